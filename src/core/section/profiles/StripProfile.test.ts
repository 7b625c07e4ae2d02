import { describe, it, expect } from 'vitest';
import { StripProfile } from './StripProfile';
import { FullyCorrodedError, NegativeValueError, NotPositiveValueError } from '../errors';

describe('StripProfile', () => {
  const strip = new StripProfile({ width: 160, height: 5 }, { name: '160x5' });

  it('builds a centred rectangle', () => {
    expect(strip.area).toBeCloseTo(800, 9);
    expect(strip.perimeter).toBeCloseTo(330, 9);
    expect(strip.profileWidth).toBeCloseTo(160, 9);
    expect(strip.profileHeight).toBeCloseTo(5, 9);
    expect(strip.centroid.x).toBeCloseTo(0, 9);
    expect(strip.centroid.y).toBeCloseTo(0, 9);
    expect(strip.maxProfileThickness).toBe(5);
  });

  it('uses a default name', () => {
    expect(new StripProfile({ width: 10, height: 2 }).name).toBe('Strip Profile');
  });

  it('rejects non-positive dimensions', () => {
    expect(() => new StripProfile({ width: 0, height: 5 })).toThrow(NotPositiveValueError);
  });

  it('freezes its dimensions', () => {
    expect(Object.isFrozen(strip.dimensions)).toBe(true);
  });

  it('reports volume per metre', () => {
    expect(strip.volumePerMeter).toBeCloseTo(8e-4, 12);
  });

  it('derives section properties', () => {
    const props = strip.sectionProperties();
    expect(props.Ixx_c).toBeCloseTo(160 * 5 ** 3 / 12, 6);
    expect(props.Iyy_c).toBeCloseTo(5 * 160 ** 3 / 12, 3);
  });

  describe('transform', () => {
    it('rotates about the centroid, then offsets', () => {
      const moved = strip.transform({ horizontalOffset: 10, rotation: 90 });
      expect(moved).toBeInstanceOf(StripProfile);
      expect(moved.centroid.x).toBeCloseTo(10, 9);
      expect(moved.centroid.y).toBeCloseTo(0, 9);
      expect(moved.profileWidth).toBeCloseTo(5, 9);
      expect(moved.profileHeight).toBeCloseTo(160, 9);
      expect(moved.name).toBe('160x5');
    });

    it('adds to the existing placement', () => {
      const moved = strip.transform({ horizontalOffset: 10 }).transform({ horizontalOffset: 5, verticalOffset: -2 });
      expect(moved.horizontalOffset).toBe(15);
      expect(moved.verticalOffset).toBe(-2);
      expect(moved.localPolygon.centroid.x).toBeCloseTo(0, 9);
    });
  });

  describe('withCorrosion', () => {
    it('removes material from all four faces', () => {
      const corroded = strip.withCorrosion(1);
      expect(corroded.dimensions).toEqual({ width: 158, height: 3 });
      expect(corroded.name).toBe('160x5 (corrosion: 1.0 mm)');
    });

    it('returns the same instance for zero corrosion', () => {
      expect(strip.withCorrosion(0)).toBe(strip);
    });

    it('accumulates in dimensions and name', () => {
      const twice = strip.withCorrosion(0.5).withCorrosion(1);
      const once = strip.withCorrosion(1.5);
      expect(twice.dimensions).toEqual(once.dimensions);
      expect(twice.dimensions).toEqual({ width: 157, height: 2 });
      expect(twice.name).toBe('160x5 (corrosion: 1.5 mm)');
      expect(once.name).toBe(twice.name);
    });

    it('leaves a thin plate just before the height is used up', () => {
      const thin = strip.withCorrosion(2.4);
      expect(thin.dimensions.height).toBeCloseTo(0.2, 9);
      expect(thin.area).toBeCloseTo(155.2 * 0.2, 9);
      expect(thin.area).toBeLessThan(strip.area);
    });

    it('keeps the placement', () => {
      const corroded = strip.transform({ verticalOffset: 20 }).withCorrosion(1);
      expect(corroded.verticalOffset).toBe(20);
    });

    it('fails once a dimension is used up', () => {
      expect(() => strip.withCorrosion(2.5)).toThrow(FullyCorrodedError);
    });

    it('rejects negative corrosion', () => {
      expect(() => strip.withCorrosion(-1)).toThrow(NegativeValueError);
    });
  });

  it('serializes its definition', () => {
    expect(strip.toJSON()).toEqual({
      family: 'STRIP',
      name: '160x5',
      dimensions: { width: 160, height: 5 },
      horizontalOffset: 0,
      verticalOffset: 0,
      rotation: 0,
    });
  });
});
