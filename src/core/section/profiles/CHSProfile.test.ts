import { describe, it, expect } from 'vitest';
import { CHSProfile } from './CHSProfile';
import { FullyCorrodedError, NegativeValueError, NotPositiveValueError } from '../errors';

describe('CHSProfile', () => {
  const tube = new CHSProfile({ outerDiameter: 100, wallThickness: 5 });

  it('derives the inner diameter', () => {
    expect(tube.innerDiameter).toBe(90);
    expect(tube.maxProfileThickness).toBe(5);
  });

  it('tessellates with chords of about 1 mm', () => {
    expect(tube.maxSegmentAngle).toBeCloseTo(360 / (Math.PI * 100), 12);
    expect(tube.polygon.outer).toHaveLength(315);
    expect(tube.polygon.holes).toHaveLength(1);
    expect(tube.polygon.holes[0]).toHaveLength(315);
  });

  it('stays close to the exact ring area', () => {
    expect(tube.area).toBeCloseTo(1492.1576, 3);
    expect(Math.abs(tube.area - Math.PI * (50 ** 2 - 45 ** 2))).toBeLessThan(0.2);
    expect(tube.perimeter).toBeCloseTo(596.8927, 3);
  });

  it('is centred on the origin', () => {
    expect(tube.centroid.x).toBeCloseTo(0, 9);
    expect(tube.centroid.y).toBeCloseTo(0, 9);
    expect(tube.profileWidth).toBeCloseTo(100, 2);
  });

  it('builds a solid bar when the wall fills the section', () => {
    const bar = new CHSProfile({ outerDiameter: 20, wallThickness: 10 });
    expect(bar.polygon.holes).toHaveLength(0);
    expect(bar.polygon.outer).toHaveLength(72);
    expect(bar.area).toBeCloseTo(313.7607, 3);
  });

  it('treats a hole below the point tolerance as solid', () => {
    const bar = new CHSProfile({ outerDiameter: 20, wallThickness: 10 - 5e-13 });
    expect(bar.innerDiameter).toBeGreaterThan(0);
    expect(bar.polygon.holes).toHaveLength(0);
    expect(bar.area).toBeCloseTo(313.7607, 3);
  });

  it('validates dimensions', () => {
    expect(() => new CHSProfile({ outerDiameter: 10, wallThickness: 6 })).toThrow(NegativeValueError);
    expect(() => new CHSProfile({ outerDiameter: 0, wallThickness: 0 })).toThrow(NotPositiveValueError);
    expect(() => new CHSProfile({ outerDiameter: 10, wallThickness: -1 })).toThrow(NegativeValueError);
  });

  describe('withCorrosion', () => {
    it('shrinks the outside and thins the wall', () => {
      const corroded = tube.withCorrosion({ corrosionOutside: 1, corrosionInside: 0.5 });
      expect(corroded.dimensions.outerDiameter).toBe(98);
      expect(corroded.dimensions.wallThickness).toBe(3.5);
      expect(corroded.innerDiameter).toBe(91);
      expect(corroded.name).toBe('CHS Profile (corrosion inside: 0.5 mm, outside: 1.0 mm)');
    });

    it('equals one combined step when applied twice', () => {
      const twice = tube.withCorrosion({ corrosionOutside: 0.5 }).withCorrosion({ corrosionOutside: 0.5, corrosionInside: 1 });
      const once = tube.withCorrosion({ corrosionOutside: 1, corrosionInside: 1 });
      expect(twice.dimensions.outerDiameter).toBeCloseTo(once.dimensions.outerDiameter, 9);
      expect(twice.dimensions.wallThickness).toBeCloseTo(once.dimensions.wallThickness, 9);
      expect(twice.name).toBe(once.name);
    });

    it('returns the same instance for zero corrosion', () => {
      expect(tube.withCorrosion({})).toBe(tube);
    });

    it('keeps a thin valid ring just before the wall is gone', () => {
      const thin = tube.withCorrosion({ corrosionOutside: 2, corrosionInside: 2.9 });
      expect(thin.dimensions.wallThickness).toBeCloseTo(0.1, 9);
      expect(thin.polygon.holes).toHaveLength(1);
      expect(thin.area).toBeCloseTo(30.13, 1);
      expect(thin.area).toBeLessThan(tube.area);
    });

    it('fails when the wall is gone', () => {
      expect(() => tube.withCorrosion({ corrosionOutside: 2.5, corrosionInside: 2.5 })).toThrow(FullyCorrodedError);
    });

    it('rejects negative values', () => {
      expect(() => tube.withCorrosion({ corrosionInside: -1 })).toThrow(NegativeValueError);
    });
  });
});
