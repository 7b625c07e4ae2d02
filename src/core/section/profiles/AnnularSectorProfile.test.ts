import { describe, it, expect } from 'vitest';
import { AnnularSectorProfile, type AnnularSectorDimensions } from './AnnularSectorProfile';
import { NegativeValueError, NotPositiveValueError, PreconditionError } from '../errors';

const quarter: AnnularSectorDimensions = {
  innerRadius: 50,
  thickness: 10,
  startAngle: 0,
  endAngle: 90,
  x: 0,
  y: 0,
};

// Area ratio of a 72-gon to its circumscribed circle
const TESSELLATION_FACTOR = (72 * Math.sin(Math.PI / 36)) / (2 * Math.PI);

describe('AnnularSectorProfile', () => {
  const sector = new AnnularSectorProfile(quarter);

  it('derives the radii', () => {
    expect(sector.outerRadius).toBe(60);
    expect(sector.centerlineRadius).toBe(55);
    expect(sector.span).toBe(90);
    expect(sector.maxProfileThickness).toBe(10);
  });

  it('covers the given angles clockwise from the top', () => {
    const { minX, minY, maxX, maxY } = sector.polygon.bounds;
    expect(minX).toBeCloseTo(0, 6);
    expect(minY).toBeCloseTo(0, 6);
    expect(maxX).toBeCloseTo(60, 6);
    expect(maxY).toBeCloseTo(60, 6);
  });

  it('matches the sector area up to tessellation', () => {
    const exact = (90 / 360) * Math.PI * (60 ** 2 - 50 ** 2);
    expect(sector.area / exact).toBeCloseTo(TESSELLATION_FACTOR, 3);
  });

  it('is symmetric when centred on the top', () => {
    const top = new AnnularSectorProfile({ ...quarter, startAngle: -45, endAngle: 45 });
    expect(top.centroid.x).toBeCloseTo(0, 6);
    expect(top.polygon.bounds.maxY).toBeCloseTo(60, 6);
  });

  it('builds a half disc without inner radius', () => {
    const half = new AnnularSectorProfile({ ...quarter, innerRadius: 0, startAngle: 0, endAngle: 180 });
    expect(half.polygon.holes).toHaveLength(0);
    expect(half.area / (Math.PI * 100 / 2)).toBeCloseTo(TESSELLATION_FACTOR, 3);
    expect(half.polygon.bounds.minY).toBeCloseTo(-10, 6);
    expect(half.polygon.bounds.maxX).toBeCloseTo(10, 6);
  });

  it('spans more than half a turn', () => {
    const wide = new AnnularSectorProfile({ ...quarter, startAngle: 0, endAngle: 270 });
    const exact = (270 / 360) * Math.PI * (60 ** 2 - 50 ** 2);
    expect(wide.area / exact).toBeCloseTo(TESSELLATION_FACTOR, 3);
  });

  it('is placed around (x, y)', () => {
    const placed = new AnnularSectorProfile({ ...quarter, x: 100, y: 50 });
    expect(placed.polygon.bounds.minX).toBeCloseTo(100, 6);
    expect(placed.polygon.bounds.minY).toBeCloseTo(50, 6);
    expect(placed.polygon.bounds.maxX).toBeCloseTo(160, 6);
  });

  describe('validation', () => {
    it('rejects a negative inner radius', () => {
      expect(() => new AnnularSectorProfile({ ...quarter, innerRadius: -1 })).toThrow(NegativeValueError);
    });

    it('needs a positive thickness', () => {
      expect(() => new AnnularSectorProfile({ ...quarter, thickness: 0 })).toThrow(NotPositiveValueError);
    });

    it('limits the start angle to one turn either way', () => {
      expect(() => new AnnularSectorProfile({ ...quarter, startAngle: 400, endAngle: 410 })).toThrow(PreconditionError);
    });

    it('needs the end angle after the start angle', () => {
      expect(() => new AnnularSectorProfile({ ...quarter, endAngle: 0 })).toThrow(PreconditionError);
    });

    it('refuses a full ring', () => {
      expect(() => new AnnularSectorProfile({ ...quarter, startAngle: 0, endAngle: 360 })).toThrow(PreconditionError);
    });
  });
});
