import { describe, it, expect } from 'vitest';
import {
  convertArea,
  convertFromMm,
  convertLength,
  convertMomentOfInertia,
  convertVolume,
  formatWithUnit,
} from './units';

describe('unit conversion', () => {
  it('converts from millimetre base units', () => {
    expect(convertLength(2500, 'm')).toBeCloseTo(2.5, 12);
    expect(convertArea(1e6, 'm²')).toBeCloseTo(1, 12);
    expect(convertVolume(800000, 'm³')).toBeCloseTo(8e-4, 15);
    expect(convertMomentOfInertia(1e4, 'cm⁴')).toBeCloseTo(1, 12);
  });

  it('dispatches by unit type', () => {
    expect(convertFromMm(150, 'length', 'cm')).toBeCloseTo(15, 12);
    expect(convertFromMm(3e4, 'volume', 'cm³')).toBeCloseTo(30, 12);
  });
});

describe('formatWithUnit', () => {
  it('groups thousands and trims decimals', () => {
    expect(formatWithUnit(1520.5, 'area', 'mm²')).toBe('1,520.5 mm²');
    expect(formatWithUnit(3218.654, 'area', 'cm²', 2)).toBe('32.19 cm²');
  });
});
