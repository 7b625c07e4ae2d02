/**
 * Unit conversion and formatting utilities for section values.
 * All geometry is computed in millimetre-based units (mm, mm², mm³, mm⁴).
 */

// ============================================================================
// Unit Type Definitions
// ============================================================================

/** Length units */
export type LengthUnit = 'mm' | 'cm' | 'm';

/** Area units */
export type AreaUnit = 'mm²' | 'cm²' | 'm²';

/** Volume units (also used for section moduli) */
export type VolumeUnit = 'mm³' | 'cm³' | 'm³';

/** Moment of inertia units */
export type MomentOfInertiaUnit = 'mm⁴' | 'cm⁴' | 'm⁴';

export type UnitTypeKey = 'length' | 'area' | 'volume' | 'momentOfInertia';

export interface UnitByType {
  length: LengthUnit;
  area: AreaUnit;
  volume: VolumeUnit;
  momentOfInertia: MomentOfInertiaUnit;
}

// ============================================================================
// Conversion Factors (from millimetre base units)
// ============================================================================

const LENGTH_FACTORS: Record<LengthUnit, number> = {
  'mm': 1,
  'cm': 1e-1,
  'm': 1e-3,
};

const AREA_FACTORS: Record<AreaUnit, number> = {
  'mm²': 1,
  'cm²': 1e-2,
  'm²': 1e-6,
};

const VOLUME_FACTORS: Record<VolumeUnit, number> = {
  'mm³': 1,
  'cm³': 1e-3,
  'm³': 1e-9,
};

const MOMENT_OF_INERTIA_FACTORS: Record<MomentOfInertiaUnit, number> = {
  'mm⁴': 1,
  'cm⁴': 1e-4,
  'm⁴': 1e-12,
};

/** Millimetres in one metre */
export const MM_PER_M = 1000;

// ============================================================================
// Conversion Functions
// ============================================================================

export function convertLength(valueInMm: number, toUnit: LengthUnit): number {
  return valueInMm * LENGTH_FACTORS[toUnit];
}

export function convertArea(valueInMm2: number, toUnit: AreaUnit): number {
  return valueInMm2 * AREA_FACTORS[toUnit];
}

export function convertVolume(valueInMm3: number, toUnit: VolumeUnit): number {
  return valueInMm3 * VOLUME_FACTORS[toUnit];
}

export function convertMomentOfInertia(valueInMm4: number, toUnit: MomentOfInertiaUnit): number {
  return valueInMm4 * MOMENT_OF_INERTIA_FACTORS[toUnit];
}

/**
 * Convert a millimetre-based value of the given kind.
 */
export function convertFromMm<K extends UnitTypeKey>(value: number, unitType: K, unit: UnitByType[K]): number {
  const factors: { [T in UnitTypeKey]: Record<UnitByType[T], number> } = {
    length: LENGTH_FACTORS,
    area: AREA_FACTORS,
    volume: VOLUME_FACTORS,
    momentOfInertia: MOMENT_OF_INERTIA_FACTORS,
  };
  const table: Record<UnitByType[K], number> = factors[unitType];
  return value * table[unit];
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a millimetre-based value in the requested unit, e.g. `1,520.5 mm²`.
 */
export function formatWithUnit<K extends UnitTypeKey>(
  value: number,
  unitType: K,
  unit: UnitByType[K],
  decimals: number = 3
): string {
  const formatted = convertFromMm(value, unitType, unit).toLocaleString('en-US', {
    minimumFractionDigits: 0,
    maximumFractionDigits: decimals,
  });
  return `${formatted} ${unit}`;
}
