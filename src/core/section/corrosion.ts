/**
 * Uniform corrosion helpers shared by the profile families.
 *
 * A profile's name records the corrosion applied so far, either as a single
 * value ("IPE200 (corrosion: 1.5 mm)") or, for hollow sections, as separate
 * inside/outside values. Applying more corrosion sums into that annotation.
 */

import { DEFAULT_SECTION_CONFIG, getSectionConfig } from './config';
import { FullyCorrodedError } from './errors';

export const FULL_CORROSION_TOLERANCE = DEFAULT_SECTION_CONFIG.fullCorrosionTolerance;

/** Uniform material loss on every exposed face [mm] */
export interface SingleCorrosion {
  corrosion: number;
}

/** Material loss on the outer and inner faces of a hollow section [mm] */
export interface DoubleCorrosion {
  corrosionInside?: number;
  corrosionOutside?: number;
}

export type CorrosionSpec = SingleCorrosion | DoubleCorrosion;

const SINGLE_PATTERN = /\s*\(corrosion:\s*([0-9.]+)\s*mm\)\s*$/;
const DOUBLE_PATTERN = /\s*\(corrosion\s+inside:\s*([0-9.]+)\s*mm,\s*outside:\s*([0-9.]+)\s*mm\)\s*$/;

/**
 * Corrosion values are summed in floating point; rounding to 1e-6 mm keeps
 * "0.1 then 0.2" and "0.3" on the same label. Whole numbers keep one decimal.
 */
export function formatCorrosion(value: number): string {
  const rounded = Math.round(value * 1e6) / 1e6;
  return Number.isInteger(rounded) ? rounded.toFixed(1) : String(rounded);
}

function isSingle(spec: CorrosionSpec): spec is SingleCorrosion {
  return 'corrosion' in spec && spec.corrosion !== undefined;
}

/**
 * Add corrosion to a profile name, summing with any value already recorded.
 */
export function updateNameWithCorrosion(currentName: string, spec: CorrosionSpec): string {
  const single = isSingle(spec);
  const double = 'corrosionInside' in spec || 'corrosionOutside' in spec;

  if (single && double) {
    throw new Error('Cannot use both single corrosion and double (inside/outside) corrosion parameters');
  }

  if (isSingle(spec)) {
    const match = SINGLE_PATTERN.exec(currentName);
    const existing = match ? parseFloat(match[1]) : 0;
    const base = match ? currentName.replace(SINGLE_PATTERN, '') : currentName;
    return `${base} (corrosion: ${formatCorrosion(existing + spec.corrosion)} mm)`;
  }

  if (!double || (spec.corrosionInside === undefined && spec.corrosionOutside === undefined)) {
    throw new Error('At least one corrosion parameter must be provided');
  }

  const match = DOUBLE_PATTERN.exec(currentName);
  const existingInside = match ? parseFloat(match[1]) : 0;
  const existingOutside = match ? parseFloat(match[2]) : 0;
  const base = match ? currentName.replace(DOUBLE_PATTERN, '') : currentName;
  const inside = formatCorrosion(existingInside + (spec.corrosionInside ?? 0));
  const outside = formatCorrosion(existingOutside + (spec.corrosionOutside ?? 0));
  return `${base} (corrosion inside: ${inside} mm, outside: ${outside} mm)`;
}

/** Convex radii lose material and cannot go below zero */
export function shrinkRadius(radius: number, corrosion: number): number {
  return Math.max(radius - corrosion, 0);
}

/** Concave radii grow as material is removed from both faces */
export function growRadius(radius: number, corrosion: number): number {
  return radius + corrosion;
}

/**
 * Throws when any remaining thickness is at or below the full-corrosion
 * tolerance.
 */
export function assertNotFullyCorroded(
  thicknesses: Record<string, number>,
  tolerance: number = getSectionConfig().fullCorrosionTolerance
): void {
  for (const value of Object.values(thicknesses)) {
    if (value <= tolerance) {
      throw new FullyCorrodedError();
    }
  }
}
