/**
 * Section geometry settings
 *
 * Process-wide defaults read by the path builder, the corrosion transform and
 * the polygon assembler. Overrides are validated eagerly.
 */

import { ConsoleService, type LogLevel } from '../console/ConsoleService';
import { raiseIfNotPositive } from './validation';

export interface SectionConfig {
  /** Largest angle one tessellated arc segment may span [deg] */
  maxSegmentAngle: number;
  /** Remaining thickness at or below which a profile counts as fully corroded [mm] */
  fullCorrosionTolerance: number;
  /** Distance below which consecutive points are merged [mm] */
  pointTolerance: number;
  logLevel: LogLevel;
}

export const DEFAULT_SECTION_CONFIG: Readonly<SectionConfig> = Object.freeze({
  maxSegmentAngle: 5,
  fullCorrosionTolerance: 1e-3,
  pointTolerance: 1e-9,
  logLevel: 'info',
});

let current: Readonly<SectionConfig> = DEFAULT_SECTION_CONFIG;

export function getSectionConfig(): Readonly<SectionConfig> {
  return current;
}

export function configureSection(overrides: Partial<SectionConfig>): Readonly<SectionConfig> {
  const next: SectionConfig = { ...current, ...overrides };
  raiseIfNotPositive({
    maxSegmentAngle: next.maxSegmentAngle,
    fullCorrosionTolerance: next.fullCorrosionTolerance,
    pointTolerance: next.pointTolerance,
  });
  current = Object.freeze(next);
  ConsoleService.setMinLevel(current.logLevel);
  return current;
}

export function resetSectionConfig(): Readonly<SectionConfig> {
  current = DEFAULT_SECTION_CONFIG;
  ConsoleService.setMinLevel(current.logLevel);
  return current;
}
