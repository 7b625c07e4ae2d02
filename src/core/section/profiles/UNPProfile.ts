/**
 * UNP channel profile with sloped flanges
 *
 * Each flange has its own width, thickness, slope (in percent) and root,
 * toe and outer-corner radii. Flange thickness is specified at half the
 * flange width. The path starts halfway up the back of the web, runs
 * clockwise over the top flange, down the inside of the web and back over
 * the bottom flange, which mirrors the top one.
 */

import { ConsoleService } from '../../console/ConsoleService';
import type { ClosedPolygon } from '../ClosedPolygon';
import { degToRad, radToDeg, POINT_TOLERANCE } from '../Geometry2D';
import { PathBuilder } from '../PathBuilder';
import { Profile, type ProfileOptions } from '../Profile';
import { PreconditionError } from '../errors';
import { assertNotFullyCorroded, growRadius, shrinkRadius, updateNameWithCorrosion } from '../corrosion';
import { raiseIfNegative } from '../validation';

export interface UNPDimensions {
  topFlangeTotalWidth: number;
  topFlangeThickness: number;
  bottomFlangeTotalWidth: number;
  bottomFlangeThickness: number;
  totalHeight: number;
  webThickness: number;
  topRootFilletRadius: number;
  topToeRadius: number;
  topOuterCornerRadius: number;
  bottomRootFilletRadius: number;
  bottomToeRadius: number;
  bottomOuterCornerRadius: number;
  /** Inner flange face grade [%] */
  topSlope: number;
  bottomSlope: number;
}

/** Derived lengths of one flange */
export type FlangeGeometry = {
  /** Slope as an angle [deg] */
  slopeAngle: number;
  rootFilletHeight: number;
  rootFilletWidth: number;
  toeRadiusHeight: number;
  toeRadiusWidth: number;
  slopeWidth: number;
  slopeHeight: number;
  slopeLength: number;
  toeTotalHeight: number;
  toeFlatHeight: number;
  webInnerHeight: number;
};

/** Convert a grade in percent to an angle in degrees */
export function slopeToAngle(slope: number): number {
  return radToDeg(Math.atan(slope / 100));
}

/** Flange thickness at the toe before the toe radius is cut off */
function toeTipThickness(width: number, thickness: number, slope: number): number {
  return thickness - (width / 2) * slope / 100;
}

/**
 * Largest toe radius that leaves a non-negative flat at the flange tip:
 * the toe flat is the tip thickness minus r·(cos α − (1 − sin α)·slope).
 */
function maxToeRadius(width: number, thickness: number, slope: number): number {
  const rad = degToRad(slopeToAngle(slope));
  const drop = Math.cos(rad) - (1 - Math.sin(rad)) * slope / 100;
  return toeTipThickness(width, thickness, slope) / drop;
}

function flangeGeometry(
  width: number,
  thickness: number,
  slope: number,
  rootRadius: number,
  toeRadius: number,
  webThickness: number,
  totalHeight: number
): FlangeGeometry {
  const slopeAngle = slopeToAngle(slope);
  const rad = degToRad(slopeAngle);

  const rootFilletHeight = Math.cos(rad) * rootRadius;
  const rootFilletWidth = (1 - Math.sin(rad)) * rootRadius;
  const toeRadiusHeight = Math.cos(rad) * toeRadius;
  const toeRadiusWidth = (1 - Math.sin(rad)) * toeRadius;

  const slopeWidth = width - webThickness - rootFilletWidth - toeRadiusWidth;
  const slopeHeight = Math.tan(rad) * slopeWidth;
  const slopeLength = Math.hypot(slopeWidth, slopeHeight);

  const toeTotalHeight = thickness - (width / 2 - toeRadiusWidth) * slope / 100;
  const flat = toeTotalHeight - toeRadiusHeight;
  // A toe radius capped by maxToeRadius lands on zero up to round-off
  const toeFlatHeight = Math.abs(flat) < POINT_TOLERANCE ? 0 : flat;
  const webInnerHeight = totalHeight / 2 - toeTotalHeight - slopeHeight - rootFilletHeight;

  return {
    slopeAngle,
    rootFilletHeight,
    rootFilletWidth,
    toeRadiusHeight,
    toeRadiusWidth,
    slopeWidth,
    slopeHeight,
    slopeLength,
    toeTotalHeight,
    toeFlatHeight,
    webInnerHeight,
  };
}

function prefixed(prefix: 'top' | 'bottom', flange: FlangeGeometry): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [key, value] of Object.entries(flange)) {
    result[`${prefix}${key.charAt(0).toUpperCase()}${key.slice(1)}`] = value;
  }
  return result;
}

export class UNPProfile extends Profile<UNPDimensions, UNPProfile> {
  readonly family = 'UNP';
  readonly top: FlangeGeometry;
  readonly bottom: FlangeGeometry;

  constructor(dimensions: UNPDimensions, options: ProfileOptions = {}) {
    super(dimensions, 'UNP Profile', options);
    const d = this.dimensions;
    raiseIfNegative({ ...d });
    for (const [key, slope] of [['topSlope', d.topSlope], ['bottomSlope', d.bottomSlope]] as const) {
      if (slope >= 100) {
        throw new PreconditionError(`Flange slope must be below 100%: ${key}=${slope}`);
      }
    }

    this.top = flangeGeometry(
      d.topFlangeTotalWidth, d.topFlangeThickness, d.topSlope,
      d.topRootFilletRadius, d.topToeRadius, d.webThickness, d.totalHeight
    );
    this.bottom = flangeGeometry(
      d.bottomFlangeTotalWidth, d.bottomFlangeThickness, d.bottomSlope,
      d.bottomRootFilletRadius, d.bottomToeRadius, d.webThickness, d.totalHeight
    );

    raiseIfNegative({
      ...prefixed('top', this.top),
      ...prefixed('bottom', this.bottom),
      topOuterStraight: d.totalHeight / 2 - d.topOuterCornerRadius,
      bottomOuterStraight: d.totalHeight / 2 - d.bottomOuterCornerRadius,
      topFlangeOuterStraight: d.topFlangeTotalWidth - d.topOuterCornerRadius,
      bottomFlangeOuterStraight: d.bottomFlangeTotalWidth - d.bottomOuterCornerRadius,
    });
  }

  protected create(dimensions: UNPDimensions, options: ProfileOptions): UNPProfile {
    return new UNPProfile(dimensions, options);
  }

  get maxProfileThickness(): number {
    const d = this.dimensions;
    return Math.max(d.topFlangeThickness, d.bottomFlangeThickness, d.webThickness);
  }

  protected buildPolygon(): ClosedPolygon {
    const d = this.dimensions;
    const { top, bottom } = this;
    const a = top.slopeAngle;
    const b = bottom.slopeAngle;

    return new PathBuilder({ x: 0, y: 0 })
      // Back of the web, up to the top flange
      .appendLine(d.totalHeight / 2 - d.topOuterCornerRadius, 90)
      // Top flange
      .appendArc(-90, 90, d.topOuterCornerRadius)
      .appendLine(d.topFlangeTotalWidth - d.topOuterCornerRadius, 0)
      .appendLine(top.toeFlatHeight, 270)
      .appendArc(-90 + a, 270, d.topToeRadius)
      .appendLine(top.slopeLength, 180 + a)
      .appendArc(90 - a, 180 + a, d.topRootFilletRadius)
      // Inside of the web
      .appendLine(top.webInnerHeight, 270)
      .appendLine(bottom.webInnerHeight, 270)
      // Bottom flange
      .appendArc(90 - b, 270, d.bottomRootFilletRadius)
      .appendLine(bottom.slopeLength, -b)
      .appendArc(-90 + b, -b, d.bottomToeRadius)
      .appendLine(bottom.toeFlatHeight, 270)
      .appendLine(d.bottomFlangeTotalWidth - d.bottomOuterCornerRadius, 180)
      .appendArc(-90, 180, d.bottomOuterCornerRadius)
      // Back of the web, closing the ring
      .appendLine(d.totalHeight / 2 - d.bottomOuterCornerRadius, 90)
      .generatePolygon();
  }

  /**
   * Uniform corrosion on all faces; slopes are kept. Toe radii shrink with
   * the corrosion and are capped so the thinner flange tip keeps its flat.
   * Returns this instance for zero corrosion.
   */
  withCorrosion(corrosion: number): UNPProfile {
    raiseIfNegative({ corrosion });
    if (corrosion === 0) return this;

    const d = this.dimensions;
    const topFlangeTotalWidth = d.topFlangeTotalWidth - 2 * corrosion;
    const topFlangeThickness = d.topFlangeThickness - 2 * corrosion;
    const bottomFlangeTotalWidth = d.bottomFlangeTotalWidth - 2 * corrosion;
    const bottomFlangeThickness = d.bottomFlangeThickness - 2 * corrosion;
    const webThickness = d.webThickness - 2 * corrosion;

    assertNotFullyCorroded({
      topFlangeThickness,
      bottomFlangeThickness,
      webThickness,
      topToeTipThickness: toeTipThickness(topFlangeTotalWidth, topFlangeThickness, d.topSlope),
      bottomToeTipThickness: toeTipThickness(bottomFlangeTotalWidth, bottomFlangeThickness, d.bottomSlope),
    });

    const corroded: UNPDimensions = {
      topFlangeTotalWidth,
      topFlangeThickness,
      bottomFlangeTotalWidth,
      bottomFlangeThickness,
      totalHeight: d.totalHeight - 2 * corrosion,
      webThickness,
      topRootFilletRadius: growRadius(d.topRootFilletRadius, corrosion),
      topToeRadius: Math.min(
        shrinkRadius(d.topToeRadius, corrosion),
        maxToeRadius(topFlangeTotalWidth, topFlangeThickness, d.topSlope)
      ),
      topOuterCornerRadius: shrinkRadius(d.topOuterCornerRadius, corrosion),
      bottomRootFilletRadius: growRadius(d.bottomRootFilletRadius, corrosion),
      bottomToeRadius: Math.min(
        shrinkRadius(d.bottomToeRadius, corrosion),
        maxToeRadius(bottomFlangeTotalWidth, bottomFlangeThickness, d.bottomSlope)
      ),
      bottomOuterCornerRadius: shrinkRadius(d.bottomOuterCornerRadius, corrosion),
      topSlope: d.topSlope,
      bottomSlope: d.bottomSlope,
    };

    const name = updateNameWithCorrosion(this.name, { corrosion });
    ConsoleService.debug(`${this.name}: corrosion ${corrosion} mm`, 'corrosion');
    return new UNPProfile(corroded, { ...this.options, name });
  }
}
