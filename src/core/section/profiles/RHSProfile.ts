/**
 * Rectangular / Square Hollow Section (RHS, SHS)
 *
 * Every wall and every corner radius is independent, which also covers
 * partially corroded or fabricated box sections.
 */

import { ConsoleService } from '../../console/ConsoleService';
import type { ClosedPolygon } from '../ClosedPolygon';
import { PathBuilder } from '../PathBuilder';
import { Profile, type ProfileOptions } from '../Profile';
import {
  assertNotFullyCorroded,
  growRadius,
  shrinkRadius,
  updateNameWithCorrosion,
  type DoubleCorrosion,
} from '../corrosion';
import { PreconditionError } from '../errors';
import { raiseIfNegative } from '../validation';

export interface RHSDimensions {
  totalWidth: number;
  totalHeight: number;
  leftWallThickness: number;
  rightWallThickness: number;
  topWallThickness: number;
  bottomWallThickness: number;
  topRightOuterRadius: number;
  topLeftOuterRadius: number;
  bottomRightOuterRadius: number;
  bottomLeftOuterRadius: number;
  topRightInnerRadius: number;
  topLeftInnerRadius: number;
  bottomRightInnerRadius: number;
  bottomLeftInnerRadius: number;
}

/** Four equal walls and equal corner radii */
export interface UniformRHSDimensions {
  totalWidth: number;
  totalHeight: number;
  wallThickness: number;
  outerRadius: number;
  innerRadius: number;
}

export function uniformRHSDimensions(d: UniformRHSDimensions): RHSDimensions {
  return {
    totalWidth: d.totalWidth,
    totalHeight: d.totalHeight,
    leftWallThickness: d.wallThickness,
    rightWallThickness: d.wallThickness,
    topWallThickness: d.wallThickness,
    bottomWallThickness: d.wallThickness,
    topRightOuterRadius: d.outerRadius,
    topLeftOuterRadius: d.outerRadius,
    bottomRightOuterRadius: d.outerRadius,
    bottomLeftOuterRadius: d.outerRadius,
    topRightInnerRadius: d.innerRadius,
    topLeftInnerRadius: d.innerRadius,
    bottomRightInnerRadius: d.innerRadius,
    bottomLeftInnerRadius: d.innerRadius,
  };
}

type DimensionKey = keyof RHSDimensions;

// outer radius, inner radius and the two walls meeting at each corner
const CORNERS: readonly (readonly [DimensionKey, DimensionKey, DimensionKey, DimensionKey])[] = [
  ['topRightOuterRadius', 'topRightInnerRadius', 'topWallThickness', 'rightWallThickness'],
  ['topLeftOuterRadius', 'topLeftInnerRadius', 'topWallThickness', 'leftWallThickness'],
  ['bottomRightOuterRadius', 'bottomRightInnerRadius', 'bottomWallThickness', 'rightWallThickness'],
  ['bottomLeftOuterRadius', 'bottomLeftInnerRadius', 'bottomWallThickness', 'leftWallThickness'],
];

export class RHSProfile extends Profile<RHSDimensions, RHSProfile> {
  readonly family = 'RHS';

  // Straight wall lengths between the corner arcs
  readonly rightWallOuterHeight: number;
  readonly leftWallOuterHeight: number;
  readonly topWallOuterWidth: number;
  readonly bottomWallOuterWidth: number;
  readonly rightWallInnerHeight: number;
  readonly leftWallInnerHeight: number;
  readonly topWallInnerWidth: number;
  readonly bottomWallInnerWidth: number;

  constructor(dimensions: RHSDimensions, options: ProfileOptions = {}) {
    super(dimensions, 'RHS Profile', options);
    const d = this.dimensions;
    raiseIfNegative({ ...d });

    this.rightWallOuterHeight = d.totalHeight - d.topRightOuterRadius - d.bottomRightOuterRadius;
    this.leftWallOuterHeight = d.totalHeight - d.topLeftOuterRadius - d.bottomLeftOuterRadius;
    this.topWallOuterWidth = d.totalWidth - d.topRightOuterRadius - d.topLeftOuterRadius;
    this.bottomWallOuterWidth = d.totalWidth - d.bottomRightOuterRadius - d.bottomLeftOuterRadius;

    const innerHeight = d.totalHeight - d.topWallThickness - d.bottomWallThickness;
    const innerWidth = d.totalWidth - d.leftWallThickness - d.rightWallThickness;
    this.rightWallInnerHeight = innerHeight - d.topRightInnerRadius - d.bottomRightInnerRadius;
    this.leftWallInnerHeight = innerHeight - d.topLeftInnerRadius - d.bottomLeftInnerRadius;
    this.topWallInnerWidth = innerWidth - d.topRightInnerRadius - d.topLeftInnerRadius;
    this.bottomWallInnerWidth = innerWidth - d.bottomRightInnerRadius - d.bottomLeftInnerRadius;

    raiseIfNegative({
      rightWallOuterHeight: this.rightWallOuterHeight,
      leftWallOuterHeight: this.leftWallOuterHeight,
      topWallOuterWidth: this.topWallOuterWidth,
      bottomWallOuterWidth: this.bottomWallOuterWidth,
      rightWallInnerHeight: this.rightWallInnerHeight,
      leftWallInnerHeight: this.leftWallInnerHeight,
      topWallInnerWidth: this.topWallInnerWidth,
      bottomWallInnerWidth: this.bottomWallInnerWidth,
    });

    // The inner corner must stay inside the outer one
    for (const [outer, inner, wallA, wallB] of CORNERS) {
      const limit = d[inner] + Math.min(d[wallA], d[wallB]);
      if (d[outer] > limit) {
        throw new PreconditionError(
          `${outer}=${d[outer]} must not exceed ${inner} plus the thinner adjacent wall (${limit})`
        );
      }
    }
  }

  protected create(dimensions: RHSDimensions, options: ProfileOptions): RHSProfile {
    return new RHSProfile(dimensions, options);
  }

  get maxProfileThickness(): number {
    const d = this.dimensions;
    return Math.max(d.leftWallThickness, d.rightWallThickness, d.topWallThickness, d.bottomWallThickness);
  }

  /**
   * Both rings start just right of their top-left corner and run clockwise.
   * They are traced in the same frame (outer bottom-left corner at the
   * origin) so the hole sits where the wall thicknesses put it; the
   * assembled section is then centred on its centroid.
   */
  protected buildPolygon(): ClosedPolygon {
    const d = this.dimensions;

    const outer = new PathBuilder({ x: d.topLeftOuterRadius, y: d.totalHeight })
      .appendLine(this.topWallOuterWidth, 0)
      .appendArc(-90, 0, d.topRightOuterRadius)
      .appendLine(this.rightWallOuterHeight, 270)
      .appendArc(-90, 270, d.bottomRightOuterRadius)
      .appendLine(this.bottomWallOuterWidth, 180)
      .appendArc(-90, 180, d.bottomLeftOuterRadius)
      .appendLine(this.leftWallOuterHeight, 90)
      .appendArc(-90, 90, d.topLeftOuterRadius)
      .generatePolygon(false);

    const inner = new PathBuilder({
      x: d.leftWallThickness + d.topLeftInnerRadius,
      y: d.totalHeight - d.topWallThickness,
    })
      .appendLine(this.topWallInnerWidth, 0)
      .appendArc(-90, 0, d.topRightInnerRadius)
      .appendLine(this.rightWallInnerHeight, 270)
      .appendArc(-90, 270, d.bottomRightInnerRadius)
      .appendLine(this.bottomWallInnerWidth, 180)
      .appendArc(-90, 180, d.bottomLeftInnerRadius)
      .appendLine(this.leftWallInnerHeight, 90)
      .appendArc(-90, 90, d.topLeftInnerRadius)
      .generatePolygon(false);

    return outer.withHoles([inner.outer]).centered();
  }

  /**
   * Remove material from the outer and inner faces. Returns this instance
   * when both values are zero.
   */
  withCorrosion({ corrosionOutside = 0, corrosionInside = 0 }: DoubleCorrosion): RHSProfile {
    raiseIfNegative({ corrosionOutside, corrosionInside });
    if (corrosionOutside === 0 && corrosionInside === 0) return this;

    const d = this.dimensions;
    const loss = corrosionOutside + corrosionInside;
    const corroded: RHSDimensions = {
      totalWidth: d.totalWidth - 2 * corrosionOutside,
      totalHeight: d.totalHeight - 2 * corrosionOutside,
      leftWallThickness: d.leftWallThickness - loss,
      rightWallThickness: d.rightWallThickness - loss,
      topWallThickness: d.topWallThickness - loss,
      bottomWallThickness: d.bottomWallThickness - loss,
      topRightOuterRadius: shrinkRadius(d.topRightOuterRadius, corrosionOutside),
      topLeftOuterRadius: shrinkRadius(d.topLeftOuterRadius, corrosionOutside),
      bottomRightOuterRadius: shrinkRadius(d.bottomRightOuterRadius, corrosionOutside),
      bottomLeftOuterRadius: shrinkRadius(d.bottomLeftOuterRadius, corrosionOutside),
      topRightInnerRadius: growRadius(d.topRightInnerRadius, corrosionInside),
      topLeftInnerRadius: growRadius(d.topLeftInnerRadius, corrosionInside),
      bottomRightInnerRadius: growRadius(d.bottomRightInnerRadius, corrosionInside),
      bottomLeftInnerRadius: growRadius(d.bottomLeftInnerRadius, corrosionInside),
    };

    assertNotFullyCorroded({
      leftWallThickness: corroded.leftWallThickness,
      rightWallThickness: corroded.rightWallThickness,
      topWallThickness: corroded.topWallThickness,
      bottomWallThickness: corroded.bottomWallThickness,
    });

    const name = updateNameWithCorrosion(this.name, { corrosionInside, corrosionOutside });
    ConsoleService.debug(`${this.name}: corrosion outside ${corrosionOutside} mm, inside ${corrosionInside} mm`, 'corrosion');
    return new RHSProfile(corroded, { ...this.options, name });
  }
}
