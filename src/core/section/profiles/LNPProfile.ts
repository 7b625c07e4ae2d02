/**
 * LNP angle profile (equal and unequal leg angles)
 *
 * The web is the vertical leg, the base the horizontal one. Traced
 * clockwise from the top-left corner of the web.
 */

import { ConsoleService } from '../../console/ConsoleService';
import type { ClosedPolygon } from '../ClosedPolygon';
import { PathBuilder } from '../PathBuilder';
import { Profile, type ProfileOptions } from '../Profile';
import { assertNotFullyCorroded, growRadius, shrinkRadius, updateNameWithCorrosion } from '../corrosion';
import { raiseIfNegative } from '../validation';

export interface LNPDimensions {
  totalHeight: number;
  totalWidth: number;
  webThickness: number;
  baseThickness: number;
  /** Fillet between web and base */
  rootRadius: number;
  /** Outer corner behind the root */
  backRadius: number;
  webToeRadius: number;
  baseToeRadius: number;
}

export class LNPProfile extends Profile<LNPDimensions, LNPProfile> {
  readonly family = 'LNP';

  readonly webToeStraightPart: number;
  readonly baseToeStraightPart: number;
  readonly webOuterHeight: number;
  readonly webInnerHeight: number;
  readonly baseOuterWidth: number;
  readonly baseInnerWidth: number;

  constructor(dimensions: LNPDimensions, options: ProfileOptions = {}) {
    super(dimensions, 'LNP Profile', options);
    const d = this.dimensions;
    raiseIfNegative({ ...d });

    this.webToeStraightPart = d.webThickness - d.webToeRadius;
    this.baseToeStraightPart = d.baseThickness - d.baseToeRadius;
    this.webOuterHeight = d.totalHeight - d.backRadius;
    this.webInnerHeight = d.totalHeight - d.baseThickness - d.rootRadius - d.webToeRadius;
    this.baseOuterWidth = d.totalWidth - d.backRadius;
    this.baseInnerWidth = d.totalWidth - d.webThickness - d.rootRadius - d.baseToeRadius;

    raiseIfNegative({
      webToeStraightPart: this.webToeStraightPart,
      baseToeStraightPart: this.baseToeStraightPart,
      webOuterHeight: this.webOuterHeight,
      webInnerHeight: this.webInnerHeight,
      baseOuterWidth: this.baseOuterWidth,
      baseInnerWidth: this.baseInnerWidth,
    });
  }

  protected create(dimensions: LNPDimensions, options: ProfileOptions): LNPProfile {
    return new LNPProfile(dimensions, options);
  }

  get maxProfileThickness(): number {
    return Math.max(this.dimensions.webThickness, this.dimensions.baseThickness);
  }

  protected buildPolygon(): ClosedPolygon {
    const d = this.dimensions;
    return new PathBuilder({ x: 0, y: 0 })
      // Web
      .appendLine(this.webToeStraightPart, 0)
      .appendArc(-90, 0, d.webToeRadius)
      .appendLine(this.webInnerHeight, 270)
      // Root
      .appendArc(90, 270, d.rootRadius)
      // Base
      .appendLine(this.baseInnerWidth, 0)
      .appendArc(-90, 0, d.baseToeRadius)
      .appendLine(this.baseToeStraightPart, 270)
      .appendLine(this.baseOuterWidth, 180)
      // Back
      .appendArc(-90, 180, d.backRadius)
      .appendLine(this.webOuterHeight, 90)
      .generatePolygon();
  }

  /**
   * Uniform corrosion on all faces. Returns this instance for zero corrosion.
   */
  withCorrosion(corrosion: number): LNPProfile {
    raiseIfNegative({ corrosion });
    if (corrosion === 0) return this;

    const d = this.dimensions;
    const webThickness = d.webThickness - 2 * corrosion;
    const baseThickness = d.baseThickness - 2 * corrosion;
    assertNotFullyCorroded({ webThickness, baseThickness });

    // A toe radius never exceeds the leg it rounds off
    const corroded: LNPDimensions = {
      totalHeight: d.totalHeight - 2 * corrosion,
      totalWidth: d.totalWidth - 2 * corrosion,
      webThickness,
      baseThickness,
      rootRadius: growRadius(d.rootRadius, corrosion),
      backRadius: shrinkRadius(d.backRadius, corrosion),
      webToeRadius: Math.min(shrinkRadius(d.webToeRadius, corrosion), webThickness),
      baseToeRadius: Math.min(shrinkRadius(d.baseToeRadius, corrosion), baseThickness),
    };

    const name = updateNameWithCorrosion(this.name, { corrosion });
    ConsoleService.debug(`${this.name}: corrosion ${corrosion} mm`, 'corrosion');
    return new LNPProfile(corroded, { ...this.options, name });
  }
}
