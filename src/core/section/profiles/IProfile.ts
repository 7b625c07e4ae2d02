/**
 * I-profile with parallel flanges (IPE, HEA, HEB, ...)
 *
 * Top and bottom flange may differ in width, thickness and root radius; the
 * web is centred on both flanges. Traced clockwise from the top-left corner.
 */

import { ConsoleService } from '../../console/ConsoleService';
import type { ClosedPolygon } from '../ClosedPolygon';
import { PathBuilder } from '../PathBuilder';
import { Profile, type ProfileOptions } from '../Profile';
import { assertNotFullyCorroded, growRadius, updateNameWithCorrosion } from '../corrosion';
import { raiseIfNegative, raiseIfNotPositive } from '../validation';

export interface IDimensions {
  topFlangeWidth: number;
  topFlangeThickness: number;
  bottomFlangeWidth: number;
  bottomFlangeThickness: number;
  totalHeight: number;
  webThickness: number;
  /** Root fillet between web and top flange */
  topRadius: number;
  /** Root fillet between web and bottom flange */
  bottomRadius: number;
}

export class IProfile extends Profile<IDimensions, IProfile> {
  readonly family = 'I';

  /** Straight part of the web between the root fillets */
  readonly webHeight: number;
  /** Flange outstand beyond the root fillet, one side */
  readonly topFlangeOutstand: number;
  readonly bottomFlangeOutstand: number;

  constructor(dimensions: IDimensions, options: ProfileOptions = {}) {
    super(dimensions, 'I-Profile', options);
    const d = this.dimensions;
    raiseIfNegative({ topRadius: d.topRadius, bottomRadius: d.bottomRadius });
    raiseIfNotPositive({
      topFlangeWidth: d.topFlangeWidth,
      topFlangeThickness: d.topFlangeThickness,
      bottomFlangeWidth: d.bottomFlangeWidth,
      bottomFlangeThickness: d.bottomFlangeThickness,
      totalHeight: d.totalHeight,
      webThickness: d.webThickness,
    });

    this.webHeight =
      d.totalHeight - d.topFlangeThickness - d.bottomFlangeThickness - d.topRadius - d.bottomRadius;
    this.topFlangeOutstand = (d.topFlangeWidth - d.webThickness - 2 * d.topRadius) / 2;
    this.bottomFlangeOutstand = (d.bottomFlangeWidth - d.webThickness - 2 * d.bottomRadius) / 2;

    raiseIfNegative({
      webHeight: this.webHeight,
      topFlangeOutstand: this.topFlangeOutstand,
      bottomFlangeOutstand: this.bottomFlangeOutstand,
    });
  }

  protected create(dimensions: IDimensions, options: ProfileOptions): IProfile {
    return new IProfile(dimensions, options);
  }

  get maxProfileThickness(): number {
    const d = this.dimensions;
    return Math.max(d.topFlangeThickness, d.bottomFlangeThickness, d.webThickness);
  }

  protected buildPolygon(): ClosedPolygon {
    const d = this.dimensions;
    return new PathBuilder({ x: 0, y: 0 })
      // Top flange, right half
      .appendLine(d.topFlangeWidth, 0)
      .appendLine(d.topFlangeThickness, 270)
      .appendLine(this.topFlangeOutstand, 180)
      .appendArc(90, 180, d.topRadius)
      // Web, right face
      .appendLine(this.webHeight, 270)
      // Bottom flange
      .appendArc(90, 270, d.bottomRadius)
      .appendLine(this.bottomFlangeOutstand, 0)
      .appendLine(d.bottomFlangeThickness, 270)
      .appendLine(d.bottomFlangeWidth, 180)
      .appendLine(d.bottomFlangeThickness, 90)
      .appendLine(this.bottomFlangeOutstand, 0)
      .appendArc(90, 0, d.bottomRadius)
      // Web, left face
      .appendLine(this.webHeight, 90)
      // Top flange, left half
      .appendArc(90, 90, d.topRadius)
      .appendLine(this.topFlangeOutstand, 180)
      .appendLine(d.topFlangeThickness, 90)
      .generatePolygon();
  }

  /**
   * Uniform corrosion on all faces; root fillets grow. Returns this instance
   * for zero corrosion.
   */
  withCorrosion(corrosion: number): IProfile {
    raiseIfNegative({ corrosion });
    if (corrosion === 0) return this;

    const d = this.dimensions;
    const corroded: IDimensions = {
      topFlangeWidth: d.topFlangeWidth - 2 * corrosion,
      topFlangeThickness: d.topFlangeThickness - 2 * corrosion,
      bottomFlangeWidth: d.bottomFlangeWidth - 2 * corrosion,
      bottomFlangeThickness: d.bottomFlangeThickness - 2 * corrosion,
      totalHeight: d.totalHeight - 2 * corrosion,
      webThickness: d.webThickness - 2 * corrosion,
      topRadius: growRadius(d.topRadius, corrosion),
      bottomRadius: growRadius(d.bottomRadius, corrosion),
    };
    assertNotFullyCorroded({
      topFlangeThickness: corroded.topFlangeThickness,
      bottomFlangeThickness: corroded.bottomFlangeThickness,
      webThickness: corroded.webThickness,
      // Growing fillets eat the flange outstand from both sides
      topFlangeOutstand: this.topFlangeOutstand - corrosion,
      bottomFlangeOutstand: this.bottomFlangeOutstand - corrosion,
    });

    const name = updateNameWithCorrosion(this.name, { corrosion });
    ConsoleService.debug(`${this.name}: corrosion ${corrosion} mm`, 'corrosion');
    return new IProfile(corroded, { ...this.options, name });
  }
}
