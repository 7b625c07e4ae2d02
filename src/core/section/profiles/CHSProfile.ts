/**
 * Circular Hollow Section (CHS)
 *
 * Outer and inner boundary are each a single 360° arc. The tessellation
 * angle adapts to the diameter so chords stay around 1 mm long.
 */

import { ConsoleService } from '../../console/ConsoleService';
import type { ClosedPolygon } from '../ClosedPolygon';
import { degToRad } from '../Geometry2D';
import { PathBuilder } from '../PathBuilder';
import { Profile, type ProfileOptions } from '../Profile';
import { assertNotFullyCorroded, updateNameWithCorrosion, type DoubleCorrosion } from '../corrosion';
import { getSectionConfig } from '../config';
import { raiseIfNegative, raiseIfNotPositive } from '../validation';

export interface CHSDimensions {
  outerDiameter: number;
  wallThickness: number;
}

export class CHSProfile extends Profile<CHSDimensions, CHSProfile> {
  readonly family = 'CHS';
  readonly innerDiameter: number;

  constructor(dimensions: CHSDimensions, options: ProfileOptions = {}) {
    super(dimensions, 'CHS Profile', options);
    const { outerDiameter, wallThickness } = this.dimensions;
    this.innerDiameter = outerDiameter - 2 * wallThickness;

    raiseIfNotPositive({ outerDiameter });
    raiseIfNegative({ innerDiameter: this.innerDiameter, wallThickness });
  }

  protected create(dimensions: CHSDimensions, options: ProfileOptions): CHSProfile {
    return new CHSProfile(dimensions, options);
  }

  get maxProfileThickness(): number {
    return this.dimensions.wallThickness;
  }

  /** Tessellation angle: at most the configured default, at most ~1 mm of arc */
  get maxSegmentAngle(): number {
    return Math.min(getSectionConfig().maxSegmentAngle, 360 / (Math.PI * this.dimensions.outerDiameter));
  }

  protected buildPolygon(): ClosedPolygon {
    const outer = circle(this.dimensions.outerDiameter / 2, this.maxSegmentAngle);
    // A hole whose chords would merge into one point is a solid round bar
    const innerChord = this.innerDiameter * Math.sin(degToRad(this.maxSegmentAngle / 2));
    if (innerChord <= getSectionConfig().pointTolerance) return outer;
    return outer.withHoles([circle(this.innerDiameter / 2, this.maxSegmentAngle).outer]);
  }

  /**
   * Remove material from the outer and inner faces. Returns this instance
   * when both values are zero.
   */
  withCorrosion({ corrosionOutside = 0, corrosionInside = 0 }: DoubleCorrosion): CHSProfile {
    raiseIfNegative({ corrosionOutside, corrosionInside });
    if (corrosionOutside === 0 && corrosionInside === 0) return this;

    const outerDiameter = this.dimensions.outerDiameter - 2 * corrosionOutside;
    const wallThickness = this.dimensions.wallThickness - corrosionOutside - corrosionInside;
    assertNotFullyCorroded({ wallThickness });

    const name = updateNameWithCorrosion(this.name, { corrosionInside, corrosionOutside });
    ConsoleService.debug(`${this.name}: corrosion outside ${corrosionOutside} mm, inside ${corrosionInside} mm`, 'corrosion');
    return new CHSProfile({ outerDiameter, wallThickness }, { ...this.options, name });
  }
}

function circle(radius: number, maxSegmentAngle: number): ClosedPolygon {
  return new PathBuilder({ x: 0, y: 0 })
    .appendArc(360, 0, radius, maxSegmentAngle)
    .generatePolygon();
}
