/**
 * Flat strip (rectangular plate) profile
 */

import { ConsoleService } from '../../console/ConsoleService';
import type { ClosedPolygon } from '../ClosedPolygon';
import { PathBuilder } from '../PathBuilder';
import { Profile, type ProfileOptions } from '../Profile';
import { assertNotFullyCorroded, updateNameWithCorrosion } from '../corrosion';
import { raiseIfNotPositive, raiseIfNegative } from '../validation';

export interface StripDimensions {
  width: number;
  height: number;
}

export class StripProfile extends Profile<StripDimensions, StripProfile> {
  readonly family = 'STRIP';

  constructor(dimensions: StripDimensions, options: ProfileOptions = {}) {
    super(dimensions, 'Strip Profile', options);
    raiseIfNotPositive({ ...this.dimensions });
  }

  protected create(dimensions: StripDimensions, options: ProfileOptions): StripProfile {
    return new StripProfile(dimensions, options);
  }

  get maxProfileThickness(): number {
    return Math.min(this.dimensions.width, this.dimensions.height);
  }

  protected buildPolygon(): ClosedPolygon {
    const { width, height } = this.dimensions;
    return new PathBuilder({ x: 0, y: 0 })
      .appendLine(width, 0)
      .appendLine(height, 90)
      .appendLine(width, 180)
      .appendLine(height, 270)
      .generatePolygon();
  }

  /**
   * Uniform corrosion on all four faces. Returns this instance for zero
   * corrosion.
   */
  withCorrosion(corrosion: number): StripProfile {
    raiseIfNegative({ corrosion });
    if (corrosion === 0) return this;

    const width = this.dimensions.width - 2 * corrosion;
    const height = this.dimensions.height - 2 * corrosion;
    assertNotFullyCorroded({ width, height });

    const name = updateNameWithCorrosion(this.name, { corrosion });
    ConsoleService.debug(`${this.name}: corrosion ${corrosion} mm`, 'corrosion');
    return new StripProfile({ width, height }, { ...this.options, name });
  }
}
