/**
 * Annular sector (a segment of a ring)
 *
 * Angles are measured from the top, clockwise positive, so a sector from 0°
 * to 90° covers the upper right quadrant. (x, y) is the centre of the radii.
 */

import { ClosedPolygon } from '../ClosedPolygon';
import { degToRad, Vec2 } from '../Geometry2D';
import { PathBuilder } from '../PathBuilder';
import { intersectPolygons } from '../PolygonBoolean';
import { Profile, type ProfileOptions } from '../Profile';
import { InvalidPolygonError, PreconditionError } from '../errors';
import { raiseIfNegative, raiseIfNotFinite, raiseIfNotPositive } from '../validation';

export interface AnnularSectorDimensions {
  innerRadius: number;
  thickness: number;
  /** Degrees from the top, clockwise positive */
  startAngle: number;
  /** Greater than startAngle, less than a full turn further */
  endAngle: number;
  x: number;
  y: number;
}

const WEDGE_STEPS = 8;
const WEDGE_MARGIN = 1;

export class AnnularSectorProfile extends Profile<AnnularSectorDimensions, AnnularSectorProfile> {
  readonly family = 'ANNULAR_SECTOR';

  constructor(dimensions: AnnularSectorDimensions, options: ProfileOptions = {}) {
    super(dimensions, 'Annular Sector', options);
    const d = this.dimensions;
    raiseIfNegative({ innerRadius: d.innerRadius });
    raiseIfNotPositive({ thickness: d.thickness });
    raiseIfNotFinite({ startAngle: d.startAngle, endAngle: d.endAngle, x: d.x, y: d.y });

    if (d.startAngle > 360 || d.startAngle < -360) {
      throw new PreconditionError(`Start angle must be between -360 and 360 degrees, got ${d.startAngle}`);
    }
    if (d.endAngle <= d.startAngle) {
      throw new PreconditionError(
        `End angle must be greater than start angle, got end ${d.endAngle} and start ${d.startAngle}`
      );
    }
    if (d.endAngle - d.startAngle >= 360) {
      throw new PreconditionError(
        `The sector must span less than 360 degrees, got ${d.endAngle - d.startAngle}; use a CHS for a full ring`
      );
    }
  }

  protected create(dimensions: AnnularSectorDimensions, options: ProfileOptions): AnnularSectorProfile {
    return new AnnularSectorProfile(dimensions, options);
  }

  get outerRadius(): number {
    return this.dimensions.innerRadius + this.dimensions.thickness;
  }

  get centerlineRadius(): number {
    return this.dimensions.innerRadius + this.dimensions.thickness / 2;
  }

  /** Swept angle [deg] */
  get span(): number {
    return this.dimensions.endAngle - this.dimensions.startAngle;
  }

  get maxProfileThickness(): number {
    return this.dimensions.thickness;
  }

  protected buildPolygon(): ClosedPolygon {
    const { innerRadius, x, y } = this.dimensions;
    const center = new Vec2(x, y);

    const outer = ring(center, this.outerRadius);
    const annulus = innerRadius > 0 ? outer.withHoles([ring(center, innerRadius).outer]) : outer;

    const sector = intersectPolygons(annulus, this.wedge(center));
    if (sector === null) {
      throw new InvalidPolygonError('The annular sector is empty');
    }
    return sector;
  }

  /**
   * Fan around the centre covering the swept angle. Each wedge chord sits at
   * R·cos(step/2) from the centre, so R is chosen to keep the chords outside
   * the outer radius.
   */
  private wedge(center: Vec2): ClosedPolygon {
    const step = this.span / WEDGE_STEPS;
    const radius = this.outerRadius / Math.cos(degToRad(step / 2)) + WEDGE_MARGIN;

    const points: Vec2[] = [center];
    for (let i = 0; i <= WEDGE_STEPS; i++) {
      // Clockwise from the top is 90° minus the mathematical angle
      points.push(center.add(Vec2.polar(radius, 90 - this.dimensions.startAngle - i * step)));
    }
    return ClosedPolygon.fromRing(points);
  }
}

/** Full circle around `center`, starting at its rightmost point */
function ring(center: Vec2, radius: number): ClosedPolygon {
  return new PathBuilder(center.add(new Vec2(radius, 0)))
    .appendArc(360, 90, radius)
    .generatePolygon(false);
}
