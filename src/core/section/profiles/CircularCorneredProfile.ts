/**
 * Cornered plate: a corner block with a concave quarter circle on the inside
 * and a rounded outer corner
 *
 * In direction 0 the inner radius is centred on the reference point and the
 * block occupies [0, thicknessHorizontal + innerRadius] by
 * [0, thicknessVertical + innerRadius], rounded by the outer radius at the
 * far corner. Directions 1 and 2 mirror x, directions 2 and 3 mirror y.
 */

import type { ClosedPolygon } from '../ClosedPolygon';
import { PathBuilder } from '../PathBuilder';
import { Profile, type ProfileOptions } from '../Profile';
import { PreconditionError } from '../errors';
import { raiseIfNegative, raiseIfNotFinite } from '../validation';

export type CornerDirection = 0 | 1 | 2 | 3;

/**
 * 'intersection': (x, y) is the centre of the inner radius.
 * 'outer': (x, y) is the corner where the outer faces would meet.
 */
export type CornerReferencePoint = 'intersection' | 'outer';

const CORNER_DIRECTIONS: readonly number[] = [0, 1, 2, 3];
const REFERENCE_POINTS: readonly string[] = ['intersection', 'outer'];

export interface CorneredDimensions {
  thicknessVertical: number;
  thicknessHorizontal: number;
  innerRadius: number;
  outerRadius: number;
  cornerDirection: CornerDirection;
  referencePoint: CornerReferencePoint;
  x: number;
  y: number;
}

export class CircularCorneredProfile extends Profile<CorneredDimensions, CircularCorneredProfile> {
  readonly family = 'CORNERED';

  readonly totalWidth: number;
  readonly totalHeight: number;

  constructor(dimensions: CorneredDimensions, options: ProfileOptions = {}) {
    super(dimensions, 'Cornered Profile', options);
    const d = this.dimensions;
    raiseIfNegative({
      thicknessVertical: d.thicknessVertical,
      thicknessHorizontal: d.thicknessHorizontal,
      innerRadius: d.innerRadius,
      outerRadius: d.outerRadius,
    });
    raiseIfNotFinite({ x: d.x, y: d.y });

    if (!CORNER_DIRECTIONS.includes(d.cornerDirection)) {
      throw new PreconditionError(`Corner direction must be 0, 1, 2 or 3, got ${String(d.cornerDirection)}`);
    }
    if (!REFERENCE_POINTS.includes(d.referencePoint)) {
      throw new PreconditionError(`Reference point must be 'intersection' or 'outer', got '${String(d.referencePoint)}'`);
    }

    const limit = d.innerRadius + Math.min(d.thicknessVertical, d.thicknessHorizontal);
    if (d.outerRadius > limit) {
      throw new PreconditionError(
        `Outer radius ${d.outerRadius} must not exceed inner radius plus the smallest thickness (${limit})`
      );
    }

    this.totalWidth = d.thicknessHorizontal + d.innerRadius;
    this.totalHeight = d.thicknessVertical + d.innerRadius;
  }

  protected create(dimensions: CorneredDimensions, options: ProfileOptions): CircularCorneredProfile {
    return new CircularCorneredProfile(dimensions, options);
  }

  get maxProfileThickness(): number {
    return Math.max(this.dimensions.thicknessVertical, this.dimensions.thicknessHorizontal);
  }

  /** Built at its reference point; not centred on the centroid */
  protected buildPolygon(): ClosedPolygon {
    const d = this.dimensions;
    const w = this.totalWidth;
    const h = this.totalHeight;

    const local = new PathBuilder({ x: d.innerRadius, y: 0 })
      .appendLine(d.thicknessHorizontal, 0)
      .appendLine(h - d.outerRadius, 90)
      .appendArc(90, 90, d.outerRadius)
      .appendLine(w - d.outerRadius, 180)
      .appendLine(d.thicknessVertical, 270)
      .appendArc(-90, 0, d.innerRadius)
      .generatePolygon(false);

    const shifted = d.referencePoint === 'outer' ? local.translate(-w, -h) : local;
    const flipX = d.cornerDirection === 1 || d.cornerDirection === 2;
    const flipY = d.cornerDirection === 2 || d.cornerDirection === 3;
    return shifted.mirror(flipX, flipY).translate(d.x, d.y);
  }
}
