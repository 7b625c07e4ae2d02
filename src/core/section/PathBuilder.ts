/**
 * PathBuilder - turtle-style boundary construction
 *
 * Profiles describe their outline as a chain of straight segments and
 * circular arcs, each given by an explicit direction angle. Arcs are
 * tessellated into polyline vertices as they are appended.
 *
 *   new PathBuilder({ x: 0, y: 0 })
 *     .appendLine(10, 0)
 *     .appendArc(90, 0, 2)
 *     .appendLine(5, 90)
 *     ...
 *     .generatePolygon();
 */

import { Vec2, type Point2D } from './Geometry2D';
import { ClosedPolygon, isRingSimple, normalizeRing } from './ClosedPolygon';
import { InvalidPolygonError } from './errors';
import { getSectionConfig } from './config';
import { raiseIfNegative, raiseIfNotPositive } from './validation';

export type PathState = 'empty' | 'building' | 'finalized';

export interface PathBuilderOptions {
  /** Default tessellation angle for arcs [deg] */
  maxSegmentAngle?: number;
  /** Distance below which consecutive points are merged [mm] */
  tolerance?: number;
}

/**
 * Vertices of a circular arc starting at `start`, excluding `start` itself.
 *
 * The centre sits `radius` away from `start`, perpendicular to the tangent
 * direction `angle`: on the left for a positive sweep (counter-clockwise), on
 * the right for a negative sweep.
 */
export function tessellateArc(
  start: Point2D,
  sweep: number,
  angle: number,
  radius: number,
  maxSegmentAngle: number
): Vec2[] {
  const normal = sweep > 0 ? angle + 90 : angle - 90;
  const center = Vec2.from(start).add(Vec2.polar(radius, normal));
  const radial = Vec2.from(start).subtract(center);

  const segmentCount = Math.max(1, Math.ceil(Math.abs(sweep) / maxSegmentAngle));
  const step = sweep / segmentCount;

  const vertices: Vec2[] = [];
  for (let i = 1; i <= segmentCount; i++) {
    vertices.push(center.add(radial.rotate(step * i)));
  }
  return vertices;
}

export class PathBuilder {
  private readonly vertices: Vec2[];
  private readonly maxSegmentAngle: number;
  private readonly tolerance: number;
  private finalized = false;

  constructor(start: Point2D = { x: 0, y: 0 }, options: PathBuilderOptions = {}) {
    const config = getSectionConfig();
    this.maxSegmentAngle = options.maxSegmentAngle ?? config.maxSegmentAngle;
    this.tolerance = options.tolerance ?? config.pointTolerance;
    raiseIfNotPositive({ maxSegmentAngle: this.maxSegmentAngle });
    this.vertices = [Vec2.from(start)];
  }

  get state(): PathState {
    if (this.finalized) return 'finalized';
    return this.vertices.length > 1 ? 'building' : 'empty';
  }

  get currentPoint(): Vec2 {
    return this.vertices[this.vertices.length - 1];
  }

  get points(): Vec2[] {
    return [...this.vertices];
  }

  /** Append a straight segment of `length` in direction `angle` (degrees) */
  appendLine(length: number, angle: number): this {
    this.assertOpen();
    this.vertices.push(this.currentPoint.add(Vec2.polar(length, angle)));
    return this;
  }

  /**
   * Append a circular arc.
   *
   * @param sweep - positive turns left (counter-clockwise), negative turns right
   * @param angle - tangent direction at the current point
   * @param radius - zero makes the call a no-op
   * @param maxSegmentAngle - largest angle covered by one polyline segment
   */
  appendArc(sweep: number, angle: number, radius: number, maxSegmentAngle: number = this.maxSegmentAngle): this {
    this.assertOpen();
    raiseIfNegative({ radius });
    raiseIfNotPositive({ maxSegmentAngle });
    if (sweep === 0 || radius === 0) return this;

    this.vertices.push(...tessellateArc(this.currentPoint, sweep, angle, radius, maxSegmentAngle));
    return this;
  }

  /**
   * Close the path and build a validated polygon. The builder cannot be used
   * afterwards.
   *
   * @param transformCentroid - translate the result so its centroid is the origin
   */
  generatePolygon(transformCentroid: boolean = true): ClosedPolygon {
    this.assertOpen();
    this.finalized = true;

    const ring = normalizeRing(this.vertices, this.tolerance);
    if (ring.length < 3) {
      throw new InvalidPolygonError('At least 3 points required to create a polygon');
    }
    if (!isRingSimple(ring)) {
      throw new InvalidPolygonError('The constructed polygon is not valid');
    }

    const polygon = new ClosedPolygon(ring);
    return transformCentroid ? polygon.centered() : polygon;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error('PathBuilder has already generated its polygon');
    }
  }
}
