/**
 * Closed polygon with optional holes
 *
 * The boundary representation every profile resolves to. Rings are stored
 * without a repeated closing point; a polygon is immutable once built and all
 * transforms return a new instance.
 */

import { Vec2, POINT_TOLERANCE, pointsEqual, segmentsCross, type Point2D } from './Geometry2D';
import { InvalidPolygonError } from './errors';
import {
  calculateAreaIntegrals,
  calculateSignedArea,
  getBoundingBox,
  type Ring,
  type SectionGeometry,
} from './SectionProperties';

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

// ============================================================================
// Ring utilities
// ============================================================================

/**
 * Drop consecutive duplicate points and a trailing point equal to the first.
 */
export function normalizeRing(points: readonly Point2D[], tolerance: number = POINT_TOLERANCE): Vec2[] {
  const result: Vec2[] = [];
  for (const p of points) {
    const last = result[result.length - 1];
    if (last !== undefined && pointsEqual(last, p, tolerance)) continue;
    result.push(Vec2.from(p));
  }
  while (result.length > 1 && pointsEqual(result[0], result[result.length - 1], tolerance)) {
    result.pop();
  }
  return result;
}

export function ringLength(points: Ring): number {
  const n = points.length;
  if (n < 2) return 0;
  let length = 0;
  for (let i = 0; i < n; i++) {
    const p = points[i];
    const q = points[(i + 1) % n];
    length += Math.hypot(q.x - p.x, q.y - p.y);
  }
  return length;
}

/**
 * Check that no two non-adjacent edges of the closed ring cross.
 */
export function isRingSimple(points: Ring): boolean {
  const n = points.length;
  if (n < 3) return false;
  if (n === 3) return Math.abs(calculateSignedArea(points)) > 0;

  for (let i = 0; i < n; i++) {
    const p1 = points[i];
    const p2 = points[(i + 1) % n];

    for (let j = i + 2; j < n; j++) {
      // Edges sharing a vertex
      if ((j + 1) % n === i) continue;

      if (segmentsCross(p1, p2, points[j], points[(j + 1) % n])) {
        return false;
      }
    }
  }
  return Math.abs(calculateSignedArea(points)) > 0;
}

function distanceToSegment(p: Point2D, a: Point2D, b: Point2D): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  const t = lengthSq > 0 ? Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq)) : 0;
  return Math.hypot(p.x - (a.x + t * dx), p.y - (a.y + t * dy));
}

/**
 * Ray-casting point-in-ring test. Points on the boundary (within
 * `tolerance`) are reported as outside.
 */
export function pointInRing(point: Point2D, ring: Ring, tolerance: number = POINT_TOLERANCE): boolean {
  const n = ring.length;
  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if (distanceToSegment(point, a, b) <= tolerance) return false;
    if ((a.y > point.y) !== (b.y > point.y) &&
        point.x < ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y) + a.x) {
      inside = !inside;
    }
  }
  return inside;
}

function ringsCross(a: Ring, b: Ring): boolean {
  for (let i = 0; i < a.length; i++) {
    const p1 = a[i];
    const p2 = a[(i + 1) % a.length];
    for (let j = 0; j < b.length; j++) {
      if (segmentsCross(p1, p2, b[j], b[(j + 1) % b.length])) return true;
    }
  }
  return false;
}

function reversed(ring: readonly Vec2[]): Vec2[] {
  return [...ring].reverse();
}

// ============================================================================
// ClosedPolygon
// ============================================================================

export class ClosedPolygon {
  readonly outer: readonly Vec2[];
  readonly holes: readonly (readonly Vec2[])[];

  constructor(outer: readonly Point2D[], holes: readonly (readonly Point2D[])[] = []) {
    if (outer.length < 3) {
      throw new InvalidPolygonError('At least 3 points required to create a polygon');
    }
    for (const hole of holes) {
      if (hole.length < 3) {
        throw new InvalidPolygonError('At least 3 points required to create a hole');
      }
    }
    this.outer = Object.freeze(outer.map(p => Vec2.from(p)));
    this.holes = Object.freeze(holes.map(h => Object.freeze(h.map(p => Vec2.from(p)))));
  }

  /**
   * Build a validated polygon from an arbitrary point list: duplicates are
   * merged and the ring must be simple.
   */
  static fromRing(points: readonly Point2D[], tolerance: number = POINT_TOLERANCE): ClosedPolygon {
    const ring = normalizeRing(points, tolerance);
    if (ring.length < 3) {
      throw new InvalidPolygonError('At least 3 points required to create a polygon');
    }
    if (!isRingSimple(ring)) {
      throw new InvalidPolygonError('The constructed polygon is not valid');
    }
    return new ClosedPolygon(ring);
  }

  /**
   * Add holes. Every hole must be simple, lie strictly inside the outer ring
   * and not touch the other holes; holes are reoriented to the winding
   * opposite the outer ring.
   */
  withHoles(holes: readonly (readonly Point2D[])[], tolerance: number = POINT_TOLERANCE): ClosedPolygon {
    const outerClockwise = this.isClockwise;
    const accepted: Vec2[][] = this.holes.map(h => [...h]);

    for (const raw of holes) {
      const hole = normalizeRing(raw, tolerance);
      if (hole.length < 3) {
        throw new InvalidPolygonError('At least 3 points required to create a hole');
      }
      if (!isRingSimple(hole)) {
        throw new InvalidPolygonError('The hole is not a valid polygon');
      }
      if (!hole.every(p => pointInRing(p, this.outer, tolerance)) || ringsCross(hole, this.outer)) {
        throw new InvalidPolygonError('The hole must lie inside the outer boundary');
      }
      for (const other of accepted) {
        if (ringsCross(hole, other) || pointInRing(hole[0], other, tolerance) || pointInRing(other[0], hole, tolerance)) {
          throw new InvalidPolygonError('Holes must not overlap');
        }
      }
      const holeClockwise = calculateSignedArea(hole) < 0;
      accepted.push(holeClockwise === outerClockwise ? reversed(hole) : hole);
    }

    return new ClosedPolygon(this.outer, accepted);
  }

  get rings(): readonly (readonly Vec2[])[] {
    return [this.outer, ...this.holes];
  }

  /** Signed area of the outer ring (positive when counter-clockwise) */
  get signedArea(): number {
    return calculateSignedArea(this.outer);
  }

  get isClockwise(): boolean {
    return this.signedArea < 0;
  }

  /** Outer area minus the area of every hole */
  get area(): number {
    return calculateAreaIntegrals(this.toSectionGeometry()).A;
  }

  /** Length of the outer ring plus the length of every hole */
  get perimeter(): number {
    return this.rings.reduce((sum, ring) => sum + ringLength(ring), 0);
  }

  get centroid(): Vec2 {
    const { A, Qx, Qy } = calculateAreaIntegrals(this.toSectionGeometry());
    if (A < 1e-12) return Vec2.origin();
    return new Vec2(Qy / A, Qx / A);
  }

  get bounds(): Bounds {
    const { xmin, xmax, ymin, ymax } = getBoundingBox(this.outer);
    return { minX: xmin, minY: ymin, maxX: xmax, maxY: ymax };
  }

  get width(): number {
    const b = this.bounds;
    return b.maxX - b.minX;
  }

  get height(): number {
    const b = this.bounds;
    return b.maxY - b.minY;
  }

  get vertexCount(): number {
    return this.rings.reduce((sum, ring) => sum + ring.length, 0);
  }

  translate(dx: number, dy: number): ClosedPolygon {
    if (dx === 0 && dy === 0) return this;
    const offset = new Vec2(dx, dy);
    return this.map(p => p.add(offset));
  }

  /** Rotate counter-clockwise by `angle` degrees about `origin` (default: centroid) */
  rotate(angle: number, origin: Point2D = this.centroid): ClosedPolygon {
    if (angle === 0) return this;
    return this.map(p => p.rotateAbout(angle, origin));
  }

  /** Translate so the centroid lies on the origin */
  centered(): ClosedPolygon {
    const c = this.centroid;
    return this.translate(-c.x, -c.y);
  }

  /**
   * Mirror through the origin: `flipX` negates x, `flipY` negates y. The
   * result keeps the outer ring counter-clockwise.
   */
  mirror(flipX: boolean, flipY: boolean): ClosedPolygon {
    if (!flipX && !flipY) return this;
    return this.map(p => {
      const q = flipX ? p.mirrorX() : p;
      return flipY ? q.mirrorY() : q;
    }).oriented();
  }

  /** Outer ring counter-clockwise, holes clockwise */
  oriented(): ClosedPolygon {
    if (!this.isClockwise) return this;
    return new ClosedPolygon(reversed(this.outer), this.holes.map(reversed));
  }

  toSectionGeometry(): SectionGeometry {
    return { outer: this.outer, holes: this.holes };
  }

  toSvgPath(): string {
    return this.rings
      .map(ring => ring.map((p, i) => `${i === 0 ? 'M' : 'L'} ${p.x} ${p.y}`).join(' ') + ' Z')
      .join(' ');
  }

  toJSON(): { outer: Point2D[]; holes: Point2D[][] } {
    return {
      outer: this.outer.map(p => p.toJSON()),
      holes: this.holes.map(h => h.map(p => p.toJSON())),
    };
  }

  private map(fn: (p: Vec2) => Vec2): ClosedPolygon {
    return new ClosedPolygon(this.outer.map(fn), this.holes.map(h => h.map(fn)));
  }
}
