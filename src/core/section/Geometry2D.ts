/**
 * 2D geometry primitives for section profiles
 * Points, angle conversion and segment predicates shared by the path builder
 * and the polygon assembler. Angles are in degrees, counter-clockwise from +x.
 */

/** Plain 2D point as it flows through rings and JSON */
export interface Point2D {
  x: number;
  y: number;
}

/** Default tolerance for coincident points [mm] */
export const POINT_TOLERANCE = 1e-9;

export function degToRad(angle: number): number {
  return (angle * Math.PI) / 180;
}

export function radToDeg(angle: number): number {
  return (angle * 180) / Math.PI;
}

/** Immutable 2D vector */
export class Vec2 implements Point2D {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  static origin(): Vec2 {
    return new Vec2(0, 0);
  }

  static from(point: Point2D): Vec2 {
    return point instanceof Vec2 ? point : new Vec2(point.x, point.y);
  }

  /** Unit vector pointing along `angle` (degrees) scaled by `length` */
  static polar(length: number, angle: number): Vec2 {
    const rad = degToRad(angle);
    return new Vec2(length * Math.cos(rad), length * Math.sin(rad));
  }

  add(other: Point2D): Vec2 {
    return new Vec2(this.x + other.x, this.y + other.y);
  }

  subtract(other: Point2D): Vec2 {
    return new Vec2(this.x - other.x, this.y - other.y);
  }

  scale(factor: number): Vec2 {
    return new Vec2(this.x * factor, this.y * factor);
  }

  length(): number {
    return Math.hypot(this.x, this.y);
  }

  distanceTo(other: Point2D): number {
    return Math.hypot(this.x - other.x, this.y - other.y);
  }

  /** Rotate about the origin by `angle` degrees */
  rotate(angle: number): Vec2 {
    const rad = degToRad(angle);
    const cos = Math.cos(rad);
    const sin = Math.sin(rad);
    return new Vec2(this.x * cos - this.y * sin, this.x * sin + this.y * cos);
  }

  rotateAbout(angle: number, center: Point2D): Vec2 {
    return this.subtract(center).rotate(angle).add(center);
  }

  mirrorX(): Vec2 {
    return new Vec2(-this.x, this.y);
  }

  mirrorY(): Vec2 {
    return new Vec2(this.x, -this.y);
  }

  equals(other: Point2D, tolerance: number = POINT_TOLERANCE): boolean {
    return Math.abs(this.x - other.x) <= tolerance && Math.abs(this.y - other.y) <= tolerance;
  }

  toJSON(): Point2D {
    return { x: this.x, y: this.y };
  }
}

export function pointsEqual(a: Point2D, b: Point2D, tolerance: number = POINT_TOLERANCE): boolean {
  return Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;
}

/**
 * Orientation of `pk` relative to the directed segment pi→pj.
 * Positive, negative or zero (collinear) cross product.
 */
export function direction(pi: Point2D, pj: Point2D, pk: Point2D): number {
  return (pk.x - pi.x) * (pj.y - pi.y) - (pj.x - pi.x) * (pk.y - pi.y);
}

/**
 * Check whether two segments properly cross (touching endpoints and collinear
 * overlap do not count).
 */
export function segmentsCross(
  p1: Point2D, p2: Point2D,
  p3: Point2D, p4: Point2D,
  tolerance: number = POINT_TOLERANCE
): boolean {
  const d1 = direction(p3, p4, p1);
  const d2 = direction(p3, p4, p2);
  const d3 = direction(p1, p2, p3);
  const d4 = direction(p1, p2, p4);

  return ((d1 > tolerance && d2 < -tolerance) || (d1 < -tolerance && d2 > tolerance)) &&
    ((d3 > tolerance && d4 < -tolerance) || (d3 < -tolerance && d4 > tolerance));
}
