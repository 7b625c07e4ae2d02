/**
 * SectionProperties - Cross-section property calculator
 *
 * Calculates geometric properties of cross-sections given as a polygon
 * boundary with optional holes, using Green's theorem over every ring.
 * Rings may be in either winding; each ring is normalized to a positive area
 * before holes are subtracted.
 *
 * Properties calculated:
 * - Area (A) and first moments (Qx, Qy) about the origin
 * - Centroid (xc, yc)
 * - Second moments about the origin and about the centroid
 * - Principal moments (I11, I22) and principal axis angle (phi)
 * - Elastic section moduli (Wx, Wy) and plastic section moduli (Wpl_x, Wpl_y)
 * - Radii of gyration (rx, ry)
 */

import type { Point2D } from './Geometry2D';

export type Ring = readonly Point2D[];

/** Complete section geometry with outer boundary and optional holes */
export interface SectionGeometry {
  outer: Ring;
  holes?: readonly Ring[];
}

/** Area integrals of one region about the origin */
export interface AreaIntegrals {
  A: number;
  Qx: number;             // ∫y dA
  Qy: number;             // ∫x dA
  Ixx: number;            // ∫y² dA
  Iyy: number;            // ∫x² dA
  Ixy: number;            // ∫xy dA
}

/** Calculated section properties */
export interface SectionPropertiesResult extends AreaIntegrals {
  // Centroid coordinates
  xc: number;
  yc: number;

  // Centroidal moments of inertia
  Ixx_c: number;
  Iyy_c: number;
  Ixy_c: number;

  // Principal moments of inertia
  I11: number;
  I22: number;
  phi: number;            // Principal axis angle [radians]

  // Elastic section moduli (minimum of both fibres)
  Wx: number;
  Wy: number;

  // Plastic section moduli
  Wpl_x: number;
  Wpl_y: number;

  // Radii of gyration
  rx: number;
  ry: number;

  // Extreme fibre distances from the centroid
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;

  h: number;
  b: number;
}

const EMPTY: AreaIntegrals = { A: 0, Qx: 0, Qy: 0, Ixx: 0, Iyy: 0, Ixy: 0 };

/**
 * Calculate the signed area of a ring using the shoelace formula.
 * Positive for counter-clockwise, negative for clockwise.
 */
export function calculateSignedArea(points: Ring): number {
  const n = points.length;
  if (n < 3) return 0;

  let area = 0;
  for (let i = 0; i < n; i++) {
    const p = points[i];
    const q = points[(i + 1) % n];
    area += p.x * q.y - q.x * p.y;
  }
  return area / 2;
}

export function calculateArea(points: Ring): number {
  return Math.abs(calculateSignedArea(points));
}

/**
 * All area integrals of a single ring in one pass, normalized so the ring
 * contributes a positive area regardless of its winding.
 */
export function calculateRingIntegrals(points: Ring): AreaIntegrals {
  const n = points.length;
  if (n < 3) return { ...EMPTY };

  let A = 0, Qx = 0, Qy = 0, Ixx = 0, Iyy = 0, Ixy = 0;
  for (let i = 0; i < n; i++) {
    const { x: xi, y: yi } = points[i];
    const { x: xj, y: yj } = points[(i + 1) % n];
    const cross = xi * yj - xj * yi;

    A += cross;
    Qx += (yi + yj) * cross;
    Qy += (xi + xj) * cross;
    Ixx += (yi * yi + yi * yj + yj * yj) * cross;
    Iyy += (xi * xi + xi * xj + xj * xj) * cross;
    Ixy += (xi * yj + 2 * xi * yi + 2 * xj * yj + xj * yi) * cross;
  }

  const sign = A >= 0 ? 1 : -1;
  return {
    A: (sign * A) / 2,
    Qx: (sign * Qx) / 6,
    Qy: (sign * Qy) / 6,
    Ixx: (sign * Ixx) / 12,
    Iyy: (sign * Iyy) / 12,
    Ixy: (sign * Ixy) / 24,
  };
}

/** Outer ring minus every hole */
export function calculateAreaIntegrals(geometry: SectionGeometry): AreaIntegrals {
  const total = calculateRingIntegrals(geometry.outer);
  for (const hole of geometry.holes ?? []) {
    const h = calculateRingIntegrals(hole);
    total.A -= h.A;
    total.Qx -= h.Qx;
    total.Qy -= h.Qy;
    total.Ixx -= h.Ixx;
    total.Iyy -= h.Iyy;
    total.Ixy -= h.Ixy;
  }
  return total;
}

/** Centroid of a single ring; the origin for degenerate rings */
export function calculateCentroid(points: Ring): Point2D {
  const { A, Qx, Qy } = calculateRingIntegrals(points);
  if (A < 1e-12) return { x: 0, y: 0 };
  return { x: Qy / A, y: Qx / A };
}

/**
 * Principal moments of inertia and principal axis angle.
 *
 * I11 = (Ixx + Iyy)/2 + sqrt(((Ixx - Iyy)/2)² + Ixy²)
 * I22 = (Ixx + Iyy)/2 - sqrt(((Ixx - Iyy)/2)² + Ixy²)
 * phi = 0.5 * atan2(-2*Ixy, Ixx - Iyy)
 */
export function calculatePrincipalMoments(
  Ixx: number,
  Iyy: number,
  Ixy: number
): { I11: number; I22: number; phi: number } {
  const avg = (Ixx + Iyy) / 2;
  const diff = (Ixx - Iyy) / 2;
  const delta = Math.hypot(diff, Ixy);

  let phi = 0;
  if (Math.abs(Ixy) > 1e-12 || Math.abs(diff) > 1e-12) {
    phi = 0.5 * Math.atan2(-2 * Ixy, Ixx - Iyy);
  }

  return { I11: avg + delta, I22: avg - delta, phi };
}

export function getBoundingBox(points: Iterable<Point2D>): { xmin: number; xmax: number; ymin: number; ymax: number } {
  let xmin = Infinity, xmax = -Infinity;
  let ymin = Infinity, ymax = -Infinity;

  for (const p of points) {
    if (p.x < xmin) xmin = p.x;
    if (p.x > xmax) xmax = p.x;
    if (p.y < ymin) ymin = p.y;
    if (p.y > ymax) ymax = p.y;
  }

  if (xmin === Infinity) return { xmin: 0, xmax: 0, ymin: 0, ymax: 0 };
  return { xmin, xmax, ymin, ymax };
}

/**
 * Calculate all section properties for a geometry with optional holes.
 */
export function calculateSectionProperties(geometry: SectionGeometry): SectionPropertiesResult {
  const integrals = calculateAreaIntegrals(geometry);
  const { A, Qx, Qy, Ixx, Iyy, Ixy } = integrals;

  const xc = A > 1e-12 ? Qy / A : 0;
  const yc = A > 1e-12 ? Qx / A : 0;

  // Parallel axis theorem
  const Ixx_c = Ixx - A * yc * yc;
  const Iyy_c = Iyy - A * xc * xc;
  const Ixy_c = Ixy - A * xc * yc;

  const { I11, I22, phi } = calculatePrincipalMoments(Ixx_c, Iyy_c, Ixy_c);

  // Holes lie inside the outer ring, so it bounds the section
  const bbox = getBoundingBox(geometry.outer);
  const xmin = bbox.xmin - xc;
  const xmax = bbox.xmax - xc;
  const ymin = bbox.ymin - yc;
  const ymax = bbox.ymax - yc;

  const fibreY = Math.max(Math.abs(ymin), Math.abs(ymax));
  const fibreX = Math.max(Math.abs(xmin), Math.abs(xmax));

  return {
    ...integrals,
    xc, yc,
    Ixx_c, Iyy_c, Ixy_c,
    I11, I22, phi,
    Wx: fibreY > 1e-12 ? Ixx_c / fibreY : 0,
    Wy: fibreX > 1e-12 ? Iyy_c / fibreX : 0,
    Wpl_x: calculatePlasticModulus(geometry, 'x'),
    Wpl_y: calculatePlasticModulus(geometry, 'y'),
    rx: A > 1e-12 ? Math.sqrt(Ixx_c / A) : 0,
    ry: A > 1e-12 ? Math.sqrt(Iyy_c / A) : 0,
    xmin, xmax, ymin, ymax,
    h: bbox.ymax - bbox.ymin,
    b: bbox.xmax - bbox.xmin,
  };
}

/**
 * Plastic section modulus about the x-axis (bending about a horizontal
 * neutral axis) or the y-axis.
 *
 * The plastic neutral axis splits the area in two equal halves and is found
 * by bisection; the modulus is the sum of both halves' first moments about it.
 */
export function calculatePlasticModulus(
  geometry: SectionGeometry,
  axis: 'x' | 'y' = 'x',
  iterations: number = 60
): number {
  const total = calculateAreaIntegrals(geometry).A;
  if (total < 1e-12) return 0;

  const coord: 'x' | 'y' = axis === 'x' ? 'y' : 'x';
  const bbox = getBoundingBox(geometry.outer);
  let lo = coord === 'y' ? bbox.ymin : bbox.xmin;
  let hi = coord === 'y' ? bbox.ymax : bbox.xmax;

  for (let i = 0; i < iterations; i++) {
    const mid = (lo + hi) / 2;
    const below = calculateAreaIntegrals(clipGeometry(geometry, mid, coord, 'below')).A;
    if (below < total / 2) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  const pna = (lo + hi) / 2;

  const above = calculateAreaIntegrals(clipGeometry(geometry, pna, coord, 'above'));
  const below = calculateAreaIntegrals(clipGeometry(geometry, pna, coord, 'below'));
  const moment = (part: AreaIntegrals) => (coord === 'y' ? part.Qx : part.Qy) - pna * part.A;

  return moment(above) - moment(below);
}

function clipGeometry(
  geometry: SectionGeometry,
  value: number,
  coord: 'x' | 'y',
  side: 'above' | 'below'
): SectionGeometry {
  return {
    outer: clipRing(geometry.outer, value, coord, side),
    holes: (geometry.holes ?? []).map(hole => clipRing(hole, value, coord, side)),
  };
}

/**
 * Clip a ring by a horizontal (`coord = 'y'`) or vertical line, keeping one
 * side. Sutherland-Hodgman against a single half-plane: the result may
 * contain zero-width bridges, which carry no area.
 */
function clipRing(
  points: Ring,
  value: number,
  coord: 'x' | 'y',
  side: 'above' | 'below'
): Point2D[] {
  if (points.length < 3) return [];

  const result: Point2D[] = [];
  const n = points.length;

  const isInside = (p: Point2D): boolean =>
    side === 'below' ? p[coord] <= value : p[coord] >= value;

  const intersect = (p1: Point2D, p2: Point2D): Point2D => {
    if (coord === 'y') {
      const t = (value - p1.y) / (p2.y - p1.y);
      return { x: p1.x + t * (p2.x - p1.x), y: value };
    }
    const t = (value - p1.x) / (p2.x - p1.x);
    return { x: value, y: p1.y + t * (p2.y - p1.y) };
  };

  for (let i = 0; i < n; i++) {
    const current = points[i];
    const next = points[(i + 1) % n];
    const currentInside = isInside(current);
    const nextInside = isInside(next);

    if (currentInside) {
      result.push(current);
      if (!nextInside) result.push(intersect(current, next));
    } else if (nextInside) {
      result.push(intersect(current, next));
    }
  }

  return result;
}
