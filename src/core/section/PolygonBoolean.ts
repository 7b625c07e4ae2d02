/**
 * Boolean polygon operations
 *
 * Wraps the polygon-clipping library to work with ClosedPolygon. Used to
 * merge touching profiles into one cross-section and to cut sectors out of
 * annuli.
 */

import polygonClipping from 'polygon-clipping';
import type { Pair, Ring, Polygon, MultiPolygon } from 'polygon-clipping';
import type { Point2D } from './Geometry2D';
import { ClosedPolygon, normalizeRing } from './ClosedPolygon';
import { InvalidPolygonError } from './errors';
import { calculateArea } from './SectionProperties';

function toRing(points: readonly Point2D[]): Ring {
  return points.map((p): Pair => [p.x, p.y]);
}

function toPolygon(polygon: ClosedPolygon): Polygon {
  return [toRing(polygon.outer), ...polygon.holes.map(toRing)];
}

// polygon-clipping closes its output rings by repeating the first point
function fromRing(ring: Ring): Point2D[] {
  return normalizeRing(ring.map(([x, y]) => ({ x, y })));
}

function fromPolygon(polygon: Polygon): ClosedPolygon {
  const [outer, ...holes] = polygon;
  if (outer === undefined) {
    throw new InvalidPolygonError('The boolean operation produced an empty polygon');
  }
  return new ClosedPolygon(fromRing(outer), holes.map(fromRing)).oriented();
}

function largest(result: MultiPolygon): ClosedPolygon | null {
  let best: Polygon | null = null;
  let bestArea = 0;
  for (const polygon of result) {
    const area = polygon.length > 0 ? calculateArea(fromRing(polygon[0])) : 0;
    if (area > bestArea) {
      best = polygon;
      bestArea = area;
    }
  }
  return best === null ? null : fromPolygon(best);
}

/**
 * Union of several polygons into one. Fails when the inputs do not form a
 * single connected region.
 */
export function mergePolygons(polygons: readonly ClosedPolygon[]): ClosedPolygon {
  const [first, ...rest] = polygons;
  if (first === undefined) {
    throw new Error('No elements have been added to the cross-section.');
  }
  if (rest.length === 0) return first;

  const result = polygonClipping.union(toPolygon(first), ...rest.map(toPolygon));
  if (result.length !== 1) {
    throw new InvalidPolygonError('The combined geometry is not a valid polygon.');
  }
  return fromPolygon(result[0]);
}

/**
 * Intersection of two polygons. If the result has several disjoint regions
 * the largest one is returned; `null` when they do not overlap.
 */
export function intersectPolygons(a: ClosedPolygon, b: ClosedPolygon): ClosedPolygon | null {
  return largest(polygonClipping.intersection(toPolygon(a), toPolygon(b)));
}

/**
 * `a` with `b` removed. Largest remaining region, or `null` when nothing is left.
 */
export function differencePolygons(a: ClosedPolygon, b: ClosedPolygon): ClosedPolygon | null {
  return largest(polygonClipping.difference(toPolygon(a), toPolygon(b)));
}
