/**
 * Simple 2D polygons
 *
 * Vertices are given counter-clockwise. Consecutive tolerance-duplicate
 * vertices are collapsed at construction, so no two consecutive stored
 * vertices are equal and at least one vertex remains. Indices are cyclic.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Orientation } from '../num/predicates.js';
import { sub2, dot2, cross2, dist2 } from '../num/vec2.js';
import { eq2 } from '../num/tolerance.js';
import { orient2D } from '../num/predicates.js';
import { DegenerateInputError } from '../errors.js';
import { segmentContainsPoint } from './segment2d.js';

export interface Polygon2D {
  readonly kind: 'polygon';
  readonly points: readonly Vec2[];
}

/**
 * Position of a point relative to a closed shape
 * - 1: inside
 * - 0: on the boundary
 * - -1: outside
 */
export type Side = Orientation;

/**
 * Create a polygon, collapsing consecutive duplicate vertices
 */
export function polygon2d(points: readonly Vec2[], ctx: NumericContext): Polygon2D {
  if (points.length === 0) {
    throw new DegenerateInputError('Polygon needs at least one vertex');
  }
  const kept: Vec2[] = [points[0]];
  for (const p of points.slice(1)) {
    if (!eq2(kept[kept.length - 1], p, ctx)) {
      kept.push(p);
    }
  }
  return { kind: 'polygon', points: kept };
}

export function vertexCount(polygon: Polygon2D): number {
  return polygon.points.length;
}

/**
 * Vertex at a cyclic index
 */
export function vertexAt(polygon: Polygon2D, i: number): Vec2 {
  const n = polygon.points.length;
  return polygon.points[((i % n) + n) % n];
}

/**
 * Edges as [start, end] pairs, including the closing edge
 */
export function edges(polygon: Polygon2D): Array<readonly [Vec2, Vec2]> {
  return polygon.points.map((p, i) => [p, vertexAt(polygon, i + 1)] as const);
}

/**
 * Enclosed area (shoelace formula); independent of winding direction
 */
export function polygonArea(polygon: Polygon2D): number {
  let area = 0;
  for (const [a, b] of edges(polygon)) {
    area += cross2(a, b) / 2;
  }
  return Math.abs(area);
}

export function polygonPerimeter(polygon: Polygon2D): number {
  return edges(polygon).reduce((sum, [a, b]) => sum + dist2(a, b), 0);
}

/**
 * Whether the polygon is convex
 *
 * Only a mix of strict left and strict right turns breaks convexity;
 * collinear vertex triples never do.
 */
export function isConvex(polygon: Polygon2D, ctx: NumericContext): boolean {
  let top = 0;
  let bottom = 0;
  for (let i = 0; i < polygon.points.length; i++) {
    const turn = orient2D(vertexAt(polygon, i), vertexAt(polygon, i + 1), vertexAt(polygon, i + 2), ctx);
    top = Math.max(top, turn);
    bottom = Math.min(bottom, turn);
  }
  return !(top === 1 && bottom === -1);
}

/**
 * Winding-number containment test
 *
 * Returns 0 as soon as p is found on an edge. Otherwise the signed angles
 * subtended by each edge are summed: a total near ±2π means inside, near 0
 * outside.
 */
export function polygonSideOfPoint(polygon: Polygon2D, p: Vec2, ctx: NumericContext): Side {
  let theta = 0;
  for (const [a, b] of edges(polygon)) {
    if (segmentContainsPoint({ p1: a, p2: b }, p, ctx)) {
      return 0;
    }
    const pa = sub2(a, p);
    const pb = sub2(b, p);
    theta += Math.atan2(cross2(pa, pb), dot2(pa, pb));
  }
  return Math.abs(theta) > Math.PI ? 1 : -1;
}
