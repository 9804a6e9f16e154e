/**
 * Convex clipping
 *
 * Intersection of two convex polygons, and the cut of a convex polygon by a
 * directed line. Both collect candidate points and re-hull them, so the
 * result is ordered counter-clockwise and free of consecutive duplicates.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Linear2D } from './linear2d.js';
import type { Polygon2D } from './polygon2d.js';
import { orient2D } from '../num/predicates.js';
import { crossingPoint } from './linear2d.js';
import { edges, polygon2d, polygonSideOfPoint } from './polygon2d.js';
import { convexHull } from './hull2d.js';

function edgeSegment([p1, p2]: readonly [Vec2, Vec2]) {
  return { kind: 'segment', p1, p2 } as const;
}

/**
 * Intersection region of two convex polygons, O(n·m)
 *
 * Each input is hulled first. The result may be degenerate (one or two
 * points) when the polygons only touch; it is null when they are disjoint.
 */
export function convexCommon(a: Polygon2D, b: Polygon2D, ctx: NumericContext): Polygon2D | null {
  const hullA = convexHull(a, ctx);
  const hullB = convexHull(b, ctx);

  const points: Vec2[] = [
    ...hullA.points.filter((p) => polygonSideOfPoint(hullB, p, ctx) === 1),
    ...hullB.points.filter((p) => polygonSideOfPoint(hullA, p, ctx) === 1),
  ];

  for (const edgeA of edges(hullA)) {
    for (const edgeB of edges(hullB)) {
      const p = crossingPoint(edgeSegment(edgeA), edgeSegment(edgeB), ctx);
      if (p) {
        points.push(p);
      }
    }
  }

  if (ctx.verbose) {
    console.log(`[clip] common of ${hullA.points.length} x ${hullB.points.length} vertices: ${points.length} candidates`);
  }
  if (points.length === 0) {
    return null;
  }
  return convexHull(polygon2d(points, ctx), ctx);
}

/**
 * Part of a convex polygon on the left (counter-clockwise) side of a
 * directed line, boundary included. Null when nothing remains.
 */
export function convexCutWithLine(polygon: Polygon2D, line: Linear2D, ctx: NumericContext): Polygon2D | null {
  const points: Vec2[] = [];
  for (const edge of edges(polygon)) {
    const [p, q] = edge;
    const sideP = orient2D(line.p1, line.p2, p, ctx);
    const sideQ = orient2D(line.p1, line.p2, q, ctx);
    if (sideP !== -1) {
      points.push(p);
    }
    if (sideP * sideQ < 0) {
      const cross = crossingPoint(edgeSegment(edge), { kind: 'line', p1: line.p1, p2: line.p2 }, ctx);
      if (cross) {
        points.push(cross);
      }
    }
  }

  if (ctx.verbose) {
    console.log(`[clip] cut of ${polygon.points.length} vertices keeps ${points.length} points`);
  }
  if (points.length === 0) {
    return null;
  }
  return convexHull(polygon2d(points, ctx), ctx);
}
