/**
 * Convex hull and diameter
 *
 * Hull: Andrew's monotone chain over vertices sorted by (y, x), O(n log n).
 * Diameter: rotating calipers over the hull, O(n).
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Polygon2D } from './polygon2d.js';
import { sub2, cross2, dist2 } from '../num/vec2.js';
import { eq2 } from '../num/tolerance.js';
import { orient2D } from '../num/predicates.js';
import { polygon2d, vertexAt } from './polygon2d.js';

/**
 * Order by y, then x
 */
function compareYX(a: Vec2, b: Vec2): number {
  return a[1] - b[1] || a[0] - b[0];
}

/**
 * Scan sorted points into one chain, popping while the last two kept
 * points and the next one turn clockwise. Collinear points are kept.
 */
function buildChain(sorted: readonly Vec2[], ctx: NumericContext): Vec2[] {
  const chain: Vec2[] = [];
  for (const next of sorted) {
    while (
      chain.length >= 2 &&
      orient2D(chain[chain.length - 2], chain[chain.length - 1], next, ctx) < 0
    ) {
      chain.pop();
    }
    chain.push(next);
  }
  return chain;
}

/**
 * Convex hull of the polygon's vertices, counter-clockwise, starting from
 * the lowest (then leftmost) vertex. Points on hull edges are kept.
 *
 * Returns a new polygon; the input is not reordered.
 */
export function convexHull(polygon: Polygon2D, ctx: NumericContext): Polygon2D {
  // Repeated points would survive the scan as zero-length collinear steps
  const points = [...polygon.points]
    .sort(compareYX)
    .filter((p, k, sorted) => k === 0 || !eq2(sorted[k - 1], p, ctx));
  const n = points.length;

  if (n <= 2) {
    return polygon2d(points, ctx);
  }
  if (n === 3) {
    if (orient2D(points[0], points[1], points[2], ctx) < 0) {
      return polygon2d([points[0], points[2], points[1]], ctx);
    }
    return polygon2d(points, ctx);
  }

  const right = buildChain(points, ctx);
  const left = buildChain([...points].reverse(), ctx);
  right.pop();
  left.pop();

  const hull = polygon2d([...right, ...left], ctx);
  if (ctx.verbose) {
    console.log(`[hull] ${n} points -> ${hull.points.length} hull vertices`);
  }
  return hull;
}

/**
 * Index of the vertex smallest by (x, y) for sign 1, largest for sign -1
 */
function extremeIndex(points: readonly Vec2[], sign: 1 | -1): number {
  let best = 0;
  for (let k = 1; k < points.length; k++) {
    const d = (points[k][0] - points[best][0] || points[k][1] - points[best][1]) * sign;
    if (d < 0) {
      best = k;
    }
  }
  return best;
}

/**
 * Largest distance between any two vertices (farthest pair)
 */
export function polygonDiameter(polygon: Polygon2D, ctx: NumericContext): number {
  const hull = convexHull(polygon, ctx);
  const pts = hull.points;
  const n = pts.length;
  if (n === 2) {
    return dist2(pts[0], pts[1]);
  }

  const si = extremeIndex(pts, 1);
  const sj = extremeIndex(pts, -1);
  let i = si;
  let j = sj;
  let best = 0;
  // Each step advances one caliper; a full turn takes n steps for a strictly
  // convex hull. The cap bounds degenerate (collinear) hulls.
  for (let step = 0; step <= 2 * n && (step === 0 || i !== sj || j !== si); step++) {
    best = Math.max(best, dist2(pts[i], pts[j]));
    const vi = sub2(vertexAt(hull, i + 1), pts[i]);
    const vj = sub2(vertexAt(hull, j + 1), pts[j]);
    if (cross2(vi, vj) < 0) {
      i = (i + 1) % n;
    } else {
      j = (j + 1) % n;
    }
  }

  if (ctx.verbose) {
    console.log(`[calipers] hull of ${n} vertices, diameter ${best}`);
  }
  return best;
}
