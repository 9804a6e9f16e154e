/**
 * Geometric predicates
 *
 * Orientation tests used for every left/right/collinear decision in the kernel
 * (containment, convexity, crossing, hull construction).
 * Uses Shewchuk-style adaptive precision robust predicates via mourner/robust-predicates
 * for the sign, then buckets results within tolerance to collinear.
 */

import { orient2d as robustOrient2d } from 'robust-predicates';
import type { Vec2 } from './vec2.js';
import type { NumericContext } from './tolerance.js';
import { ZERO2 } from './vec2.js';
import { isZero } from './tolerance.js';

/**
 * Three-way orientation:
 * - 1: counter-clockwise (left turn)
 * - -1: clockwise (right turn)
 * - 0: collinear
 */
export type Orientation = -1 | 0 | 1;

/**
 * 2D orientation test using ROBUST predicates (Shewchuk)
 *
 * Returns the cross product (b - a) × (c - a), evaluated with adaptive precision:
 * - positive (>0): c is to the left (counter-clockwise)
 * - negative (<0): c is to the right (clockwise)
 * - zero (0): c is collinear with a and b
 *
 * Note: robust-predicates uses the opposite sign convention, so we negate the result.
 */
export function orient2DRobust(a: Vec2, b: Vec2, c: Vec2): number {
  return -robustOrient2d(a[0], a[1], b[0], b[1], c[0], c[1]);
}

/**
 * 2D orientation test (tolerance-aware wrapper)
 *
 * Returns the orientation of point c relative to the directed line from a to b.
 * A cross product whose magnitude is below the length tolerance counts as collinear.
 */
export function orient2D(a: Vec2, b: Vec2, c: Vec2, ctx: NumericContext): Orientation {
  const result = orient2DRobust(a, b, c);
  if (isZero(result, ctx)) {
    return 0;
  }
  return result > 0 ? 1 : -1;
}

/**
 * Orientation of vector v as seen from vector u (sign of u × v)
 */
export function ccw2(u: Vec2, v: Vec2, ctx: NumericContext): Orientation {
  return orient2D(ZERO2, u, v, ctx);
}
