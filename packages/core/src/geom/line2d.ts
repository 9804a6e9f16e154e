/**
 * Infinite 2D lines
 *
 * A line is stored as two distinct points; its direction is p2 - p1.
 * The operations here that only depend on the carrier (direction, slope,
 * projection, parallelism) are shared with segments.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import { add2, sub2, mul2, dot2, cross2, lengthSq2, dist2 } from '../num/vec2.js';
import { eq, eq2, isZero } from '../num/tolerance.js';
import { orient2D } from '../num/predicates.js';
import { DegenerateInputError } from '../errors.js';

/**
 * Anything carried by two points: a line or a segment
 */
export interface TwoPoint {
  readonly p1: Vec2;
  readonly p2: Vec2;
}

/**
 * Infinite line through p1 and p2
 */
export interface Line2D extends TwoPoint {
  readonly kind: 'line';
}

/**
 * Throw unless p1 and p2 are distinct within tolerance
 */
export function assertDistinct(p1: Vec2, p2: Vec2, what: string, ctx: NumericContext): void {
  if (eq2(p1, p2, ctx)) {
    throw new DegenerateInputError(`${what} endpoints must be distinct, got (${p1[0]}, ${p1[1]}) twice`);
  }
}

/**
 * Create a line through two distinct points
 */
export function line2d(p1: Vec2, p2: Vec2, ctx: NumericContext): Line2D {
  assertDistinct(p1, p2, 'Line', ctx);
  return { kind: 'line', p1, p2 };
}

/**
 * Direction vector p2 - p1
 */
export function direction(l: TwoPoint): Vec2 {
  return sub2(l.p2, l.p1);
}

/**
 * Slope dy/dx, or Infinity when the carrier is vertical
 */
export function slope(l: TwoPoint, ctx: NumericContext): number {
  if (eq(l.p1[0], l.p2[0], ctx)) {
    return Infinity;
  }
  return (l.p2[1] - l.p1[1]) / (l.p2[0] - l.p1[0]);
}

/**
 * Orthogonal projection of p onto the carrier line
 */
export function projectPoint(l: TwoPoint, p: Vec2): Vec2 {
  const base = direction(l);
  return add2(l.p1, mul2(base, dot2(sub2(p, l.p1), base) / lengthSq2(base)));
}

/**
 * Mirror image of p across the carrier line
 */
export function reflectPoint(l: TwoPoint, p: Vec2): Vec2 {
  return add2(p, mul2(sub2(projectPoint(l, p), p), 2));
}

export function isParallel(a: TwoPoint, b: TwoPoint, ctx: NumericContext): boolean {
  return isZero(cross2(direction(a), direction(b)), ctx);
}

export function isOrthogonal(a: TwoPoint, b: TwoPoint, ctx: NumericContext): boolean {
  return isZero(dot2(direction(a), direction(b)), ctx);
}

/**
 * Whether p lies on the infinite carrier line
 */
export function lineContainsPoint(l: TwoPoint, p: Vec2, ctx: NumericContext): boolean {
  if (eq2(l.p1, p, ctx) || eq2(l.p2, p, ctx)) {
    return true;
  }
  return orient2D(l.p1, l.p2, p, ctx) === 0;
}

/**
 * Distance from p to the infinite carrier line
 */
export function lineDistanceToPoint(l: TwoPoint, p: Vec2): number {
  return dist2(p, projectPoint(l, p));
}
