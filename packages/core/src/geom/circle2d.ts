/**
 * Circles
 *
 * Relational tests against points, lines and other circles, crossing points,
 * and tangent construction from an external point.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Linear2D } from './linear2d.js';
import type { Side } from './polygon2d.js';
import { add2, sub2, mul2, dist2, rotate2, unit2 } from '../num/vec2.js';
import { eq, eq2 } from '../num/tolerance.js';
import { DegenerateInputError } from '../errors.js';
import { direction, projectPoint } from './line2d.js';
import { containsPoint, distanceToPoint } from './linear2d.js';

export interface Circle2D {
  readonly kind: 'circle';
  readonly center: Vec2;
  readonly radius: number;
}

/**
 * How two circles touch
 * - 1: internally tangent
 * - -1: externally tangent
 * - 0: not tangent
 */
export type Touching = -1 | 0 | 1;

/**
 * How two circles lie apart
 * - 1: one strictly contains the other
 * - -1: strictly disjoint
 * - 0: tangent, or crossing at two points
 */
export type Apart = -1 | 0 | 1;

/**
 * Create a circle; the radius must be a finite positive number
 */
export function circle2d(center: Vec2, radius: number): Circle2D {
  if (!(radius > 0) || !Number.isFinite(radius)) {
    throw new DegenerateInputError(`Circle radius must be positive, got ${radius}`);
  }
  return { kind: 'circle', center, radius };
}

export function circleArea(c: Circle2D): number {
  return Math.PI * c.radius ** 2;
}

export function circleSideOfPoint(c: Circle2D, p: Vec2, ctx: NumericContext): Side {
  const d = dist2(c.center, p);
  if (eq(d, c.radius, ctx)) {
    return 0;
  }
  return d < c.radius ? 1 : -1;
}

export function sideOfTouchingCircle(a: Circle2D, b: Circle2D, ctx: NumericContext): Touching {
  const d = dist2(a.center, b.center);
  if (eq(d, Math.abs(a.radius - b.radius), ctx)) {
    return 1;
  }
  if (eq(d, a.radius + b.radius, ctx)) {
    return -1;
  }
  return 0;
}

export function sideOfApartingCircle(a: Circle2D, b: Circle2D, ctx: NumericContext): Apart {
  if (sideOfTouchingCircle(a, b, ctx) !== 0) {
    return 0;
  }
  const d = dist2(a.center, b.center);
  if (d < Math.abs(a.radius - b.radius)) {
    return 1;
  }
  if (a.radius + b.radius < d) {
    return -1;
  }
  return 0;
}

/**
 * Crossing points of two circles: one point when tangent, two when they
 * cross, none when nested, apart or coincident
 */
export function crossingPointsWithCircle(a: Circle2D, b: Circle2D, ctx: NumericContext): Vec2[] {
  if (eq2(a.center, b.center, ctx) && eq(a.radius, b.radius, ctx)) {
    return [];
  }
  const touching = sideOfTouchingCircle(a, b, ctx);
  const unit = unit2(sub2(b.center, a.center), ctx);
  if (touching === 1) {
    return a.radius > b.radius
      ? [add2(a.center, mul2(unit, a.radius))]
      : [sub2(b.center, mul2(unit, b.radius))];
  }
  if (touching === -1) {
    return [add2(a.center, mul2(unit, a.radius))];
  }
  if (sideOfApartingCircle(a, b, ctx) !== 0) {
    return [];
  }

  // Foot of the common chord on the center line, from the law of cosines
  const d = dist2(a.center, b.center);
  const foot = (a.radius ** 2 - b.radius ** 2 + d ** 2) / (2 * d);
  const halfChord = Math.sqrt(Math.max(0, a.radius ** 2 - foot ** 2));
  const p = add2(a.center, mul2(unit, foot));
  const normal = rotate2(unit, Math.PI / 2);
  return [add2(p, mul2(normal, halfChord)), sub2(p, mul2(normal, halfChord))];
}

export function isTouchingLine(c: Circle2D, l: Linear2D, ctx: NumericContext): boolean {
  return eq(distanceToPoint(l, c.center, ctx), c.radius, ctx);
}

/**
 * Whether the line/segment meets the circle in at least one point
 */
export function isCrossingLine(c: Circle2D, l: Linear2D, ctx: NumericContext): boolean {
  if (isTouchingLine(c, l, ctx)) {
    return true;
  }
  return distanceToPoint(l, c.center, ctx) < c.radius;
}

/**
 * Crossing points with a line (or the part of them a segment contains),
 * ordered along the direction p1 -> p2
 */
export function crossingPointsWithLine(c: Circle2D, l: Linear2D, ctx: NumericContext): Vec2[] {
  if (!isCrossingLine(c, l, ctx)) {
    return [];
  }
  const foot = projectPoint(l, c.center);
  const onCarrier = (() => {
    const d = dist2(foot, c.center);
    if (eq(d, c.radius, ctx)) {
      return [foot];
    }
    const unit = unit2(direction(l), ctx);
    const half = Math.sqrt(Math.max(0, c.radius ** 2 - d ** 2));
    return [sub2(foot, mul2(unit, half)), add2(foot, mul2(unit, half))];
  })();
  return l.kind === 'segment' ? onCarrier.filter((p) => containsPoint(l, p, ctx)) : onCarrier;
}

/**
 * Points of tangency of the tangent lines through p
 *
 * None when p is inside, p itself when it lies on the circle, otherwise the
 * two crossings with the circle centered at p through both tangency points.
 */
export function tangentPoints(c: Circle2D, p: Vec2, ctx: NumericContext): Vec2[] {
  const side = circleSideOfPoint(c, p, ctx);
  if (side === 1) {
    return [];
  }
  if (side === 0) {
    return [p];
  }
  const reach = Math.sqrt(dist2(p, c.center) ** 2 - c.radius ** 2);
  return crossingPointsWithCircle(c, circle2d(p, reach), ctx);
}
