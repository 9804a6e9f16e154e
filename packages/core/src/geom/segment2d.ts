/**
 * Bounded 2D segments
 *
 * A segment shares its carrier algebra with lines (see line2d.ts); the
 * functions here are the ones whose answer changes once the parameter range
 * is restricted to [0, |p2 - p1|].
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Line2D, TwoPoint } from './line2d.js';
import { sub2, dot2, length2, dist2, mid2, rotate2 } from '../num/vec2.js';
import { eq2, inRange } from '../num/tolerance.js';
import { assertDistinct, direction, line2d, lineContainsPoint, projectPoint } from './line2d.js';

/**
 * Segment from p1 to p2
 */
export interface Segment2D extends TwoPoint {
  readonly kind: 'segment';
}

/**
 * Create a segment between two distinct points
 */
export function segment2d(p1: Vec2, p2: Vec2, ctx: NumericContext): Segment2D {
  assertDistinct(p1, p2, 'Segment', ctx);
  return { kind: 'segment', p1, p2 };
}

export function segmentLength(s: TwoPoint): number {
  return dist2(s.p1, s.p2);
}

/**
 * Perpendicular bisector: both endpoints rotated a quarter turn about the midpoint
 */
export function bisector(s: TwoPoint, ctx: NumericContext): Line2D {
  const center = mid2(s.p1, s.p2);
  return line2d(rotate2(s.p1, Math.PI / 2, center), rotate2(s.p2, Math.PI / 2, center), ctx);
}

/**
 * Whether p lies on the segment, endpoints included
 *
 * Accepts zero-length carriers (a closing polygon edge can be one), which
 * contain only their single point.
 */
export function segmentContainsPoint(s: TwoPoint, p: Vec2, ctx: NumericContext): boolean {
  const len = segmentLength(s);
  if (len === 0) {
    return eq2(s.p1, p, ctx);
  }
  const ref = dot2(direction(s), sub2(p, s.p1)) / len;
  return lineContainsPoint(s, p, ctx) && inRange(ref, 0, len, ctx);
}

/**
 * Distance from p to the closest point of the segment
 */
export function segmentDistanceToPoint(s: TwoPoint, p: Vec2, ctx: NumericContext): number {
  if (segmentLength(s) === 0) {
    return dist2(s.p1, p);
  }
  const foot = projectPoint(s, p);
  if (segmentContainsPoint(s, foot, ctx)) {
    return length2(sub2(p, foot));
  }
  return Math.min(dist2(s.p1, p), dist2(s.p2, p));
}
