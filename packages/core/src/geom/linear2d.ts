/**
 * Line/segment dispatch
 *
 * Crossing, containment and distance queries accept exactly two operand
 * kinds, 'line' and 'segment'. Dispatch is an explicit switch on `kind`;
 * anything else (including values smuggled past the type checker) raises
 * InvalidArgumentTypeError.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Line2D } from './line2d.js';
import type { Segment2D } from './segment2d.js';
import { add2, sub2, mul2, cross2 } from '../num/vec2.js';
import { isZero } from '../num/tolerance.js';
import { orient2D } from '../num/predicates.js';
import { InvalidArgumentTypeError } from '../errors.js';
import { direction, isParallel, lineContainsPoint, lineDistanceToPoint } from './line2d.js';
import { segmentContainsPoint, segmentDistanceToPoint } from './segment2d.js';

export type Linear2D = Line2D | Segment2D;

export type LinearKind = Linear2D['kind'];

/**
 * Type guard for line/segment records
 */
export function isLinear(value: unknown): value is Linear2D {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'line' || value.kind === 'segment')
  );
}

export function assertLinear(value: unknown): asserts value is Linear2D {
  if (!isLinear(value)) {
    throw new InvalidArgumentTypeError(value);
  }
}

/**
 * Whether p lies on the line (unbounded) or on the segment (bounded)
 */
export function containsPoint(l: Linear2D, p: Vec2, ctx: NumericContext): boolean {
  assertLinear(l);
  switch (l.kind) {
    case 'line':
      return lineContainsPoint(l, p, ctx);
    case 'segment':
      return segmentContainsPoint(l, p, ctx);
  }
}

export function distanceToPoint(l: Linear2D, p: Vec2, ctx: NumericContext): number {
  assertLinear(l);
  switch (l.kind) {
    case 'line':
      return lineDistanceToPoint(l, p);
    case 'segment':
      return segmentDistanceToPoint(l, p, ctx);
  }
}

/**
 * Whether two lines/segments share at least one point
 *
 * Coincident lines and collinear overlapping segments count as crossing.
 */
export function isCrossing(a: Linear2D, b: Linear2D, ctx: NumericContext): boolean {
  assertLinear(a);
  assertLinear(b);
  if (a.kind === 'line') {
    return b.kind === 'line' ? lineCrossesLine(a, b, ctx) : lineCrossesSegment(a, b, ctx);
  }
  return b.kind === 'line' ? lineCrossesSegment(b, a, ctx) : segmentCrossesSegment(a, b, ctx);
}

function lineCrossesLine(a: Line2D, b: Line2D, ctx: NumericContext): boolean {
  if (lineContainsPoint(a, b.p1, ctx)) {
    return true;
  }
  return !isParallel(a, b, ctx);
}

function lineCrossesSegment(l: Line2D, s: Segment2D, ctx: NumericContext): boolean {
  if (lineContainsPoint(l, s.p1, ctx) || lineContainsPoint(l, s.p2, ctx)) {
    return true;
  }
  return orient2D(l.p1, l.p2, s.p1, ctx) * orient2D(l.p1, l.p2, s.p2, ctx) < 0;
}

function segmentCrossesSegment(a: Segment2D, b: Segment2D, ctx: NumericContext): boolean {
  if (
    segmentContainsPoint(a, b.p1, ctx) ||
    segmentContainsPoint(a, b.p2, ctx) ||
    segmentContainsPoint(b, a.p1, ctx) ||
    segmentContainsPoint(b, a.p2, ctx)
  ) {
    return true;
  }
  const o1 = orient2D(a.p1, a.p2, b.p1, ctx);
  const o2 = orient2D(a.p1, a.p2, b.p2, ctx);
  const o3 = orient2D(b.p1, b.p2, a.p1, ctx);
  const o4 = orient2D(b.p1, b.p2, a.p2, ctx);
  return o1 !== o2 && o3 !== o4;
}

/**
 * Crossing point of two lines/segments
 *
 * Returns null when they do not cross. When they overlap (coincident lines,
 * collinear overlapping segments) a canonical representative is returned:
 * the first of b.p1, b.p2, a.p1, a.p2 lying on both, which is b.p1 whenever
 * b is unbounded or starts inside a.
 */
export function crossingPoint(a: Linear2D, b: Linear2D, ctx: NumericContext): Vec2 | null {
  if (!isCrossing(a, b, ctx)) {
    return null;
  }
  const da = direction(a);
  const db = direction(b);
  const d1 = cross2(da, db);
  const d2 = cross2(da, sub2(a.p2, b.p1));
  if (isParallel(a, b, ctx)) {
    if (!isZero(d2, ctx)) {
      return null;
    }
    return overlapRepresentative(a, b, ctx);
  }
  return add2(b.p1, mul2(db, d2 / d1));
}

function overlapRepresentative(a: Linear2D, b: Linear2D, ctx: NumericContext): Vec2 | null {
  const candidates = [b.p1, b.p2, a.p1, a.p2];
  return candidates.find((p) => containsPoint(a, p, ctx) && containsPoint(b, p, ctx)) ?? null;
}

/**
 * Distance between the closest points of two segments
 */
export function distanceSegmentSegment(a: Segment2D, b: Segment2D, ctx: NumericContext): number {
  if (isCrossing(a, b, ctx)) {
    return 0;
  }
  return Math.min(
    segmentDistanceToPoint(a, b.p1, ctx),
    segmentDistanceToPoint(a, b.p2, ctx),
    segmentDistanceToPoint(b, a.p1, ctx),
    segmentDistanceToPoint(b, a.p2, ctx)
  );
}
