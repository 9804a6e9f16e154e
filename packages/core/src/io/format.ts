/**
 * Text rendering of primitives
 *
 * Two renderings per primitive: `text` is whitespace-separated numbers in
 * judge-output style, `describe` is for humans. Neither is meant to be
 * parsed back.
 */

import type { Vec2 } from '../num/vec2.js';
import type { TwoPoint } from '../geom/line2d.js';
import type { Polygon2D } from '../geom/polygon2d.js';
import type { Circle2D } from '../geom/circle2d.js';

/**
 * Fractional digits written for every coordinate
 */
export const FORMAT_DIGITS = 10;

export function formatNumber(value: number, digits: number = FORMAT_DIGITS): string {
  return value.toFixed(digits);
}

export function vec2Text(v: Vec2): string {
  return `${formatNumber(v[0])} ${formatNumber(v[1])}`;
}

export function describeVec2(v: Vec2): string {
  return `(${formatNumber(v[0])}, ${formatNumber(v[1])})`;
}

export function linearText(l: TwoPoint): string {
  return `${vec2Text(l.p1)} ${vec2Text(l.p2)}`;
}

export function describeLinear(l: TwoPoint): string {
  return `${describeVec2(l.p1)} -- ${describeVec2(l.p2)}`;
}

/**
 * One vertex per line
 */
export function polygonText(polygon: Polygon2D): string {
  return polygon.points.map(vec2Text).join('\n');
}

export function describePolygon(polygon: Polygon2D): string {
  return polygon.points.map(describeVec2).join(' -> ');
}

export function circleText(c: Circle2D): string {
  return `${vec2Text(c.center)} ${formatNumber(c.radius)}`;
}

export function describeCircle(c: Circle2D): string {
  return `o: ${describeVec2(c.center)}, r: ${formatNumber(c.radius)}`;
}
