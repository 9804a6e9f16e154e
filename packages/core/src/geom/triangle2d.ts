/**
 * Triangle centers
 *
 * Circumscribed and inscribed circles, built from bisector crossings.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Circle2D } from './circle2d.js';
import { add2, sub2, mul2, dist2, unit2 } from '../num/vec2.js';
import { orient2D } from '../num/predicates.js';
import { line2d, lineDistanceToPoint } from './line2d.js';
import { bisector } from './segment2d.js';
import { crossingPoint } from './linear2d.js';
import { circle2d } from './circle2d.js';

/**
 * Circle through a, b and c; null when they are collinear
 */
export function circumcircle(a: Vec2, b: Vec2, c: Vec2, ctx: NumericContext): Circle2D | null {
  if (orient2D(a, b, c, ctx) === 0) {
    return null;
  }
  const center = crossingPoint(bisector({ p1: a, p2: b }, ctx), bisector({ p1: b, p2: c }, ctx), ctx);
  return center ? circle2d(center, dist2(center, a)) : null;
}

/**
 * Internal angle bisector at vertex p of the corner q-p-r
 */
function angleBisector(p: Vec2, q: Vec2, r: Vec2, ctx: NumericContext) {
  const toward = mul2(add2(unit2(sub2(q, p), ctx), unit2(sub2(r, p), ctx)), 0.5);
  return line2d(p, add2(p, toward), ctx);
}

/**
 * Largest circle inside triangle abc; null when the vertices are collinear
 */
export function incircle(a: Vec2, b: Vec2, c: Vec2, ctx: NumericContext): Circle2D | null {
  if (orient2D(a, b, c, ctx) === 0) {
    return null;
  }
  const center = crossingPoint(angleBisector(a, b, c, ctx), angleBisector(b, a, c, ctx), ctx);
  return center ? circle2d(center, lineDistanceToPoint({ p1: a, p2: b }, center)) : null;
}
