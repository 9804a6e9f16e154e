/**
 * Areas of overlap with circles
 *
 * Polygon ∩ circle: walk the polygon boundary, split at the circle crossings,
 * and sum a signed term per piece as seen from the circle center: a circular
 * sector when the piece leaves the disk, a triangle when it stays inside.
 * Circle ∩ circle: two sectors plus the two signed chord triangles.
 *
 * The circle/polygon direction is a delegate of the polygon/circle one, so
 * both orders give identical results.
 */

import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Circle2D } from './circle2d.js';
import type { Polygon2D } from './polygon2d.js';
import { sub2, dot2, cross2 } from '../num/vec2.js';
import { eq2 } from '../num/tolerance.js';
import {
  circleArea,
  circleSideOfPoint,
  crossingPointsWithCircle,
  crossingPointsWithLine,
  sideOfApartingCircle,
  sideOfTouchingCircle,
} from './circle2d.js';
import { edges } from './polygon2d.js';
import { segmentContainsPoint } from './segment2d.js';

/**
 * Polygon boundary with the circle crossings strictly inside each edge inserted
 */
function splitAtCircle(polygon: Polygon2D, circle: Circle2D, ctx: NumericContext): Vec2[] {
  const loop: Vec2[] = [];
  for (const [p1, p2] of edges(polygon)) {
    loop.push(p1);
    if (eq2(p1, p2, ctx)) {
      continue;
    }
    const edge = { kind: 'segment', p1, p2 } as const;
    for (const p of crossingPointsWithLine(circle, edge, ctx)) {
      if (segmentContainsPoint(edge, p, ctx) && !eq2(p, p1, ctx) && !eq2(p, p2, ctx)) {
        loop.push(p);
      }
    }
  }
  return loop;
}

/**
 * Area of the intersection of a simple polygon and a circle
 */
export function areaCommonPolygonCircle(polygon: Polygon2D, circle: Circle2D, ctx: NumericContext): number {
  const loop = splitAtCircle(polygon, circle, ctx);
  let area = 0;
  for (let i = 0; i < loop.length; i++) {
    const p1 = loop[i];
    const p2 = loop[(i + 1) % loop.length];
    const a = sub2(p1, circle.center);
    const b = sub2(p2, circle.center);
    const cross = cross2(a, b);
    if (circleSideOfPoint(circle, p1, ctx) === -1 || circleSideOfPoint(circle, p2, ctx) === -1) {
      const theta = Math.atan2(cross, dot2(a, b));
      area += (circle.radius ** 2 * theta) / 2;
    } else {
      area += cross / 2;
    }
  }

  const result = Math.abs(area);
  if (ctx.verbose) {
    console.log(`[area] polygon(${polygon.points.length}) ∩ circle r=${circle.radius}: ${loop.length} pieces, area ${result}`);
  }
  return result;
}

/**
 * Area of the intersection of a circle and a simple polygon
 */
export function areaCommonCirclePolygon(circle: Circle2D, polygon: Polygon2D, ctx: NumericContext): number {
  return areaCommonPolygonCircle(polygon, circle, ctx);
}

/**
 * Area of the intersection of two circles
 */
export function areaCommonCircleCircle(a: Circle2D, b: Circle2D, ctx: NumericContext): number {
  const apart = sideOfApartingCircle(a, b, ctx);
  const touching = sideOfTouchingCircle(a, b, ctx);
  if (apart === 1 || touching === 1) {
    return Math.min(circleArea(a), circleArea(b));
  }
  if (apart === -1 || touching === -1) {
    return 0;
  }

  const [p1, p2] = crossingPointsWithCircle(a, b, ctx);
  const toB = sub2(b.center, a.center);
  const toA = sub2(a.center, b.center);
  const fromA = sub2(p1, a.center);
  const fromB = sub2(p1, b.center);
  const thetaA = Math.atan2(cross2(fromA, toB), dot2(fromA, toB));
  const thetaB = Math.atan2(cross2(fromB, toA), dot2(fromB, toA));
  const sectorA = Math.abs(a.radius ** 2 * thetaA);
  const sectorB = Math.abs(b.radius ** 2 * thetaB);
  const triangleA = cross2(fromA, sub2(p2, a.center)) / 2;
  const triangleB = cross2(sub2(p2, b.center), fromB) / 2;

  const result = sectorA + sectorB + triangleA + triangleB;
  if (ctx.verbose) {
    console.log(`[area] circle r=${a.radius} ∩ circle r=${b.radius}: ${result}`);
  }
  return result;
}
