/**
 * 2D vector operations
 *
 * Vectors are readonly tuples [x, y].
 * A Vec2 is used both as a point and as a displacement.
 * All operations are pure functions.
 */

import type { NumericContext } from './tolerance.js';
import { isZero } from './tolerance.js';
import { DivisionByZeroError } from '../errors.js';

export type Vec2 = readonly [number, number];

/**
 * Create a 2D vector
 */
export function vec2(x: number, y: number): Vec2 {
  return [x, y];
}

/**
 * Zero vector
 */
export const ZERO2: Vec2 = [0, 0];

/**
 * Add two vectors: a + b
 */
export function add2(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

/**
 * Subtract two vectors: a - b
 */
export function sub2(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

/**
 * Multiply vector by scalar: v * s
 */
export function mul2(v: Vec2, s: number): Vec2 {
  return [v[0] * s, v[1] * s];
}

/**
 * Divide vector by scalar: v / s
 *
 * Throws DivisionByZeroError when s is exactly 0.
 */
export function div2(v: Vec2, s: number): Vec2 {
  if (s === 0) {
    throw new DivisionByZeroError(`Cannot divide (${v[0]}, ${v[1]}) by zero`);
  }
  return [v[0] / s, v[1] / s];
}

/**
 * Dot product: a · b
 */
export function dot2(a: Vec2, b: Vec2): number {
  return a[0] * b[0] + a[1] * b[1];
}

/**
 * Cross product (2D): returns scalar (z-component of 3D cross product)
 */
export function cross2(a: Vec2, b: Vec2): number {
  return a[0] * b[1] - a[1] * b[0];
}

/**
 * Squared length of vector
 */
export function lengthSq2(v: Vec2): number {
  return v[0] * v[0] + v[1] * v[1];
}

/**
 * Length of vector
 */
export function length2(v: Vec2): number {
  return Math.sqrt(lengthSq2(v));
}

/**
 * Distance squared between two points
 */
export function distSq2(a: Vec2, b: Vec2): number {
  return lengthSq2(sub2(a, b));
}

/**
 * Distance between two points
 */
export function dist2(a: Vec2, b: Vec2): number {
  return length2(sub2(a, b));
}

/**
 * Midpoint of two points
 */
export function mid2(a: Vec2, b: Vec2): Vec2 {
  return div2(add2(a, b), 2);
}

/**
 * Translate a point by (dx, dy)
 */
export function move2(v: Vec2, dx: number, dy: number): Vec2 {
  return [v[0] + dx, v[1] + dy];
}

/**
 * Rotate a point by theta radians (counter-clockwise) about origin
 */
export function rotate2(v: Vec2, theta: number, origin: Vec2 = ZERO2): Vec2 {
  const [rx, ry] = sub2(v, origin);
  const cos = Math.cos(theta);
  const sin = Math.sin(theta);
  return add2(origin, [rx * cos - ry * sin, rx * sin + ry * cos]);
}

/**
 * Unit vector in the direction of v
 * Returns zero vector if the length of v is within tolerance of zero
 */
export function unit2(v: Vec2, ctx: NumericContext): Vec2 {
  const len = length2(v);
  if (isZero(len, ctx)) {
    return ZERO2;
  }
  return div2(v, len);
}
