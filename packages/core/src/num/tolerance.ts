/**
 * Tolerance model and numeric context
 *
 * Provides a centralized tolerance system for all geometric comparisons.
 * All equality/near-equality decisions should go through these helpers
 * rather than using raw comparisons.
 */

import { z } from 'zod';
import type { Vec2 } from './vec2.js';
import { InvalidOptionsError } from '../errors.js';

/**
 * Tolerance values for a context
 */
export interface Tolerances {
  /** Absolute tolerance: two scalars closer than this are equal */
  length: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  readonly tol: Readonly<Tolerances>;
  /** Log algorithm summaries to the console */
  readonly verbose: boolean;
}

/**
 * Default tolerances
 */
export const DEFAULT_TOLERANCES: Readonly<Tolerances> = Object.freeze({
  length: 1e-8,
});

const numericContextOptionsSchema = z
  .object({
    length: z.number().finite().positive(),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

export type NumericContextOptions = z.input<typeof numericContextOptionsSchema>;

/**
 * Create a numeric context, validating the overrides
 */
export function createNumericContext(options?: NumericContextOptions): NumericContext {
  const parsed = numericContextOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    throw new InvalidOptionsError(parsed.error.issues);
  }
  return Object.freeze({
    tol: Object.freeze({ length: parsed.data.length ?? DEFAULT_TOLERANCES.length }),
    verbose: parsed.data.verbose ?? false,
  });
}

/**
 * Shared default context
 */
export const DEFAULT_CONTEXT: NumericContext = createNumericContext();

/**
 * Check if two numbers are equal within tolerance (strict: |a - b| < tol)
 */
export function eq(a: number, b: number, ctx: NumericContext): boolean {
  return Math.abs(a - b) < ctx.tol.length;
}

/**
 * Check if a value is effectively zero
 */
export function isZero(value: number, ctx: NumericContext): boolean {
  return eq(value, 0, ctx);
}

/**
 * Clamp a value to zero if it's within tolerance
 */
export function clampToZero(value: number, ctx: NumericContext): number {
  return isZero(value, ctx) ? 0 : value;
}

/**
 * Check approximate equality of 2D coordinates, component-wise
 */
export function eq2(a: Vec2, b: Vec2, ctx: NumericContext): boolean {
  return eq(a[0], b[0], ctx) && eq(a[1], b[1], ctx);
}

/**
 * Inclusive range test with tolerant bounds
 */
export function inRange(value: number, lo: number, hi: number, ctx: NumericContext): boolean {
  return eq(value, lo, ctx) || eq(value, hi, ctx) || (lo < value && value < hi);
}
