/**
 * Geometry error types
 *
 * Only malformed input raises. Configurations with no geometric solution
 * (parallel lines, disjoint circles, a point inside a circle asked for
 * tangents) are valid outcomes and come back as `null` or an empty array.
 */

import type { ZodIssue } from 'zod';

export type GeometryErrorCode =
  | 'DEGENERATE_INPUT'
  | 'DIVISION_BY_ZERO'
  | 'INVALID_ARGUMENT_TYPE'
  | 'INVALID_OPTIONS'
  | 'SHAPE_PARSE';

/**
 * Base class for all errors raised by the kernel
 */
export abstract class GeometryError extends Error {
  abstract readonly code: GeometryErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A primitive was constructed from input that does not define it:
 * coincident line endpoints, a non-positive radius, an empty vertex list.
 */
export class DegenerateInputError extends GeometryError {
  readonly code = 'DEGENERATE_INPUT';

  constructor(message = 'Degenerate input') {
    super(message);
  }
}

/**
 * A vector was divided by exactly zero
 */
export class DivisionByZeroError extends GeometryError {
  readonly code = 'DIVISION_BY_ZERO';

  constructor(message = 'Division by zero') {
    super(message);
  }
}

/**
 * A line/segment operation received an operand outside {line, segment}
 */
export class InvalidArgumentTypeError extends GeometryError {
  readonly code = 'INVALID_ARGUMENT_TYPE';

  constructor(readonly received: unknown, message?: string) {
    super(message ?? `Expected a line or segment, received ${describeOperand(received)}`);
  }
}

/**
 * Numeric context options failed validation
 */
export class InvalidOptionsError extends GeometryError {
  readonly code = 'INVALID_OPTIONS';

  constructor(readonly issues: ZodIssue[]) {
    super(`Invalid numeric context options: ${formatIssues(issues)}`);
  }
}

/**
 * Serialized shape input failed validation
 */
export class ShapeParseError extends GeometryError {
  readonly code = 'SHAPE_PARSE';

  constructor(readonly issues: ZodIssue[]) {
    super(`Invalid shape: ${formatIssues(issues)}`);
  }
}

/**
 * Type guard for kernel errors
 */
export function isGeometryError(err: unknown): err is GeometryError {
  return err instanceof GeometryError;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function describeOperand(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object' && 'kind' in value) {
    return `kind "${String(value.kind)}"`;
  }
  return typeof value;
}
