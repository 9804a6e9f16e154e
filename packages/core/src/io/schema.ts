/**
 * Shape Schemas
 *
 * Zod schemas for JSON-serializable primitives, and a parser that validates
 * the data and then builds the primitive through its constructor. Schema
 * failures raise ShapeParseError; geometric invariants (distinct endpoints,
 * positive radius) are still enforced by the constructors and raise
 * DegenerateInputError.
 *
 * Input:  { kind: 'segment', p1: [0, 0], p2: [2, 0] }
 * Output: Segment2D
 */

import { z } from 'zod';
import type { Vec2 } from '../num/vec2.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Line2D } from '../geom/line2d.js';
import type { Segment2D } from '../geom/segment2d.js';
import type { Polygon2D } from '../geom/polygon2d.js';
import type { Circle2D } from '../geom/circle2d.js';
import { vec2 } from '../num/vec2.js';
import { ShapeParseError } from '../errors.js';
import { line2d } from '../geom/line2d.js';
import { segment2d } from '../geom/segment2d.js';
import { polygon2d } from '../geom/polygon2d.js';
import { circle2d } from '../geom/circle2d.js';

// ============================================================================
// Schemas
// ============================================================================

const coordinate = z.number().finite();

export const pointSchema = z.tuple([coordinate, coordinate]);

export const shapeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('point'), x: coordinate, y: coordinate }),
  z.object({ kind: z.literal('line'), p1: pointSchema, p2: pointSchema }),
  z.object({ kind: z.literal('segment'), p1: pointSchema, p2: pointSchema }),
  z.object({ kind: z.literal('polygon'), points: z.array(pointSchema).min(1) }),
  z.object({ kind: z.literal('circle'), center: pointSchema, radius: coordinate }),
]);

export type ShapeInput = z.input<typeof shapeSchema>;

// ============================================================================
// Parsing
// ============================================================================

export type Shape =
  | { readonly kind: 'point'; readonly point: Vec2 }
  | Line2D
  | Segment2D
  | Polygon2D
  | Circle2D;

/**
 * Validate serialized input and build the primitive it describes
 */
export function parseShape(input: unknown, ctx: NumericContext): Shape {
  const parsed = shapeSchema.safeParse(input);
  if (!parsed.success) {
    throw new ShapeParseError(parsed.error.issues);
  }
  const data = parsed.data;
  switch (data.kind) {
    case 'point':
      return { kind: 'point', point: vec2(data.x, data.y) };
    case 'line':
      return line2d(data.p1, data.p2, ctx);
    case 'segment':
      return segment2d(data.p1, data.p2, ctx);
    case 'polygon':
      return polygon2d(data.points, ctx);
    case 'circle':
      return circle2d(data.center, data.radius);
  }
}

/**
 * Serialize a primitive back to schema-shaped data
 */
export function toShapeInput(shape: Shape): ShapeInput {
  switch (shape.kind) {
    case 'point':
      return { kind: 'point', x: shape.point[0], y: shape.point[1] };
    case 'line':
      return { kind: 'line', p1: pair(shape.p1), p2: pair(shape.p2) };
    case 'segment':
      return { kind: 'segment', p1: pair(shape.p1), p2: pair(shape.p2) };
    case 'polygon':
      return { kind: 'polygon', points: shape.points.map(pair) };
    case 'circle':
      return { kind: 'circle', center: pair(shape.center), radius: shape.radius };
  }
}

function pair(p: Vec2): [number, number] {
  return [p[0], p[1]];
}
