/**
 * @planegeo/core - 2D computational geometry kernel
 *
 * Plain data (Vec2 tuples and kind-tagged records) and pure functions:
 *
 * - num: tolerances, vectors, robust orientation predicates
 * - geom: lines, segments, polygons, circles and the algorithms over them
 *   (convex hull, rotating-calipers diameter, convex clipping, overlap areas)
 * - io: text rendering and schema-validated parsing of primitives
 *
 * Every tolerance-sensitive function takes a NumericContext; use
 * DEFAULT_CONTEXT or build one with createNumericContext().
 */

// Errors
export * from './errors.js';

// num: numeric backbone & tolerances
export * from './num/tolerance.js';
export * from './num/vec2.js';
export * from './num/predicates.js';

// geom: primitives & algorithms
export * from './geom/line2d.js';
export * from './geom/segment2d.js';
export * from './geom/linear2d.js';
export * from './geom/polygon2d.js';
export * from './geom/hull2d.js';
export * from './geom/clip2d.js';
export * from './geom/circle2d.js';
export * from './geom/area2d.js';
export * from './geom/triangle2d.js';

// io: formatting & parsing
export * from './io/format.js';
export * from './io/schema.js';
