/**
 * @planegeo/oo - Object-oriented façade for @planegeo/core
 *
 * Immutable classes wrapping the plain-data kernel:
 * - Vector - point/displacement with arithmetic and orientation
 * - Line, Segment - unbounded and bounded linear shapes (LinearShape)
 * - Polygon - measures, containment, hull, diameter, convex clipping
 * - Circle - relations, crossings, tangents, overlap areas
 *
 * Every instance carries the NumericContext it was created with and hands it
 * to the objects its operations return.
 */

import {
  // Numeric types
  type Vec2,
  type NumericContext,
  type Orientation,
  DEFAULT_CONTEXT,
  vec2,
  add2,
  sub2,
  mul2,
  div2,
  dot2,
  cross2,
  length2,
  dist2,
  move2,
  rotate2,
  unit2,
  eq2,
  ccw2,

  // Errors
  InvalidArgumentTypeError,

  // Linear shapes
  type Line2D,
  type Segment2D,
  type Linear2D,
  line2d,
  slope,
  projectPoint,
  reflectPoint,
  isParallel,
  isOrthogonal,
  segment2d,
  segmentLength,
  bisector,
  containsPoint,
  distanceToPoint,
  isCrossing,
  crossingPoint,
  distanceSegmentSegment,

  // Polygons
  type Polygon2D,
  type Side,
  polygon2d,
  vertexAt,
  polygonArea,
  polygonPerimeter,
  isConvex,
  polygonSideOfPoint,
  convexHull,
  polygonDiameter,
  convexCommon,
  convexCutWithLine,

  // Circles
  type Circle2D,
  type Touching,
  type Apart,
  circle2d,
  circleArea,
  circleSideOfPoint,
  sideOfTouchingCircle,
  sideOfApartingCircle,
  crossingPointsWithCircle,
  isTouchingLine,
  isCrossingLine,
  crossingPointsWithLine,
  tangentPoints,
  areaCommonPolygonCircle,
  areaCommonCirclePolygon,
  areaCommonCircleCircle,
  circumcircle,
  incircle,

  // Text & data
  vec2Text,
  describeVec2,
  linearText,
  describeLinear,
  polygonText,
  describePolygon,
  circleText,
  describeCircle,
  parseShape,
} from '@planegeo/core';

// Re-export useful types
export type { Vec2, NumericContext, Orientation, Side, Touching, Apart };
export { DEFAULT_CONTEXT, createNumericContext, isGeometryError } from '@planegeo/core';

// ============================================================================
// Vector
// ============================================================================

/**
 * 2D point or displacement
 */
export class Vector {
  constructor(
    public readonly x: number,
    public readonly y: number,
    private readonly ctx: NumericContext = DEFAULT_CONTEXT
  ) {}

  static from(v: Vec2, ctx: NumericContext = DEFAULT_CONTEXT): Vector {
    return new Vector(v[0], v[1], ctx);
  }

  private wrap(v: Vec2): Vector {
    return Vector.from(v, this.ctx);
  }

  add(other: Vector): Vector {
    return this.wrap(add2(this.toData(), other.toData()));
  }

  sub(other: Vector): Vector {
    return this.wrap(sub2(this.toData(), other.toData()));
  }

  mul(s: number): Vector {
    return this.wrap(mul2(this.toData(), s));
  }

  /**
   * @throws DivisionByZeroError when s is exactly 0
   */
  div(s: number): Vector {
    return this.wrap(div2(this.toData(), s));
  }

  dot(other: Vector): number {
    return dot2(this.toData(), other.toData());
  }

  cross(other: Vector): number {
    return cross2(this.toData(), other.toData());
  }

  length(): number {
    return length2(this.toData());
  }

  distanceTo(other: Vector): number {
    return dist2(this.toData(), other.toData());
  }

  /**
   * Tolerance equality
   */
  equals(other: Vector): boolean {
    return eq2(this.toData(), other.toData(), this.ctx);
  }

  move(dx: number, dy: number): Vector {
    return this.wrap(move2(this.toData(), dx, dy));
  }

  rotate(theta: number, origin?: Vector): Vector {
    return this.wrap(rotate2(this.toData(), theta, origin?.toData()));
  }

  /**
   * Turn from this vector to other: 1 counter-clockwise, -1 clockwise,
   * 0 collinear
   */
  ccw(other: Vector): Orientation {
    return ccw2(this.toData(), other.toData(), this.ctx);
  }

  unitVector(): Vector {
    return this.wrap(unit2(this.toData(), this.ctx));
  }

  toData(): Vec2 {
    return vec2(this.x, this.y);
  }

  toString(): string {
    return vec2Text(this.toData());
  }

  format(): string {
    return describeVec2(this.toData());
  }
}

// ============================================================================
// Lines & segments
// ============================================================================

/**
 * Operations shared by Line and Segment
 */
export interface LinearShape {
  readonly p1: Vector;
  readonly p2: Vector;
  direction(): Vector;
  slope(): number;
  projection(p: Vector): Vector;
  reflection(p: Vector): Vector;
  isParallel(other: LinearShape): boolean;
  isOrthogonal(other: LinearShape): boolean;
  includes(p: Vector): boolean;
  distanceToPoint(p: Vector): number;
  isCrossing(other: Line | Segment): boolean;
  crossingPoint(other: Line | Segment): Vector | null;
  toData(): Linear2D;
}

function linearData(value: unknown): Linear2D {
  if (value instanceof Line || value instanceof Segment) {
    return value.toData();
  }
  throw new InvalidArgumentTypeError(value, `Expected a Line or Segment instance, received ${typeof value}`);
}

abstract class TwoPointShape<T extends Linear2D> implements LinearShape {
  protected constructor(
    protected readonly data: T,
    protected readonly ctx: NumericContext
  ) {}

  get p1(): Vector {
    return Vector.from(this.data.p1, this.ctx);
  }

  get p2(): Vector {
    return Vector.from(this.data.p2, this.ctx);
  }

  direction(): Vector {
    return Vector.from(sub2(this.data.p2, this.data.p1), this.ctx);
  }

  /**
   * Infinity for vertical carriers
   */
  slope(): number {
    return slope(this.data, this.ctx);
  }

  projection(p: Vector): Vector {
    return Vector.from(projectPoint(this.data, p.toData()), this.ctx);
  }

  reflection(p: Vector): Vector {
    return Vector.from(reflectPoint(this.data, p.toData()), this.ctx);
  }

  isParallel(other: LinearShape): boolean {
    return isParallel(this.data, other.toData(), this.ctx);
  }

  isOrthogonal(other: LinearShape): boolean {
    return isOrthogonal(this.data, other.toData(), this.ctx);
  }

  includes(p: Vector): boolean {
    return containsPoint(this.data, p.toData(), this.ctx);
  }

  distanceToPoint(p: Vector): number {
    return distanceToPoint(this.data, p.toData(), this.ctx);
  }

  isCrossing(other: Line | Segment): boolean {
    return isCrossing(this.data, linearData(other), this.ctx);
  }

  crossingPoint(other: Line | Segment): Vector | null {
    const p = crossingPoint(this.data, linearData(other), this.ctx);
    return p ? Vector.from(p, this.ctx) : null;
  }

  toData(): T {
    return this.data;
  }

  toString(): string {
    return linearText(this.data);
  }

  format(): string {
    return describeLinear(this.data);
  }
}

/**
 * Unbounded line through two distinct points
 */
export class Line extends TwoPointShape<Line2D> {
  /**
   * @throws DegenerateInputError when p1 and p2 are tolerance-equal
   */
  constructor(p1: Vector, p2: Vector, ctx: NumericContext = DEFAULT_CONTEXT) {
    super(line2d(p1.toData(), p2.toData(), ctx), ctx);
  }
}

/**
 * Bounded segment between two distinct points
 */
export class Segment extends TwoPointShape<Segment2D> {
  /**
   * @throws DegenerateInputError when p1 and p2 are tolerance-equal
   */
  constructor(p1: Vector, p2: Vector, ctx: NumericContext = DEFAULT_CONTEXT) {
    super(segment2d(p1.toData(), p2.toData(), ctx), ctx);
  }

  length(): number {
    return segmentLength(this.data);
  }

  /**
   * Perpendicular bisector
   */
  bisector(): Line {
    const b = bisector(this.data, this.ctx);
    return new Line(Vector.from(b.p1, this.ctx), Vector.from(b.p2, this.ctx), this.ctx);
  }

  distanceToSegment(other: Segment): number {
    return distanceSegmentSegment(this.data, other.toData(), this.ctx);
  }
}

// ============================================================================
// Polygon
// ============================================================================

/**
 * Simple polygon with counter-clockwise vertices
 */
export class Polygon {
  private readonly data: Polygon2D;

  /**
   * Consecutive duplicate vertices are collapsed
   *
   * @throws DegenerateInputError when points is empty
   */
  constructor(
    points: readonly Vector[],
    private readonly ctx: NumericContext = DEFAULT_CONTEXT
  ) {
    this.data = polygon2d(
      points.map((p) => p.toData()),
      ctx
    );
  }

  static fromData(data: Polygon2D, ctx: NumericContext = DEFAULT_CONTEXT): Polygon {
    return new Polygon(
      data.points.map((p) => Vector.from(p, ctx)),
      ctx
    );
  }

  get points(): Vector[] {
    return this.data.points.map((p) => Vector.from(p, this.ctx));
  }

  get n(): number {
    return this.data.points.length;
  }

  /**
   * Vertex at a cyclic index
   */
  at(i: number): Vector {
    return Vector.from(vertexAt(this.data, i), this.ctx);
  }

  area(): number {
    return polygonArea(this.data);
  }

  perimeter(): number {
    return polygonPerimeter(this.data);
  }

  isConvex(): boolean {
    return isConvex(this.data, this.ctx);
  }

  sideOfPoint(p: Vector): Side {
    return polygonSideOfPoint(this.data, p.toData(), this.ctx);
  }

  convexHull(): Polygon {
    return Polygon.fromData(convexHull(this.data, this.ctx), this.ctx);
  }

  diameter(): number {
    return polygonDiameter(this.data, this.ctx);
  }

  /**
   * Intersection with another convex polygon; null when disjoint
   */
  convexCommon(other: Polygon): Polygon | null {
    const common = convexCommon(this.data, other.toData(), this.ctx);
    return common ? Polygon.fromData(common, this.ctx) : null;
  }

  /**
   * Part left of the directed line; null when nothing remains
   */
  convexCutWithLine(line: Line | Segment): Polygon | null {
    const cut = convexCutWithLine(this.data, linearData(line), this.ctx);
    return cut ? Polygon.fromData(cut, this.ctx) : null;
  }

  areaCommonWithCircle(circle: Circle): number {
    return areaCommonPolygonCircle(this.data, circle.toData(), this.ctx);
  }

  toData(): Polygon2D {
    return this.data;
  }

  toString(): string {
    return polygonText(this.data);
  }

  format(): string {
    return describePolygon(this.data);
  }
}

// ============================================================================
// Circle
// ============================================================================

export class Circle {
  private readonly data: Circle2D;

  /**
   * @throws DegenerateInputError when radius is not a finite positive number
   */
  constructor(
    center: Vector,
    radius: number,
    private readonly ctx: NumericContext = DEFAULT_CONTEXT
  ) {
    this.data = circle2d(center.toData(), radius);
  }

  static fromData(data: Circle2D, ctx: NumericContext = DEFAULT_CONTEXT): Circle {
    return new Circle(Vector.from(data.center, ctx), data.radius, ctx);
  }

  /**
   * Circle through three points; null when they are collinear
   */
  static circumscribed(a: Vector, b: Vector, c: Vector, ctx: NumericContext = DEFAULT_CONTEXT): Circle | null {
    const circle = circumcircle(a.toData(), b.toData(), c.toData(), ctx);
    return circle ? Circle.fromData(circle, ctx) : null;
  }

  /**
   * Inscribed circle of a triangle; null when the vertices are collinear
   */
  static inscribed(a: Vector, b: Vector, c: Vector, ctx: NumericContext = DEFAULT_CONTEXT): Circle | null {
    const circle = incircle(a.toData(), b.toData(), c.toData(), ctx);
    return circle ? Circle.fromData(circle, ctx) : null;
  }

  get center(): Vector {
    return Vector.from(this.data.center, this.ctx);
  }

  get radius(): number {
    return this.data.radius;
  }

  area(): number {
    return circleArea(this.data);
  }

  sideOfPoint(p: Vector): Side {
    return circleSideOfPoint(this.data, p.toData(), this.ctx);
  }

  sideOfTouchingCircle(other: Circle): Touching {
    return sideOfTouchingCircle(this.data, other.toData(), this.ctx);
  }

  sideOfApartingCircle(other: Circle): Apart {
    return sideOfApartingCircle(this.data, other.toData(), this.ctx);
  }

  crossingPointsWithCircle(other: Circle): Vector[] {
    return this.wrapAll(crossingPointsWithCircle(this.data, other.toData(), this.ctx));
  }

  isTouchingLine(line: Line | Segment): boolean {
    return isTouchingLine(this.data, linearData(line), this.ctx);
  }

  isCrossingLine(line: Line | Segment): boolean {
    return isCrossingLine(this.data, linearData(line), this.ctx);
  }

  crossingPointsWithLine(line: Line | Segment): Vector[] {
    return this.wrapAll(crossingPointsWithLine(this.data, linearData(line), this.ctx));
  }

  /**
   * Points where the tangents through p touch the circle
   */
  tangentPoints(p: Vector): Vector[] {
    return this.wrapAll(tangentPoints(this.data, p.toData(), this.ctx));
  }

  areaCommonWithCircle(other: Circle): number {
    return areaCommonCircleCircle(this.data, other.toData(), this.ctx);
  }

  areaCommonWithPolygon(polygon: Polygon): number {
    return areaCommonCirclePolygon(this.data, polygon.toData(), this.ctx);
  }

  toData(): Circle2D {
    return this.data;
  }

  toString(): string {
    return circleText(this.data);
  }

  format(): string {
    return describeCircle(this.data);
  }

  private wrapAll(points: Vec2[]): Vector[] {
    return points.map((p) => Vector.from(p, this.ctx));
  }
}

// ============================================================================
// Parsing
// ============================================================================

export type GeometryObject = Vector | Line | Segment | Polygon | Circle;

/**
 * Validate serialized shape data and wrap it in the matching class
 *
 * @throws ShapeParseError on malformed data
 * @throws DegenerateInputError when the data does not define the shape
 */
export function parse(input: unknown, ctx: NumericContext = DEFAULT_CONTEXT): GeometryObject {
  const shape = parseShape(input, ctx);
  switch (shape.kind) {
    case 'point':
      return Vector.from(shape.point, ctx);
    case 'line':
      return new Line(Vector.from(shape.p1, ctx), Vector.from(shape.p2, ctx), ctx);
    case 'segment':
      return new Segment(Vector.from(shape.p1, ctx), Vector.from(shape.p2, ctx), ctx);
    case 'polygon':
      return Polygon.fromData(shape, ctx);
    case 'circle':
      return Circle.fromData(shape, ctx);
  }
}
