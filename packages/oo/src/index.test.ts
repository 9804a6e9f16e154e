import { describe, it, expect } from 'vitest';
import { DegenerateInputError, DivisionByZeroError, InvalidArgumentTypeError } from '@planegeo/core';
import { Circle, Line, Polygon, Segment, Vector, createNumericContext, parse } from './index.js';

const v = (x: number, y: number) => new Vector(x, y);

function expectVector(actual: Vector | null | undefined, x: number, y: number): void {
  expect(actual).toBeInstanceOf(Vector);
  expect(actual?.x).toBeCloseTo(x, 8);
  expect(actual?.y).toBeCloseTo(y, 8);
}

describe('@planegeo/oo', () => {
  describe('Vector', () => {
    it('should do arithmetic', () => {
      expect(v(1, 2).add(v(3, 4)).toData()).toEqual([4, 6]);
      expect(v(1, 2).sub(v(3, 4)).toData()).toEqual([-2, -2]);
      expect(v(1, 2).mul(3).toData()).toEqual([3, 6]);
      expect(v(3, 6).div(3).toData()).toEqual([1, 2]);
      expect(v(1, 2).dot(v(3, 4))).toBe(11);
      expect(v(1, 2).cross(v(3, 4))).toBe(-2);
      expect(v(3, 4).length()).toBe(5);
      expect(v(1, 1).distanceTo(v(4, 5))).toBe(5);
    });

    it('should refuse to divide by zero', () => {
      expect(() => v(1, 1).div(0)).toThrow(DivisionByZeroError);
    });

    it('should compare with tolerance', () => {
      expect(v(1, 1).equals(v(1 + 1e-9, 1))).toBe(true);
      expect(v(1, 1).equals(v(1 + 1e-6, 1))).toBe(false);
    });

    it('should report orientation', () => {
      expect(v(1, 0).ccw(v(0, 1))).toBe(1);
      expect(v(0, 1).ccw(v(1, 0))).toBe(-1);
      expect(v(1, 1).ccw(v(2, 2))).toBe(0);
    });

    it('should move and rotate', () => {
      expect(v(1, 2).move(2, -1).toData()).toEqual([3, 1]);
      expectVector(v(1, 0).rotate(Math.PI / 2), 0, 1);
      expectVector(v(2, 1).rotate(Math.PI, v(1, 1)), 0, 1);
    });

    it('should normalize', () => {
      expectVector(v(3, 4).unitVector(), 0.6, 0.8);
      expect(v(0, 0).unitVector().toData()).toEqual([0, 0]);
    });

    it('should render text', () => {
      expect(v(1, 2).toString()).toBe('1.0000000000 2.0000000000');
      expect(v(1, 2).format()).toBe('(1.0000000000, 2.0000000000)');
    });

    it('should carry its numeric context into results', () => {
      const coarse = createNumericContext({ length: 0.1 });
      const origin = new Vector(0, 0, coarse);
      expect(origin.equals(v(0.05, 0))).toBe(true);
      expect(origin.add(v(1, 0)).equals(v(1.05, 0))).toBe(true);
    });
  });

  describe('Line', () => {
    const line = new Line(v(0, 0), v(3, 4));

    it('should reject coincident points', () => {
      expect(() => new Line(v(1, 1), v(1, 1))).toThrow(DegenerateInputError);
    });

    it('should project and reflect', () => {
      expectVector(line.projection(v(2, 5)), 3.12, 4.16);
      expectVector(line.reflection(v(2, 5)), 4.24, 3.32);
    });

    it('should report slope', () => {
      expect(line.slope()).toBeCloseTo(4 / 3, 12);
      expect(new Line(v(1, 0), v(1, 5)).slope()).toBe(Infinity);
    });

    it('should compare directions', () => {
      expect(line.isParallel(new Segment(v(1, 0), v(4, 4)))).toBe(true);
      expect(line.isOrthogonal(new Line(v(0, 0), v(4, -3)))).toBe(true);
    });

    it('should cross segments', () => {
      const s = new Segment(v(0, 5), v(5, 0));
      expect(line.isCrossing(s)).toBe(true);
      expectVector(line.crossingPoint(s), 15 / 7, 20 / 7);
    });

    it('should be unbounded', () => {
      expect(line.includes(v(6, 8))).toBe(true);
      expect(line.distanceToPoint(v(4, -3))).toBeCloseTo(5, 12);
    });
  });

  describe('Segment', () => {
    const s = new Segment(v(0, 0), v(2, 0));

    it('should find the crossing point', () => {
      expectVector(s.crossingPoint(new Segment(v(1, 1), v(1, -1))), 1, 0);
    });

    it('should return null when not crossing', () => {
      expect(s.crossingPoint(new Segment(v(3, 1), v(3, -1)))).toBeNull();
    });

    it('should be bounded', () => {
      expect(s.includes(v(1, 0))).toBe(true);
      expect(s.includes(v(3, 0))).toBe(false);
      expect(s.distanceToPoint(v(5, 4))).toBeCloseTo(5, 12);
      expect(s.length()).toBe(2);
    });

    it('should build its bisector as a Line', () => {
      const b = s.bisector();
      expect(b).toBeInstanceOf(Line);
      expect(b.includes(v(1, 7))).toBe(true);
    });

    it('should measure segment distance symmetrically', () => {
      const other = new Segment(v(0, 1), v(2, 1));
      expect(s.distanceToSegment(other)).toBeCloseTo(1, 12);
      expect(other.distanceToSegment(s)).toBeCloseTo(1, 12);
    });

    it('should reject operands that are not lines or segments', () => {
      const bogus: Segment = JSON.parse('{"kind":"segment","p1":[0,0],"p2":[1,1]}');
      expect(() => s.isCrossing(bogus)).toThrow(InvalidArgumentTypeError);
    });

    it('should render text', () => {
      expect(s.toString()).toBe('0.0000000000 0.0000000000 2.0000000000 0.0000000000');
      expect(s.format()).toBe('(0.0000000000, 0.0000000000) -- (2.0000000000, 0.0000000000)');
    });
  });

  describe('Polygon', () => {
    it('should compute the area', () => {
      expect(new Polygon([v(0, 0), v(2, 2), v(-1, 1)]).area()).toBeCloseTo(2, 12);
    });

    it('should expose vertices cyclically', () => {
      const p = new Polygon([v(0, 0), v(0, 0), v(1, 0), v(0, 1)]);
      expect(p.n).toBe(3);
      expect(p.at(-1).toData()).toEqual([0, 1]);
      expect(p.points.map((q) => q.toData())).toEqual([
        [0, 0],
        [1, 0],
        [0, 1],
      ]);
    });

    it('should build a convex hull', () => {
      const p = new Polygon([v(2, 1), v(0, 0), v(1, 2), v(2, 2), v(4, 2), v(1, 3), v(3, 3)]);
      const hull = p.convexHull();
      expect(hull).toBeInstanceOf(Polygon);
      expect(hull.points.map((q) => q.toData())).toEqual([
        [0, 0],
        [2, 1],
        [4, 2],
        [3, 3],
        [1, 3],
      ]);
      expect(hull.isConvex()).toBe(true);
      expect(p.isConvex()).toBe(false);
    });

    it('should measure the diameter', () => {
      expect(new Polygon([v(0, 0), v(4, 0), v(4, 3), v(0, 3)]).diameter()).toBeCloseTo(5, 12);
    });

    it('should classify points', () => {
      const p = new Polygon([v(0, 0), v(3, 1), v(2, 3), v(0, 3)]);
      expect(p.sideOfPoint(v(2, 1))).toBe(1);
      expect(p.sideOfPoint(v(0, 2))).toBe(0);
      expect(p.sideOfPoint(v(3, 2))).toBe(-1);
    });

    it('should intersect convex polygons', () => {
      const a = new Polygon([v(0, 0), v(2, 0), v(2, 2), v(0, 2)]);
      const b = new Polygon([v(1, 1), v(3, 1), v(3, 3), v(1, 3)]);
      const common = a.convexCommon(b);
      expect(common?.points.map((q) => q.toData())).toEqual([
        [1, 1],
        [2, 1],
        [2, 2],
        [1, 2],
      ]);
      expect(a.convexCommon(new Polygon([v(5, 5), v(6, 5), v(6, 6)]))).toBeNull();
    });

    it('should cut with a directed line', () => {
      const rect = new Polygon([v(1, 1), v(4, 1), v(4, 3), v(1, 3)]);
      expect(rect.convexCutWithLine(new Line(v(2, 0), v(2, 4)))?.area()).toBeCloseTo(2, 12);
      expect(rect.convexCutWithLine(new Line(v(2, 4), v(2, 0)))?.area()).toBeCloseTo(4, 12);
      expect(rect.convexCutWithLine(new Line(v(0, 0), v(0, 1)))).toBeNull();
    });

    it('should render text', () => {
      const p = new Polygon([v(0, 0), v(1, 0), v(0, 1)]);
      expect(p.toString()).toBe('0.0000000000 0.0000000000\n1.0000000000 0.0000000000\n0.0000000000 1.0000000000');
    });
  });

  describe('Circle', () => {
    it('should reject a non-positive radius', () => {
      expect(() => new Circle(v(0, 0), 0)).toThrow(DegenerateInputError);
    });

    it('should compute the overlap area with a polygon in both directions', () => {
      const c = new Circle(v(0, 0), 5);
      const p = new Polygon([v(1, 1), v(4, 1), v(5, 5)]);
      expect(p.areaCommonWithCircle(c)).toBeCloseTo(4.639858417607, 9);
      expect(c.areaCommonWithPolygon(p)).toBe(p.areaCommonWithCircle(c));
    });

    it('should find crossing points with another circle', () => {
      const points = new Circle(v(0, 0), 2).crossingPointsWithCircle(new Circle(v(2, 0), 2));
      expect(points).toHaveLength(2);
      expectVector(points[0], 1, 1.7320508075688772);
      expectVector(points[1], 1, -1.7320508075688772);
    });

    it('should relate to other circles', () => {
      const a = new Circle(v(1, 1), 1);
      const b = new Circle(v(6, 2), 2);
      expect(a.sideOfTouchingCircle(b)).toBe(0);
      expect(a.sideOfApartingCircle(b)).toBe(-1);
      expect(a.areaCommonWithCircle(b)).toBe(0);
    });

    it('should cross and touch lines', () => {
      const c = new Circle(v(2, 1), 1);
      const tangent = new Line(v(3, 0), v(3, 5));
      expect(c.isTouchingLine(tangent)).toBe(true);
      expect(c.isCrossingLine(new Segment(v(0, 1), v(2, 1)))).toBe(true);
      const points = c.crossingPointsWithLine(new Line(v(0, 1), v(5, 1)));
      expectVector(points[0], 1, 1);
      expectVector(points[1], 3, 1);
    });

    it('should find tangent points', () => {
      const points = new Circle(v(2, 2), 2).tangentPoints(v(0, 0));
      expectVector(points[0], 2, 0);
      expectVector(points[1], 0, 2);
    });

    it('should build triangle circles', () => {
      const outer = Circle.circumscribed(v(0, 3), v(4, 0), v(0, 0));
      expectVector(outer?.center, 2, 1.5);
      expect(outer?.radius).toBeCloseTo(2.5, 10);
      const inner = Circle.inscribed(v(0, 3), v(4, 0), v(0, 0));
      expectVector(inner?.center, 1, 1);
      expect(Circle.inscribed(v(0, 0), v(1, 1), v(2, 2))).toBeNull();
    });

    it('should render text', () => {
      const c = new Circle(v(1, 2), 2.5);
      expect(c.toString()).toBe('1.0000000000 2.0000000000 2.5000000000');
      expect(c.format()).toBe('o: (1.0000000000, 2.0000000000), r: 2.5000000000');
    });
  });

  describe('parse', () => {
    it('should wrap parsed data in the matching class', () => {
      expect(parse({ kind: 'point', x: 1, y: 2 })).toBeInstanceOf(Vector);
      expect(parse({ kind: 'line', p1: [0, 0], p2: [1, 0] })).toBeInstanceOf(Line);
      expect(parse({ kind: 'segment', p1: [0, 0], p2: [1, 0] })).toBeInstanceOf(Segment);
      expect(parse({ kind: 'polygon', points: [[0, 0], [1, 0], [0, 1]] })).toBeInstanceOf(Polygon);
      expect(parse({ kind: 'circle', center: [0, 0], radius: 1 })).toBeInstanceOf(Circle);
    });
  });
});
