import { describe, it, expect } from 'vitest';
import {
  bisector,
  segment2d,
  segmentContainsPoint,
  segmentDistanceToPoint,
  segmentLength,
} from './segment2d.js';
import { vec2 } from '../num/vec2.js';
import { DEFAULT_CONTEXT } from '../num/tolerance.js';
import { DegenerateInputError } from '../errors.js';

describe('segment2d', () => {
  const ctx = DEFAULT_CONTEXT;
  const s = segment2d(vec2(0, 0), vec2(4, 0), ctx);

  it('rejects tolerance-equal endpoints', () => {
    expect(() => segment2d(vec2(2, 2), vec2(2, 2), ctx)).toThrow(DegenerateInputError);
  });

  it('segmentLength', () => {
    expect(segmentLength(segment2d(vec2(1, 1), vec2(4, 5), ctx))).toBe(5);
  });

  describe('bisector', () => {
    it('is the perpendicular through the midpoint', () => {
      const b = bisector(segment2d(vec2(0, 0), vec2(2, 0), ctx), ctx);
      expect(b.kind).toBe('line');
      expect(b.p1[0]).toBeCloseTo(1, 12);
      expect(b.p1[1]).toBeCloseTo(-1, 12);
      expect(b.p2[0]).toBeCloseTo(1, 12);
      expect(b.p2[1]).toBeCloseTo(1, 12);
    });
  });

  describe('segmentContainsPoint', () => {
    it('includes interior points and endpoints', () => {
      expect(segmentContainsPoint(s, vec2(2, 0), ctx)).toBe(true);
      expect(segmentContainsPoint(s, vec2(0, 0), ctx)).toBe(true);
      expect(segmentContainsPoint(s, vec2(4, 0), ctx)).toBe(true);
    });

    it('tolerates overshoot below the tolerance', () => {
      expect(segmentContainsPoint(s, vec2(4 + 1e-9, 0), ctx)).toBe(true);
      expect(segmentContainsPoint(s, vec2(-1e-9, 0), ctx)).toBe(true);
    });

    it('excludes collinear points beyond the ends', () => {
      expect(segmentContainsPoint(s, vec2(5, 0), ctx)).toBe(false);
      expect(segmentContainsPoint(s, vec2(-1e-6, 0), ctx)).toBe(false);
    });

    it('excludes points off the carrier', () => {
      expect(segmentContainsPoint(s, vec2(2, 1), ctx)).toBe(false);
    });

    it('treats a zero-length carrier as a single point', () => {
      const dot = { p1: vec2(1, 1), p2: vec2(1, 1) };
      expect(segmentContainsPoint(dot, vec2(1, 1), ctx)).toBe(true);
      expect(segmentContainsPoint(dot, vec2(1, 2), ctx)).toBe(false);
    });
  });

  describe('segmentDistanceToPoint', () => {
    it('uses the perpendicular when the foot is inside', () => {
      expect(segmentDistanceToPoint(s, vec2(2, 3), ctx)).toBeCloseTo(3, 12);
    });

    it('uses the nearest endpoint otherwise', () => {
      expect(segmentDistanceToPoint(s, vec2(7, 4), ctx)).toBeCloseTo(5, 12);
      expect(segmentDistanceToPoint(s, vec2(-3, -4), ctx)).toBeCloseTo(5, 12);
    });
  });
});
