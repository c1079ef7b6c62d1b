import { describe, it, expect } from 'vitest';
import { boundsOf, clamp, createRect, offsetRect, rectBottom, rectCenterX, rectCenterY, rectsIntersect } from './geometry';

describe('geometry', () => {
  it('rounds centres down to whole pixels', () => {
    const r = createRect(10, 20, 5, 7);
    expect(rectCenterX(r)).toBe(12);
    expect(rectCenterY(r)).toBe(23);
    expect(rectBottom(r)).toBe(27);
  });

  it('treats touching edges as no overlap', () => {
    const a = createRect(0, 0, 10, 10);
    expect(rectsIntersect(a, createRect(10, 0, 10, 10))).toBe(false);
    expect(rectsIntersect(a, createRect(0, 10, 10, 10))).toBe(false);
    expect(rectsIntersect(a, createRect(9, 9, 10, 10))).toBe(true);
  });

  it('offsets without touching the size', () => {
    expect(offsetRect(createRect(5, 5, 3, 4), -2, 6)).toEqual({ x: 3, y: 11, width: 3, height: 4 });
  });

  it('bounds a set of rects', () => {
    expect(boundsOf([createRect(0, 0, 10, 10), createRect(20, 5, 4, 4)])).toEqual({ x: 0, y: 0, width: 24, height: 10 });
    expect(boundsOf([])).toEqual({ x: 0, y: 0, width: 0, height: 0 });
  });

  it('clamps', () => {
    expect(clamp(-5, 10, 740)).toBe(10);
    expect(clamp(800, 10, 740)).toBe(740);
  });
});
