import * as THREE from 'three';
import type { Rect } from '@/types/game';

export const clamp = THREE.MathUtils.clamp;

export function createRect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

export function rectRight(r: Rect): number {
  return r.x + r.width;
}

export function rectBottom(r: Rect): number {
  return r.y + r.height;
}

export function rectCenterX(r: Rect): number {
  return r.x + Math.floor(r.width / 2);
}

export function rectCenterY(r: Rect): number {
  return r.y + Math.floor(r.height / 2);
}

/** Overlap test with exclusive edges: touching rects do not intersect. */
export function rectsIntersect(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;
}

export function offsetRect(r: Rect, dx: number, dy: number): Rect {
  return { x: r.x + dx, y: r.y + dy, width: r.width, height: r.height };
}

// Shared scratch objects for boundsOf
const scratchBox = new THREE.Box2();
const scratchPoint = new THREE.Vector2();

/** Smallest rect containing every input rect; zero rect when empty. */
export function boundsOf(rects: Iterable<Rect>): Rect {
  scratchBox.makeEmpty();
  for (const r of rects) {
    scratchBox.expandByPoint(scratchPoint.set(r.x, r.y));
    scratchBox.expandByPoint(scratchPoint.set(r.x + r.width, r.y + r.height));
  }
  if (scratchBox.isEmpty()) return createRect(0, 0, 0, 0);
  return createRect(
    scratchBox.min.x,
    scratchBox.min.y,
    scratchBox.max.x - scratchBox.min.x,
    scratchBox.max.y - scratchBox.min.y,
  );
}
