/**
 * Rectangle helpers.
 * Rectangles are half-open: a point on the right/bottom edge is outside.
 */

import type { Point, Rectangle } from '@/types/geometry';

export function createRect(x: number, y: number, width: number, height: number): Rectangle {
  return { x, y, width: Math.max(0, width), height: Math.max(0, height) };
}

export function isEmptyRect(rect: Rectangle): boolean {
  return rect.width <= 0 || rect.height <= 0;
}

export function rectArea(rect: Rectangle): number {
  return isEmptyRect(rect) ? 0 : rect.width * rect.height;
}

export function containsPoint(rect: Rectangle, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x < rect.x + rect.width &&
    point.y >= rect.y &&
    point.y < rect.y + rect.height
  );
}

/**
 * Overlapping area of two rectangles, or null when they do not overlap on
 * both axes. Touching edges do not overlap.
 */
export function intersectRects(a: Rectangle, b: Rectangle): Rectangle | null {
  const x1 = Math.max(a.x, b.x);
  const y1 = Math.max(a.y, b.y);
  const x2 = Math.min(a.x + a.width, b.x + b.width);
  const y2 = Math.min(a.y + a.height, b.y + b.height);

  if (x1 < x2 && y1 < y2) {
    return { x: x1, y: y1, width: x2 - x1, height: y2 - y1 };
  }
  return null;
}

/**
 * Smallest rectangle containing both. Empty rectangles are ignored.
 */
export function unionRects(a: Rectangle, b: Rectangle): Rectangle {
  if (isEmptyRect(a)) return { ...b };
  if (isEmptyRect(b)) return { ...a };

  const x1 = Math.min(a.x, b.x);
  const y1 = Math.min(a.y, b.y);
  const x2 = Math.max(a.x + a.width, b.x + b.width);
  const y2 = Math.max(a.y + a.height, b.y + b.height);
  return { x: x1, y: y1, width: x2 - x1, height: y2 - y1 };
}

export function translateRect(rect: Rectangle, dx: number, dy: number): Rectangle {
  return { ...rect, x: rect.x + dx, y: rect.y + dy };
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function midpoint(a: Point, b: Point): Point {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}
