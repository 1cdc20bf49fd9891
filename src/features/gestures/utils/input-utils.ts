/**
 * Helpers shared by the recognizers for reading input events.
 */

import type { Point } from '@/types/geometry';
import type { SwipeDirection } from '@/types/gesture';
import type { InputEvent, KeyModifier } from '@/types/input';

/**
 * Identifies one pointer stream: the mouse, or a single touch contact.
 */
export type PointerKey = 'mouse' | `touch:${number}`;

export function pointerKeyOf(event: InputEvent): PointerKey | null {
  switch (event.type) {
    case 'pointer-press':
    case 'pointer-release':
    case 'pointer-move':
    case 'scroll':
      return 'mouse';
    case 'touch-begin':
    case 'touch-update':
    case 'touch-end':
      return `touch:${event.touchId}`;
    case 'idle':
      return null;
  }
}

export function eventModifiers(event: InputEvent): readonly KeyModifier[] {
  return event.type === 'idle' ? [] : (event.modifiers ?? []);
}

export function hasModifier(event: InputEvent, modifier: KeyModifier): boolean {
  return eventModifiers(event).includes(modifier);
}

/** Pixels per second; zero when no time has passed */
export function velocityOf(delta: Point, durationMs: number): Point {
  if (durationMs <= 0) return { x: 0, y: 0 };
  return { x: (delta.x * 1000) / durationMs, y: (delta.y * 1000) / durationMs };
}

const DIRECTIONS_BY_OCTANT: Record<number, SwipeDirection> = {
  [-4]: 'left',
  [-3]: 'up-left',
  [-2]: 'up',
  [-1]: 'up-right',
  0: 'right',
  1: 'down-right',
  2: 'down',
  3: 'down-left',
  4: 'left',
};

/**
 * Eight-way direction of a movement in screen coordinates (y grows down).
 * Each direction covers 45°, so diagonals span ±22.5° around their axis.
 */
export function swipeDirectionOf(dx: number, dy: number): SwipeDirection {
  const octant = Math.round(Math.atan2(dy, dx) / (Math.PI / 4));
  return DIRECTIONS_BY_OCTANT[octant] ?? 'right';
}

/** Wrap an angle difference into (-π, π]. */
export function normalizeAngle(angle: number): number {
  let result = angle;
  while (result > Math.PI) result -= 2 * Math.PI;
  while (result <= -Math.PI) result += 2 * Math.PI;
  return result;
}
