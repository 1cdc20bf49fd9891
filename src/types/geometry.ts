/**
 * Geometry primitives shared by the compositor, gestures and effects.
 * All coordinates are logical pixels.
 */

export interface Point {
  x: number;
  y: number;
}

/**
 * Axis-aligned rectangle. `width` and `height` are never negative.
 */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Row-major 3x3 matrix for 2D affine transforms */
export type TransformMatrix = readonly [
  readonly [number, number, number],
  readonly [number, number, number],
  readonly [number, number, number],
];

/** Output rotation as reported by the display */
export type OutputTransform = 'normal' | 'rotate-90' | 'rotate-180' | 'rotate-270';
