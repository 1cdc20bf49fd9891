/**
 * Gesture recognition types.
 */

import type { Point } from './geometry';
import type { KeyModifier } from './input';
import type { WindowId } from './compositor';

export type GestureType =
  | 'tap'
  | 'double-tap'
  | 'long-press'
  | 'swipe'
  | 'pinch'
  | 'rotate'
  | 'edge-swipe';

/**
 * Lifecycle of an emitted gesture. Discrete gestures (tap, double-tap)
 * emit a single `ended`.
 */
export type GestureState = 'began' | 'changed' | 'ended' | 'cancelled' | 'failed';

export type SwipeDirection =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'up-left'
  | 'up-right'
  | 'down-left'
  | 'down-right';

export type ScreenEdge = 'left' | 'right' | 'top' | 'bottom';

export type PinchDirection = 'in' | 'out';

export type RotationDirection = 'clockwise' | 'counter-clockwise';

/**
 * A recognized gesture. Immutable once produced.
 */
export interface GestureInfo {
  readonly type: GestureType;
  readonly state: GestureState;
  readonly timestamp: number;
  readonly position: Point;
  readonly startPosition?: Point;
  readonly target?: WindowId;
  /** Milliseconds since the gesture's press/touch began */
  readonly duration?: number;
  readonly scale?: number;
  /** Radians, counter-clockwise positive */
  readonly rotation?: number;
  readonly modifiers: readonly KeyModifier[];
  readonly sourceDevice?: string;
  readonly delta?: Point;
  /** Pixels per second */
  readonly velocity?: Point;
  readonly swipeDirection?: SwipeDirection;
  readonly edge?: ScreenEdge;
  readonly pinchDirection?: PinchDirection;
  readonly rotationDirection?: RotationDirection;
  readonly tapCount?: number;
  readonly touchCount?: number;
}

/**
 * Gesture callback. Return `false` to stop the remaining callbacks for this
 * gesture; the return value means "continue propagation", not success.
 */
export type GestureCallback = (gesture: GestureInfo) => boolean;
