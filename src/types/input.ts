/**
 * Normalized input events delivered by the input source.
 * Timestamps are milliseconds and monotonic within one device stream.
 */

import type { Point } from './geometry';
import type { WindowId } from './compositor';

export type KeyModifier =
  | 'shift'
  | 'ctrl'
  | 'alt'
  | 'super'
  | 'hyper'
  | 'meta'
  | 'caps-lock'
  | 'num-lock';

export type MouseButton = 'left' | 'right' | 'middle' | 'back' | 'forward';

interface InputEventBase {
  timestamp: number;
  position: Point;
  modifiers?: readonly KeyModifier[];
  /** Window under the event, when the input source resolved one */
  target?: WindowId;
  /** Free-form device name, e.g. "touchpad" or "touchscreen-0" */
  sourceDevice?: string;
}

export interface PointerPressEvent extends InputEventBase {
  type: 'pointer-press';
  button: MouseButton;
}

export interface PointerReleaseEvent extends InputEventBase {
  type: 'pointer-release';
  button: MouseButton;
}

export interface PointerMoveEvent extends InputEventBase {
  type: 'pointer-move';
}

export interface ScrollEvent extends InputEventBase {
  type: 'scroll';
  deltaX: number;
  deltaY: number;
}

export interface TouchBeginEvent extends InputEventBase {
  type: 'touch-begin';
  touchId: number;
  pressure?: number;
}

export interface TouchUpdateEvent extends InputEventBase {
  type: 'touch-update';
  touchId: number;
  pressure?: number;
}

export interface TouchEndEvent extends InputEventBase {
  type: 'touch-end';
  touchId: number;
}

/**
 * Timer tick with no new input. Lets time-based recognizers (long-press)
 * fire while the pointer is held perfectly still.
 */
export interface IdleEvent {
  type: 'idle';
  timestamp: number;
}

export type InputEvent =
  | PointerPressEvent
  | PointerReleaseEvent
  | PointerMoveEvent
  | ScrollEvent
  | TouchBeginEvent
  | TouchUpdateEvent
  | TouchEndEvent
  | IdleEvent;

export type InputEventType = InputEvent['type'];
