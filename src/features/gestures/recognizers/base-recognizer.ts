import type { WindowId } from '@/types/compositor';
import type { Point } from '@/types/geometry';
import type { GestureInfo, GestureState, GestureType } from '@/types/gesture';
import type { InputEvent, KeyModifier, PointerPressEvent, TouchBeginEvent } from '@/types/input';
import { elapsedSince } from '@/lib/time';
import { createGestureInfo } from '../utils/gesture-info';
import type { GestureInfoInit } from '../utils/gesture-info';
import { eventModifiers, pointerKeyOf } from '../utils/input-utils';
import type { PointerKey } from '../utils/input-utils';
import type { GestureRecognizer } from './types';

/**
 * Where and when the tracked pointer went down.
 */
export interface PressContext {
  pointer: PointerKey;
  startPosition: Point;
  startTime: number;
  position: Point;
  target?: WindowId;
  modifiers: readonly KeyModifier[];
  sourceDevice?: string;
}

export type PressEvent = PointerPressEvent | TouchBeginEvent;

type GestureFields = Omit<GestureInfoInit, 'type' | 'state' | 'timestamp'>;

/**
 * Shared plumbing for single-pointer recognizers: press bookkeeping and
 * GestureInfo construction. Only the left mouse button starts a press.
 */
export abstract class SinglePointerRecognizer implements GestureRecognizer {
  abstract readonly name: string;
  abstract readonly type: GestureType;
  readonly exclusive: boolean = true;

  protected press: PressContext | null = null;

  abstract update(event: InputEvent): GestureInfo | null;

  reset(): void {
    this.press = null;
  }

  isActive(): boolean {
    return this.press !== null;
  }

  trackedPointer(): PointerKey | null {
    return this.press?.pointer ?? null;
  }

  protected isPressEvent(event: InputEvent): event is PressEvent {
    return (
      (event.type === 'pointer-press' && event.button === 'left') || event.type === 'touch-begin'
    );
  }

  protected isReleaseEvent(event: InputEvent): boolean {
    return (
      (event.type === 'pointer-release' && event.button === 'left') || event.type === 'touch-end'
    );
  }

  protected isMoveEvent(event: InputEvent): boolean {
    return event.type === 'pointer-move' || event.type === 'touch-update';
  }

  /** True when the event belongs to the pointer stream being tracked */
  protected isTracked(event: InputEvent): boolean {
    return this.press !== null && pointerKeyOf(event) === this.press.pointer;
  }

  protected startPress(event: PressEvent): PressContext {
    const press: PressContext = {
      pointer: event.type === 'touch-begin' ? `touch:${event.touchId}` : 'mouse',
      startPosition: { ...event.position },
      startTime: event.timestamp,
      position: { ...event.position },
      target: event.target,
      modifiers: eventModifiers(event),
      sourceDevice: event.sourceDevice,
    };
    this.press = press;
    return press;
  }

  protected elapsed(press: PressContext, timestamp: number): number {
    return elapsedSince(press.startTime, timestamp);
  }

  protected gesture(
    press: PressContext,
    state: GestureState,
    timestamp: number,
    fields: Partial<GestureFields> = {}
  ): GestureInfo {
    return createGestureInfo({
      type: this.type,
      state,
      timestamp,
      position: press.position,
      startPosition: press.startPosition,
      target: press.target,
      modifiers: press.modifiers,
      sourceDevice: press.sourceDevice,
      duration: this.elapsed(press, timestamp),
      ...fields,
    });
  }
}
