import type { WindowId } from '@/types/compositor';
import type { Point } from '@/types/geometry';
import type { GestureInfo, GestureState, PinchDirection } from '@/types/gesture';
import type { InputEvent, KeyModifier, ScrollEvent } from '@/types/input';
import { pinchOptionsSchema } from '@/lib/config';
import type { PinchOptions } from '@/lib/config';
import { elapsedSince } from '@/lib/time';
import { distance, midpoint } from '@/features/compositor/utils/geometry';
import { createGestureInfo } from '../utils/gesture-info';
import { eventModifiers, hasModifier } from '../utils/input-utils';
import type { PointerKey } from '../utils/input-utils';
import { TouchPoints } from '../utils/touch-points';
import type { GestureRecognizer } from './types';

/** Touchpad pinches have no explicit end; a plain scroll or a pause this long ends them. */
const TOUCHPAD_PINCH_END_MS = 200;

interface PinchSession {
  source: 'touch' | 'touchpad';
  startTime: number;
  lastTime: number;
  startPosition: Point;
  position: Point;
  initialDistance: number;
  scale: number;
  direction: PinchDirection;
  began: boolean;
  target?: WindowId;
  modifiers: readonly KeyModifier[];
  sourceDevice?: string;
}

/**
 * Two-finger pinch, or ctrl+scroll on a touchpad.
 *
 * Scale is the current finger distance over the distance when the second
 * finger landed. Changes smaller than `minScaleChange` are not reported.
 * A change of direction is reported as `changed` with the new
 * `pinchDirection`.
 */
export class PinchRecognizer implements GestureRecognizer {
  readonly name = 'Pinch Recognizer';
  readonly type = 'pinch' as const;
  readonly exclusive = false;

  private readonly options: PinchOptions;
  private readonly touches = new TouchPoints();
  private session: PinchSession | null = null;

  constructor(options: Partial<PinchOptions> = {}) {
    this.options = pinchOptionsSchema.parse(options);
  }

  reset(): void {
    this.touches.clear();
    this.session = null;
  }

  isActive(): boolean {
    return this.session !== null;
  }

  trackedPointer(): PointerKey | null {
    if (!this.session) return null;
    if (this.session.source === 'touchpad') return 'mouse';
    const id = this.touches.firstId();
    return id === undefined ? null : `touch:${id}`;
  }

  update(event: InputEvent): GestureInfo | null {
    switch (event.type) {
      case 'touch-begin': {
        this.touches.set(event.touchId, event.position);
        const pair = this.touches.pair();
        if (pair && !this.session) {
          const center = midpoint(pair[0], pair[1]);
          this.session = {
            source: 'touch',
            startTime: event.timestamp,
            lastTime: event.timestamp,
            startPosition: center,
            position: center,
            initialDistance: distance(pair[0], pair[1]),
            scale: 1,
            direction: 'out',
            began: false,
            target: event.target,
            modifiers: eventModifiers(event),
            sourceDevice: event.sourceDevice,
          };
        }
        return null;
      }

      case 'touch-update': {
        if (!this.touches.has(event.touchId)) return null;
        this.touches.set(event.touchId, event.position);
        return this.checkTouchPinch(event.timestamp);
      }

      case 'touch-end': {
        this.touches.delete(event.touchId);
        const session = this.session;
        if (!session || session.source !== 'touch' || this.touches.size >= 2) return null;
        this.session = null;
        return session.began ? this.pinchGesture(session, 'ended', event.timestamp) : null;
      }

      case 'scroll':
        return this.handleScroll(event);

      case 'idle': {
        const session = this.session;
        if (
          session?.source === 'touchpad' &&
          elapsedSince(session.lastTime, event.timestamp) > TOUCHPAD_PINCH_END_MS
        ) {
          this.session = null;
          return this.pinchGesture(session, 'ended', event.timestamp);
        }
        return null;
      }

      default:
        return null;
    }
  }

  private checkTouchPinch(timestamp: number): GestureInfo | null {
    const session = this.session;
    const pair = this.touches.pair();
    if (!session || session.source !== 'touch' || !pair) return null;
    if (session.initialDistance < this.options.minDistance) return null;

    const scale = distance(pair[0], pair[1]) / session.initialDistance;
    if (Math.abs(scale - session.scale) < this.options.minScaleChange) return null;

    session.scale = scale;
    session.direction = scale < 1 ? 'in' : 'out';
    session.position = midpoint(pair[0], pair[1]);
    session.lastTime = timestamp;

    const state: GestureState = session.began ? 'changed' : 'began';
    session.began = true;
    return this.pinchGesture(session, state, timestamp);
  }

  private handleScroll(event: ScrollEvent): GestureInfo | null {
    if (event.sourceDevice !== 'touchpad') return null;
    const session = this.session;

    if (!hasModifier(event, 'ctrl')) {
      if (
        session?.source === 'touchpad' &&
        elapsedSince(session.startTime, event.timestamp) > TOUCHPAD_PINCH_END_MS
      ) {
        this.session = null;
        return this.pinchGesture(session, 'ended', event.timestamp);
      }
      return null;
    }

    if (session && session.source === 'touch') return null;

    const step = event.deltaY !== 0 ? 1 - event.deltaY * this.options.scrollScaleFactor : 1;
    const direction: PinchDirection = step < 1 ? 'in' : 'out';

    if (!session) {
      const started: PinchSession = {
        source: 'touchpad',
        startTime: event.timestamp,
        lastTime: event.timestamp,
        startPosition: { ...event.position },
        position: { ...event.position },
        initialDistance: 0,
        scale: step,
        direction,
        began: true,
        target: event.target,
        modifiers: eventModifiers(event),
        sourceDevice: event.sourceDevice,
      };
      this.session = started;
      return this.pinchGesture(started, 'began', event.timestamp);
    }

    session.scale *= step;
    session.direction = direction;
    session.position = { ...event.position };
    session.lastTime = event.timestamp;
    return this.pinchGesture(session, 'changed', event.timestamp);
  }

  private pinchGesture(session: PinchSession, state: GestureState, timestamp: number): GestureInfo {
    return createGestureInfo({
      type: this.type,
      state,
      timestamp,
      position: session.position,
      startPosition: session.startPosition,
      target: session.target,
      modifiers: session.modifiers,
      sourceDevice: session.sourceDevice,
      duration: elapsedSince(session.startTime, timestamp),
      scale: session.scale,
      pinchDirection: session.direction,
      touchCount: session.source === 'touch' ? 2 : undefined,
    });
  }
}
