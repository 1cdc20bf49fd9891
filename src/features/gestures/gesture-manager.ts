/**
 * Gesture Manager
 *
 * Feeds each input event to the registered recognizers and fans the
 * resulting gestures out to callbacks.
 *
 * Dispatch is two-phase. Recognizers whose gesture type is not in progress
 * see the event first; one that reports `began` joins the active set. Then
 * every type that was already active sees the event, and a terminal state
 * (`ended`, `cancelled`, `failed`) takes it out again. A type that began on
 * this event is not fed the same event twice. When two new types begin on
 * the same event, both are reported.
 */

import { createLogger } from '@/lib/logger';
import { parseGestureConfig } from '@/lib/config';
import type { GestureConfig, GestureConfigInput } from '@/lib/config';
import type { GestureCallback, GestureInfo, GestureState, GestureType } from '@/types/gesture';
import type { InputEvent } from '@/types/input';
import {
  DoubleTapRecognizer,
  EdgeSwipeRecognizer,
  LongPressRecognizer,
  PinchRecognizer,
  RotateRecognizer,
  SwipeRecognizer,
  TapRecognizer,
} from './recognizers';
import type { GestureRecognizer } from './recognizers';

const log = createLogger('GestureManager');

const TERMINAL_STATES: ReadonlySet<GestureState> = new Set(['ended', 'cancelled', 'failed']);

export class GestureManager {
  private readonly config: GestureConfig;
  private readonly recognizers = new Map<GestureType, GestureRecognizer>();
  private active: GestureType[] = [];
  private callbacks: GestureCallback[] = [];

  constructor(config: GestureConfigInput = {}) {
    this.config = parseGestureConfig(config);
  }

  /** Register a recognizer, replacing any existing one for the same type. */
  registerRecognizer(recognizer: GestureRecognizer): void {
    const previous = this.recognizers.get(recognizer.type);
    if (previous) {
      previous.reset();
      this.active = this.active.filter((type) => type !== recognizer.type);
    }
    this.recognizers.set(recognizer.type, recognizer);
    log.debug(`Registered ${recognizer.name}`);
  }

  registerDefaultRecognizers(): void {
    this.registerRecognizer(new TapRecognizer(this.config.tap));
    this.registerRecognizer(new DoubleTapRecognizer(this.config.doubleTap));
    this.registerRecognizer(new LongPressRecognizer(this.config.longPress));
    this.registerRecognizer(new SwipeRecognizer(this.config.swipe));
    this.registerRecognizer(new PinchRecognizer(this.config.pinch));
    this.registerRecognizer(new RotateRecognizer(this.config.rotate));
    this.registerRecognizer(new EdgeSwipeRecognizer(this.config.edgeSwipe));
  }

  unregisterRecognizer(type: GestureType): boolean {
    const recognizer = this.recognizers.get(type);
    if (!recognizer) return false;
    recognizer.reset();
    this.recognizers.delete(type);
    this.active = this.active.filter((activeType) => activeType !== type);
    return true;
  }

  /**
   * Callbacks run in registration order for every gesture. Returning false
   * stops the remaining callbacks for that gesture only.
   */
  addGestureCallback(callback: GestureCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      this.callbacks = this.callbacks.filter((cb) => cb !== callback);
    };
  }

  processEvent(event: InputEvent): GestureInfo[] {
    const detected: GestureInfo[] = [];
    const begunNow = new Set<GestureType>();
    const activeBefore = new Set(this.active);
    const exclusiveWinners: GestureRecognizer[] = [];

    for (const [type, recognizer] of this.recognizers) {
      if (activeBefore.has(type)) continue;

      const gesture = this.feed(recognizer, event);
      if (!gesture) continue;

      if (gesture.state === 'began') {
        this.active.push(type);
        begunNow.add(type);
        if (recognizer.exclusive) exclusiveWinners.push(recognizer);
      }
      detected.push(gesture);
      this.dispatch(gesture);
    }

    // Rivals are settled after every inactive recognizer has seen the event
    for (const winner of exclusiveWinners) {
      this.resolveExclusive(winner, begunNow);
    }

    const completed = new Set<GestureType>();
    for (const type of activeBefore) {
      const recognizer = this.recognizers.get(type);
      if (!recognizer || !this.active.includes(type)) continue;

      const gesture = this.feed(recognizer, event);
      if (!gesture) continue;

      detected.push(gesture);
      this.dispatch(gesture);
      if (TERMINAL_STATES.has(gesture.state)) {
        completed.add(type);
      }
    }

    if (completed.size > 0) {
      this.active = this.active.filter((type) => !completed.has(type));
    }
    return detected;
  }

  private feed(recognizer: GestureRecognizer, event: InputEvent): GestureInfo | null {
    try {
      return recognizer.update(event);
    } catch (error) {
      log.error(`${recognizer.name} failed on ${event.type}`, error);
      recognizer.reset();
      this.active = this.active.filter((type) => type !== recognizer.type);
      return null;
    }
  }

  /**
   * An exclusive recognizer has begun: other exclusive recognizers following
   * the same pointer that have not begun themselves give up.
   */
  private resolveExclusive(winner: GestureRecognizer, begunNow: ReadonlySet<GestureType>): void {
    const pointer = winner.trackedPointer();
    if (pointer === null) return;

    for (const [type, recognizer] of this.recognizers) {
      if (recognizer === winner || !recognizer.exclusive) continue;
      if (this.active.includes(type) || begunNow.has(type)) continue;
      if (recognizer.trackedPointer() === pointer) {
        recognizer.reset();
        log.debug(`${winner.name} took ${pointer} from ${recognizer.name}`);
      }
    }
  }

  private dispatch(gesture: GestureInfo): void {
    for (const callback of [...this.callbacks]) {
      let proceed: boolean;
      try {
        proceed = callback(gesture);
      } catch (error) {
        log.error(`Gesture callback failed on ${gesture.type}/${gesture.state}`, error);
        proceed = false;
      }
      if (!proceed) break;
    }
  }

  resetAll(): void {
    for (const recognizer of this.recognizers.values()) {
      recognizer.reset();
    }
    this.active = [];
  }

  getRecognizer(type: GestureType): GestureRecognizer | undefined {
    return this.recognizers.get(type);
  }

  getActiveGestureTypes(): GestureType[] {
    return [...this.active];
  }

  hasActiveRecognizers(): boolean {
    return this.active.length > 0;
  }
}
