import type { GestureInfo } from '@/types/gesture';
import type { InputEvent } from '@/types/input';
import { longPressOptionsSchema } from '@/lib/config';
import type { LongPressOptions } from '@/lib/config';
import { elapsedSince } from '@/lib/time';
import { distance } from '@/features/compositor/utils/geometry';
import { SinglePointerRecognizer } from './base-recognizer';

/**
 * Press and hold without moving.
 *
 * Once the hold reaches `delayMs` it emits `began`, then `changed` at most
 * once per `feedbackIntervalMs` while still held, and `ended` on release.
 * Moving past the threshold abandons the press; a press that already began
 * reports `cancelled`. Timing comes from event timestamps, so a host that
 * wants the gesture to fire while the pointer is perfectly still must feed
 * `idle` events.
 *
 * Only the pointer that started the press is followed; other touches are
 * ignored until it is released.
 */
export class LongPressRecognizer extends SinglePointerRecognizer {
  readonly name = 'Long Press Recognizer';
  readonly type = 'long-press' as const;

  private readonly options: LongPressOptions;
  private began = false;
  private lastFeedbackTime = 0;

  constructor(options: Partial<LongPressOptions> = {}) {
    super();
    this.options = longPressOptionsSchema.parse(options);
  }

  override reset(): void {
    super.reset();
    this.began = false;
    this.lastFeedbackTime = 0;
  }

  update(event: InputEvent): GestureInfo | null {
    if (this.isPressEvent(event)) {
      if (!this.press) {
        this.reset();
        this.startPress(event);
      }
      return null;
    }

    const press = this.press;
    if (!press) return null;

    if (event.type === 'idle') {
      return this.checkHold(event.timestamp);
    }

    if (!this.isTracked(event)) return null;

    if (this.isMoveEvent(event)) {
      if (distance(press.startPosition, event.position) > this.options.movementThreshold) {
        const began = this.began;
        this.reset();
        return began ? this.gesture(press, 'cancelled', event.timestamp) : null;
      }
      press.position = { ...event.position };
      return this.checkHold(event.timestamp);
    }

    if (this.isReleaseEvent(event)) {
      const began = this.began;
      this.reset();
      if (!began) return null;
      press.position = { ...event.position };
      return this.gesture(press, 'ended', event.timestamp);
    }

    return null;
  }

  private checkHold(timestamp: number): GestureInfo | null {
    const press = this.press;
    if (!press) return null;

    if (!this.began) {
      if (this.elapsed(press, timestamp) < this.options.delayMs) return null;
      this.began = true;
      this.lastFeedbackTime = timestamp;
      return this.gesture(press, 'began', timestamp);
    }

    if (elapsedSince(this.lastFeedbackTime, timestamp) < this.options.feedbackIntervalMs) {
      return null;
    }
    this.lastFeedbackTime = timestamp;
    return this.gesture(press, 'changed', timestamp);
  }
}
