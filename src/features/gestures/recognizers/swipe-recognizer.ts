import type { Point } from '@/types/geometry';
import type { GestureInfo } from '@/types/gesture';
import type { InputEvent } from '@/types/input';
import { swipeOptionsSchema } from '@/lib/config';
import type { SwipeOptions } from '@/lib/config';
import { distance } from '@/features/compositor/utils/geometry';
import { swipeDirectionOf, velocityOf } from '../utils/input-utils';
import { SinglePointerRecognizer } from './base-recognizer';
import type { PressContext } from './base-recognizer';

/**
 * A fast straight drag. Begins once the pointer has travelled `minDistance`
 * within `maxDurationMs`; a drag slower than that is not a swipe.
 */
export class SwipeRecognizer extends SinglePointerRecognizer {
  readonly name = 'Swipe Recognizer';
  readonly type = 'swipe' as const;

  private readonly options: SwipeOptions;
  private began = false;

  constructor(options: Partial<SwipeOptions> = {}) {
    super();
    this.options = swipeOptionsSchema.parse(options);
  }

  override reset(): void {
    super.reset();
    this.began = false;
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
    if (!press || event.type === 'idle' || !this.isTracked(event)) return null;

    if (this.isMoveEvent(event)) {
      press.position = { ...event.position };
      const duration = this.elapsed(press, event.timestamp);

      if (!this.began) {
        if (duration > this.options.maxDurationMs) {
          this.reset();
          return null;
        }
        if (distance(press.startPosition, press.position) < this.options.minDistance) {
          return null;
        }
        this.began = true;
        return this.swipeGesture(press, 'began', event.timestamp);
      }
      return this.swipeGesture(press, 'changed', event.timestamp);
    }

    if (this.isReleaseEvent(event)) {
      press.position = { ...event.position };
      const began = this.began;
      this.reset();

      const inTime = this.elapsed(press, event.timestamp) <= this.options.maxDurationMs;
      if (began) {
        return this.swipeGesture(press, inTime ? 'ended' : 'cancelled', event.timestamp);
      }
      // A flick with no intermediate moves
      if (inTime && distance(press.startPosition, press.position) >= this.options.minDistance) {
        return this.swipeGesture(press, 'ended', event.timestamp);
      }
    }

    return null;
  }

  private swipeGesture(
    press: PressContext,
    state: 'began' | 'changed' | 'ended' | 'cancelled',
    timestamp: number
  ): GestureInfo {
    const delta: Point = {
      x: press.position.x - press.startPosition.x,
      y: press.position.y - press.startPosition.y,
    };
    return this.gesture(press, state, timestamp, {
      delta,
      velocity: velocityOf(delta, this.elapsed(press, timestamp)),
      swipeDirection: swipeDirectionOf(delta.x, delta.y),
    });
  }
}
