import type { GestureInfo } from '@/types/gesture';
import type { InputEvent } from '@/types/input';
import { tapOptionsSchema } from '@/lib/config';
import type { TapOptions } from '@/lib/config';
import { distance } from '@/features/compositor/utils/geometry';
import { SinglePointerRecognizer } from './base-recognizer';

/**
 * Press and release in place. Emits a single `ended` on release.
 */
export class TapRecognizer extends SinglePointerRecognizer {
  readonly name = 'Tap Recognizer';
  readonly type = 'tap' as const;

  private readonly options: TapOptions;

  constructor(options: Partial<TapOptions> = {}) {
    super();
    this.options = tapOptionsSchema.parse(options);
  }

  update(event: InputEvent): GestureInfo | null {
    if (this.isPressEvent(event)) {
      if (!this.press) this.startPress(event);
      return null;
    }

    const press = this.press;
    if (!press) return null;

    if (event.type === 'idle') {
      if (this.elapsed(press, event.timestamp) > this.options.maxDurationMs) {
        this.reset();
      }
      return null;
    }

    if (!this.isTracked(event)) return null;

    if (this.isMoveEvent(event)) {
      if (distance(press.startPosition, event.position) > this.options.movementThreshold) {
        this.reset();
      }
      return null;
    }

    if (this.isReleaseEvent(event)) {
      this.reset();
      press.position = { ...event.position };
      const moved = distance(press.startPosition, event.position);
      const duration = this.elapsed(press, event.timestamp);
      if (moved > this.options.movementThreshold || duration > this.options.maxDurationMs) {
        return null;
      }
      return this.gesture(press, 'ended', event.timestamp, { tapCount: 1 });
    }

    return null;
  }
}
