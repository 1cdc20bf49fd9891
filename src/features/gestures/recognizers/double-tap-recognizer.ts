import type { Point } from '@/types/geometry';
import type { GestureInfo } from '@/types/gesture';
import type { InputEvent } from '@/types/input';
import { doubleTapOptionsSchema } from '@/lib/config';
import type { DoubleTapOptions } from '@/lib/config';
import { elapsedSince } from '@/lib/time';
import { distance } from '@/features/compositor/utils/geometry';
import type { PointerKey } from '../utils/input-utils';
import { SinglePointerRecognizer } from './base-recognizer';

interface CompletedTap {
  position: Point;
  time: number;
  pointer: PointerKey;
}

/**
 * Two taps close together in time and space. The interval runs from the
 * first release to the second press.
 */
export class DoubleTapRecognizer extends SinglePointerRecognizer {
  readonly name = 'Double Tap Recognizer';
  readonly type = 'double-tap' as const;

  private readonly options: DoubleTapOptions;
  private firstTap: CompletedTap | null = null;

  constructor(options: Partial<DoubleTapOptions> = {}) {
    super();
    this.options = doubleTapOptionsSchema.parse(options);
  }

  override reset(): void {
    super.reset();
    this.firstTap = null;
  }

  override isActive(): boolean {
    return this.press !== null || this.firstTap !== null;
  }

  override trackedPointer(): PointerKey | null {
    return this.press?.pointer ?? this.firstTap?.pointer ?? null;
  }

  private expireFirstTap(timestamp: number): void {
    if (this.firstTap && elapsedSince(this.firstTap.time, timestamp) > this.options.maxIntervalMs) {
      this.firstTap = null;
    }
  }

  update(event: InputEvent): GestureInfo | null {
    if (event.type === 'idle') {
      this.expireFirstTap(event.timestamp);
      return null;
    }

    if (this.isPressEvent(event)) {
      if (this.press) return null;
      this.expireFirstTap(event.timestamp);
      this.startPress(event);
      return null;
    }

    const press = this.press;
    if (!press || !this.isTracked(event)) return null;

    if (this.isMoveEvent(event)) {
      if (distance(press.startPosition, event.position) > this.options.movementThreshold) {
        this.reset();
      }
      return null;
    }

    if (!this.isReleaseEvent(event)) return null;

    press.position = { ...event.position };
    this.press = null;

    const validTap =
      distance(press.startPosition, event.position) <= this.options.movementThreshold &&
      this.elapsed(press, event.timestamp) <= this.options.maxTapDurationMs;
    if (!validTap) {
      this.reset();
      return null;
    }

    const first = this.firstTap;
    if (
      first &&
      first.pointer === press.pointer &&
      elapsedSince(first.time, press.startTime) <= this.options.maxIntervalMs &&
      distance(first.position, event.position) <= this.options.maxDistance
    ) {
      this.reset();
      return this.gesture(press, 'ended', event.timestamp, {
        startPosition: first.position,
        duration: elapsedSince(first.time, event.timestamp),
        tapCount: 2,
      });
    }

    this.firstTap = { position: { ...event.position }, time: event.timestamp, pointer: press.pointer };
    return null;
  }
}
