import type { Point, Rectangle } from '@/types/geometry';
import type { GestureInfo, ScreenEdge } from '@/types/gesture';
import type { InputEvent } from '@/types/input';
import { edgeSwipeOptionsSchema } from '@/lib/config';
import type { EdgeSwipeOptions } from '@/lib/config';
import { SinglePointerRecognizer } from './base-recognizer';
import type { PressContext } from './base-recognizer';

/**
 * A drag that starts within `edgeThreshold` of a screen edge and moves
 * inward at least `minDistance`.
 */
export class EdgeSwipeRecognizer extends SinglePointerRecognizer {
  readonly name = 'Edge Swipe Recognizer';
  readonly type = 'edge-swipe' as const;

  private readonly options: EdgeSwipeOptions;
  private screen: Rectangle;
  private edge: ScreenEdge | null = null;
  private began = false;

  constructor(options: Partial<EdgeSwipeOptions> = {}) {
    super();
    this.options = edgeSwipeOptionsSchema.parse(options);
    this.screen = { ...this.options.screen };
  }

  /** Follow output changes; takes effect from the next press. */
  setScreen(screen: Rectangle): void {
    this.screen = { ...screen };
  }

  override reset(): void {
    super.reset();
    this.edge = null;
    this.began = false;
  }

  private edgeAt(point: Point): ScreenEdge | null {
    const { x, y, width, height } = this.screen;
    const threshold = this.options.edgeThreshold;
    if (point.x - x <= threshold) return 'left';
    if (x + width - point.x <= threshold) return 'right';
    if (point.y - y <= threshold) return 'top';
    if (y + height - point.y <= threshold) return 'bottom';
    return null;
  }

  private inwardDistance(edge: ScreenEdge, start: Point, current: Point): number {
    switch (edge) {
      case 'left':
        return current.x - start.x;
      case 'right':
        return start.x - current.x;
      case 'top':
        return current.y - start.y;
      case 'bottom':
        return start.y - current.y;
    }
  }

  update(event: InputEvent): GestureInfo | null {
    if (this.isPressEvent(event)) {
      if (this.press) return null;
      const edge = this.edgeAt(event.position);
      if (edge) {
        this.startPress(event);
        this.edge = edge;
      }
      return null;
    }

    const press = this.press;
    const edge = this.edge;
    if (!press || !edge || event.type === 'idle' || !this.isTracked(event)) return null;

    if (this.isMoveEvent(event)) {
      press.position = { ...event.position };
      if (this.began) {
        return this.edgeGesture(press, edge, 'changed', event.timestamp);
      }
      if (this.inwardDistance(edge, press.startPosition, press.position) >= this.options.minDistance) {
        this.began = true;
        return this.edgeGesture(press, edge, 'began', event.timestamp);
      }
      return null;
    }

    if (this.isReleaseEvent(event)) {
      press.position = { ...event.position };
      const began = this.began;
      this.reset();
      return began ? this.edgeGesture(press, edge, 'ended', event.timestamp) : null;
    }

    return null;
  }

  private edgeGesture(
    press: PressContext,
    edge: ScreenEdge,
    state: 'began' | 'changed' | 'ended',
    timestamp: number
  ): GestureInfo {
    return this.gesture(press, state, timestamp, {
      edge,
      delta: {
        x: press.position.x - press.startPosition.x,
        y: press.position.y - press.startPosition.y,
      },
    });
  }
}
