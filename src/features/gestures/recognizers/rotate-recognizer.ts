import type { WindowId } from '@/types/compositor';
import type { Point } from '@/types/geometry';
import type { GestureInfo, GestureState, RotationDirection } from '@/types/gesture';
import type { InputEvent, KeyModifier } from '@/types/input';
import { rotateOptionsSchema } from '@/lib/config';
import type { RotateOptions } from '@/lib/config';
import { elapsedSince } from '@/lib/time';
import { midpoint } from '@/features/compositor/utils/geometry';
import { createGestureInfo } from '../utils/gesture-info';
import { eventModifiers, hasModifier, normalizeAngle } from '../utils/input-utils';
import type { PointerKey } from '../utils/input-utils';
import { TouchPoints } from '../utils/touch-points';
import type { GestureRecognizer } from './types';

/** Distance of the virtual pivot to the left of the cursor in mouse rotation */
const MOUSE_PIVOT_OFFSET = 50;

interface RotateSession {
  source: 'touch' | 'mouse';
  startTime: number;
  startPosition: Point;
  position: Point;
  /** Angle of the finger pair when rotation was last reported */
  referenceAngle: number;
  rotation: number;
  direction: RotationDirection;
  began: boolean;
  target?: WindowId;
  modifiers: readonly KeyModifier[];
  sourceDevice?: string;
  /** Fixed second point for mouse rotation */
  pivot?: Point;
}

function angleBetween(a: Point, b: Point): number {
  return Math.atan2(b.y - a.y, b.x - a.x);
}

/**
 * Two-finger rotation, or ctrl + right-drag with the mouse around a pivot
 * 50px left of the press.
 *
 * Rotation accumulates across reports. Movement below `minAngle` is held
 * back until it adds up to enough to report. Positive angles are reported
 * as counter-clockwise.
 */
export class RotateRecognizer implements GestureRecognizer {
  readonly name = 'Rotate Recognizer';
  readonly type = 'rotate' as const;
  readonly exclusive = false;

  private readonly options: RotateOptions;
  private readonly touches = new TouchPoints();
  private session: RotateSession | null = null;

  constructor(options: Partial<RotateOptions> = {}) {
    this.options = rotateOptionsSchema.parse(options);
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
    if (this.session.source === 'mouse') return 'mouse';
    const id = this.touches.firstId();
    return id === undefined ? null : `touch:${id}`;
  }

  update(event: InputEvent): GestureInfo | null {
    switch (event.type) {
      case 'touch-begin': {
        this.touches.set(event.touchId, event.position);
        const pair = this.touches.pair();
        if (pair && !this.session) {
          this.session = this.startSession('touch', pair[0], pair[1], event.timestamp, {
            target: event.target,
            modifiers: eventModifiers(event),
            sourceDevice: event.sourceDevice,
          });
        }
        return null;
      }

      case 'touch-update': {
        if (!this.touches.has(event.touchId)) return null;
        this.touches.set(event.touchId, event.position);
        const pair = this.touches.pair();
        if (!pair || this.session?.source !== 'touch') return null;
        return this.checkRotation(pair[0], pair[1], event.timestamp);
      }

      case 'touch-end': {
        this.touches.delete(event.touchId);
        if (this.session?.source !== 'touch' || this.touches.size >= 2) return null;
        return this.finish(event.timestamp);
      }

      case 'pointer-press': {
        if (event.button !== 'right' || !hasModifier(event, 'ctrl') || this.session) return null;
        const pivot = { x: event.position.x - MOUSE_PIVOT_OFFSET, y: event.position.y };
        this.session = this.startSession('mouse', pivot, event.position, event.timestamp, {
          target: event.target,
          modifiers: eventModifiers(event),
          sourceDevice: event.sourceDevice,
          pivot,
        });
        return null;
      }

      case 'pointer-move': {
        const pivot = this.session?.source === 'mouse' ? this.session.pivot : undefined;
        if (!pivot) return null;
        return this.checkRotation(pivot, event.position, event.timestamp);
      }

      case 'pointer-release': {
        if (event.button !== 'right' || this.session?.source !== 'mouse') return null;
        return this.finish(event.timestamp);
      }

      default:
        return null;
    }
  }

  private startSession(
    source: RotateSession['source'],
    a: Point,
    b: Point,
    timestamp: number,
    extra: Pick<RotateSession, 'target' | 'modifiers' | 'sourceDevice' | 'pivot'>
  ): RotateSession {
    const center = midpoint(a, b);
    return {
      source,
      startTime: timestamp,
      startPosition: center,
      position: center,
      referenceAngle: angleBetween(a, b),
      rotation: 0,
      direction: 'counter-clockwise',
      began: false,
      ...extra,
    };
  }

  private checkRotation(a: Point, b: Point, timestamp: number): GestureInfo | null {
    const session = this.session;
    if (!session) return null;

    session.position = midpoint(a, b);
    const angle = angleBetween(a, b);
    const diff = normalizeAngle(angle - session.referenceAngle);
    if (Math.abs(diff) < this.options.minAngle) return null;

    session.rotation += diff;
    session.referenceAngle = angle;
    session.direction = diff > 0 ? 'counter-clockwise' : 'clockwise';

    const state: GestureState = session.began ? 'changed' : 'began';
    session.began = true;
    return this.rotateGesture(session, state, timestamp);
  }

  private finish(timestamp: number): GestureInfo | null {
    const session = this.session;
    this.session = null;
    return session?.began ? this.rotateGesture(session, 'ended', timestamp) : null;
  }

  private rotateGesture(session: RotateSession, state: GestureState, timestamp: number): GestureInfo {
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
      rotation: session.rotation,
      rotationDirection: session.direction,
      touchCount: session.source === 'touch' ? 2 : undefined,
    });
  }
}
