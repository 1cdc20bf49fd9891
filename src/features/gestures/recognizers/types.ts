import type { GestureInfo, GestureType } from '@/types/gesture';
import type { InputEvent } from '@/types/input';
import type { PointerKey } from '../utils/input-utils';

/**
 * A recognizer consumes input events one at a time and reports a gesture
 * when one starts, progresses or finishes.
 */
export interface GestureRecognizer {
  readonly name: string;
  readonly type: GestureType;
  /**
   * Exclusive recognizers compete for their pointer: once one begins, the
   * manager resets the other exclusive recognizers tracking that pointer.
   */
  readonly exclusive: boolean;

  update(event: InputEvent): GestureInfo | null;
  reset(): void;
  isActive(): boolean;
  /** Pointer stream currently followed, or null when idle */
  trackedPointer(): PointerKey | null;
}
