/**
 * Monotonic time source in milliseconds.
 *
 * Everything that measures elapsed time (frame loop, effects) takes one of
 * these so tests can drive time by hand.
 */
export type TimeSource = () => number;

export const monotonicNow: TimeSource = () => performance.now();

/**
 * Saturating difference: never negative.
 */
export function elapsedSince(start: number, now: number): number {
  return now > start ? now - start : 0;
}

/**
 * Manually advanced clock for tests and deterministic replays.
 */
export class ManualClock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  readonly now: TimeSource = () => this.current;

  advance(ms: number): number {
    this.current += Math.max(0, ms);
    return this.current;
  }

  set(ms: number): void {
    this.current = Math.max(this.current, ms);
  }
}
