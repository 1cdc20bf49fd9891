/**
 * Frames-per-second over a sliding window of frame timestamps.
 */
export class FpsCounter {
  private readonly samples: number[] = [];

  constructor(private readonly windowSize = 100) {
    if (!Number.isInteger(windowSize) || windowSize < 2) {
      throw new RangeError(`FPS window must be an integer >= 2, got ${windowSize}`);
    }
  }

  /** Record a frame presented at `timestamp` (ms). */
  record(timestamp: number): void {
    this.samples.push(timestamp);
    if (this.samples.length > this.windowSize) {
      this.samples.shift();
    }
  }

  /**
   * Frames per second across the window. 0 with fewer than two samples or
   * when all samples share a timestamp.
   */
  getFps(): number {
    const count = this.samples.length;
    if (count < 2) return 0;

    const first = this.samples[0];
    const last = this.samples[count - 1];
    if (first === undefined || last === undefined) return 0;

    const spanMs = last - first;
    if (spanMs <= 0) return 0;
    return ((count - 1) * 1000) / spanMs;
  }

  get sampleCount(): number {
    return this.samples.length;
  }

  reset(): void {
    this.samples.length = 0;
  }
}
