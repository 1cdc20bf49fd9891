import type { Point } from '@/types/geometry';

/**
 * Live touch contacts in the order they went down. Two-finger gestures use
 * the first two.
 */
export class TouchPoints {
  private readonly points = new Map<number, Point>();

  get size(): number {
    return this.points.size;
  }

  has(id: number): boolean {
    return this.points.has(id);
  }

  set(id: number, position: Point): void {
    this.points.set(id, { ...position });
  }

  delete(id: number): boolean {
    return this.points.delete(id);
  }

  clear(): void {
    this.points.clear();
  }

  firstId(): number | undefined {
    return this.points.keys().next().value;
  }

  pair(): [Point, Point] | null {
    const [first, second] = this.points.values();
    return first && second ? [first, second] : null;
  }
}
