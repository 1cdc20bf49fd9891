import { describe, it, expect, beforeEach } from 'vitest';
import { press, release, move } from '@/test/input-events';
import { EdgeSwipeRecognizer } from './edge-swipe-recognizer';

describe('EdgeSwipeRecognizer', () => {
  let recognizer: EdgeSwipeRecognizer;

  beforeEach(() => {
    recognizer = new EdgeSwipeRecognizer();
  });

  it('recognizes an inward drag from the left edge', () => {
    recognizer.update(press(0, 5, 500));
    expect(recognizer.update(move(50, 40, 500))).toBeNull();
    expect(recognizer.update(move(80, 60, 500))).toMatchObject({
      type: 'edge-swipe',
      state: 'began',
      edge: 'left',
      delta: { x: 55, y: 0 },
    });
    expect(recognizer.update(release(120, 200, 500))).toMatchObject({ state: 'ended', edge: 'left' });
  });

  it('ignores presses away from the edges', () => {
    recognizer.update(press(0, 500, 500));
    expect(recognizer.isActive()).toBe(false);
    expect(recognizer.update(move(50, 700, 500))).toBeNull();
  });

  it('measures inward distance from the right edge', () => {
    recognizer.update(press(0, 1910, 300));
    expect(recognizer.update(move(50, 1850, 300))).toMatchObject({ state: 'began', edge: 'right' });
  });

  it('does not begin when moving outward', () => {
    recognizer.update(press(0, 1910, 300));
    expect(recognizer.update(move(50, 1919, 300))).toBeNull();
  });

  it('uses the configured screen bounds', () => {
    recognizer.setScreen({ x: 0, y: 0, width: 800, height: 600 });
    recognizer.update(press(0, 400, 590));
    expect(recognizer.update(move(50, 400, 500))).toMatchObject({ state: 'began', edge: 'bottom' });
  });
});
