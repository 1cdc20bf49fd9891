import { describe, it, expect, beforeEach } from 'vitest';
import { move, press, release, touchBegin, touchEnd, touchUpdate } from '@/test/input-events';
import { RotateRecognizer } from './rotate-recognizer';

describe('RotateRecognizer', () => {
  let recognizer: RotateRecognizer;

  beforeEach(() => {
    recognizer = new RotateRecognizer();
  });

  it('accumulates rotation across reports', () => {
    recognizer.update(touchBegin(0, 1, 0, 0));
    recognizer.update(touchBegin(0, 2, 100, 0));

    // ~0.02 rad is below the minimum angle
    expect(recognizer.update(touchUpdate(10, 2, 100, 2))).toBeNull();

    const began = recognizer.update(touchUpdate(20, 2, 0, 100));
    expect(began).toMatchObject({
      type: 'rotate',
      state: 'began',
      rotationDirection: 'counter-clockwise',
      position: { x: 0, y: 50 },
    });
    expect(began?.rotation).toBeCloseTo(Math.PI / 2);

    const half = recognizer.update(touchUpdate(30, 2, -100, 0));
    expect(half?.state).toBe('changed');
    expect(half?.rotation).toBeCloseTo(Math.PI);

    // Crossing ±π keeps accumulating instead of jumping back
    const threeQuarters = recognizer.update(touchUpdate(40, 2, 0, -100));
    expect(threeQuarters?.rotation).toBeCloseTo((3 * Math.PI) / 2);

    const ended = recognizer.update(touchEnd(50, 1, 0, 0));
    expect(ended?.state).toBe('ended');
    expect(ended?.rotation).toBeCloseTo((3 * Math.PI) / 2);
    expect(recognizer.isActive()).toBe(false);
  });

  it('reports clockwise rotation with a negative angle', () => {
    recognizer.update(touchBegin(0, 1, 0, 0));
    recognizer.update(touchBegin(0, 2, 100, 0));
    const gesture = recognizer.update(touchUpdate(10, 2, 0, -100));
    expect(gesture?.rotationDirection).toBe('clockwise');
    expect(gesture?.rotation).toBeCloseTo(-Math.PI / 2);
  });

  it('rotates with ctrl + right drag around a virtual pivot', () => {
    expect(recognizer.update(press(0, 100, 100, { button: 'right', modifiers: ['ctrl'] }))).toBeNull();
    expect(recognizer.trackedPointer()).toBe('mouse');

    // Pivot sits at (50, 100); moving straight below it is a quarter turn
    const began = recognizer.update(move(10, 50, 150));
    expect(began?.state).toBe('began');
    expect(began?.rotation).toBeCloseTo(Math.PI / 2);

    expect(recognizer.update(release(20, 50, 150, { button: 'right' }))).toMatchObject({ state: 'ended' });
  });

  it('ignores right drags without ctrl', () => {
    recognizer.update(press(0, 100, 100, { button: 'right' }));
    expect(recognizer.update(move(10, 50, 150))).toBeNull();
  });
});
