import { describe, it, expect, beforeEach } from 'vitest';
import { idle, scroll, touchBegin, touchEnd, touchUpdate } from '@/test/input-events';
import { PinchRecognizer } from './pinch-recognizer';

describe('PinchRecognizer', () => {
  let recognizer: PinchRecognizer;

  beforeEach(() => {
    recognizer = new PinchRecognizer();
  });

  describe('touch', () => {
    beforeEach(() => {
      recognizer.update(touchBegin(0, 1, 100, 100));
      recognizer.update(touchBegin(0, 2, 200, 100));
    });

    it('reports scale relative to the initial finger distance', () => {
      expect(recognizer.update(touchUpdate(10, 2, 202, 100))).toBeNull();

      expect(recognizer.update(touchUpdate(20, 2, 250, 100))).toMatchObject({
        type: 'pinch',
        state: 'began',
        scale: 1.5,
        pinchDirection: 'out',
        position: { x: 175, y: 100 },
        startPosition: { x: 150, y: 100 },
        touchCount: 2,
      });

      // Below the minimum change since the last report
      expect(recognizer.update(touchUpdate(30, 2, 252, 100))).toBeNull();

      expect(recognizer.update(touchUpdate(40, 2, 160, 100))).toMatchObject({
        state: 'changed',
        scale: 0.6,
        pinchDirection: 'in',
      });

      expect(recognizer.update(touchEnd(50, 2, 160, 100))).toMatchObject({
        state: 'ended',
        scale: 0.6,
        pinchDirection: 'in',
        duration: 50,
      });
      expect(recognizer.isActive()).toBe(false);
    });

    it('emits nothing when the touches lift before a pinch began', () => {
      expect(recognizer.update(touchEnd(10, 1, 100, 100))).toBeNull();
      expect(recognizer.isActive()).toBe(false);
    });

    it('tracks the first touch as its pointer', () => {
      expect(recognizer.trackedPointer()).toBe('touch:1');
    });
  });

  it('ignores fingers that start too close together', () => {
    recognizer.update(touchBegin(0, 1, 100, 100));
    recognizer.update(touchBegin(0, 2, 110, 100));
    expect(recognizer.update(touchUpdate(10, 2, 200, 100))).toBeNull();
  });

  describe('touchpad', () => {
    it('turns ctrl+scroll into a pinch that ends after a pause', () => {
      const began = recognizer.update(scroll(0, -10, { modifiers: ['ctrl'] }));
      expect(began).toMatchObject({ state: 'began', pinchDirection: 'out' });
      expect(began?.scale).toBeCloseTo(1.1);

      const changed = recognizer.update(scroll(50, 20, { modifiers: ['ctrl'] }));
      expect(changed).toMatchObject({ state: 'changed', pinchDirection: 'in' });
      expect(changed?.scale).toBeCloseTo(0.88);

      expect(recognizer.update(idle(100))).toBeNull();
      expect(recognizer.update(idle(300))).toMatchObject({ state: 'ended' });
      expect(recognizer.isActive()).toBe(false);
    });

    it('ends on a plain scroll once the pinch has run long enough', () => {
      recognizer.update(scroll(0, -10, { modifiers: ['ctrl'] }));
      expect(recognizer.update(scroll(100, 5))).toBeNull();
      expect(recognizer.update(scroll(250, 5))).toMatchObject({ state: 'ended' });
    });

    it('ignores scrolls from other devices', () => {
      expect(recognizer.update(scroll(0, -10, { modifiers: ['ctrl'], sourceDevice: 'mouse' }))).toBeNull();
    });
  });
});
