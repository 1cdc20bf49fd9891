import { describe, it, expect, beforeEach } from 'vitest';
import { ManualClock } from '@/lib/time';
import { Compositor } from '@/features/compositor';
import { createDefaultPipeline, createEffectsStore } from '@/features/effects';
import type { EffectsPipeline, EffectsStore } from '@/features/effects';
import { animateWindowOpacity } from './window-effects';

describe('animateWindowOpacity', () => {
  let clock: ManualClock;
  let compositor: Compositor;
  let pipeline: EffectsPipeline;
  let effects: EffectsStore;

  beforeEach(() => {
    clock = new ManualClock();
    compositor = new Compositor({ now: clock.now });
    pipeline = createDefaultPipeline({ now: clock.now });
    effects = createEffectsStore(pipeline);
  });

  it('interpolates between the two opacities', () => {
    const id = compositor.createWindow();
    expect(animateWindowOpacity(compositor, effects, id, { from: 1, to: 0, durationMs: 100, easing: 'linear' })).toBe(true);
    expect(compositor.getWindow(id)?.opacity).toBe(1);

    clock.advance(25);
    effects.getState().update();
    expect(compositor.getWindow(id)?.opacity).toBe(0.75);
  });

  it('uses fade-out when the opacity goes down', () => {
    const id = compositor.createWindow();
    animateWindowOpacity(compositor, effects, id, { from: 1, to: 0.2 });
    const manager = pipeline.getEffectsManager();
    expect(manager.findEffect(id, 'fade-out')).toBeDefined();
    expect(manager.findEffect(id, 'fade-in')).toBeUndefined();
  });

  it('replaces a running animation on the same window', () => {
    const id = compositor.createWindow();
    animateWindowOpacity(compositor, effects, id, { from: 0, to: 1, durationMs: 100, easing: 'linear' });
    animateWindowOpacity(compositor, effects, id, { from: 1, to: 0.5, durationMs: 100, easing: 'linear' });

    clock.advance(50);
    effects.getState().update();
    expect(effects.getState().activeEffectCount).toBe(1);
    expect(compositor.getWindow(id)?.opacity).toBe(0.75);
  });

  it('cancels itself once the window is gone', () => {
    const id = compositor.createWindow();
    animateWindowOpacity(compositor, effects, id, { from: 0, to: 1, durationMs: 100 });
    compositor.removeWindow(id);

    clock.advance(10);
    effects.getState().update();
    expect(effects.getState().activeEffectCount).toBe(0);
  });

  it('refuses unknown windows', () => {
    expect(animateWindowOpacity(compositor, effects, 42, { from: 0, to: 1 })).toBe(false);
    expect(effects.getState().activeEffectCount).toBe(0);
  });
});
