import { describe, it, expect, vi } from 'vitest';
import { ManualClock } from '@/lib/time';
import { createDefaultPipeline } from '../effects-pipeline';
import { createEffectsStore } from './effects-store';

function setup() {
  const clock = new ManualClock();
  const pipeline = createDefaultPipeline({ now: clock.now });
  const store = createEffectsStore(pipeline);
  return { clock, pipeline, store };
}

describe('effects store', () => {
  it('starts from the pipeline snapshot', () => {
    const { store } = setup();
    const state = store.getState();
    expect(state.activeEffectCount).toBe(0);
    expect(state.activePreset).toBeNull();
    expect(state.stages.map((stage) => stage.name)).toEqual(['fade', 'scale', 'blur']);
    expect(state.enabled).toBe(true);
    expect(state.lastError).toBeNull();
  });

  it('counts applied effects and drops them when finished', () => {
    const { clock, store } = setup();
    expect(store.getState().applyEffect(1, 'fade-in', { durationMs: 100 })).toBe(true);
    expect(store.getState().activeEffectCount).toBe(1);

    clock.advance(100);
    store.getState().update();
    expect(store.getState().activeEffectCount).toBe(0);
  });

  it('records the error when effects are disabled', () => {
    const { store } = setup();
    store.getState().setEnabled(false);
    expect(store.getState().enabled).toBe(false);

    expect(store.getState().applyEffect(1, 'fade-in')).toBe(false);
    expect(store.getState().lastError).toBe('Cannot add fade-in: effects are disabled');

    store.getState().setEnabled(true);
    expect(store.getState().applyEffect(1, 'fade-in')).toBe(true);
    expect(store.getState().lastError).toBeNull();
  });

  it('applies presets and reports unknown ones', () => {
    const { store } = setup();
    expect(store.getState().applyPreset('performance')).toEqual({ success: true });
    expect(store.getState().activePreset).toBe('performance');
    expect(store.getState().stages.map((stage) => stage.name)).toEqual(['fade', 'scale']);

    const result = store.getState().applyPreset('missing');
    expect(result.success).toBe(false);
    expect(store.getState().lastError).toBe('Preset "missing" not found');
    expect(store.getState().activePreset).toBe('performance');
  });

  it('toggles stages', () => {
    const { store } = setup();
    expect(store.getState().setStageEnabled('blur', false)).toBe(true);
    expect(store.getState().stages.find((stage) => stage.name === 'blur')?.enabled).toBe(false);
    expect(store.getState().setStageEnabled('missing', false)).toBe(false);
  });

  it('clears all effects', () => {
    const { store } = setup();
    store.getState().applyEffect(1, 'fade-in');
    store.getState().applyEffect(2, 'fade-in');
    store.getState().clearAllEffects();
    expect(store.getState().activeEffectCount).toBe(0);
  });

  it('notifies subscribers only when the tick changes the count', () => {
    const { clock, store } = setup();
    store.getState().applyEffect(1, 'fade-in', { durationMs: 100 });
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    clock.advance(10);
    store.getState().update();
    expect(listener).not.toHaveBeenCalled();

    clock.advance(100);
    store.getState().update();
    expect(listener).toHaveBeenCalledTimes(1);
    unsubscribe();
  });
});
