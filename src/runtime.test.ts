import { describe, it, expect } from 'vitest';
import { loadRuntimeConfig } from '@/lib/config';
import { LogLevel } from '@/lib/logger';
import { ManualClock } from '@/lib/time';
import { HeadlessBackend } from '@/features/compositor';
import { createRuntime } from './runtime';

describe('createRuntime', () => {
  const config = { ...loadRuntimeConfig({ WM_EFFECT_LIMIT: '4' }), logLevel: LogLevel.SILENT };

  it('applies the configuration to every subsystem', () => {
    const runtime = createRuntime({ config });
    expect(runtime.pipeline.getEffectsManager().getEffectLimit()).toBe(4);
    expect(runtime.compositor.getConfig().maxRenderTimeMs).toBe(16);
    expect(runtime.gestures.getRecognizer('edge-swipe')).toBeDefined();
  });

  it('renders faded-in windows once started', async () => {
    const clock = new ManualClock();
    const backend = new HeadlessBackend();
    const runtime = createRuntime({ config, backend, now: clock.now });
    await runtime.start();

    const id = runtime.compositor.createWindow();
    clock.advance(200);
    expect(runtime.compositor.renderFrame()).toBe(true);
    expect(backend.lastFrame?.commands).toHaveLength(1);
    expect(backend.lastFrame?.commands[0]?.opacity).toBe(1);
    expect(runtime.compositor.getWindow(id)?.opacity).toBe(1);
  });

  it('tears everything down on shutdown', async () => {
    const runtime = createRuntime({ config });
    await runtime.start();
    runtime.compositor.createWindow();
    runtime.shutdown();

    expect(runtime.compositor.isInitialized).toBe(false);
    expect(runtime.compositor.getWindowCount()).toBe(0);
    expect(runtime.effects.getState().activeEffectCount).toBe(0);
  });
});
