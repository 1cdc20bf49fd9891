/**
 * Runtime assembly
 *
 * Builds one compositor, gesture manager and effects pipeline from a
 * RuntimeConfig and connects them through a desktop session. Callers own
 * the result and drive its lifecycle explicitly.
 */

import { loadRuntimeConfig } from '@/lib/config';
import type { RuntimeConfig } from '@/lib/config';
import { setRootLogLevel } from '@/lib/logger';
import type { TimeSource } from '@/lib/time';
import { Compositor } from '@/features/compositor';
import type { RenderBackend } from '@/features/compositor';
import { GestureManager } from '@/features/gestures';
import { createDefaultPipeline, createEffectsStore } from '@/features/effects';
import type { EffectsPipeline, EffectsStore } from '@/features/effects';
import { createDesktopSession } from '@/features/desktop';
import type { DesktopSession } from '@/features/desktop';

export interface RuntimeOptions {
  config?: RuntimeConfig;
  backend?: RenderBackend;
  now?: TimeSource;
}

export interface Runtime {
  config: RuntimeConfig;
  compositor: Compositor;
  gestures: GestureManager;
  pipeline: EffectsPipeline;
  effects: EffectsStore;
  session: DesktopSession;
  start(): Promise<void>;
  shutdown(): void;
}

export function createRuntime({ config = loadRuntimeConfig(), backend, now }: RuntimeOptions = {}): Runtime {
  setRootLogLevel(config.logLevel);

  const compositor = new Compositor({ config: config.compositor, backend, now });
  const gestures = new GestureManager(config.gestures);
  gestures.registerDefaultRecognizers();
  const pipeline = createDefaultPipeline({ config: config.effects, now });
  const effects = createEffectsStore(pipeline);
  const session = createDesktopSession({ compositor, gestures, effects });

  return {
    config,
    compositor,
    gestures,
    pipeline,
    effects,
    session,
    start: () => compositor.initialize(),
    shutdown: () => {
      session.dispose();
      effects.getState().clearAllEffects();
      gestures.resetAll();
      compositor.shutdown();
    },
  };
}
