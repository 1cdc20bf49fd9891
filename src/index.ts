// Public API

export * from '@/features/compositor';
export * from '@/features/gestures';
export * from '@/features/effects';
export * from '@/features/desktop';
export { createRuntime } from './runtime';
export type { Runtime, RuntimeOptions } from './runtime';

export {
  loadRuntimeConfig,
  parseCompositorConfig,
  parseEffectsConfig,
  parseGestureConfig,
} from '@/lib/config';
export type {
  CompositorConfig,
  CompositorConfigInput,
  EffectsConfig,
  EffectsConfigInput,
  GestureConfig,
  GestureConfigInput,
  RuntimeConfig,
} from '@/lib/config';
export { createLogger, setRootLogLevel, LogLevel } from '@/lib/logger';
export { ManualClock, monotonicNow } from '@/lib/time';
export type { TimeSource } from '@/lib/time';

export type * from '@/types/geometry';
export type * from '@/types/compositor';
export type * from '@/types/input';
export type * from '@/types/gesture';
export type * from '@/types/effects';
