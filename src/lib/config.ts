/**
 * Runtime configuration
 *
 * Defaults live in the zod schemas; environment variables override them.
 *
 * Usage:
 *   import { loadRuntimeConfig, parseCompositorConfig } from '@/lib/config';
 *   const config = loadRuntimeConfig(process.env);
 *   const compositor = parseCompositorConfig({ maxRenderTimeMs: 8 });
 */

import { z } from 'zod';
import { resolveLogLevel } from './logger';
import type { LogLevel } from './logger';

export const powerSaveModeSchema = z.enum(['performance', 'balanced', 'power-save', 'adaptive']);

export const compositorConfigSchema = z.object({
  vsyncEnabled: z.boolean().default(true),
  tripleBuffering: z.boolean().default(true),
  directScanout: z.boolean().default(true),
  vrrEnabled: z.boolean().default(true),
  maxRenderTimeMs: z
    .number()
    .positive('Frame budget must be positive')
    .max(1000, 'Frame budget must be at most 1000ms')
    .default(16),
  powerSaveMode: powerSaveModeSchema.default('balanced'),
  customAnimations: z.boolean().default(true),
  tearFree: z.boolean().default(true),
  independentUpdates: z.boolean().default(true),
  damageTracking: z.boolean().default(true),
  fpsWindowSize: z
    .number()
    .int('FPS window must be an integer')
    .min(2, 'FPS window needs at least 2 samples')
    .max(10_000)
    .default(100),
  frameSleepMs: z.number().min(0).max(1000).default(1),
});

export type CompositorConfig = z.infer<typeof compositorConfigSchema>;

export const effectsConfigSchema = z.object({
  effectLimit: z
    .number()
    .int('Effect limit must be an integer')
    .min(1, 'Effect limit must be at least 1')
    .default(32),
  enabled: z.boolean().default(true),
});

export type EffectsConfig = z.infer<typeof effectsConfigSchema>;

const pixels = z.number().min(0);
const millis = z.number().min(0);

export const tapOptionsSchema = z.object({
  movementThreshold: pixels.default(10),
  maxDurationMs: millis.default(300),
});

export const doubleTapOptionsSchema = z.object({
  movementThreshold: pixels.default(10),
  maxTapDurationMs: millis.default(300),
  maxIntervalMs: millis.default(300),
  maxDistance: pixels.default(20),
});

export const longPressOptionsSchema = z.object({
  movementThreshold: pixels.default(15),
  delayMs: millis.default(500),
  feedbackIntervalMs: millis.default(100),
});

export const swipeOptionsSchema = z.object({
  minDistance: pixels.default(50),
  maxDurationMs: millis.default(500),
});

export const pinchOptionsSchema = z.object({
  minDistance: pixels.default(20),
  minScaleChange: z.number().min(0).default(0.05),
  /** Scale change per scroll unit for touchpad ctrl+scroll pinches */
  scrollScaleFactor: z.number().positive().default(0.01),
});

export const rotateOptionsSchema = z.object({
  /** Radians (~3 degrees) */
  minAngle: z.number().min(0).default(0.05),
});

export const edgeSwipeOptionsSchema = z.object({
  edgeThreshold: pixels.default(20),
  minDistance: pixels.default(50),
  screen: z
    .object({
      x: z.number().default(0),
      y: z.number().default(0),
      width: z.number().positive().default(1920),
      height: z.number().positive().default(1080),
    })
    .default({}),
});

export type TapOptions = z.infer<typeof tapOptionsSchema>;
export type DoubleTapOptions = z.infer<typeof doubleTapOptionsSchema>;
export type LongPressOptions = z.infer<typeof longPressOptionsSchema>;
export type SwipeOptions = z.infer<typeof swipeOptionsSchema>;
export type PinchOptions = z.infer<typeof pinchOptionsSchema>;
export type RotateOptions = z.infer<typeof rotateOptionsSchema>;
export type EdgeSwipeOptions = z.infer<typeof edgeSwipeOptionsSchema>;

export const gestureConfigSchema = z.object({
  tap: tapOptionsSchema.default({}),
  doubleTap: doubleTapOptionsSchema.default({}),
  longPress: longPressOptionsSchema.default({}),
  swipe: swipeOptionsSchema.default({}),
  pinch: pinchOptionsSchema.default({}),
  rotate: rotateOptionsSchema.default({}),
  edgeSwipe: edgeSwipeOptionsSchema.default({}),
});

export type GestureConfig = z.infer<typeof gestureConfigSchema>;

export type CompositorConfigInput = z.input<typeof compositorConfigSchema>;
export type EffectsConfigInput = z.input<typeof effectsConfigSchema>;
export type GestureConfigInput = z.input<typeof gestureConfigSchema>;

export interface RuntimeConfig {
  logLevel: LogLevel;
  compositor: CompositorConfig;
  effects: EffectsConfig;
  gestures: GestureConfig;
}

export function parseCompositorConfig(input: CompositorConfigInput = {}): CompositorConfig {
  return compositorConfigSchema.parse(input);
}

export function parseEffectsConfig(input: EffectsConfigInput = {}): EffectsConfig {
  return effectsConfigSchema.parse(input);
}

export function parseGestureConfig(input: GestureConfigInput = {}): GestureConfig {
  return gestureConfigSchema.parse(input);
}

type Env = Record<string, string | undefined>;

function getNumberEnv(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Build the runtime configuration: environment > defaults.
 * Invalid values throw a ZodError describing the offending field.
 */
export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const logLevel = resolveLogLevel(env);

  const compositor = parseCompositorConfig({
    maxRenderTimeMs: getNumberEnv(env, 'WM_MAX_RENDER_TIME_MS'),
    fpsWindowSize: getNumberEnv(env, 'WM_FPS_WINDOW'),
  });

  const effects = parseEffectsConfig({
    effectLimit: getNumberEnv(env, 'WM_EFFECT_LIMIT'),
  });

  return {
    logLevel,
    compositor,
    effects,
    gestures: parseGestureConfig(),
  };
}
