/**
 * Effects pipeline types: easing, effect kinds, settings and stages.
 */

/** Easing applied to the linear time fraction of a transition */
export type EasingType =
  | 'linear'
  | 'ease-in'
  | 'ease-out'
  | 'ease-in-out'
  | 'bounce'
  | 'elastic'
  | 'back';

/** Slide direction options */
export type SlideDirection = 'from-left' | 'from-right' | 'from-top' | 'from-bottom';

/**
 * Built-in effect kinds. Project-specific effects use a `custom:` prefix.
 */
export type BuiltinEffectKind =
  | 'fade-in'
  | 'fade-out'
  | 'scale-in'
  | 'scale-out'
  | 'slide-in'
  | 'slide-out'
  | 'blur'
  | 'sharpen'
  | 'color-transform'
  | 'hue-shift'
  | 'ripple'
  | 'elastic';

export type EffectKind = BuiltinEffectKind | `custom:${string}`;

export type EffectState = 'ready' | 'running' | 'completed' | 'cancelled';

/**
 * What an effect animates: a window id, or a named surface such as
 * "theme-transition". Effects never hold the window itself.
 */
export type EffectTarget = number | string;

/**
 * Timing and shaping of a single effect instance.
 */
export interface EffectSettings {
  /** Milliseconds from start to completion */
  durationMs: number;
  /** Milliseconds between start() and the first non-zero progress */
  delayMs: number;
  easing: EasingType;
  /** Multiplier applied by getValue() (0-1 typical) */
  strength: number;
  direction?: SlideDirection;
  /** Named float parameters, scaled by the current value on read */
  params: Record<string, number>;
}

/**
 * Progress callback attached to a managed effect.
 * Return `false` to cancel the effect early.
 */
export type EffectCallback = (progress: number) => boolean;

export type PipelineStageType = 'transition' | 'filter' | 'animation' | 'render' | 'custom';

/**
 * A named, ordered step of the effects pipeline.
 */
export interface PipelineStage {
  name: string;
  type: PipelineStageType;
  /** Effect or filter identifier the stage runs, e.g. "fade-in" or "blur" */
  effect: string;
  enabled: boolean;
}

export type PresetResult = { success: true } | { success: false; error: string };
