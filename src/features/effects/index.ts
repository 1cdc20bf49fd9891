// Effects feature - public API
// Transitions, the bounded effects manager, pipeline presets and theme blends

export { TransitionEffect, resolveEffectSettings, DEFAULT_EFFECT_SETTINGS } from './transition-effect';
export { EffectsManager } from './effects-manager';
export type { AddEffectOptions, EffectFactory, EffectsManagerOptions } from './effects-manager';
export { EffectsPipeline, createDefaultPipeline } from './effects-pipeline';
export type { EffectsPipelineOptions, PipelineStageInit } from './effects-pipeline';
export { BUILTIN_PRESETS, DEFAULT_STAGES } from './builtin-presets';
export { ThemeBlend, THEME_TRANSITION_TARGET } from './theme-blend';
export type { ThemeBlendState, ThemeBlendType } from './theme-blend';
export { createEffectsStore } from './stores/effects-store';
export type { EffectsActions, EffectsState, EffectsStore } from './stores/effects-store';
export { EffectsError } from './errors';
export type { EffectsErrorType } from './errors';
export { applyEasing, EASING_FUNCTIONS } from './utils/easing';
