/**
 * Built-in pipeline presets
 *
 * Each preset is a complete stage list; applying one replaces the active
 * stages wholesale.
 */

import type { PipelineStage } from '@/types/effects';

const FADE: PipelineStage = { name: 'fade', type: 'transition', effect: 'fade-in', enabled: true };
const SCALE: PipelineStage = { name: 'scale', type: 'transition', effect: 'scale-in', enabled: true };
const BLUR: PipelineStage = { name: 'blur', type: 'filter', effect: 'blur', enabled: true };
const COLOR: PipelineStage = { name: 'color-transform', type: 'filter', effect: 'color-transform', enabled: true };

/** Stages a fresh default pipeline starts with */
export const DEFAULT_STAGES: readonly PipelineStage[] = [FADE, SCALE, BLUR];

export const BUILTIN_PRESETS: Readonly<Record<string, readonly PipelineStage[]>> = {
  // Fade only
  minimal: [FADE],
  // Cheap transitions, no filters
  performance: [FADE, SCALE],
  fancy: [FADE, SCALE, BLUR, COLOR],
};
