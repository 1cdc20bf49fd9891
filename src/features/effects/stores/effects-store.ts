/**
 * Effects Store
 *
 * Vanilla zustand store wrapping one EffectsPipeline. Settings/theme
 * requests and the frame loop both go through these actions, so all
 * effects mutation happens in one place; subscribers read snapshots.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { EffectCallback, EffectKind, EffectSettings, EffectTarget, PipelineStage, PresetResult } from '@/types/effects';
import type { EffectsPipeline } from '../effects-pipeline';
import { EffectsError } from '../errors';

export interface EffectsState {
  activeEffectCount: number;
  activePreset: string | null;
  stages: PipelineStage[];
  enabled: boolean;
  /** Message of the last failed action, cleared by the next success */
  lastError: string | null;
}

export interface EffectsActions {
  /** Returns false and records lastError when the manager refuses the effect */
  applyEffect: (
    target: EffectTarget,
    kind: EffectKind,
    settings?: Partial<EffectSettings>,
    callback?: EffectCallback
  ) => boolean;
  applyPreset: (name: string) => PresetResult;
  setStageEnabled: (name: string, enabled: boolean) => boolean;
  setEnabled: (enabled: boolean) => void;
  cancelEffectsForTarget: (target: EffectTarget) => void;
  /** Per-frame tick */
  update: () => void;
  clearAllEffects: () => void;
}

export type EffectsStore = StoreApi<EffectsState & EffectsActions>;

export function createEffectsStore(pipeline: EffectsPipeline): EffectsStore {
  const manager = pipeline.getEffectsManager();

  const snapshot = (): Omit<EffectsState, 'lastError'> => ({
    activeEffectCount: manager.getActiveEffectCount(),
    activePreset: pipeline.getActivePreset(),
    stages: pipeline.getStages(),
    enabled: pipeline.isEnabled(),
  });

  return createStore<EffectsState & EffectsActions>()((set, get) => ({
    ...snapshot(),
    lastError: null,

    applyEffect: (target, kind, settings, callback) => {
      try {
        manager.applyEffect(target, kind, settings, callback);
      } catch (error) {
        if (!(error instanceof EffectsError)) throw error;
        set({ lastError: error.message });
        return false;
      }
      set({ ...snapshot(), lastError: null });
      return true;
    },

    applyPreset: (name) => {
      const result = pipeline.applyPreset(name);
      set({ ...snapshot(), lastError: result.success ? null : result.error });
      return result;
    },

    setStageEnabled: (name, enabled) => {
      const found = pipeline.setStageEnabled(name, enabled);
      if (found) set({ stages: pipeline.getStages() });
      return found;
    },

    setEnabled: (enabled) => {
      pipeline.setEnabled(enabled);
      set(snapshot());
    },

    cancelEffectsForTarget: (target) => {
      manager.cancelEffectsForTarget(target);
      set(snapshot());
    },

    update: () => {
      pipeline.update();
      const activeEffectCount = manager.getActiveEffectCount();
      // Skip the notification on quiet frames
      if (activeEffectCount !== get().activeEffectCount) {
        set({ activeEffectCount });
      }
    },

    clearAllEffects: () => {
      pipeline.clearAllEffects();
      pipeline.update();
      set(snapshot());
    },
  }));
}
