/**
 * Effects Pipeline
 *
 * Ordered stage list on top of an EffectsManager. Presets swap the whole
 * list at once; frame updates and clears go straight to the manager.
 */

import { createLogger } from '@/lib/logger';
import type { PipelineStage, PipelineStageType, PresetResult } from '@/types/effects';
import { BUILTIN_PRESETS, DEFAULT_STAGES } from './builtin-presets';
import { EffectsManager } from './effects-manager';
import type { EffectsManagerOptions } from './effects-manager';

const log = createLogger('EffectsPipeline');

export interface PipelineStageInit {
  name: string;
  type: PipelineStageType;
  effect: string;
  enabled?: boolean;
}

export interface EffectsPipelineOptions extends EffectsManagerOptions {
  manager?: EffectsManager;
}

function toStage(init: PipelineStageInit): PipelineStage {
  return {
    name: init.name,
    type: init.type,
    effect: init.effect,
    enabled: init.enabled ?? true,
  };
}

export class EffectsPipeline {
  private readonly manager: EffectsManager;
  private stages: PipelineStage[] = [];
  private readonly presets = new Map<string, readonly PipelineStage[]>();
  private activePreset: string | null = null;
  private enabled = true;

  constructor(options: EffectsPipelineOptions = {}) {
    this.manager = options.manager ?? new EffectsManager(options);
    this.enabled = this.manager.isEnabled();
  }

  getEffectsManager(): EffectsManager {
    return this.manager;
  }

  addStage(stage: PipelineStageInit): this {
    this.stages.push(toStage(stage));
    this.activePreset = null;
    return this;
  }

  /** Remove the first stage with the name */
  removeStage(name: string): boolean {
    const index = this.stages.findIndex((stage) => stage.name === name);
    if (index === -1) return false;
    this.stages.splice(index, 1);
    this.activePreset = null;
    return true;
  }

  setStageEnabled(name: string, enabled: boolean): boolean {
    const stage = this.stages.find((s) => s.name === name);
    if (!stage) return false;
    stage.enabled = enabled;
    return true;
  }

  /** Copies of the active stages, in order */
  getStages(): PipelineStage[] {
    return this.stages.map((stage) => ({ ...stage }));
  }

  /**
   * Whether an enabled stage runs the given effect.
   */
  hasActiveStage(effect: string): boolean {
    return this.stages.some((stage) => stage.enabled && stage.effect === effect);
  }

  registerPreset(name: string, stages: readonly PipelineStageInit[]): this {
    this.presets.set(name, Object.freeze(stages.map((stage) => Object.freeze(toStage(stage)))));
    return this;
  }

  hasPreset(name: string): boolean {
    return this.presets.has(name);
  }

  getPresetNames(): string[] {
    return [...this.presets.keys()];
  }

  /**
   * Replace the active stages with a preset's. Unknown names leave the
   * stages untouched.
   */
  applyPreset(name: string): PresetResult {
    const preset = this.presets.get(name);
    if (!preset) {
      return { success: false, error: `Preset "${name}" not found` };
    }
    this.stages = preset.map((stage) => ({ ...stage }));
    this.activePreset = name;
    log.debug(`Applied preset ${name}`, { stages: this.stages.length });
    return { success: true };
  }

  /** Name of the last applied preset, cleared by manual stage edits */
  getActivePreset(): string | null {
    return this.activePreset;
  }

  setEnabled(enabled: boolean): this {
    this.enabled = enabled;
    this.manager.setEnabled(enabled);
    return this;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  update(): void {
    this.manager.update();
  }

  clearAllEffects(): void {
    this.manager.cancelAllEffects();
  }
}

/**
 * Pipeline with the default stages and the built-in presets registered.
 */
export function createDefaultPipeline(options: EffectsPipelineOptions = {}): EffectsPipeline {
  const pipeline = new EffectsPipeline(options);
  for (const stage of DEFAULT_STAGES) {
    pipeline.addStage(stage);
  }
  for (const [name, stages] of Object.entries(BUILTIN_PRESETS)) {
    pipeline.registerPreset(name, stages);
  }
  return pipeline;
}
