/**
 * Effects Manager
 *
 * Bounded, ordered collection of running transitions. When full, the oldest
 * effect is evicted to make room. Effects point at their target by id only,
 * so a target can disappear while its effect is still running.
 */

import { createLogger } from '@/lib/logger';
import { parseEffectsConfig } from '@/lib/config';
import type { EffectsConfigInput } from '@/lib/config';
import { monotonicNow } from '@/lib/time';
import type { TimeSource } from '@/lib/time';
import type { EffectCallback, EffectKind, EffectSettings, EffectTarget } from '@/types/effects';
import { EffectsError } from './errors';
import { TransitionEffect } from './transition-effect';

const log = createLogger('EffectsManager');

export interface EffectsManagerOptions {
  config?: EffectsConfigInput;
  now?: TimeSource;
}

export interface AddEffectOptions {
  target?: EffectTarget;
  /** Called with the progress after every changing update; `false` cancels */
  callback?: EffectCallback;
}

export type EffectFactory = (durationMs: number, now: TimeSource) => TransitionEffect;

interface ManagedEffect {
  effect: TransitionEffect;
  target: EffectTarget | null;
  callback: EffectCallback | null;
}

const DEFAULT_FACTORIES: ReadonlyArray<[EffectKind, EffectFactory]> = [
  ['fade-in', (durationMs, now) => new TransitionEffect('fade-in', { durationMs, easing: 'ease-in-out' }, now)],
  ['fade-out', (durationMs, now) => new TransitionEffect('fade-out', { durationMs, easing: 'ease-in-out' }, now)],
  [
    'scale-in',
    (durationMs, now) =>
      new TransitionEffect('scale-in', { durationMs, easing: 'ease-out' }, now).withParam('startScale', 0.8),
  ],
  [
    'scale-out',
    (durationMs, now) =>
      new TransitionEffect('scale-out', { durationMs, easing: 'back' }, now).withParam('endScale', 0.8),
  ],
];

export class EffectsManager {
  private effects: ManagedEffect[] = [];
  private readonly factories = new Map<EffectKind, EffectFactory>(DEFAULT_FACTORIES);
  private readonly globalSettings = new Map<EffectKind, Partial<EffectSettings>>();
  private readonly now: TimeSource;
  private limit: number;
  private enabled: boolean;

  constructor(options: EffectsManagerOptions = {}) {
    const config = parseEffectsConfig(options.config);
    this.limit = config.effectLimit;
    this.enabled = config.enabled;
    this.now = options.now ?? monotonicNow;
  }

  /**
   * Build an effect on this manager's clock without adding it.
   */
  createEffect(kind: EffectKind, settings: Partial<EffectSettings> = {}): TransitionEffect {
    return new TransitionEffect(kind, settings, this.now);
  }

  /**
   * Start an effect and append it. Evicts the oldest effects when full.
   * @throws EffectsError('disabled') while the manager is disabled
   */
  addEffect(effect: TransitionEffect, options: AddEffectOptions = {}): TransitionEffect {
    if (!this.enabled) {
      throw new EffectsError(`Cannot add ${effect.kind}: effects are disabled`, 'disabled');
    }

    while (this.effects.length >= this.limit) {
      this.evictOldest();
    }

    effect.start();
    this.effects.push({
      effect,
      target: options.target ?? null,
      callback: options.callback ?? null,
    });
    return effect;
  }

  registerEffectFactory(kind: EffectKind, factory: EffectFactory): void {
    this.factories.set(kind, factory);
  }

  hasEffectFactory(kind: EffectKind): boolean {
    return this.factories.has(kind);
  }

  /**
   * @throws EffectsError('factory-missing') when no factory is registered for the kind
   */
  addEffectFromFactory(kind: EffectKind, durationMs: number, options: AddEffectOptions = {}): TransitionEffect {
    const factory = this.factories.get(kind);
    if (!factory) {
      throw new EffectsError(`No factory registered for ${kind}`, 'factory-missing');
    }
    return this.addEffect(factory(durationMs, this.now), options);
  }

  setGlobalEffectSettings(kind: EffectKind, settings: Partial<EffectSettings>): void {
    this.globalSettings.set(kind, { ...settings });
  }

  getGlobalEffectSettings(kind: EffectKind): Partial<EffectSettings> | undefined {
    return this.globalSettings.get(kind);
  }

  /**
   * Run an effect on a target. Explicit settings win over the per-kind
   * global settings, which win over the defaults.
   */
  applyEffect(
    target: EffectTarget,
    kind: EffectKind,
    settings?: Partial<EffectSettings>,
    callback?: EffectCallback
  ): TransitionEffect {
    const resolved = settings ?? this.globalSettings.get(kind) ?? {};
    return this.addEffect(this.createEffect(kind, resolved), { target, callback });
  }

  /**
   * Advance every effect once, in insertion order, then drop the finished
   * ones. A callback that returns false or throws cancels its effect.
   */
  update(): void {
    if (this.enabled) {
      // Callbacks may add effects; those start on the next update.
      for (const managed of [...this.effects]) {
        this.advance(managed);
      }
    }
    this.prune();
  }

  private advance(managed: ManagedEffect): void {
    const { effect, callback } = managed;
    if (!effect.update() || !callback) return;

    let keep: boolean;
    try {
      keep = callback(effect.getProgress());
    } catch (error) {
      log.error(`Callback for ${effect.kind} failed`, error);
      keep = false;
    }
    if (!keep) {
      effect.cancel();
    }
  }

  private prune(): void {
    this.effects = this.effects.filter(({ effect }) => !effect.isFinished());
  }

  private evictOldest(): void {
    const evicted = this.effects.shift();
    if (evicted) {
      evicted.effect.cancel();
      log.debug(`Evicted ${evicted.effect.kind}`, { target: evicted.target });
    }
  }

  /** Cancel every effect on a target. Returns how many were cancelled. */
  cancelEffectsForTarget(target: EffectTarget): number {
    let cancelled = 0;
    for (const { effect, target: effectTarget } of this.effects) {
      if (effectTarget === target && !effect.isFinished()) {
        effect.cancel();
        cancelled++;
      }
    }
    return cancelled;
  }

  cancelAllEffects(): void {
    for (const { effect } of this.effects) {
      effect.cancel();
    }
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) {
      this.cancelAllEffects();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @throws EffectsError('invalid-limit') unless the limit is an integer >= 1
   */
  setEffectLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new EffectsError(`Effect limit must be a positive integer, got ${limit}`, 'invalid-limit');
    }
    this.limit = limit;
    while (this.effects.length > this.limit) {
      this.evictOldest();
    }
  }

  getEffectLimit(): number {
    return this.limit;
  }

  /**
   * Progress of the oldest live effect of a kind on a target.
   */
  getEffectProgress(target: EffectTarget, kind: EffectKind): number | undefined {
    const managed = this.findEffect(target, kind);
    return managed?.getProgress();
  }

  findEffect(target: EffectTarget, kind: EffectKind): TransitionEffect | undefined {
    return this.effects.find(
      ({ effect, target: effectTarget }) =>
        effectTarget === target && effect.kind === kind && effect.getState() !== 'cancelled'
    )?.effect;
  }

  getActiveEffectCount(): number {
    return this.effects.length;
  }
}
