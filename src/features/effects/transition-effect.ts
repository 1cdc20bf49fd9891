import type { EffectKind, EffectSettings, EffectState, EasingType } from '@/types/effects';
import { monotonicNow, type TimeSource } from '@/lib/time';
import { applyEasing } from './utils/easing';

export const DEFAULT_EFFECT_SETTINGS: Readonly<EffectSettings> = {
  durationMs: 300,
  delayMs: 0,
  easing: 'ease-in-out',
  strength: 1,
  params: {},
};

function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Normalize partial settings: missing fields take the defaults, times
 * below zero become zero and strength is clamped to [0, 1].
 */
export function resolveEffectSettings(settings: Partial<EffectSettings> = {}): EffectSettings {
  const merged = { ...DEFAULT_EFFECT_SETTINGS, ...settings };
  return {
    ...merged,
    durationMs: nonNegative(merged.durationMs),
    delayMs: nonNegative(merged.delayMs),
    strength: clampUnit(merged.strength),
    params: { ...merged.params },
  };
}

/**
 * A single time-based transition. Progress is the eased fraction of the
 * window [startTime, endTime], where startTime = start() + delay.
 */
export class TransitionEffect {
  readonly kind: EffectKind;
  private readonly settings: EffectSettings;
  private readonly now: TimeSource;
  private state: EffectState = 'ready';
  private progress = 0;
  private startTime: number | null = null;
  private endTime: number | null = null;

  constructor(kind: EffectKind, settings: Partial<EffectSettings> = {}, now: TimeSource = monotonicNow) {
    this.kind = kind;
    this.settings = resolveEffectSettings(settings);
    this.now = now;
  }

  withEasing(easing: EasingType): this {
    this.settings.easing = easing;
    return this;
  }

  withParam(name: string, value: number): this {
    this.settings.params[name] = value;
    return this;
  }

  /**
   * Start (or restart) the effect from progress 0.
   */
  start(): void {
    const startTime = this.now() + this.settings.delayMs;
    this.startTime = startTime;
    this.endTime = startTime + this.settings.durationMs;
    this.progress = 0;
    this.state = 'running';
  }

  /**
   * Advance progress from the clock. Returns true when progress or state
   * changed, including the tick that completes the effect.
   */
  update(): boolean {
    if (this.state !== 'running' || this.startTime === null || this.endTime === null) {
      return false;
    }

    const now = this.now();
    if (now < this.startTime) {
      return false;
    }

    if (now >= this.endTime) {
      this.progress = 1;
      this.state = 'completed';
      return true;
    }

    const raw = (now - this.startTime) / (this.endTime - this.startTime);
    const eased = applyEasing(raw, this.settings.easing);
    const changed = eased !== this.progress;
    this.progress = eased;
    return changed;
  }

  cancel(): void {
    if (this.state === 'completed') return;
    this.state = 'cancelled';
  }

  getState(): EffectState {
    return this.state;
  }

  getProgress(): number {
    return this.progress;
  }

  /** Progress scaled by strength */
  getValue(): number {
    return this.progress * this.settings.strength;
  }

  /** Base parameter scaled by the current value, or undefined when unset */
  getParamValue(name: string): number | undefined {
    const base = this.settings.params[name];
    return base === undefined ? undefined : base * this.getValue();
  }

  getSettings(): Readonly<EffectSettings> {
    return this.settings;
  }

  getStartTime(): number | null {
    return this.startTime;
  }

  getEndTime(): number | null {
    return this.endTime;
  }

  isFinished(): boolean {
    return this.state === 'completed' || this.state === 'cancelled';
  }
}
