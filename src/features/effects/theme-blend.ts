/**
 * Theme blend
 *
 * Cross-fade between two themes driven by a transition on the
 * "theme-transition" target. The effects manager advances the transition;
 * the blend only reads it. Only one blend runs at a time.
 */

import { createLogger } from '@/lib/logger';
import type { EffectKind, EffectSettings } from '@/types/effects';
import type { EffectsManager } from './effects-manager';
import type { TransitionEffect } from './transition-effect';

const log = createLogger('ThemeBlend');

export const THEME_TRANSITION_TARGET = 'theme-transition';

export type ThemeBlendType = 'fade' | 'slide-left' | 'zoom';

export interface ThemeBlendState {
  from: string;
  to: string;
  blendType: ThemeBlendType;
  /** Blend progress, 0 = fully `from`, 1 = fully `to` */
  value: number;
}

const DEFAULT_BLEND_SETTINGS: Partial<EffectSettings> = { durationMs: 500 };

const BLEND_EFFECTS: Record<ThemeBlendType, EffectKind> = {
  'fade': 'fade-in',
  'slide-left': 'slide-in',
  'zoom': 'scale-in',
};

interface ActiveBlend {
  from: string;
  to: string;
  blendType: ThemeBlendType;
  effect: TransitionEffect;
}

export class ThemeBlend {
  private current: ActiveBlend | null = null;
  private readonly blendSettings = new Map<ThemeBlendType, Partial<EffectSettings>>();

  constructor(private readonly manager: EffectsManager) {}

  setBlendSettings(blendType: ThemeBlendType, settings: Partial<EffectSettings>): void {
    this.blendSettings.set(blendType, { ...settings });
  }

  /**
   * Returns false when a blend is already running.
   * @throws EffectsError('disabled') when the manager is disabled
   */
  startThemeBlend(from: string, to: string, blendType: ThemeBlendType = 'fade'): boolean {
    if (this.current) {
      return false;
    }

    const settings: Partial<EffectSettings> = {
      ...(this.blendSettings.get(blendType) ?? DEFAULT_BLEND_SETTINGS),
    };
    if (blendType === 'slide-left') {
      settings.direction = 'from-right';
    }

    const effect = this.manager.applyEffect(THEME_TRANSITION_TARGET, BLEND_EFFECTS[blendType], settings);
    this.current = { from, to, blendType, effect };
    log.debug(`Blending ${from} -> ${to}`, { blendType });
    return true;
  }

  /**
   * Read the blend after the manager's update for the frame. Returns the
   * blend value, 1 once the effect has completed, or null when nothing is
   * blending. A blend whose effect was cancelled is dropped.
   */
  update(): number | null {
    const blend = this.current;
    if (!blend) return null;

    switch (blend.effect.getState()) {
      case 'cancelled':
        this.current = null;
        return null;
      case 'completed':
        this.current = null;
        return 1;
      default:
        return blend.effect.getProgress();
    }
  }

  getCurrentBlend(): ThemeBlendState | null {
    if (!this.current) return null;
    const { from, to, blendType, effect } = this.current;
    return { from, to, blendType, value: effect.getProgress() };
  }

  isBlending(): boolean {
    return this.current !== null;
  }

  cancel(): void {
    if (!this.current) return;
    this.current.effect.cancel();
    this.current = null;
  }
}
