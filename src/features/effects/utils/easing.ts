/**
 * Easing functions for transition effects.
 * Each function takes a progress value (0-1) and returns an eased value.
 * Bounce, elastic and back may leave [0, 1] between the endpoints.
 */

import type { EasingType } from '@/types/effects';

function linear(t: number): number {
  return t;
}

/**
 * Ease in - starts slow, accelerates (t^2)
 */
export function easeIn(t: number): number {
  return t * t;
}

/**
 * Ease out - starts fast, decelerates
 */
export function easeOut(t: number): number {
  return t * (2 - t);
}

/**
 * Ease in-out - piecewise quadratic
 */
export function easeInOut(t: number): number {
  return t < 0.5 ? 2 * t * t : -1 + (4 - 2 * t) * t;
}

const BOUNCE_N = 7.5625;
const BOUNCE_D = 2.75;

/**
 * Bounce - four parabolic segments settling onto 1
 */
export function bounce(t: number): number {
  if (t < 1 / BOUNCE_D) {
    return BOUNCE_N * t * t;
  }
  if (t < 2 / BOUNCE_D) {
    const u = t - 1.5 / BOUNCE_D;
    return BOUNCE_N * u * u + 0.75;
  }
  if (t < 2.5 / BOUNCE_D) {
    const u = t - 2.25 / BOUNCE_D;
    return BOUNCE_N * u * u + 0.9375;
  }
  const u = t - 2.625 / BOUNCE_D;
  return BOUNCE_N * u * u + 0.984375;
}

const ELASTIC_PERIOD = 0.3;

/**
 * Elastic - exponentially growing sinusoid that lands on 1
 */
export function elastic(t: number): number {
  if (t === 0) return 0;
  if (t === 1) return 1;
  const s = ELASTIC_PERIOD / 4;
  const u = t - 1;
  return -(Math.pow(2, 10 * u) * Math.sin(((u - s) * (2 * Math.PI)) / ELASTIC_PERIOD));
}

const BACK_OVERSHOOT = 1.70158;

/**
 * Back - pulls below 0 before accelerating to 1
 */
export function back(t: number): number {
  return t * t * ((BACK_OVERSHOOT + 1) * t - BACK_OVERSHOOT);
}

export const EASING_FUNCTIONS: Record<EasingType, (t: number) => number> = {
  'linear': linear,
  'ease-in': easeIn,
  'ease-out': easeOut,
  'ease-in-out': easeInOut,
  'bounce': bounce,
  'elastic': elastic,
  'back': back,
};

/**
 * Apply an easing curve. Input is clamped to [0, 1] first.
 */
export function applyEasing(t: number, easing: EasingType): number {
  const clamped = Number.isNaN(t) ? 0 : Math.max(0, Math.min(1, t));
  return EASING_FUNCTIONS[easing](clamped);
}
