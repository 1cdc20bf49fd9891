import type { Compositor } from '@/features/compositor';
import type { EffectsStore } from '@/features/effects';
import type { WindowId } from '@/types/compositor';
import type { EasingType, EffectKind } from '@/types/effects';

export interface OpacityAnimation {
  from: number;
  to: number;
  durationMs?: number;
  easing?: EasingType;
}

/**
 * Animate a window's opacity through the effects store. The effect only
 * holds the window id; it cancels itself once the window is gone.
 * Returns false when the window is unknown or effects are refused, leaving
 * the opacity untouched.
 */
export function animateWindowOpacity(
  compositor: Compositor,
  effects: EffectsStore,
  windowId: WindowId,
  { from, to, durationMs = 200, easing = 'ease-out' }: OpacityAnimation
): boolean {
  if (!compositor.hasWindow(windowId)) return false;

  const kind: EffectKind = to >= from ? 'fade-in' : 'fade-out';
  const actions = effects.getState();
  actions.cancelEffectsForTarget(windowId);

  const started = actions.applyEffect(windowId, kind, { durationMs, easing }, (progress) =>
    compositor.setWindowOpacity(windowId, from + (to - from) * progress)
  );
  if (started) {
    compositor.setWindowOpacity(windowId, from);
  }
  return started;
}
