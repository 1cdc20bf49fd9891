/**
 * Desktop session
 *
 * Connects one compositor, gesture manager and effects store:
 * - input is resolved to the window under it and fed to the gesture manager
 * - a tap, or the start of a long press, focuses and raises the window
 * - new windows fade in unless the compositor disables custom animations;
 *   destroyed windows drop their effects
 * - the effects store is ticked at the start of every compositor frame
 * - the edge-swipe recognizer follows the primary output
 */

import { createLogger } from '@/lib/logger';
import type { Compositor } from '@/features/compositor';
import { outputLogicalBounds } from '@/features/compositor';
import type { GestureManager } from '@/features/gestures';
import { EdgeSwipeRecognizer } from '@/features/gestures';
import type { EffectsStore } from '@/features/effects';
import type { CompositorEvent } from '@/types/compositor';
import type { GestureInfo } from '@/types/gesture';
import type { InputEvent } from '@/types/input';
import { animateWindowOpacity } from './window-effects';

const log = createLogger('DesktopSession');

export interface DesktopSessionOptions {
  compositor: Compositor;
  gestures: GestureManager;
  effects: EffectsStore;
  /** Fade-in length for new windows; 0 disables the fade */
  fadeInMs?: number;
}

export interface DesktopSession {
  handleInput(event: InputEvent): GestureInfo[];
  dispose(): void;
}

function activatesWindow(gesture: GestureInfo): boolean {
  return (
    (gesture.type === 'tap' && gesture.state === 'ended') ||
    (gesture.type === 'long-press' && gesture.state === 'began')
  );
}

export function createDesktopSession({
  compositor,
  gestures,
  effects,
  fadeInMs = 200,
}: DesktopSessionOptions): DesktopSession {
  compositor.attachEffects({ update: () => effects.getState().update() });

  const syncEdgeScreen = (): void => {
    const primary = compositor.getPrimaryOutput();
    const recognizer = gestures.getRecognizer('edge-swipe');
    if (primary && recognizer instanceof EdgeSwipeRecognizer) {
      recognizer.setScreen(outputLogicalBounds(primary));
    }
  };

  const fadeIn = (windowId: number): void => {
    const window = compositor.getWindow(windowId);
    if (!window || fadeInMs <= 0 || !compositor.getConfig().customAnimations) return;
    const fadeStage = effects.getState().stages.some((stage) => stage.enabled && stage.effect === 'fade-in');
    if (!fadeStage) return;
    animateWindowOpacity(compositor, effects, windowId, {
      from: 0,
      to: window.opacity,
      durationMs: fadeInMs,
    });
  };

  const onCompositorEvent = (event: CompositorEvent): boolean => {
    switch (event.type) {
      case 'window-created':
        fadeIn(event.windowId);
        break;
      case 'window-destroyed':
        effects.getState().cancelEffectsForTarget(event.windowId);
        break;
      case 'output-added':
      case 'output-removed':
      case 'output-mode-changed':
        syncEdgeScreen();
        break;
      default:
        break;
    }
    return true;
  };

  const onGesture = (gesture: GestureInfo): boolean => {
    if (activatesWindow(gesture) && gesture.target !== undefined) {
      if (compositor.setActiveWindow(gesture.target)) {
        compositor.raiseWindow(gesture.target);
        log.debug(`Activated window ${gesture.target} by ${gesture.type}`);
      }
    }
    return true;
  };

  const removeCompositorHandler = compositor.addEventHandler(onCompositorEvent);
  const removeGestureCallback = gestures.addGestureCallback(onGesture);
  syncEdgeScreen();

  return {
    handleInput(event) {
      if (event.type === 'idle' || event.target !== undefined) {
        return gestures.processEvent(event);
      }
      const target = compositor.windowAt(event.position);
      return gestures.processEvent(target === null ? event : { ...event, target });
    },

    dispose() {
      removeCompositorHandler();
      removeGestureCallback();
      compositor.attachEffects(null);
    },
  };
}
