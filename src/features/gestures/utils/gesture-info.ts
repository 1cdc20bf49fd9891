import type { Point } from '@/types/geometry';
import type { GestureInfo } from '@/types/gesture';
import type { KeyModifier } from '@/types/input';

export type GestureInfoInit = Omit<GestureInfo, 'modifiers'> & {
  modifiers?: readonly KeyModifier[];
};

function freezePoint(point: Point): Point;
function freezePoint(point: Point | undefined): Point | undefined;
function freezePoint(point: Point | undefined): Point | undefined {
  return point ? Object.freeze({ x: point.x, y: point.y }) : undefined;
}

/**
 * Build a GestureInfo. The result and the points it carries are frozen.
 */
export function createGestureInfo(init: GestureInfoInit): GestureInfo {
  return Object.freeze({
    ...init,
    position: freezePoint(init.position),
    startPosition: freezePoint(init.startPosition),
    delta: freezePoint(init.delta),
    velocity: freezePoint(init.velocity),
    modifiers: Object.freeze([...(init.modifiers ?? [])]),
  });
}
