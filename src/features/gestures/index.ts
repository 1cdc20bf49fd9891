export { GestureManager } from './gesture-manager';
export * from './recognizers';
export { createGestureInfo } from './utils/gesture-info';
export type { GestureInfoInit } from './utils/gesture-info';
export { pointerKeyOf, swipeDirectionOf, velocityOf, normalizeAngle } from './utils/input-utils';
export type { PointerKey } from './utils/input-utils';
export { TouchPoints } from './utils/touch-points';
