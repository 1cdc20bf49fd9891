export type { GestureRecognizer } from './types';
export { SinglePointerRecognizer } from './base-recognizer';
export type { PressContext, PressEvent } from './base-recognizer';
export { TapRecognizer } from './tap-recognizer';
export { DoubleTapRecognizer } from './double-tap-recognizer';
export { LongPressRecognizer } from './long-press-recognizer';
export { SwipeRecognizer } from './swipe-recognizer';
export { PinchRecognizer } from './pinch-recognizer';
export { RotateRecognizer } from './rotate-recognizer';
export { EdgeSwipeRecognizer } from './edge-swipe-recognizer';
