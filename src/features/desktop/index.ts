export { createDesktopSession } from './desktop-session';
export type { DesktopSession, DesktopSessionOptions } from './desktop-session';
export { animateWindowOpacity } from './window-effects';
export type { OpacityAnimation } from './window-effects';
