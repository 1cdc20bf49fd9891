export { Compositor } from './compositor';
export type { CompositorOptions, CompositorStats, FrameDriver } from './compositor';
export { CompositorError } from './errors';
export type { CompositorErrorType } from './errors';
export { FpsCounter } from './fps-counter';
export * from './backend';
export { buildWindow, buildOutput, outputLogicalBounds, DEFAULT_WINDOW_GEOMETRY } from './utils/defaults';
export type { OutputInit } from './utils/defaults';
export * from './utils/geometry';
export * from './utils/transform';
