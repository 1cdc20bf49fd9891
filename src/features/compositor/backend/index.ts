export type {
  BackendName,
  BackendCapabilities,
  FrameDescriptor,
  PresentationHints,
  RenderCommand,
  RenderBackend,
} from './types';
export { HeadlessBackend } from './headless-backend';
export type { RecordedFrame, HeadlessBackendOptions } from './headless-backend';
