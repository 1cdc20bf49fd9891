/**
 * Render Backend Types
 *
 * The compositor decides what is drawn and in which order; a backend turns
 * those decisions into pixels. Rasterization lives entirely behind this
 * interface.
 */

import type { Rectangle } from '@/types/geometry';
import type { Buffer, OpacityRegion, OutputDevice, PixelFormat, WindowId } from '@/types/compositor';

export type BackendName = 'headless' | (string & {});

export interface BackendCapabilities {
  readonly maxTextureSize: number;
  readonly supportedFormats: readonly PixelFormat[];
  readonly supportsDirectScanout: boolean;
  readonly supportsVrr: boolean;
  readonly supportsExternalMemory: boolean;
}

/**
 * How the compositor wants a frame presented. `vrr` is only set when the
 * backend supports it.
 */
export interface PresentationHints {
  vsync: boolean;
  tripleBuffering: boolean;
  tearFree: boolean;
  vrr: boolean;
  /** Windows may be presented on their own schedule instead of as one scene */
  independentUpdates: boolean;
}

export interface FrameDescriptor {
  /** Sequence number of the frame being built, starting at 1 */
  frame: number;
  /** Monotonic ms at which the frame was started */
  timestamp: number;
  outputs: readonly OutputDevice[];
  presentation: PresentationHints;
  /**
   * Fullscreen opaque window the backend may scan out directly, bypassing
   * composition. Null when direct scanout is disabled or unsupported.
   */
  scanoutWindow: WindowId | null;
}

/**
 * One window's contribution to a frame. Commands are submitted back to front.
 */
export interface RenderCommand {
  windowId: WindowId;
  zOrder: number;
  geometry: Rectangle;
  opacity: number;
  buffer: Buffer | null;
  /** Surface-local damage; empty when the window did not change */
  damage: readonly Rectangle[];
  opacityRegions: readonly OpacityRegion[];
}

export interface RenderBackend {
  readonly name: BackendName;
  readonly capabilities: BackendCapabilities;

  init(outputs: readonly OutputDevice[]): Promise<void>;
  destroy(): void;

  beginFrame(frame: FrameDescriptor): void;
  submit(command: RenderCommand): void;
  /** Presents the frame. Returns false when the frame could not be presented. */
  endFrame(): boolean;
}
