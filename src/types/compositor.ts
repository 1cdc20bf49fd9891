/**
 * Compositor data model: windows, buffers, outputs and the events the
 * compositor broadcasts.
 */

import type { Point, Rectangle, OutputTransform } from './geometry';

export type WindowId = number;
export type OutputId = number;

export type PixelFormat =
  | 'argb8888'
  | 'xrgb8888'
  | 'rgba8888'
  | 'rgbx8888'
  | 'abgr8888'
  | 'xbgr8888'
  | 'rgb565';

/**
 * Descriptor for pixel memory owned outside the process (dmabuf and the like).
 */
export interface ExternalMemoryDescriptor {
  fd: number;
  offset: number;
  modifier?: bigint;
}

/**
 * Pixel payload. Immutable once committed to a window; content updates
 * replace the whole buffer.
 */
export interface Buffer {
  readonly width: number;
  readonly height: number;
  readonly format: PixelFormat;
  readonly stride: number;
  readonly data: Uint8Array;
  readonly externalMemory?: ExternalMemoryDescriptor;
}

export interface OpacityRegion {
  rect: Rectangle;
  opacity: number;
}

export interface Window {
  id: WindowId;
  title: string;
  appId: string;
  geometry: Rectangle;
  visible: boolean;
  focused: boolean;
  minimized: boolean;
  maximized: boolean;
  fullscreen: boolean;
  resizable: boolean;
  movable: boolean;
  closable: boolean;
  /** 0 (transparent) to 1 (opaque) */
  opacity: number;
  /** Index in the render queue, 0 = bottom */
  zOrder: number;
  /** Non-owning reference to the parent window */
  parentId: WindowId | null;
  /** Owned child windows; removed together with the parent */
  childIds: WindowId[];
  buffer: Buffer | null;
  /** Surface-local rectangles changed since the last presented frame */
  damage: Rectangle[];
  /** Surface-local input regions. Empty means the whole surface accepts input */
  inputRegions: Rectangle[];
  opacityRegions: OpacityRegion[];
  /** Monotonic ms of the last frame this window was presented in */
  lastFrameTime: number | null;
  /** Geometry to return to after maximize/fullscreen */
  restoreGeometry: Rectangle | null;
}

export type WindowInit = Partial<Omit<Window, 'id' | 'zOrder' | 'childIds' | 'damage' | 'focused'>> & {
  id?: WindowId;
};

export interface ColorProfile {
  name: string;
  iccProfile: Uint8Array;
}

export interface OutputDevice {
  id: OutputId;
  name: string;
  width: number;
  height: number;
  refreshRate: number;
  scaleFactor: number;
  enabled: boolean;
  primary: boolean;
  /** Millimetres */
  physicalSize: { width: number; height: number };
  /** Position in the global logical coordinate space */
  position: Point;
  transform: OutputTransform;
  gammaLut?: Uint16Array;
  colorProfile?: ColorProfile;
}

export type PowerSaveMode = 'performance' | 'balanced' | 'power-save' | 'adaptive';

export type CompositorEvent =
  | { type: 'window-created'; windowId: WindowId }
  | { type: 'window-destroyed'; windowId: WindowId }
  | { type: 'window-focused'; windowId: WindowId }
  | { type: 'window-moved'; windowId: WindowId; x: number; y: number }
  | { type: 'window-resized'; windowId: WindowId; width: number; height: number }
  | { type: 'window-minimized'; windowId: WindowId }
  | { type: 'window-maximized'; windowId: WindowId }
  | { type: 'window-restored'; windowId: WindowId }
  | { type: 'window-fullscreen'; windowId: WindowId; fullscreen: boolean }
  | { type: 'window-opacity-changed'; windowId: WindowId; opacity: number }
  | { type: 'output-added'; outputId: OutputId }
  | { type: 'output-removed'; outputId: OutputId }
  | { type: 'output-enabled'; outputId: OutputId; enabled: boolean }
  | {
      type: 'output-mode-changed';
      outputId: OutputId;
      width: number;
      height: number;
      refreshRate: number;
    }
  | {
      type: 'frame-presented';
      frame: number;
      frameTimeMs: number;
      /** Ms since the previous frame started; null for the first frame */
      sinceLastFrameMs: number | null;
    }
  | { type: 'frame-dropped'; frame: number; reason: string };

export type CompositorEventType = CompositorEvent['type'];

/**
 * Event handler. Returning `false` stops the remaining handlers for this
 * event (first-handler-wins veto); it does not signal failure.
 */
export type CompositorEventHandler = (event: CompositorEvent) => boolean;
