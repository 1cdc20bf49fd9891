/**
 * Headless Render Backend
 *
 * Presents nothing; records every frame it is handed. Used when no display
 * backend is attached and throughout the tests.
 */

import type { OutputDevice, WindowId } from '@/types/compositor';
import type {
  RenderBackend,
  BackendCapabilities,
  FrameDescriptor,
  PresentationHints,
  RenderCommand,
} from './types';

export interface RecordedFrame {
  frame: number;
  timestamp: number;
  commands: RenderCommand[];
  presentation: PresentationHints;
  scanoutWindow: WindowId | null;
  presented: boolean;
}

export interface HeadlessBackendOptions {
  /** Frames kept in `frames`; older ones are dropped */
  historySize?: number;
  /** Override the advertised capabilities */
  capabilities?: Partial<BackendCapabilities>;
}

const DEFAULT_CAPABILITIES: BackendCapabilities = {
  maxTextureSize: 16384,
  supportedFormats: ['argb8888', 'xrgb8888', 'rgba8888', 'rgbx8888', 'abgr8888', 'xbgr8888', 'rgb565'],
  supportsDirectScanout: false,
  supportsVrr: false,
  supportsExternalMemory: false,
};

export class HeadlessBackend implements RenderBackend {
  readonly name = 'headless' as const;

  readonly capabilities: BackendCapabilities;

  readonly frames: RecordedFrame[] = [];

  private outputs: OutputDevice[] = [];
  private current: RecordedFrame | null = null;
  private failuresRemaining = 0;
  private initialized = false;
  private readonly historySize: number;

  constructor(options: HeadlessBackendOptions = {}) {
    this.historySize = options.historySize ?? 120;
    this.capabilities = { ...DEFAULT_CAPABILITIES, ...options.capabilities };
  }

  async init(outputs: readonly OutputDevice[]): Promise<void> {
    this.outputs = outputs.map((output) => ({ ...output }));
    this.initialized = true;
  }

  destroy(): void {
    this.frames.length = 0;
    this.outputs = [];
    this.current = null;
    this.initialized = false;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get outputCount(): number {
    return this.outputs.length;
  }

  /** Make the next `count` frames fail in endFrame. */
  failNextFrames(count: number): void {
    this.failuresRemaining = Math.max(0, Math.floor(count));
  }

  beginFrame(frame: FrameDescriptor): void {
    this.current = {
      frame: frame.frame,
      timestamp: frame.timestamp,
      commands: [],
      presentation: { ...frame.presentation },
      scanoutWindow: frame.scanoutWindow,
      presented: false,
    };
  }

  submit(command: RenderCommand): void {
    if (!this.current) {
      throw new Error('submit called outside beginFrame/endFrame');
    }
    this.current.commands.push({ ...command, damage: [...command.damage] });
  }

  endFrame(): boolean {
    const frame = this.current;
    this.current = null;
    if (!frame) return false;

    frame.presented = this.failuresRemaining === 0;
    if (this.failuresRemaining > 0) {
      this.failuresRemaining--;
    }

    this.frames.push(frame);
    if (this.frames.length > this.historySize) {
      this.frames.shift();
    }
    return frame.presented;
  }

  get lastFrame(): RecordedFrame | undefined {
    return this.frames[this.frames.length - 1];
  }
}
