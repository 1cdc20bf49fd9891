/**
 * Compositor
 *
 * Owns the window and output registries, the render queue (window ids,
 * back to front), keyboard focus and the frame loop. Pixels are produced by
 * the attached RenderBackend; everything else about a frame is decided here.
 *
 * Windows reference each other by id only. A parent owns its children:
 * removing it removes them too.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger } from '@/lib/logger';
import { parseCompositorConfig } from '@/lib/config';
import type { CompositorConfig, CompositorConfigInput } from '@/lib/config';
import { elapsedSince, monotonicNow } from '@/lib/time';
import type { TimeSource } from '@/lib/time';
import type { OutputTransform, Point, Rectangle } from '@/types/geometry';
import type {
  Buffer,
  CompositorEvent,
  CompositorEventHandler,
  OutputDevice,
  OutputId,
  PowerSaveMode,
  Window,
  WindowId,
  WindowInit,
} from '@/types/compositor';
import { HeadlessBackend } from './backend/headless-backend';
import type { PresentationHints, RenderBackend, RenderCommand } from './backend/types';
import { CompositorError } from './errors';
import { FpsCounter } from './fps-counter';
import { buildOutput, buildWindow, outputLogicalBounds } from './utils/defaults';
import type { OutputInit } from './utils/defaults';
import { containsPoint, intersectRects } from './utils/geometry';

const log = createLogger('Compositor');

const POWER_SAVE_SLEEP_FACTOR = 4;

/**
 * Anything advanced once per frame before the scene is drawn (the effects
 * pipeline, in practice).
 */
export interface FrameDriver {
  update(): unknown;
}

export interface CompositorOptions {
  config?: CompositorConfigInput;
  backend?: RenderBackend;
  now?: TimeSource;
  effects?: FrameDriver;
}

export interface CompositorStats {
  frameCount: number;
  fps: number;
  budgetOverruns: number;
  droppedFrames: number;
  windowCount: number;
  outputCount: number;
}

export class Compositor {
  private readonly config: CompositorConfig;
  private readonly backend: RenderBackend;
  private readonly now: TimeSource;
  private effects: FrameDriver | null;

  private readonly windows = new Map<WindowId, Window>();
  private readonly outputs = new Map<OutputId, OutputDevice>();
  private renderQueue: WindowId[] = [];
  private focusedId: WindowId | null = null;
  private handlers: CompositorEventHandler[] = [];

  private nextWindowId = 1;
  private nextOutputId = 1;

  private readonly fps: FpsCounter;
  private frameSequence = 0;
  private lastFrameStart: number | null = null;
  private frameCount = 0;
  private budgetOverruns = 0;
  private droppedFrames = 0;

  private initialized = false;
  private running = false;
  /** Bumped by every run(); a loop whose generation is stale exits */
  private loopGeneration = 0;

  constructor(options: CompositorOptions = {}) {
    this.config = parseCompositorConfig(options.config);
    this.backend = options.backend ?? new HeadlessBackend();
    this.now = options.now ?? monotonicNow;
    this.effects = options.effects ?? null;
    this.fps = new FpsCounter(this.config.fpsWindowSize);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await this.backend.init([...this.outputs.values()]);
    this.initialized = true;
    log.info(`Initialized with ${this.backend.name} backend`, { outputs: this.outputs.size });
  }

  shutdown(): void {
    this.stop();
    if (this.initialized) {
      this.backend.destroy();
    }
    this.windows.clear();
    this.outputs.clear();
    this.renderQueue = [];
    this.focusedId = null;
    this.fps.reset();
    this.lastFrameStart = null;
    this.initialized = false;
    log.info('Shut down');
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get isRunning(): boolean {
    return this.running;
  }

  getConfig(): Readonly<CompositorConfig> {
    return this.config;
  }

  setPowerSaveMode(mode: PowerSaveMode): void {
    this.config.powerSaveMode = mode;
    log.debug('Power save mode changed', { mode });
  }

  /** Attach (or detach with null) the driver advanced at the start of every frame. */
  attachEffects(driver: FrameDriver | null): void {
    this.effects = driver;
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Register a handler. Handlers run in registration order; one returning
   * false stops the rest for that event.
   */
  addEventHandler(handler: CompositorEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  private emit(event: CompositorEvent): void {
    for (const handler of [...this.handlers]) {
      let proceed: boolean;
      try {
        proceed = handler(event);
      } catch (error) {
        log.error(`Event handler failed on ${event.type}`, error);
        proceed = false;
      }
      if (!proceed) break;
    }
  }

  // ---------------------------------------------------------------------------
  // Window registry
  // ---------------------------------------------------------------------------

  /**
   * Insert a window as the new topmost. Compositor-owned fields (zOrder,
   * focus, children, damage) are reset. An unknown parentId is dropped.
   */
  addWindow(window: Window): WindowId {
    if (this.windows.has(window.id)) {
      throw new CompositorError(`Window ${window.id} already exists`, 'duplicate-window');
    }

    const parent = window.parentId !== null ? this.windows.get(window.parentId) : undefined;
    const record: Window = {
      ...window,
      geometry: { ...window.geometry },
      parentId: parent ? parent.id : null,
      focused: false,
      childIds: [],
      damage: [],
      zOrder: this.renderQueue.length,
    };

    this.windows.set(record.id, record);
    this.renderQueue.push(record.id);
    parent?.childIds.push(record.id);
    this.nextWindowId = Math.max(this.nextWindowId, record.id + 1);

    log.debug('Window added', { id: record.id, title: record.title });
    this.emit({ type: 'window-created', windowId: record.id });
    return record.id;
  }

  createWindow(init: WindowInit = {}): WindowId {
    return this.addWindow(buildWindow(init.id ?? this.nextWindowId, init));
  }

  /**
   * Remove a window and everything it owns. Focus moves to the topmost
   * visible, non-minimized window that remains.
   */
  removeWindow(id: WindowId): boolean {
    const window = this.windows.get(id);
    if (!window) return false;

    const removed = this.collectSubtree(id);

    if (window.parentId !== null) {
      const parent = this.windows.get(window.parentId);
      if (parent) {
        parent.childIds = parent.childIds.filter((childId) => childId !== id);
      }
    }

    const removedSet = new Set(removed);
    for (const removedId of removed) {
      this.windows.delete(removedId);
    }
    this.renderQueue = this.renderQueue.filter((queued) => !removedSet.has(queued));
    this.reindex();

    const lostFocus = this.focusedId !== null && removedSet.has(this.focusedId);
    if (lostFocus) {
      this.focusedId = null;
    }

    log.debug('Window removed', { id, withChildren: removed.length - 1 });
    for (const removedId of removed) {
      this.emit({ type: 'window-destroyed', windowId: removedId });
    }

    if (lostFocus) {
      const next = this.findFocusCandidate(true);
      if (next !== null) {
        this.focus(next);
      }
    }
    return true;
  }

  private collectSubtree(rootId: WindowId): WindowId[] {
    const result: WindowId[] = [];
    const visited = new Set<WindowId>();
    const stack = [rootId];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      result.push(current);
      const window = this.windows.get(current);
      if (window) {
        stack.push(...[...window.childIds].reverse());
      }
    }
    return result;
  }

  /**
   * Topmost visible, non-minimized window. With `allowAnyFallback`, the queue
   * tail is used when no window qualifies.
   */
  private findFocusCandidate(allowAnyFallback: boolean, exclude?: WindowId): WindowId | null {
    for (let i = this.renderQueue.length - 1; i >= 0; i--) {
      const id = this.renderQueue[i];
      if (id === undefined || id === exclude) continue;
      const window = this.windows.get(id);
      if (window && window.visible && !window.minimized) {
        return id;
      }
    }

    if (!allowAnyFallback) return null;
    const tail = this.renderQueue.filter((id) => id !== exclude);
    return tail[tail.length - 1] ?? null;
  }

  private focus(id: WindowId): void {
    if (this.focusedId !== null) {
      const previous = this.windows.get(this.focusedId);
      if (previous) previous.focused = false;
    }
    const window = this.windows.get(id);
    if (!window) return;
    window.focused = true;
    this.focusedId = id;
    this.emit({ type: 'window-focused', windowId: id });
  }

  private clearFocus(): void {
    if (this.focusedId === null) return;
    const previous = this.windows.get(this.focusedId);
    if (previous) previous.focused = false;
    this.focusedId = null;
  }

  private reindex(): void {
    this.renderQueue.forEach((id, index) => {
      const window = this.windows.get(id);
      if (window) window.zOrder = index;
    });
  }

  getWindow(id: WindowId): Readonly<Window> | undefined {
    return this.windows.get(id);
  }

  hasWindow(id: WindowId): boolean {
    return this.windows.has(id);
  }

  /** Windows back to front */
  getWindows(): Readonly<Window>[] {
    const result: Window[] = [];
    for (const id of this.renderQueue) {
      const window = this.windows.get(id);
      if (window) result.push(window);
    }
    return result;
  }

  getRenderQueue(): readonly WindowId[] {
    return [...this.renderQueue];
  }

  getFocusedWindowId(): WindowId | null {
    return this.focusedId;
  }

  getWindowCount(): number {
    return this.windows.size;
  }

  // ---------------------------------------------------------------------------
  // Focus and stacking
  // ---------------------------------------------------------------------------

  setActiveWindow(id: WindowId): boolean {
    if (!this.windows.has(id)) return false;
    this.focus(id);
    return true;
  }

  raiseWindow(id: WindowId): boolean {
    if (!this.windows.has(id)) return false;
    this.renderQueue = [...this.renderQueue.filter((queued) => queued !== id), id];
    this.reindex();
    return true;
  }

  lowerWindow(id: WindowId): boolean {
    if (!this.windows.has(id)) return false;
    this.renderQueue = [id, ...this.renderQueue.filter((queued) => queued !== id)];
    this.reindex();
    return true;
  }

  // ---------------------------------------------------------------------------
  // Window state
  // ---------------------------------------------------------------------------

  moveWindow(id: WindowId, x: number, y: number): boolean {
    const window = this.windows.get(id);
    if (!window || !window.movable) return false;
    window.geometry = { ...window.geometry, x, y };
    this.emit({ type: 'window-moved', windowId: id, x, y });
    return true;
  }

  resizeWindow(id: WindowId, width: number, height: number): boolean {
    const window = this.windows.get(id);
    if (!window || !window.resizable) return false;
    const w = Math.max(0, width);
    const h = Math.max(0, height);
    window.geometry = { ...window.geometry, width: w, height: h };
    this.damageWholeSurface(window);
    this.emit({ type: 'window-resized', windowId: id, width: w, height: h });
    return true;
  }

  minimizeWindow(id: WindowId): boolean {
    const window = this.windows.get(id);
    if (!window) return false;
    if (window.minimized) return true;

    window.minimized = true;
    this.emit({ type: 'window-minimized', windowId: id });

    if (this.focusedId === id) {
      const next = this.findFocusCandidate(false, id);
      if (next !== null) {
        this.focus(next);
      } else {
        this.clearFocus();
      }
    }
    return true;
  }

  /**
   * Fill the primary output. Fails when there is no primary output.
   */
  maximizeWindow(id: WindowId): boolean {
    const window = this.windows.get(id);
    if (!window) return false;
    const primary = this.getPrimaryOutput();
    if (!primary) {
      log.warn('Cannot maximize without a primary output', { id });
      return false;
    }
    if (window.maximized) return true;

    window.restoreGeometry ??= { ...window.geometry };
    window.geometry = outputLogicalBounds(primary);
    window.maximized = true;
    window.minimized = false;
    this.damageWholeSurface(window);
    this.emit({ type: 'window-maximized', windowId: id });
    return true;
  }

  /**
   * Leave minimized, maximized and fullscreen states and return to the
   * remembered geometry.
   */
  restoreWindow(id: WindowId): boolean {
    const window = this.windows.get(id);
    if (!window) return false;

    window.minimized = false;
    if (window.maximized || window.fullscreen) {
      window.geometry = window.restoreGeometry ?? window.geometry;
      window.maximized = false;
      window.fullscreen = false;
      window.restoreGeometry = null;
      this.damageWholeSurface(window);
    }
    this.emit({ type: 'window-restored', windowId: id });
    return true;
  }

  setFullscreen(id: WindowId, fullscreen: boolean): boolean {
    const window = this.windows.get(id);
    if (!window) return false;
    if (window.fullscreen === fullscreen) return true;

    const primary = this.getPrimaryOutput();
    if (fullscreen) {
      window.restoreGeometry ??= { ...window.geometry };
      if (primary) {
        window.geometry = outputLogicalBounds(primary);
      }
      window.fullscreen = true;
      this.raiseWindow(id);
    } else {
      window.fullscreen = false;
      if (window.maximized && primary) {
        window.geometry = outputLogicalBounds(primary);
      } else {
        window.geometry = window.restoreGeometry ?? window.geometry;
        window.restoreGeometry = null;
      }
    }

    this.damageWholeSurface(window);
    this.emit({ type: 'window-fullscreen', windowId: id, fullscreen });
    return true;
  }

  setWindowOpacity(id: WindowId, opacity: number): boolean {
    const window = this.windows.get(id);
    if (!window || Number.isNaN(opacity)) return false;
    const clamped = Math.min(1, Math.max(0, opacity));
    window.opacity = clamped;
    this.emit({ type: 'window-opacity-changed', windowId: id, opacity: clamped });
    return true;
  }

  closeWindow(id: WindowId): boolean {
    const window = this.windows.get(id);
    if (!window || !window.closable) return false;
    return this.removeWindow(id);
  }

  /**
   * Re-parent a window. Unknown ids return false; a parent chain that would
   * loop back to the child throws.
   */
  setParent(childId: WindowId, parentId: WindowId | null): boolean {
    const child = this.windows.get(childId);
    if (!child) return false;

    let parent: Window | undefined;
    if (parentId !== null) {
      parent = this.windows.get(parentId);
      if (!parent) return false;

      let cursor: WindowId | null = parentId;
      while (cursor !== null) {
        if (cursor === childId) {
          throw new CompositorError(
            `Making ${parentId} the parent of ${childId} would create a cycle`,
            'parent-cycle'
          );
        }
        cursor = this.windows.get(cursor)?.parentId ?? null;
      }
    }

    if (child.parentId !== null) {
      const previous = this.windows.get(child.parentId);
      if (previous) {
        previous.childIds = previous.childIds.filter((id) => id !== childId);
      }
    }

    child.parentId = parent ? parent.id : null;
    if (parent && !parent.childIds.includes(childId)) {
      parent.childIds.push(childId);
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Content
  // ---------------------------------------------------------------------------

  /**
   * Replace the window's content. The buffer is frozen and the whole surface
   * is damaged.
   */
  commitBuffer(id: WindowId, buffer: Buffer): boolean {
    const window = this.windows.get(id);
    if (!window) return false;
    window.buffer = Object.freeze({ ...buffer });
    this.damageWholeSurface(window);
    return true;
  }

  /**
   * Record a surface-local damage rectangle, clipped to the surface.
   */
  damageWindow(id: WindowId, rect: Rectangle): boolean {
    const window = this.windows.get(id);
    if (!window) return false;

    const surface = { x: 0, y: 0, width: window.geometry.width, height: window.geometry.height };
    const clipped = intersectRects(surface, rect);
    if (clipped) {
      window.damage.push(clipped);
    }
    return true;
  }

  private damageWholeSurface(window: Window): void {
    window.damage = [{ x: 0, y: 0, width: window.geometry.width, height: window.geometry.height }];
  }

  /**
   * Topmost visible, non-minimized window accepting input at `point`.
   */
  windowAt(point: Point): WindowId | null {
    for (let i = this.renderQueue.length - 1; i >= 0; i--) {
      const id = this.renderQueue[i];
      if (id === undefined) continue;
      const window = this.windows.get(id);
      if (!window || !window.visible || window.minimized) continue;
      if (!containsPoint(window.geometry, point)) continue;

      if (window.inputRegions.length === 0) return id;
      const local = { x: point.x - window.geometry.x, y: point.y - window.geometry.y };
      if (window.inputRegions.some((region) => containsPoint(region, local))) {
        return id;
      }
    }
    return null;
  }

  // ---------------------------------------------------------------------------
  // Frame loop
  // ---------------------------------------------------------------------------

  /**
   * Build and present one frame. Returns whether the backend presented it.
   * Backend failures become a `frame-dropped` event; damage is kept so the
   * next frame redraws it.
   */
  renderFrame(): boolean {
    if (!this.initialized) {
      throw new CompositorError('Compositor is not initialized', 'not-initialized');
    }

    const start = this.now();
    const frame = ++this.frameSequence;
    const sinceLastFrameMs = this.lastFrameStart === null ? null : elapsedSince(this.lastFrameStart, start);
    this.lastFrameStart = start;

    if (this.effects) {
      try {
        this.effects.update();
      } catch (error) {
        log.error('Effects update failed', error);
      }
    }

    const drawn: Window[] = [];
    let presented = false;
    let reason = 'backend rejected frame';

    try {
      this.backend.beginFrame({
        frame,
        timestamp: start,
        outputs: [...this.outputs.values()].filter((output) => output.enabled),
        presentation: this.presentationHints(),
        scanoutWindow: this.findScanoutWindow(),
      });
      for (const id of this.renderQueue) {
        const window = this.windows.get(id);
        if (!window || !window.visible || window.minimized) continue;
        this.backend.submit(this.toRenderCommand(window));
        drawn.push(window);
      }
      presented = this.backend.endFrame();
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
      log.error('Backend failed while rendering', error);
    }

    const frameTimeMs = elapsedSince(start, this.now());
    if (frameTimeMs > this.config.maxRenderTimeMs) {
      this.budgetOverruns++;
      log.warn(`Frame ${frame} took ${frameTimeMs.toFixed(2)}ms`, {
        budgetMs: this.config.maxRenderTimeMs,
      });
    }

    if (!presented) {
      this.droppedFrames++;
      log.warn(`Frame ${frame} dropped: ${reason}`);
      this.emit({ type: 'frame-dropped', frame, reason });
      return false;
    }

    for (const window of drawn) {
      window.damage = [];
      window.lastFrameTime = start;
    }
    this.frameCount++;
    this.fps.record(start);
    this.emit({ type: 'frame-presented', frame, frameTimeMs, sinceLastFrameMs });
    return true;
  }

  private presentationHints(): PresentationHints {
    return {
      vsync: this.config.vsyncEnabled,
      tripleBuffering: this.config.tripleBuffering,
      tearFree: this.config.tearFree,
      vrr: this.config.vrrEnabled && this.backend.capabilities.supportsVrr,
      independentUpdates: this.config.independentUpdates,
    };
  }

  /**
   * The topmost drawable window, when it is fullscreen, fully opaque and
   * has a buffer attached.
   */
  private findScanoutWindow(): WindowId | null {
    if (!this.config.directScanout || !this.backend.capabilities.supportsDirectScanout) {
      return null;
    }
    for (let i = this.renderQueue.length - 1; i >= 0; i--) {
      const window = this.windows.get(this.renderQueue[i]);
      if (!window || !window.visible || window.minimized) continue;
      const opaque = window.opacity >= 1 && window.opacityRegions.length === 0;
      return window.fullscreen && opaque && window.buffer !== null ? window.id : null;
    }
    return null;
  }

  private toRenderCommand(window: Window): RenderCommand {
    const damage = this.config.damageTracking
      ? [...window.damage]
      : [{ x: 0, y: 0, width: window.geometry.width, height: window.geometry.height }];
    return {
      windowId: window.id,
      zOrder: window.zOrder,
      geometry: { ...window.geometry },
      opacity: window.opacity,
      buffer: window.buffer,
      damage,
      opacityRegions: [...window.opacityRegions],
    };
  }

  /**
   * Render until stop() is called, yielding between frames for
   * getFrameSleepMs(). stop() is observed once per iteration; a loop that
   * was stopped and superseded by a later run() exits when it wakes.
   */
  async run(): Promise<void> {
    if (!this.initialized) {
      throw new CompositorError('Compositor is not initialized', 'not-initialized');
    }
    if (this.running) return;

    this.running = true;
    const generation = ++this.loopGeneration;
    log.debug('Frame loop started', { generation });
    try {
      while (this.running && generation === this.loopGeneration) {
        this.renderFrame();
        await sleep(this.getFrameSleepMs());
      }
    } finally {
      if (generation === this.loopGeneration) {
        this.running = false;
      }
      log.debug('Frame loop stopped', { generation, frames: this.frameCount });
    }
  }

  stop(): void {
    this.running = false;
  }

  /**
   * Pause between frames of the run loop. `frameSleepMs` is scaled by the
   * power save mode; adaptive mode idles only while nothing is damaged.
   */
  getFrameSleepMs(): number {
    const base = this.config.frameSleepMs;
    switch (this.config.powerSaveMode) {
      case 'performance':
        return 0;
      case 'balanced':
        return base;
      case 'power-save':
        return base * POWER_SAVE_SLEEP_FACTOR;
      case 'adaptive':
        return this.hasPendingDamage() ? base : base * POWER_SAVE_SLEEP_FACTOR;
    }
  }

  private hasPendingDamage(): boolean {
    for (const window of this.windows.values()) {
      if (window.visible && !window.minimized && window.damage.length > 0) return true;
    }
    return false;
  }

  getFps(): number {
    return this.fps.getFps();
  }

  getStats(): CompositorStats {
    return {
      frameCount: this.frameCount,
      fps: this.fps.getFps(),
      budgetOverruns: this.budgetOverruns,
      droppedFrames: this.droppedFrames,
      windowCount: this.windows.size,
      outputCount: this.outputs.size,
    };
  }

  // ---------------------------------------------------------------------------
  // Outputs
  // ---------------------------------------------------------------------------

  /**
   * Register an output. The first output, or one flagged primary, becomes
   * the primary output.
   */
  addOutput(init: OutputInit): OutputId {
    const id = init.id ?? this.nextOutputId;
    if (this.outputs.has(id)) {
      throw new CompositorError(`Output ${id} already exists`, 'duplicate-output');
    }

    const output = buildOutput(id, init);
    if (output.primary || this.outputs.size === 0) {
      for (const existing of this.outputs.values()) {
        existing.primary = false;
      }
      output.primary = true;
    }

    this.outputs.set(id, output);
    this.nextOutputId = Math.max(this.nextOutputId, id + 1);
    log.debug('Output added', { id, name: output.name, width: output.width, height: output.height });
    this.emit({ type: 'output-added', outputId: id });
    return id;
  }

  removeOutput(id: OutputId): boolean {
    const output = this.outputs.get(id);
    if (!output) return false;

    this.outputs.delete(id);
    if (output.primary) {
      const next = this.outputs.values().next();
      if (!next.done) next.value.primary = true;
    }
    this.emit({ type: 'output-removed', outputId: id });
    return true;
  }

  setOutputEnabled(id: OutputId, enabled: boolean): boolean {
    const output = this.outputs.get(id);
    if (!output) return false;
    output.enabled = enabled;
    this.emit({ type: 'output-enabled', outputId: id, enabled });
    return true;
  }

  setOutputMode(id: OutputId, width: number, height: number, refreshRate: number): boolean {
    const output = this.outputs.get(id);
    if (!output || width <= 0 || height <= 0 || refreshRate <= 0) return false;
    output.width = width;
    output.height = height;
    output.refreshRate = refreshRate;
    this.emit({ type: 'output-mode-changed', outputId: id, width, height, refreshRate });
    return true;
  }

  setOutputTransform(id: OutputId, transform: OutputTransform): boolean {
    const output = this.outputs.get(id);
    if (!output) return false;
    output.transform = transform;
    return true;
  }

  getOutput(id: OutputId): Readonly<OutputDevice> | undefined {
    return this.outputs.get(id);
  }

  getOutputs(): Readonly<OutputDevice>[] {
    return [...this.outputs.values()];
  }

  getPrimaryOutput(): Readonly<OutputDevice> | undefined {
    for (const output of this.outputs.values()) {
      if (output.primary) return output;
    }
    return undefined;
  }
}
