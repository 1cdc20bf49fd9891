import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ManualClock } from '@/lib/time';
import type { CompositorEvent } from '@/types/compositor';
import { Compositor } from './compositor';
import { CompositorError } from './errors';
import { HeadlessBackend } from './backend/headless-backend';
import { buildWindow } from './utils/defaults';

describe('Compositor', () => {
  let clock: ManualClock;
  let backend: HeadlessBackend;
  let compositor: Compositor;
  let events: CompositorEvent[];

  beforeEach(async () => {
    clock = new ManualClock(1000);
    backend = new HeadlessBackend();
    compositor = new Compositor({ backend, now: clock.now });
    events = [];
    compositor.addEventHandler((event) => {
      events.push(event);
      return true;
    });
    await compositor.initialize();
  });

  describe('window registry', () => {
    it('appends new windows as topmost with contiguous zOrder', () => {
      const a = compositor.createWindow({ title: 'a' });
      const b = compositor.createWindow({ title: 'b' });
      const c = compositor.createWindow({ title: 'c' });

      expect(compositor.getRenderQueue()).toEqual([a, b, c]);
      expect(compositor.getWindows().map((w) => w.zOrder)).toEqual([0, 1, 2]);
      expect(events.filter((e) => e.type === 'window-created')).toHaveLength(3);
    });

    it('throws on duplicate ids', () => {
      compositor.addWindow(buildWindow(7));
      expect(() => compositor.addWindow(buildWindow(7))).toThrow(CompositorError);
      try {
        compositor.addWindow(buildWindow(7));
      } catch (error) {
        expect(error instanceof CompositorError && error.type).toBe('duplicate-window');
      }
    });

    it('allocates ids after explicitly added ones', () => {
      compositor.addWindow(buildWindow(10));
      expect(compositor.createWindow()).toBe(11);
    });

    it('returns false for unknown ids', () => {
      expect(compositor.removeWindow(99)).toBe(false);
      expect(compositor.setActiveWindow(99)).toBe(false);
      expect(compositor.raiseWindow(99)).toBe(false);
      expect(compositor.moveWindow(99, 0, 0)).toBe(false);
    });
  });

  describe('removeWindow', () => {
    it('focuses the topmost remaining window when the focused one is removed', () => {
      const a = compositor.createWindow();
      const b = compositor.createWindow();
      const c = compositor.createWindow();
      compositor.setActiveWindow(c);
      events = [];

      expect(compositor.removeWindow(c)).toBe(true);

      expect(compositor.getRenderQueue()).toEqual([a, b]);
      expect(compositor.getFocusedWindowId()).toBe(b);
      expect(compositor.getWindow(b)?.focused).toBe(true);
      expect(events).toEqual([
        { type: 'window-destroyed', windowId: c },
        { type: 'window-focused', windowId: b },
      ]);
    });

    it('skips minimized and hidden windows when refocusing', () => {
      const a = compositor.createWindow();
      const b = compositor.createWindow({ visible: false });
      const c = compositor.createWindow();
      const d = compositor.createWindow();
      compositor.minimizeWindow(c);
      compositor.setActiveWindow(d);

      compositor.removeWindow(d);
      expect(compositor.getFocusedWindowId()).toBe(a);
      expect(compositor.hasWindow(b)).toBe(true);
    });

    it('falls back to the queue tail when nothing is eligible', () => {
      const a = compositor.createWindow({ visible: false });
      const b = compositor.createWindow();
      compositor.setActiveWindow(b);

      compositor.removeWindow(b);
      expect(compositor.getFocusedWindowId()).toBe(a);
    });

    it('leaves focus empty when the last window is removed', () => {
      const a = compositor.createWindow();
      compositor.setActiveWindow(a);
      compositor.removeWindow(a);
      expect(compositor.getFocusedWindowId()).toBeNull();
      expect(compositor.getRenderQueue()).toEqual([]);
    });

    it('does not move focus when an unfocused window is removed', () => {
      const a = compositor.createWindow();
      const b = compositor.createWindow();
      compositor.setActiveWindow(a);
      compositor.removeWindow(b);
      expect(compositor.getFocusedWindowId()).toBe(a);
    });

    it('removes owned children with their parent', () => {
      const parent = compositor.createWindow();
      const child = compositor.createWindow({ parentId: parent });
      const grandchild = compositor.createWindow({ parentId: child });
      const other = compositor.createWindow();
      events = [];

      compositor.removeWindow(parent);

      expect(compositor.getRenderQueue()).toEqual([other]);
      expect(compositor.getWindow(other)?.zOrder).toBe(0);
      expect(events.map((e) => e.type === 'window-destroyed' && e.windowId)).toEqual([
        parent,
        child,
        grandchild,
      ]);
    });

    it('detaches a removed child from its parent', () => {
      const parent = compositor.createWindow();
      const child = compositor.createWindow({ parentId: parent });
      compositor.removeWindow(child);
      expect(compositor.getWindow(parent)?.childIds).toEqual([]);
    });
  });

  describe('stacking', () => {
    it('raises and lowers windows and re-indexes zOrder', () => {
      const a = compositor.createWindow();
      const b = compositor.createWindow();
      const c = compositor.createWindow();

      compositor.raiseWindow(a);
      expect(compositor.getRenderQueue()).toEqual([b, c, a]);
      expect(compositor.getWindow(a)?.zOrder).toBe(2);

      compositor.lowerWindow(c);
      expect(compositor.getRenderQueue()).toEqual([c, b, a]);
      expect(compositor.getWindow(c)?.zOrder).toBe(0);
    });
  });

  describe('focus', () => {
    it('moves the focused flag between windows', () => {
      const a = compositor.createWindow();
      const b = compositor.createWindow();
      compositor.setActiveWindow(a);
      compositor.setActiveWindow(b);

      expect(compositor.getWindow(a)?.focused).toBe(false);
      expect(compositor.getWindow(b)?.focused).toBe(true);
    });

    it('moves focus away from a minimized window', () => {
      const a = compositor.createWindow();
      const b = compositor.createWindow();
      compositor.setActiveWindow(b);

      compositor.minimizeWindow(b);
      expect(compositor.getFocusedWindowId()).toBe(a);
    });

    it('clears focus when minimizing the only window', () => {
      const a = compositor.createWindow();
      compositor.setActiveWindow(a);
      compositor.minimizeWindow(a);
      expect(compositor.getFocusedWindowId()).toBeNull();
      expect(compositor.getWindow(a)?.focused).toBe(false);
    });
  });

  describe('window state', () => {
    it('respects movable and resizable', () => {
      const fixed = compositor.createWindow({ movable: false, resizable: false });
      expect(compositor.moveWindow(fixed, 10, 10)).toBe(false);
      expect(compositor.resizeWindow(fixed, 10, 10)).toBe(false);

      const free = compositor.createWindow();
      expect(compositor.moveWindow(free, 10, 20)).toBe(true);
      expect(compositor.getWindow(free)?.geometry).toEqual({ x: 10, y: 20, width: 640, height: 480 });
    });

    it('maximizes to the primary output and restores', () => {
      compositor.addOutput({ width: 2560, height: 1440, scaleFactor: 2 });
      const id = compositor.createWindow({ geometry: { x: 5, y: 5, width: 100, height: 100 } });

      expect(compositor.maximizeWindow(id)).toBe(true);
      expect(compositor.getWindow(id)?.geometry).toEqual({ x: 0, y: 0, width: 1280, height: 720 });

      compositor.restoreWindow(id);
      expect(compositor.getWindow(id)?.geometry).toEqual({ x: 5, y: 5, width: 100, height: 100 });
      expect(compositor.getWindow(id)?.maximized).toBe(false);
    });

    it('cannot maximize without an output', () => {
      const id = compositor.createWindow();
      expect(compositor.maximizeWindow(id)).toBe(false);
    });

    it('enters fullscreen on top and leaves it at the previous geometry', () => {
      compositor.addOutput({ width: 1920, height: 1080 });
      const a = compositor.createWindow({ geometry: { x: 1, y: 2, width: 3, height: 4 } });
      const b = compositor.createWindow();

      compositor.setFullscreen(a, true);
      expect(compositor.getRenderQueue()).toEqual([b, a]);
      expect(compositor.getWindow(a)?.geometry).toEqual({ x: 0, y: 0, width: 1920, height: 1080 });

      compositor.setFullscreen(a, false);
      expect(compositor.getWindow(a)?.geometry).toEqual({ x: 1, y: 2, width: 3, height: 4 });
      expect(events.filter((e) => e.type === 'window-fullscreen')).toEqual([
        { type: 'window-fullscreen', windowId: a, fullscreen: true },
        { type: 'window-fullscreen', windowId: a, fullscreen: false },
      ]);
    });

    it('clamps opacity', () => {
      const id = compositor.createWindow();
      compositor.setWindowOpacity(id, 1.5);
      expect(compositor.getWindow(id)?.opacity).toBe(1);
      compositor.setWindowOpacity(id, -1);
      expect(compositor.getWindow(id)?.opacity).toBe(0);
      expect(compositor.setWindowOpacity(id, Number.NaN)).toBe(false);
    });

    it('only closes closable windows', () => {
      const pinned = compositor.createWindow({ closable: false });
      const normal = compositor.createWindow();
      expect(compositor.closeWindow(pinned)).toBe(false);
      expect(compositor.closeWindow(normal)).toBe(true);
      expect(compositor.getRenderQueue()).toEqual([pinned]);
    });
  });

  describe('setParent', () => {
    it('links and re-links children', () => {
      const a = compositor.createWindow();
      const b = compositor.createWindow();
      const child = compositor.createWindow();

      expect(compositor.setParent(child, a)).toBe(true);
      expect(compositor.getWindow(a)?.childIds).toEqual([child]);

      compositor.setParent(child, b);
      expect(compositor.getWindow(a)?.childIds).toEqual([]);
      expect(compositor.getWindow(b)?.childIds).toEqual([child]);
      expect(compositor.getWindow(child)?.parentId).toBe(b);

      compositor.setParent(child, null);
      expect(compositor.getWindow(child)?.parentId).toBeNull();
    });

    it('rejects unknown ids', () => {
      const a = compositor.createWindow();
      expect(compositor.setParent(a, 42)).toBe(false);
      expect(compositor.setParent(42, a)).toBe(false);
    });

    it('throws on cycles', () => {
      const a = compositor.createWindow();
      const b = compositor.createWindow({ parentId: a });
      expect(() => compositor.setParent(a, b)).toThrow(CompositorError);
      expect(() => compositor.setParent(a, a)).toThrow(CompositorError);
    });
  });

  describe('damage and buffers', () => {
    it('clips damage to the surface', () => {
      const id = compositor.createWindow({ geometry: { x: 100, y: 100, width: 50, height: 50 } });
      compositor.damageWindow(id, { x: 40, y: 40, width: 20, height: 20 });
      compositor.damageWindow(id, { x: 60, y: 0, width: 10, height: 10 });
      expect(compositor.getWindow(id)?.damage).toEqual([{ x: 40, y: 40, width: 10, height: 10 }]);
    });

    it('freezes committed buffers and damages the whole surface', () => {
      const id = compositor.createWindow({ geometry: { x: 0, y: 0, width: 4, height: 2 } });
      compositor.commitBuffer(id, {
        width: 4,
        height: 2,
        format: 'argb8888',
        stride: 16,
        data: new Uint8Array(32),
      });

      const window = compositor.getWindow(id);
      expect(Object.isFrozen(window?.buffer)).toBe(true);
      expect(window?.damage).toEqual([{ x: 0, y: 0, width: 4, height: 2 }]);
    });
  });

  describe('windowAt', () => {
    it('returns the topmost window containing the point', () => {
      const bottom = compositor.createWindow({ geometry: { x: 0, y: 0, width: 100, height: 100 } });
      const top = compositor.createWindow({ geometry: { x: 50, y: 50, width: 100, height: 100 } });

      expect(compositor.windowAt({ x: 75, y: 75 })).toBe(top);
      expect(compositor.windowAt({ x: 10, y: 10 })).toBe(bottom);
      expect(compositor.windowAt({ x: 500, y: 500 })).toBeNull();
    });

    it('honours input regions', () => {
      const bottom = compositor.createWindow({ geometry: { x: 0, y: 0, width: 100, height: 100 } });
      compositor.createWindow({
        geometry: { x: 0, y: 0, width: 100, height: 100 },
        inputRegions: [{ x: 0, y: 0, width: 10, height: 10 }],
      });

      expect(compositor.windowAt({ x: 50, y: 50 })).toBe(bottom);
    });

    it('ignores minimized windows', () => {
      const bottom = compositor.createWindow({ geometry: { x: 0, y: 0, width: 100, height: 100 } });
      const top = compositor.createWindow({ geometry: { x: 0, y: 0, width: 100, height: 100 } });
      compositor.minimizeWindow(top);
      expect(compositor.windowAt({ x: 1, y: 1 })).toBe(bottom);
    });
  });

  describe('renderFrame', () => {
    it('submits visible windows in z-order', () => {
      const a = compositor.createWindow();
      compositor.createWindow({ visible: false });
      const c = compositor.createWindow();
      const d = compositor.createWindow();
      compositor.minimizeWindow(d);
      compositor.raiseWindow(a);

      expect(compositor.renderFrame()).toBe(true);
      expect(backend.lastFrame?.commands.map((cmd) => cmd.windowId)).toEqual([c, a]);
    });

    it('clears damage after a presented frame', () => {
      const id = compositor.createWindow();
      compositor.damageWindow(id, { x: 0, y: 0, width: 10, height: 10 });

      compositor.renderFrame();
      expect(backend.lastFrame?.commands[0]?.damage).toEqual([{ x: 0, y: 0, width: 10, height: 10 }]);
      expect(compositor.getWindow(id)?.damage).toEqual([]);
      expect(compositor.getWindow(id)?.lastFrameTime).toBe(1000);
    });

    it('keeps damage and reports a dropped frame when the backend fails', () => {
      const id = compositor.createWindow();
      compositor.damageWindow(id, { x: 0, y: 0, width: 10, height: 10 });
      backend.failNextFrames(1);
      events = [];

      expect(compositor.renderFrame()).toBe(false);
      expect(compositor.getWindow(id)?.damage).toHaveLength(1);
      expect(events).toEqual([{ type: 'frame-dropped', frame: 1, reason: 'backend rejected frame' }]);
      expect(compositor.getStats().droppedFrames).toBe(1);
      expect(compositor.getStats().frameCount).toBe(0);
    });

    it('advances the attached effects once per frame', () => {
      const update = vi.fn();
      compositor.attachEffects({ update });
      compositor.renderFrame();
      compositor.renderFrame();
      expect(update).toHaveBeenCalledTimes(2);
    });

    it('counts budget overruns', async () => {
      const slowBackend = new HeadlessBackend();
      const originalEnd = slowBackend.endFrame.bind(slowBackend);
      vi.spyOn(slowBackend, 'endFrame').mockImplementation(() => {
        clock.advance(20);
        return originalEnd();
      });
      const slow = new Compositor({ backend: slowBackend, now: clock.now });
      await slow.initialize();

      slow.renderFrame();
      expect(slow.getStats().budgetOverruns).toBe(1);
      expect(slow.getStats().frameCount).toBe(1);
    });

    it('reports the time since the previous frame started', () => {
      compositor.renderFrame();
      clock.advance(16);
      compositor.renderFrame();

      const presented = events.filter((event) => event.type === 'frame-presented');
      expect(presented).toEqual([
        { type: 'frame-presented', frame: 1, frameTimeMs: 0, sinceLastFrameMs: null },
        { type: 'frame-presented', frame: 2, frameTimeMs: 0, sinceLastFrameMs: 16 },
      ]);
    });

    it('throws before initialize', () => {
      const fresh = new Compositor();
      expect(() => fresh.renderFrame()).toThrow(CompositorError);
    });
  });

  describe('presentation', () => {
    const buffer = {
      width: 4,
      height: 2,
      format: 'argb8888' as const,
      stride: 16,
      data: new Uint8Array(32),
    };

    it('passes the configured hints to the backend', async () => {
      const custom = new Compositor({
        backend,
        now: clock.now,
        config: { vsyncEnabled: false, tripleBuffering: false, tearFree: false, independentUpdates: false },
      });
      await custom.initialize();
      custom.renderFrame();

      expect(backend.lastFrame?.presentation).toEqual({
        vsync: false,
        tripleBuffering: false,
        tearFree: false,
        vrr: false,
        independentUpdates: false,
      });
    });

    it('requests vrr only when the backend supports it', async () => {
      const vrrBackend = new HeadlessBackend({ capabilities: { supportsVrr: true } });
      const enabled = new Compositor({ backend: vrrBackend, now: clock.now });
      await enabled.initialize();
      enabled.renderFrame();
      expect(vrrBackend.lastFrame?.presentation.vrr).toBe(true);

      const disabled = new Compositor({ backend: vrrBackend, now: clock.now, config: { vrrEnabled: false } });
      await disabled.initialize();
      disabled.renderFrame();
      expect(vrrBackend.lastFrame?.presentation.vrr).toBe(false);

      compositor.renderFrame();
      expect(backend.lastFrame?.presentation.vrr).toBe(false);
    });

    it('offers the topmost opaque fullscreen window for direct scanout', async () => {
      const scanoutBackend = new HeadlessBackend({ capabilities: { supportsDirectScanout: true } });
      const scanout = new Compositor({ backend: scanoutBackend, now: clock.now });
      await scanout.initialize();
      scanout.createWindow();
      const top = scanout.createWindow();
      scanout.commitBuffer(top, buffer);

      scanout.renderFrame();
      expect(scanoutBackend.lastFrame?.scanoutWindow).toBeNull();

      scanout.setFullscreen(top, true);
      scanout.renderFrame();
      expect(scanoutBackend.lastFrame?.scanoutWindow).toBe(top);

      scanout.setWindowOpacity(top, 0.5);
      scanout.renderFrame();
      expect(scanoutBackend.lastFrame?.scanoutWindow).toBeNull();
    });

    it('never offers scanout when disabled or unsupported', async () => {
      const scanoutBackend = new HeadlessBackend({ capabilities: { supportsDirectScanout: true } });
      const disabled = new Compositor({ backend: scanoutBackend, now: clock.now, config: { directScanout: false } });
      await disabled.initialize();
      const id = disabled.createWindow({ fullscreen: true });
      disabled.commitBuffer(id, buffer);
      disabled.renderFrame();
      expect(scanoutBackend.lastFrame?.scanoutWindow).toBeNull();

      const unsupported = compositor.createWindow({ fullscreen: true });
      compositor.commitBuffer(unsupported, buffer);
      compositor.renderFrame();
      expect(backend.lastFrame?.scanoutWindow).toBeNull();
    });
  });

  describe('power save mode', () => {
    it('scales the pause between frames', () => {
      const paced = new Compositor({ backend, now: clock.now, config: { frameSleepMs: 2 } });
      expect(paced.getFrameSleepMs()).toBe(2);

      paced.setPowerSaveMode('performance');
      expect(paced.getFrameSleepMs()).toBe(0);

      paced.setPowerSaveMode('power-save');
      expect(paced.getFrameSleepMs()).toBe(8);
    });

    it('idles in adaptive mode until a window is damaged', () => {
      const paced = new Compositor({
        backend,
        now: clock.now,
        config: { frameSleepMs: 2, powerSaveMode: 'adaptive' },
      });
      const id = paced.createWindow();
      expect(paced.getFrameSleepMs()).toBe(8);

      paced.damageWindow(id, { x: 0, y: 0, width: 10, height: 10 });
      expect(paced.getFrameSleepMs()).toBe(2);
    });
  });

  describe('fps', () => {
    it('derives fps from presented frame timestamps', () => {
      for (let i = 0; i < 11; i++) {
        compositor.renderFrame();
        clock.advance(10);
      }
      // 10 intervals over 100 ms
      expect(compositor.getFps()).toBe(100);
      expect(compositor.getStats().frameCount).toBe(11);
    });
  });

  describe('event handlers', () => {
    it('stops remaining handlers when one returns false', () => {
      const fresh = new Compositor();
      const calls: string[] = [];
      fresh.addEventHandler(() => {
        calls.push('first');
        return false;
      });
      fresh.addEventHandler(() => {
        calls.push('second');
        return true;
      });

      fresh.createWindow();
      expect(calls).toEqual(['first']);
    });

    it('treats a throwing handler as a veto', () => {
      const fresh = new Compositor();
      const second = vi.fn(() => true);
      fresh.addEventHandler(() => {
        throw new Error('boom');
      });
      fresh.addEventHandler(second);

      expect(() => fresh.createWindow()).not.toThrow();
      expect(second).not.toHaveBeenCalled();
    });

    it('unsubscribes handlers', () => {
      const fresh = new Compositor();
      const handler = vi.fn(() => true);
      const unsubscribe = fresh.addEventHandler(handler);
      unsubscribe();
      fresh.createWindow();
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('outputs', () => {
    it('makes the first output primary and promotes another when it is removed', () => {
      const first = compositor.addOutput({ width: 1920, height: 1080 });
      const second = compositor.addOutput({ width: 1280, height: 1024 });

      expect(compositor.getPrimaryOutput()?.id).toBe(first);
      compositor.removeOutput(first);
      expect(compositor.getPrimaryOutput()?.id).toBe(second);
    });

    it('moves the primary flag to a new primary output', () => {
      const first = compositor.addOutput({ width: 1920, height: 1080 });
      const second = compositor.addOutput({ width: 1280, height: 1024, primary: true });

      expect(compositor.getOutput(first)?.primary).toBe(false);
      expect(compositor.getPrimaryOutput()?.id).toBe(second);
    });

    it('throws on duplicate output ids', () => {
      compositor.addOutput({ id: 3, width: 800, height: 600 });
      expect(() => compositor.addOutput({ id: 3, width: 800, height: 600 })).toThrow(CompositorError);
    });

    it('changes mode and emits an event', () => {
      const id = compositor.addOutput({ width: 1920, height: 1080 });
      events = [];
      expect(compositor.setOutputMode(id, 2560, 1440, 144)).toBe(true);
      expect(events).toEqual([
        { type: 'output-mode-changed', outputId: id, width: 2560, height: 1440, refreshRate: 144 },
      ]);
      expect(compositor.setOutputMode(id, 0, 1440, 144)).toBe(false);
    });

    it('only renders to enabled outputs', () => {
      const on = compositor.addOutput({ width: 1920, height: 1080 });
      const off = compositor.addOutput({ width: 1920, height: 1080 });
      compositor.setOutputEnabled(off, false);

      const beginFrame = vi.spyOn(backend, 'beginFrame');
      compositor.renderFrame();
      expect(beginFrame.mock.calls[0]?.[0].outputs.map((o) => o.id)).toEqual([on]);
    });

    it('uses the rotated size when maximizing on a rotated output', () => {
      const id = compositor.addOutput({ width: 1920, height: 1080 });
      compositor.setOutputTransform(id, 'rotate-90');
      const win = compositor.createWindow();
      compositor.maximizeWindow(win);
      expect(compositor.getWindow(win)?.geometry).toEqual({ x: 0, y: 0, width: 1080, height: 1920 });
    });
  });

  describe('run loop', () => {
    it('renders until stopped', async () => {
      compositor.addEventHandler((event) => {
        if (event.type === 'frame-presented' && event.frame === 3) {
          compositor.stop();
        }
        return true;
      });

      await compositor.run();

      expect(compositor.isRunning).toBe(false);
      expect(compositor.getStats().frameCount).toBe(3);
    });

    it('ends a stopped loop that is superseded by a new run()', async () => {
      const first = compositor.run();
      compositor.stop();
      const second = compositor.run();

      await first;
      expect(compositor.isRunning).toBe(true);

      compositor.stop();
      await second;
      expect(compositor.isRunning).toBe(false);
    });
  });

  describe('shutdown', () => {
    it('clears registries and destroys the backend', () => {
      compositor.createWindow();
      compositor.addOutput({ width: 800, height: 600 });
      compositor.shutdown();

      expect(compositor.getWindowCount()).toBe(0);
      expect(compositor.getOutputs()).toEqual([]);
      expect(compositor.isInitialized).toBe(false);
      expect(backend.isInitialized).toBe(false);
    });
  });
});
