import type { OutputDevice, OutputId, Window, WindowId, WindowInit } from '@/types/compositor';
import type { Rectangle } from '@/types/geometry';
import { transformedSize } from './transform';

export const DEFAULT_WINDOW_GEOMETRY: Rectangle = { x: 0, y: 0, width: 640, height: 480 };

/**
 * Build a window record from a partial description. zOrder, focus, children
 * and damage are owned by the compositor and always start empty.
 */
export function buildWindow(id: WindowId, init: WindowInit = {}): Window {
  return {
    title: '',
    appId: '',
    visible: true,
    minimized: false,
    maximized: false,
    fullscreen: false,
    resizable: true,
    movable: true,
    closable: true,
    opacity: 1,
    parentId: null,
    buffer: null,
    inputRegions: [],
    opacityRegions: [],
    lastFrameTime: null,
    restoreGeometry: null,
    ...init,
    geometry: { ...(init.geometry ?? DEFAULT_WINDOW_GEOMETRY) },
    id,
    focused: false,
    zOrder: 0,
    childIds: [],
    damage: [],
  };
}

export type OutputInit = Partial<Omit<OutputDevice, 'id'>> & {
  id?: OutputId;
  width: number;
  height: number;
};

export function buildOutput(id: OutputId, init: OutputInit): OutputDevice {
  return {
    name: `output-${id}`,
    refreshRate: 60,
    scaleFactor: 1,
    enabled: true,
    primary: false,
    physicalSize: { width: 0, height: 0 },
    position: { x: 0, y: 0 },
    transform: 'normal',
    ...init,
    id,
  };
}

/**
 * Area an output covers in the global logical coordinate space.
 */
export function outputLogicalBounds(output: OutputDevice): Rectangle {
  const size = transformedSize(
    { width: output.width, height: output.height },
    output.transform,
    output.scaleFactor
  );
  return { x: output.position.x, y: output.position.y, width: size.width, height: size.height };
}
