/**
 * Output rotation matrices.
 */

import type { OutputTransform, Point, Size, TransformMatrix } from '@/types/geometry';

export const IDENTITY_MATRIX: TransformMatrix = [
  [1, 0, 0],
  [0, 1, 0],
  [0, 0, 1],
];

const ROTATE_90: TransformMatrix = [
  [0, -1, 0],
  [1, 0, 0],
  [0, 0, 1],
];

const ROTATE_180: TransformMatrix = [
  [-1, 0, 0],
  [0, -1, 0],
  [0, 0, 1],
];

const ROTATE_270: TransformMatrix = [
  [0, 1, 0],
  [-1, 0, 0],
  [0, 0, 1],
];

const MATRICES: Record<OutputTransform, TransformMatrix> = {
  'normal': IDENTITY_MATRIX,
  'rotate-90': ROTATE_90,
  'rotate-180': ROTATE_180,
  'rotate-270': ROTATE_270,
};

export function getTransformMatrix(transform: OutputTransform): TransformMatrix {
  return MATRICES[transform];
}

export function applyTransform(matrix: TransformMatrix, point: Point): Point {
  const [r0, r1] = matrix;
  return {
    x: r0[0] * point.x + r0[1] * point.y + r0[2],
    y: r1[0] * point.x + r1[1] * point.y + r1[2],
  };
}

export function multiplyMatrices(a: TransformMatrix, b: TransformMatrix): TransformMatrix {
  const cell = (row: number, col: number) =>
    a[row][0] * b[0][col] + a[row][1] * b[1][col] + a[row][2] * b[2][col];

  return [
    [cell(0, 0), cell(0, 1), cell(0, 2)],
    [cell(1, 0), cell(1, 1), cell(1, 2)],
    [cell(2, 0), cell(2, 1), cell(2, 2)],
  ];
}

/** Quarter turns swap the axes */
export function isTransposed(transform: OutputTransform): boolean {
  return transform === 'rotate-90' || transform === 'rotate-270';
}

/**
 * Size of a mode after rotation and scaling, in logical pixels.
 */
export function transformedSize(size: Size, transform: OutputTransform, scaleFactor = 1): Size {
  const scale = scaleFactor > 0 ? scaleFactor : 1;
  const width = isTransposed(transform) ? size.height : size.width;
  const height = isTransposed(transform) ? size.width : size.height;
  return { width: width / scale, height: height / scale };
}
