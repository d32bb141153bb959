/**
 * Shape Geometry
 *
 * Turns a 3×3 shape grid into cell offsets and enumerates its distinct
 * orientations. For polyominoes there are 8 possible transforms:
 * - 4 rotations (0°, 90°, 180°, 270°)
 * - the same 4 rotations of the horizontal mirror
 * Symmetric shapes collapse to fewer distinct orientations.
 */

import type { Coord, Shape } from "./packing-types";
import { FILLED_MARKER } from "./packing-types";

/**
 * Filled cells of the shape's raw grid, in row-major order.
 */
export function shapeCells(shape: Shape): Coord[] {
  const cells: Coord[] = [];
  for (let y = 0; y < shape.grid.length; y++) {
    const row = shape.grid[y];
    for (let x = 0; x < row.length; x++) {
      if (row[x] === FILLED_MARKER) {
        cells.push({ x, y });
      }
    }
  }
  return cells;
}

export function cellCount(shape: Shape): number {
  return shapeCells(shape).length;
}

/**
 * Translate cells so the minimum x and y are 0, then sort row-major
 * (by y, then x).
 */
export function normalizeCells(cells: readonly Coord[]): Coord[] {
  if (cells.length === 0) return [];

  let minX = Infinity, minY = Infinity;
  for (const c of cells) {
    minX = Math.min(minX, c.x);
    minY = Math.min(minY, c.y);
  }

  return cells
    .map((c) => ({ x: c.x - minX, y: c.y - minY }))
    .sort((a, b) => a.y - b.y || a.x - b.x);
}

/**
 * Rotate 90° clockwise: (x, y) -> (-y, x), kept inside the
 * non-negative quadrant by measuring from the bounding box.
 */
export function rotate90(cells: readonly Coord[]): Coord[] {
  let maxY = 0;
  for (const c of cells) maxY = Math.max(maxY, c.y);
  return cells.map(({ x, y }) => ({ x: maxY - y, y: x }));
}

/**
 * Mirror across a vertical axis: (x, y) -> (-x, y).
 */
export function flipHorizontal(cells: readonly Coord[]): Coord[] {
  let maxX = 0;
  for (const c of cells) maxX = Math.max(maxX, c.x);
  return cells.map(({ x, y }) => ({ x: maxX - x, y }));
}

/**
 * Canonical string for a normalized cell list; equal keys mean equal
 * orientations.
 */
export function orientationKey(cells: readonly Coord[]): string {
  return cells.map((c) => `${c.x},${c.y}`).join(";");
}

/**
 * Every distinct orientation of a shape, normalized.
 *
 * Order is the first occurrence in the sequence: 4 rotations of the shape,
 * then 4 rotations of its mirror. An empty shape yields one empty orientation.
 */
export function uniqueOrientations(shape: Shape): Coord[][] {
  const base = shapeCells(shape);
  const unique = new Map<string, Coord[]>();

  const addRotations = (start: Coord[]) => {
    let current = start;
    for (let i = 0; i < 4; i++) {
      const normalized = normalizeCells(current);
      const key = orientationKey(normalized);
      if (!unique.has(key)) {
        unique.set(key, normalized);
      }
      current = rotate90(current);
    }
  };

  addRotations(base);
  addRotations(flipHorizontal(base));

  return [...unique.values()];
}

export interface ShapeSummary {
  id: number;
  cells: number;
  orientations: number;
}

/**
 * Cell and orientation counts per shape, in input order.
 */
export function describeShapes(shapes: readonly Shape[]): ShapeSummary[] {
  return shapes.map((shape) => ({
    id: shape.id,
    cells: cellCount(shape),
    orientations: uniqueOrientations(shape).length,
  }));
}
