/**
 * Placement generation and piece resolution shared by both packing strategies.
 */

import { InvalidShapeError, UnknownShapeError } from "../errors";
import type { Coord, Placement, ProblemSpace, Shape } from "./packing-types";
import { uniqueOrientations } from "./shape-geometry";

/**
 * One required instance of a shape, with its geometry precomputed.
 */
export interface PieceInstance {
  shape: Shape;
  instance: number;
  orientations: Coord[][];
  cellCount: number;
}

/**
 * Translate an orientation by (x, y). Returns null if any cell falls
 * outside a width × height board.
 */
export function translateOrientation(
  orientation: readonly Coord[],
  x: number,
  y: number,
  width: number,
  height: number
): Coord[] | null {
  const cells: Coord[] = [];
  for (const c of orientation) {
    const cx = c.x + x;
    const cy = c.y + y;
    if (cx < 0 || cx >= width || cy < 0 || cy >= height) {
      return null;
    }
    cells.push({ x: cx, y: cy });
  }
  return cells;
}

/**
 * Every in-bounds placement of one shape instance on a width × height board.
 *
 * Loops orientations, then y, then x. Other pieces are not considered.
 */
export function generatePlacements(
  shape: Shape,
  instance: number,
  width: number,
  height: number,
  orientations: Coord[][] = uniqueOrientations(shape)
): Placement[] {
  const placements: Placement[] = [];

  for (let orientation = 0; orientation < orientations.length; orientation++) {
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const cells = translateOrientation(orientations[orientation], x, y, width, height);
        if (cells) {
          placements.push({ shapeId: shape.id, instance, orientation, x, y, cells });
        }
      }
    }
  }

  return placements;
}

/**
 * Expand a problem space's shape counts into piece instances, in shape-id
 * then instance order. Shapes with a zero count are never looked up.
 */
export function resolvePieces(shapes: readonly Shape[], space: ProblemSpace): PieceInstance[] {
  const pieces: PieceInstance[] = [];

  space.shapeCounts.forEach((count, shapeId) => {
    if (count === 0) return;

    const shape = shapes.find((s) => s.id === shapeId);
    if (!shape) {
      throw new UnknownShapeError(shapeId);
    }

    const orientations = uniqueOrientations(shape);
    const size = orientations[0]?.length ?? 0;
    if (size === 0) {
      throw new InvalidShapeError(shapeId, "no filled cells");
    }

    for (let instance = 0; instance < count; instance++) {
      pieces.push({ shape, instance, orientations, cellCount: size });
    }
  });

  return pieces;
}

/**
 * Problems with a claimed packing: cells out of bounds, overlapping cells,
 * or a placement count per shape that differs from the requirement.
 * An empty list means the packing is valid.
 */
export function validatePacking(space: ProblemSpace, placements: readonly Placement[]): string[] {
  const problems: string[] = [];
  const owner = new Map<number, Placement>();

  for (const p of placements) {
    for (const c of p.cells) {
      if (c.x < 0 || c.x >= space.width || c.y < 0 || c.y >= space.height) {
        problems.push(`Shape ${p.shapeId}#${p.instance} covers (${c.x},${c.y}) outside the board`);
        continue;
      }
      const index = c.y * space.width + c.x;
      const previous = owner.get(index);
      if (previous) {
        problems.push(
          `Shape ${p.shapeId}#${p.instance} overlaps shape ${previous.shapeId}#${previous.instance} at (${c.x},${c.y})`
        );
      } else {
        owner.set(index, p);
      }
    }
  }

  const placedCounts = new Map<number, number>();
  for (const p of placements) {
    placedCounts.set(p.shapeId, (placedCounts.get(p.shapeId) ?? 0) + 1);
  }
  const shapeIds = new Set<number>([...space.shapeCounts.keys(), ...placedCounts.keys()]);
  for (const shapeId of [...shapeIds].sort((a, b) => a - b)) {
    const required = space.shapeCounts[shapeId] ?? 0;
    const placed = placedCounts.get(shapeId) ?? 0;
    if (required !== placed) {
      problems.push(`Shape ${shapeId}: expected ${required} placements, found ${placed}`);
    }
  }

  return problems;
}
