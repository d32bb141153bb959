/**
 * Backtracking packing search.
 *
 * Places pieces one at a time on a flat occupancy board, most constrained
 * pieces first, and prunes any branch where the empty cells can no longer
 * hold the remaining pieces.
 */

import type { PackingObserver, PackingResult, Placement, ProblemSpace, Shape } from "./packing-types";
import type { PieceInstance } from "./placements";
import { resolvePieces, translateOrientation } from "./placements";

export interface BacktrackingOptions extends PackingObserver {
  /**
   * Maximum number of placements to commit before giving up with an
   * `unknown` result. Unbounded when omitted.
   */
  maxSteps?: number;
}

const EMPTY = -1;

/**
 * Order pieces by fewest orientations, then most cells. The sort is stable,
 * so ties keep shape-id then instance order.
 */
export function orderPieces(pieces: readonly PieceInstance[]): PieceInstance[] {
  return [...pieces].sort(
    (a, b) => a.orientations.length - b.orientations.length || b.cellCount - a.cellCount
  );
}

/**
 * Solve a packing problem by depth-first search.
 *
 * Complete: `unsolvable` means the whole tree was exhausted. Only a
 * `maxSteps` budget can produce `unknown`.
 */
export function solvePackingBacktracking(
  shapes: readonly Shape[],
  space: ProblemSpace,
  options: BacktrackingOptions = {}
): PackingResult {
  const { width, height } = space;
  const pieces = orderPieces(resolvePieces(shapes, space));

  // remaining[i] = total cells of pieces i..n-1
  const remaining = Array.from({ length: pieces.length + 1 }, () => 0);
  for (let i = pieces.length - 1; i >= 0; i--) {
    remaining[i] = remaining[i + 1] + pieces[i].cellCount;
  }

  const board = new Int32Array(width * height).fill(EMPTY);
  let emptyCells = width * height;
  const solution: Placement[] = [];
  let steps = 0;
  let outOfBudget = false;

  const fits = (placement: Placement): boolean =>
    placement.cells.every((c) => board[c.y * width + c.x] === EMPTY);

  const mark = (placement: Placement, value: number) => {
    for (const c of placement.cells) {
      board[c.y * width + c.x] = value;
    }
  };

  const search = (pieceIndex: number): boolean => {
    if (pieceIndex === pieces.length) return true;

    if (emptyCells < remaining[pieceIndex]) return false;

    const piece = pieces[pieceIndex];
    for (let orientation = 0; orientation < piece.orientations.length; orientation++) {
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          const cells = translateOrientation(piece.orientations[orientation], x, y, width, height);
          if (!cells) continue;

          const placement: Placement = {
            shapeId: piece.shape.id,
            instance: piece.instance,
            orientation,
            x,
            y,
            cells,
          };
          if (!fits(placement)) continue;

          if (options.maxSteps !== undefined && steps >= options.maxSteps) {
            outOfBudget = true;
            return false;
          }
          steps++;

          mark(placement, pieceIndex);
          emptyCells -= cells.length;
          solution.push(placement);
          options.onPiecePlaced?.(placement, pieceIndex + 1);

          if (search(pieceIndex + 1)) return true;
          if (outOfBudget) return false;

          solution.pop();
          emptyCells += cells.length;
          mark(placement, EMPTY);
        }
      }
    }

    return false;
  };

  if (search(0)) {
    return { status: "solved", placements: solution };
  }
  if (outOfBudget) {
    return { status: "unknown", stepsTaken: steps };
  }
  return { status: "unsolvable" };
}
