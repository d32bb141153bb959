import type { Placement } from "./packing-types";
import { EMPTY_MARKER } from "./packing-types";

/**
 * Draw a packing as text, one string per board row. Covered cells show the
 * shape id in base 36 (`*` past `z`), empty cells show `.`.
 */
export function renderPacking(
  placements: readonly Placement[],
  width: number,
  height: number
): string[] {
  const grid: string[][] = Array.from({ length: height }, () =>
    Array.from({ length: width }, () => EMPTY_MARKER)
  );

  for (const p of placements) {
    const symbol = p.shapeId < 36 ? p.shapeId.toString(36) : "*";
    for (const cell of p.cells) {
      grid[cell.y][cell.x] = symbol;
    }
  }

  return grid.map((row) => row.join(""));
}
