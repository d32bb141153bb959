/**
 * Puzzle file parser.
 *
 * Format: shape blocks, each an `<id>:` line followed by three grid rows,
 * and board lines of the form `<W>x<H>: <count for shape 0> <count for 1> ...`.
 * Blank lines are ignored.
 */

import { InputParseError } from "../errors";
import type { ProblemSpace, Shape } from "../problem/packing-types";
import { SHAPE_GRID_SIZE } from "../problem/packing-types";
import { describeIssue, ProblemSpaceSchema, ShapeSchema } from "./puzzle-schemas";

export interface PuzzleInput {
  shapes: Shape[];
  spaces: ProblemSpace[];
}

const INTEGER = /^\d+$/;

function parseInteger(text: string, what: string, line: number): number {
  const value = Number(text);
  if (!INTEGER.test(text) || !Number.isSafeInteger(value)) {
    throw new InputParseError(`invalid ${what} '${text}'`, line);
  }
  return value;
}

export function parsePuzzleInput(text: string): PuzzleInput {
  const lines = text.split(/\r?\n/).map((line) => line.trim());
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  const shapes: Shape[] = [];
  const spaces: ProblemSpace[] = [];
  const seenIds = new Set<number>();

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const lineNumber = i + 1;

    if (line === "") {
      i++;
    } else if (line.endsWith(":") && !line.includes("x")) {
      const id = parseInteger(line.slice(0, -1), "shape ID", lineNumber);
      if (seenIds.has(id)) {
        throw new InputParseError(`duplicate shape ID ${id}`, lineNumber);
      }
      if (i + SHAPE_GRID_SIZE >= lines.length) {
        throw new InputParseError(
          `shape ${id} incomplete, expected ${SHAPE_GRID_SIZE} grid lines`,
          lineNumber
        );
      }

      const grid = lines.slice(i + 1, i + 1 + SHAPE_GRID_SIZE);
      const parsed = ShapeSchema.safeParse({ id, grid });
      if (!parsed.success) {
        throw new InputParseError(`shape ${id}: ${describeIssue(parsed.error)}`, lineNumber);
      }

      seenIds.add(id);
      shapes.push(parsed.data);
      i += SHAPE_GRID_SIZE + 1;
    } else if (line.includes("x") && line.includes(":")) {
      const parts = line.split(":");
      if (parts.length !== 2) {
        throw new InputParseError("invalid problem space format", lineNumber);
      }

      const dims = parts[0].trim().split("x");
      if (dims.length !== 2) {
        throw new InputParseError("invalid dimensions format, expected 'WxH'", lineNumber);
      }
      const width = parseInteger(dims[0], "width", lineNumber);
      const height = parseInteger(dims[1], "height", lineNumber);

      const countsText = parts[1].trim();
      const shapeCounts = countsText === ""
        ? []
        : countsText.split(/\s+/).map((s) => parseInteger(s, "shape count", lineNumber));

      const parsed = ProblemSpaceSchema.safeParse({ width, height, shapeCounts });
      if (!parsed.success) {
        throw new InputParseError(describeIssue(parsed.error), lineNumber);
      }

      spaces.push(parsed.data);
      i++;
    } else {
      throw new InputParseError(`unexpected format '${line}'`, lineNumber);
    }
  }

  return { shapes, spaces };
}
