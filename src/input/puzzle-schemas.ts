/**
 * Zod schemas for parsed puzzle input.
 *
 * The parser splits lines into raw values and these schemas decide whether
 * they form a valid shape or problem space.
 */

import { z } from "zod";
import { FILLED_MARKER, SHAPE_GRID_SIZE } from "../problem/packing-types";

const NonNegativeInt = z.number().int().nonnegative();

export const ShapeGridRowSchema = z
  .string()
  .regex(/^[#.]+$/, "grid rows may only contain '#' and '.'")
  .length(SHAPE_GRID_SIZE, `grid rows must be ${SHAPE_GRID_SIZE} characters`);

export const ShapeSchema = z.object({
  id: NonNegativeInt,
  grid: z
    .array(ShapeGridRowSchema)
    .length(SHAPE_GRID_SIZE)
    .refine((rows) => rows.some((row) => row.includes(FILLED_MARKER)), {
      message: "shape has no filled cells",
    }),
});

/** Largest accepted board side; occupancy is kept as one typed array */
export const MAX_BOARD_SIDE = 1000;

const BoardSide = NonNegativeInt.max(MAX_BOARD_SIDE, `must be at most ${MAX_BOARD_SIDE}`);

export const ProblemSpaceSchema = z
  .object({
    width: BoardSide,
    height: BoardSide,
    shapeCounts: z.array(NonNegativeInt),
  })
  .refine(
    (space) => space.shapeCounts.every((count) => count <= space.width * space.height),
    { message: "more instances of a shape than board cells", path: ["shapeCounts"] }
  );

/**
 * First issue of a failed parse, formatted as "path: message".
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid value";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
