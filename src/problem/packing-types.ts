/**
 * Shared types for the polyomino packing engine.
 */

/** A cell coordinate; x grows to the right, y grows downward */
export interface Coord {
  x: number;
  y: number;
}

/** Side length of the grid every shape is drawn on */
export const SHAPE_GRID_SIZE = 3;

/** Grid character for a filled shape cell */
export const FILLED_MARKER = "#";

/** Grid character for an empty shape cell or an uncovered board cell */
export const EMPTY_MARKER = ".";

/**
 * A piece template: an id plus a 3×3 grid of `#` and `.` rows.
 */
export interface Shape {
  readonly id: number;
  readonly grid: readonly string[];
}

/**
 * A board plus the number of instances required for each shape id.
 * `shapeCounts[i]` refers to the shape whose id is `i`.
 */
export interface ProblemSpace {
  readonly width: number;
  readonly height: number;
  readonly shapeCounts: readonly number[];
}

/** One candidate position of one shape instance on the board */
export interface Placement {
  shapeId: number;
  /** Index distinguishing interchangeable instances of the same shape */
  instance: number;
  /** Index into the shape's orientation list */
  orientation: number;
  /** Translation of the orientation's bounding box */
  x: number;
  y: number;
  /** Absolute board cells covered */
  cells: Coord[];
}

/** Size of one SAT encoding, reported before solving */
export interface PackingStats {
  numPlacements: number;
  numVariables: number;
  numClauses: number;
}

/**
 * Outcome of a packing attempt.
 *
 * `unsolvable` is a proof that no packing exists. `unknown` only comes from a
 * search that ran out of its step budget.
 */
export type PackingResult =
  | { status: "solved"; placements: Placement[] }
  | { status: "unsolvable" }
  | { status: "unknown"; stepsTaken: number };

export type PackingStatus = PackingResult["status"];

/** Hooks invoked at fixed points of a solve; all optional */
export interface PackingObserver {
  /** SAT strategy: called once, after encoding and before solving */
  onStatsReady?: (stats: PackingStats) => void;
  /** Backtracking strategy: called after each committed placement */
  onPiecePlaced?: (placement: Placement, depth: number) => void;
}

/**
 * Anything that decides a packing problem. Both strategies share this
 * signature so callers can pick one or run both.
 */
export type PackingStrategy<Options extends PackingObserver = PackingObserver> = (
  shapes: readonly Shape[],
  space: ProblemSpace,
  options?: Options
) => PackingResult;
