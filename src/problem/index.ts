/**
 * Problem Module
 *
 * Polyomino packing: shape geometry, placement generation, and the SAT and
 * backtracking strategies that decide whether a board can hold its pieces.
 */

// Types and constants
export { EMPTY_MARKER, FILLED_MARKER, SHAPE_GRID_SIZE } from "./packing-types";
export type {
  Coord,
  PackingObserver,
  PackingResult,
  PackingStats,
  PackingStatus,
  PackingStrategy,
  Placement,
  ProblemSpace,
  Shape,
} from "./packing-types";

// Geometry
export {
  cellCount,
  describeShapes,
  flipHorizontal,
  normalizeCells,
  orientationKey,
  rotate90,
  shapeCells,
  uniqueOrientations,
  type ShapeSummary,
} from "./shape-geometry";

// Placements
export {
  generatePlacements,
  resolvePieces,
  translateOrientation,
  validatePacking,
  type PieceInstance,
} from "./placements";

// Strategies
export { solvePackingSat, type SatPackingOptions } from "./packing-sat";
export {
  orderPieces,
  solvePackingBacktracking,
  type BacktrackingOptions,
} from "./packing-backtracking";
export {
  packingStrategies,
  solveWithCrossCheck,
  type CrossCheckResult,
  type StrategyName,
} from "./packing-strategies";

// Rendering
export { renderPacking } from "./render-packing";
