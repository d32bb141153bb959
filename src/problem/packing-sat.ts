/**
 * Polyomino Packing SAT Encoder
 *
 * Decides whether every required piece instance fits on the board.
 *
 * Variables: one boolean per placement (is this placement used?)
 *
 * Constraints:
 * 1. Each piece instance uses exactly one of its placements.
 * 2. Each board cell is covered by at most one used placement.
 *
 * Both are encoded pairwise, so the clause count grows quadratically with
 * the number of placements per instance and per cell.
 */

import { MiniSatFormulaBuilder } from "../solvers";
import type { SATSolver } from "../solvers";
import type { PackingObserver, PackingResult, Placement, ProblemSpace, Shape } from "./packing-types";
import { generatePlacements, resolvePieces } from "./placements";

export interface SatPackingOptions extends PackingObserver {
  /** SAT backend; a fresh MiniSat instance per call by default */
  solver?: SATSolver;
}

/**
 * Solve a packing problem with a SAT solver.
 *
 * `unsolvable` is definitive. When several packings exist, which one is
 * returned depends on the backend.
 */
export function solvePackingSat(
  shapes: readonly Shape[],
  space: ProblemSpace,
  options: SatPackingOptions = {}
): PackingResult {
  const pieces = resolvePieces(shapes, space);
  const builder = new MiniSatFormulaBuilder(options.solver);
  const solver = builder.solver;

  // Create one variable per placement, grouped by piece instance
  const allPlacements: Placement[] = [];
  const placementVars: number[] = [];
  const cellToVars: Map<number, number[]> = new Map();

  for (const piece of pieces) {
    const placements = generatePlacements(
      piece.shape,
      piece.instance,
      space.width,
      space.height,
      piece.orientations
    );

    const instanceVars: number[] = [];
    for (const p of placements) {
      const varNum = builder.createNamedVariable(
        `place_${p.shapeId}_${p.instance}_${p.orientation}_${p.x}_${p.y}`
      );
      allPlacements.push(p);
      placementVars.push(varNum);
      instanceVars.push(varNum);

      for (const cell of p.cells) {
        const index = cell.y * space.width + cell.x;
        const vars = cellToVars.get(index);
        if (vars) {
          vars.push(varNum);
        } else {
          cellToVars.set(index, [varNum]);
        }
      }
    }

    // CONSTRAINT 1: exactly one placement per instance.
    // No placements at all leaves an empty clause, which is UNSAT.
    builder.addExactlyOne(instanceVars);
  }

  // CONSTRAINT 2: non-overlap
  for (const vars of cellToVars.values()) {
    builder.addAtMostOne(vars);
  }

  options.onStatsReady?.({
    numPlacements: allPlacements.length,
    numVariables: solver.getVariableCount(),
    numClauses: solver.getClauseCount(),
  });

  const result = solver.solve();
  if (!result.satisfiable) {
    return { status: "unsolvable" };
  }

  const used = allPlacements.filter((_, i) => result.assignment.get(placementVars[i]) === true);
  return { status: "solved", placements: used };
}
