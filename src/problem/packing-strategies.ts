/**
 * Strategy selection and cross-checking between the two packing solvers.
 */

import { StrategyDisagreementError } from "../errors";
import type { PackingResult, PackingStrategy, ProblemSpace, Shape } from "./packing-types";
import type { BacktrackingOptions } from "./packing-backtracking";
import { solvePackingBacktracking } from "./packing-backtracking";
import type { SatPackingOptions } from "./packing-sat";
import { solvePackingSat } from "./packing-sat";

export type StrategyName = "sat" | "backtracking";

export const packingStrategies: {
  sat: PackingStrategy<SatPackingOptions>;
  backtracking: PackingStrategy<BacktrackingOptions>;
} = {
  sat: solvePackingSat,
  backtracking: solvePackingBacktracking,
};

export interface CrossCheckResult {
  sat: PackingResult;
  backtracking: PackingResult;
}

/**
 * Run both strategies on the same problem.
 *
 * Throws StrategyDisagreementError when both reach a verdict and the verdicts
 * differ. An `unknown` backtracking result is not compared.
 */
export function solveWithCrossCheck(
  shapes: readonly Shape[],
  space: ProblemSpace,
  options: { sat?: SatPackingOptions; backtracking?: BacktrackingOptions } = {}
): CrossCheckResult {
  const sat = solvePackingSat(shapes, space, options.sat);
  const backtracking = solvePackingBacktracking(shapes, space, options.backtracking);

  if (backtracking.status !== "unknown" && sat.status !== backtracking.status) {
    throw new StrategyDisagreementError(sat.status, backtracking.status);
  }

  return { sat, backtracking };
}
