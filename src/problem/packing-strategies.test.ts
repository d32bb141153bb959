/**
 * Cross-checks the SAT and backtracking strategies against each other.
 *
 * Both must agree on solvability; the chosen placements may differ, so
 * each packing is checked on its own.
 */

import { describe, it, expect } from "vitest";
import { StrategyDisagreementError } from "../errors";
import type { Clause, SATSolver, SolveResult } from "../solvers";
import type { ProblemSpace, Shape } from "./index";
import { packingStrategies, solveWithCrossCheck, validatePacking } from "./index";

const SHAPES: Shape[] = [
  { id: 0, grid: ["#..", "...", "..."] },
  { id: 1, grid: [".#.", "###", ".#."] },
  { id: 2, grid: ["#..", "#..", "##."] },
  { id: 3, grid: ["###", ".#.", "..."] },
  { id: 4, grid: [".##", "##.", "..."] },
  { id: 5, grid: ["##.", "...", "..."] },
];

/** Counts like a real backend but refutes every formula */
class AlwaysUnsatSolver implements SATSolver {
  private variables = 0;
  private clauses: Clause[] = [];

  newVariable(): number {
    return ++this.variables;
  }

  addClause(clause: Clause): void {
    this.clauses.push(clause);
  }

  solve(): SolveResult {
    return { satisfiable: false };
  }

  getVariableCount(): number {
    return this.variables;
  }

  getClauseCount(): number {
    return this.clauses.length;
  }
}

const CASES: { name: string; space: ProblemSpace; solvable: boolean }[] = [
  { name: "four single cells on 2x2", space: { width: 2, height: 2, shapeCounts: [4] }, solvable: true },
  { name: "nothing required", space: { width: 3, height: 2, shapeCounts: [] }, solvable: true },
  { name: "two plus shapes on 3x3", space: { width: 3, height: 3, shapeCounts: [0, 2] }, solvable: false },
  { name: "plus with spare room", space: { width: 4, height: 3, shapeCounts: [2, 1] }, solvable: true },
  { name: "two L on 4x2", space: { width: 4, height: 2, shapeCounts: [0, 0, 2] }, solvable: true },
  { name: "two T on 4x2", space: { width: 4, height: 2, shapeCounts: [0, 0, 0, 2] }, solvable: false },
  { name: "two S on 4x2", space: { width: 4, height: 2, shapeCounts: [0, 0, 0, 0, 2] }, solvable: false },
  { name: "S and two dominoes on 4x2", space: { width: 4, height: 2, shapeCounts: [0, 0, 0, 0, 1, 2] }, solvable: false },
  { name: "L and two dominoes on 4x2", space: { width: 4, height: 2, shapeCounts: [0, 0, 1, 0, 0, 2] }, solvable: true },
  { name: "mixed pieces on 5x3", space: { width: 5, height: 3, shapeCounts: [1, 0, 1, 1, 0, 2] }, solvable: true },
];

describe("strategy agreement", () => {
  it.each(CASES)("should agree on $name", ({ space, solvable }) => {
    const { sat, backtracking } = solveWithCrossCheck(SHAPES, space);
    const expected = solvable ? "solved" : "unsolvable";

    expect(sat.status).toBe(expected);
    expect(backtracking.status).toBe(expected);

    for (const result of [sat, backtracking]) {
      if (result.status === "solved") {
        expect(validatePacking(space, result.placements)).toEqual([]);
      }
    }
  });
});

describe("packingStrategies", () => {
  it("should expose both strategies under one contract", () => {
    const space = { width: 2, height: 1, shapeCounts: [0, 0, 0, 0, 0, 1] };
    for (const strategy of [packingStrategies.sat, packingStrategies.backtracking]) {
      const result = strategy(SHAPES, space);
      expect(result.status).toBe("solved");
    }
  });
});

describe("solveWithCrossCheck", () => {
  it("should not compare an undecided backtracking result", () => {
    const space = { width: 4, height: 2, shapeCounts: [0, 0, 0, 2] };
    const { sat, backtracking } = solveWithCrossCheck(SHAPES, space, {
      backtracking: { maxSteps: 1 },
    });

    expect(sat.status).toBe("unsolvable");
    expect(backtracking.status).toBe("unknown");
  });

  it("should throw when the verdicts differ", () => {
    const space = { width: 1, height: 1, shapeCounts: [1] };
    const call = () => solveWithCrossCheck(SHAPES, space, { sat: { solver: new AlwaysUnsatSolver() } });

    expect(call).toThrow(StrategyDisagreementError);
    expect(call).toThrow(
      "Strategies disagree: sat reported unsolvable, backtracking reported solved"
    );
  });
});
