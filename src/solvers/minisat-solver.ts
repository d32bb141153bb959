/**
 * MiniSat-based SAT Solver Implementation
 *
 * Uses the logic-solver npm package which contains MiniSat
 * compiled to JavaScript via Emscripten.
 */

import Logic from "logic-solver";
import type { Clause, SATSolver, SolveResult } from "./types";
import { BaseFormulaBuilder } from "./types";

const varName = (varNum: number) => `v${varNum}`;

/**
 * SATSolver over logic-solver, which only knows named variables:
 * variable n is `v<n>`, its negation `-v<n>`.
 */
export class MiniSatSolver implements SATSolver {
  private solver = new Logic.Solver();
  private variableCount = 0;
  private clauseCount = 0;

  newVariable(): number {
    this.variableCount++;
    // Registers the name so unconstrained variables still get a value
    this.solver.getVarNum(varName(this.variableCount));
    return this.variableCount;
  }

  addClause(clause: Clause): void {
    this.clauseCount++;
    if (clause.length === 0) {
      this.solver.require(Logic.FALSE);
      return;
    }

    const terms = clause.map((lit) => {
      const varNum = Math.abs(lit);
      if (varNum < 1 || varNum > this.variableCount) {
        throw new Error(`Unknown variable: ${varNum}`);
      }
      return lit > 0 ? varName(varNum) : `-${varName(varNum)}`;
    });
    this.solver.require(Logic.or(...terms));
  }

  solve(): SolveResult {
    const solution = this.solver.solve();
    if (!solution) {
      return { satisfiable: false };
    }

    const trueVars = new Set(solution.getTrueVars());
    const assignment = new Map<number, boolean>();
    for (let varNum = 1; varNum <= this.variableCount; varNum++) {
      assignment.set(varNum, trueVars.has(varName(varNum)));
    }
    return { satisfiable: true, assignment };
  }

  getVariableCount(): number {
    return this.variableCount;
  }

  getClauseCount(): number {
    return this.clauseCount;
  }
}

/**
 * Formula builder backed by a fresh MiniSatSolver unless one is given.
 */
export class MiniSatFormulaBuilder extends BaseFormulaBuilder {
  constructor(solver?: SATSolver) {
    super(solver ?? new MiniSatSolver());
  }
}
