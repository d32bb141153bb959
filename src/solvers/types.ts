/**
 * SAT Solver Abstraction Layer
 *
 * Packing encoders talk to this interface only, so the backend behind it
 * (MiniSat today) can be swapped without touching the encoding.
 */

/**
 * A literal is either a positive variable (variable number)
 * or a negative variable (-variable number).
 * In DIMACS format: positive = true, negative = false
 */
export type Literal = number;

/**
 * A clause is a disjunction (OR) of literals
 */
export type Clause = Literal[];

/**
 * Result of a SAT solve operation
 */
export type SolveResult =
  | { satisfiable: true; assignment: Map<number, boolean> }
  | { satisfiable: false };

/**
 * Abstract SAT solver interface
 */
export interface SATSolver {
  /**
   * Create a new variable and return its number (1-indexed)
   */
  newVariable(): number;

  /**
   * Add a clause (disjunction of literals).
   * An empty clause makes the formula unsatisfiable.
   */
  addClause(clause: Clause): void;

  solve(): SolveResult;

  getVariableCount(): number;

  getClauseCount(): number;
}

/**
 * Higher-level formula builder that works with any SATSolver
 */
export interface FormulaBuilder {
  solver: SATSolver;

  /**
   * Create named variables for easier debugging
   */
  createNamedVariable(name: string): number;

  /**
   * At least one of the literals must be true.
   * An empty list is unsatisfiable.
   */
  addOr(literals: Literal[]): void;

  /**
   * Exactly one literal must be true (pairwise at-most-one)
   */
  addExactlyOne(literals: Literal[]): void;

  /**
   * At most one literal can be true (pairwise)
   */
  addAtMostOne(literals: Literal[]): void;
}

/**
 * FormulaBuilder over any SATSolver.
 *
 * Cardinality constraints use the pairwise encoding only, so the clause
 * count grows quadratically with the number of literals.
 */
export class BaseFormulaBuilder implements FormulaBuilder {
  solver: SATSolver;
  private nameToVar: Map<string, number> = new Map();

  constructor(solver: SATSolver) {
    this.solver = solver;
  }

  createNamedVariable(name: string): number {
    if (this.nameToVar.has(name)) {
      throw new Error(`Variable already exists: ${name}`);
    }
    const varNum = this.solver.newVariable();
    this.nameToVar.set(name, varNum);
    return varNum;
  }

  addOr(literals: Literal[]): void {
    this.solver.addClause(literals);
  }

  addExactlyOne(literals: Literal[]): void {
    this.addOr(literals);
    this.addAtMostOne(literals);
  }

  addAtMostOne(literals: Literal[]): void {
    for (let i = 0; i < literals.length; i++) {
      for (let j = i + 1; j < literals.length; j++) {
        // ¬li ∨ ¬lj
        this.solver.addClause([-literals[i], -literals[j]]);
      }
    }
  }
}
