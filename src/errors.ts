/**
 * Errors raised by the packing engine and its collaborators.
 *
 * An infeasible board is never an error: solvers report it as an
 * `unsolvable` result. These classes cover malformed input and
 * internal inconsistencies only.
 */

import type { PackingStatus } from "./problem/packing-types";

/**
 * A puzzle file could not be parsed.
 */
export class InputParseError extends Error {
  /** 1-based line number of the offending line */
  public readonly line: number;

  constructor(message: string, line: number) {
    super(`Line ${line}: ${message}`);
    this.name = "InputParseError";
    this.line = line;
  }
}

/**
 * A problem space requires instances of a shape id that was never defined.
 */
export class UnknownShapeError extends Error {
  public readonly shapeId: number;

  constructor(shapeId: number) {
    super(`Shape ${shapeId} not found`);
    this.name = "UnknownShapeError";
    this.shapeId = shapeId;
  }
}

/**
 * A shape cannot take part in a packing (for example it has no filled cells).
 */
export class InvalidShapeError extends Error {
  public readonly shapeId: number;

  constructor(shapeId: number, reason: string) {
    super(`Shape ${shapeId} is invalid: ${reason}`);
    this.name = "InvalidShapeError";
    this.shapeId = shapeId;
  }
}

/**
 * The SAT and backtracking strategies reached different definitive verdicts.
 */
export class StrategyDisagreementError extends Error {
  public readonly satStatus: PackingStatus;
  public readonly backtrackingStatus: PackingStatus;

  constructor(satStatus: PackingStatus, backtrackingStatus: PackingStatus) {
    super(
      `Strategies disagree: sat reported ${satStatus}, backtracking reported ${backtrackingStatus}`
    );
    this.name = "StrategyDisagreementError";
    this.satStatus = satStatus;
    this.backtrackingStatus = backtrackingStatus;
  }
}

/**
 * Runner configuration (flags or environment) failed validation.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
