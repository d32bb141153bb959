/**
 * Command-line runner: solves every problem space of a puzzle file.
 *
 * Run with: npm run solve -- <input-file> [--strategy=sat|backtracking|both]
 *   [--visualize] [--max-steps=N] [--log-level=debug|info|warn|error]
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import type { RunnerConfig } from "../config";
import { loadRunnerConfig } from "../config";
import { parsePuzzleInput } from "../input/puzzle-parser";
import type { PackingResult, ProblemSpace, Shape } from "../problem/packing-types";
import type { BacktrackingOptions } from "../problem/packing-backtracking";
import { solvePackingBacktracking } from "../problem/packing-backtracking";
import type { SatPackingOptions } from "../problem/packing-sat";
import { solvePackingSat } from "../problem/packing-sat";
import { solveWithCrossCheck } from "../problem/packing-strategies";
import { renderPacking } from "../problem/render-packing";
import { describeShapes } from "../problem/shape-geometry";
import type { Logger } from "../utils/logger";
import { createLogger } from "../utils/logger";

export interface RunSummary {
  total: number;
  solved: number;
  unsolvable: number;
  unknown: number;
  /** Wall time spent solving, parsing excluded */
  elapsedMs: number;
}

function solveSpace(
  shapes: readonly Shape[],
  space: ProblemSpace,
  config: RunnerConfig,
  logger: Logger
): PackingResult {
  const backtrackingOptions: BacktrackingOptions = {
    maxSteps: config.maxSteps,
    onPiecePlaced: (placement, depth) =>
      logger.debug(`  depth ${depth}: shape ${placement.shapeId} at (${placement.x},${placement.y})`),
  };
  const satOptions: SatPackingOptions = {
    onStatsReady: (stats) =>
      logger.debug(
        `  ${stats.numPlacements} placements, ${stats.numVariables} variables, ${stats.numClauses} clauses`
      ),
  };

  switch (config.strategy) {
    case "sat":
      return solvePackingSat(shapes, space, satOptions);
    case "backtracking":
      return solvePackingBacktracking(shapes, space, backtrackingOptions);
    case "both":
      return solveWithCrossCheck(shapes, space, {
        sat: satOptions,
        backtracking: backtrackingOptions,
      }).sat;
  }
}

/**
 * Solve all problem spaces of already-parsed input and report as we go.
 */
export function runPuzzle(
  text: string,
  config: RunnerConfig,
  logger: Logger = createLogger(config.logLevel),
  now: () => number = () => performance.now()
): RunSummary {
  const { shapes, spaces } = parsePuzzleInput(text);

  logger.info(`Parsed ${shapes.length} shapes`);
  logger.info(`Parsed ${spaces.length} problem spaces`);
  for (const summary of describeShapes(shapes)) {
    logger.info(
      `  Shape ${summary.id}: ${summary.cells} cells, ${summary.orientations} unique transformations (out of 8 possible)`
    );
  }

  const summary: RunSummary = {
    total: spaces.length,
    solved: 0,
    unsolvable: 0,
    unknown: 0,
    elapsedMs: 0,
  };
  const startTime = now();

  spaces.forEach((space, i) => {
    if (config.visualize) {
      logger.info(`\n----- Problem Space ${i + 1} -----`);
      logger.info(`Dimensions: ${space.width}x${space.height}`);
      logger.info(`Shape counts: [${space.shapeCounts.join(", ")}]`);
    } else {
      logger.debug(`Solving space ${i + 1}/${spaces.length} (${summary.solved} solved so far)`);
    }

    const result = solveSpace(shapes, space, config, logger);
    summary[result.status]++;

    if (!config.visualize) return;
    if (result.status === "solved") {
      logger.info("Solution visualization:");
      for (const row of renderPacking(result.placements, space.width, space.height)) {
        logger.info(row);
      }
    } else if (result.status === "unsolvable") {
      logger.info("No solution found");
    } else {
      logger.info(`Gave up after ${result.stepsTaken} steps`);
    }
  });

  summary.elapsedMs = now() - startTime;

  const perSolved = summary.solved > 0
    ? ` (${(summary.elapsedMs / summary.solved).toFixed(2)}ms per solved problem)`
    : "";
  logger.info(
    `\n${summary.solved} / ${summary.total} problem spaces solved in ${summary.elapsedMs.toFixed(2)}ms${perSolved}`
  );
  if (summary.unknown > 0) {
    logger.warn(`${summary.unknown} problem spaces undecided within the step budget`);
  }

  return summary;
}

export function main(argv: readonly string[]): number {
  let logger = createLogger();
  try {
    const config = loadRunnerConfig(argv);
    logger = createLogger(config.logLevel);
    const text = fs.readFileSync(config.inputPath, "utf-8");
    runPuzzle(text, config, logger);
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    return 1;
  }
}

if (import.meta.url.startsWith("file:")) {
  const modulePath = fileURLToPath(import.meta.url);
  if (process.argv[1] === modulePath) {
    process.exitCode = main(process.argv.slice(2));
  }
}
