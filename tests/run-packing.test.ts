/**
 * End-to-end runs of the command-line runner over a small puzzle file.
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import { afterEach, describe, it, expect, vi } from "vitest";
import type { RunnerConfig } from "../src/config";
import { main, runPuzzle } from "../src/cli/run-packing";
import type { Logger } from "../src/utils/logger";

const fixturePath = fileURLToPath(new URL("./fixtures/small-puzzle.txt", import.meta.url));
const puzzle = fs.readFileSync(fixturePath, "utf-8");

function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger: Logger = {
    level: "debug",
    debug: () => {},
    info: (message) => lines.push(message),
    warn: (message) => lines.push(`WARN ${message}`),
    error: (message) => lines.push(`ERROR ${message}`),
  };
  return { logger, lines };
}

/** Clock reading 100ms when solving starts and 130ms when it ends */
function fakeClock(): () => number {
  return vi.fn<() => number>().mockReturnValueOnce(100).mockReturnValueOnce(130);
}

function config(overrides: Partial<RunnerConfig> = {}): RunnerConfig {
  return {
    inputPath: fixturePath,
    strategy: "sat",
    logLevel: "info",
    visualize: false,
    ...overrides,
  };
}

describe("runPuzzle", () => {
  it.each(["sat", "backtracking", "both"] as const)(
    "should solve 3 of 5 spaces with the %s strategy",
    (strategy) => {
      const { logger, lines } = captureLogger();
      const summary = runPuzzle(puzzle, config({ strategy }), logger, fakeClock());

      expect(summary).toEqual({ total: 5, solved: 3, unsolvable: 2, unknown: 0, elapsedMs: 30 });
      expect(lines[lines.length - 1]).toBe(
        "\n3 / 5 problem spaces solved in 30.00ms (10.00ms per solved problem)"
      );
    }
  );

  it("should report shape symmetries first", () => {
    const { logger, lines } = captureLogger();
    runPuzzle(puzzle, config(), logger);

    expect(lines.slice(0, 6)).toEqual([
      "Parsed 4 shapes",
      "Parsed 5 problem spaces",
      "  Shape 0: 1 cells, 1 unique transformations (out of 8 possible)",
      "  Shape 1: 5 cells, 1 unique transformations (out of 8 possible)",
      "  Shape 2: 4 cells, 8 unique transformations (out of 8 possible)",
      "  Shape 3: 4 cells, 4 unique transformations (out of 8 possible)",
    ]);
  });

  it("should draw solved boards when visualizing", () => {
    const { logger, lines } = captureLogger();
    runPuzzle(puzzle, config({ strategy: "backtracking", visualize: true }), logger);

    const first = lines.indexOf("\n----- Problem Space 1 -----");
    expect(lines.slice(first, first + 6)).toEqual([
      "\n----- Problem Space 1 -----",
      "Dimensions: 2x2",
      "Shape counts: [4]",
      "Solution visualization:",
      "00",
      "00",
    ]);

    const second = lines.indexOf("\n----- Problem Space 2 -----");
    expect(lines.slice(second, second + 4)).toEqual([
      "\n----- Problem Space 2 -----",
      "Dimensions: 3x3",
      "Shape counts: [0, 2]",
      "No solution found",
    ]);
  });

  it("should count undecided spaces under a step budget", () => {
    const { logger, lines } = captureLogger();
    const summary = runPuzzle(
      puzzle,
      config({ strategy: "backtracking", maxSteps: 1 }),
      logger,
      fakeClock()
    );

    expect(lines).toContain("\n0 / 5 problem spaces solved in 30.00ms");
    // The 3x3 space is refuted by the area check before any step is taken
    expect(summary.unsolvable).toBe(1);
    expect(summary.unknown).toBe(4);
    expect(lines).toContain(`WARN ${summary.unknown} problem spaces undecided within the step budget`);
  });
});

describe("main", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should exit with 0 after solving a file", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    expect(main([fixturePath])).toBe(0);
  });

  it("should exit with 1 and log the error for a missing file", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(main(["does-not-exist.txt"])).toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should exit with 1 for bad flags", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(main([fixturePath, "--strategy=guess"])).toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});
