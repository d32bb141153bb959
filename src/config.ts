/**
 * Runner configuration from command-line flags and environment variables.
 *
 * Flags win over the environment:
 * - `--strategy=sat|backtracking|both` or PACKING_STRATEGY
 * - `--log-level=debug|info|warn|error` or PACKING_LOG_LEVEL
 * - `--max-steps=N` (backtracking budget)
 * - `--visualize`
 * - first positional argument: puzzle file path
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { LOG_LEVELS } from "./utils/logger";

export const RunnerConfigSchema = z.object({
  inputPath: z.string().min(1, "an input file path is required"),
  strategy: z.enum(["sat", "backtracking", "both"]).default("sat"),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  maxSteps: z.coerce.number().int().positive().optional(),
  visualize: z.boolean().default(false),
});

const VALUE_FLAGS = new Set(["strategy", "log-level", "max-steps"]);
const SWITCH_FLAGS = new Set(["visualize"]);

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;

export function loadRunnerConfig(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env
): RunnerConfig {
  const flags = new Map<string, string | true>();
  const positional: string[] = [];

  for (const arg of argv) {
    if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      if (eq === -1) {
        flags.set(arg.slice(2), true);
      } else {
        flags.set(arg.slice(2, eq), arg.slice(eq + 1));
      }
    } else {
      positional.push(arg);
    }
  }

  const misused: string[] = [];
  for (const [name, value] of flags) {
    if (VALUE_FLAGS.has(name)) {
      if (value === true) misused.push(`--${name} needs a value (--${name}=...)`);
    } else if (SWITCH_FLAGS.has(name)) {
      if (value !== true) misused.push(`--${name} takes no value`);
    } else {
      misused.push(`unknown flag --${name}`);
    }
  }
  if (misused.length > 0) {
    throw new ConfigError(misused);
  }

  const stringFlag = (name: string): string | undefined => {
    const value = flags.get(name);
    return typeof value === "string" ? value : undefined;
  };

  const parsed = RunnerConfigSchema.safeParse({
    inputPath: positional[0] ?? "",
    strategy: stringFlag("strategy") ?? env.PACKING_STRATEGY,
    logLevel: stringFlag("log-level") ?? env.PACKING_LOG_LEVEL,
    maxSteps: stringFlag("max-steps"),
    visualize: flags.get("visualize") === true,
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return parsed.data;
}
