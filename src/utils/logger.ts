/**
 * Leveled console logger for the command-line runner.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(level: LogLevel = "info"): Logger {
  const enabled = (candidate: LogLevel) =>
    LOG_LEVELS.indexOf(candidate) >= LOG_LEVELS.indexOf(logger.level);

  const logger: Logger = {
    level,
    debug(message) {
      if (enabled("debug")) console.debug(message);
    },
    info(message) {
      if (enabled("info")) console.log(message);
    },
    warn(message) {
      if (enabled("warn")) console.warn(message);
    },
    error(message) {
      if (enabled("error")) console.error(message);
    },
  };

  return logger;
}
