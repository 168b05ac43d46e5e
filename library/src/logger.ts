/**
 * Log levels, from the most verbose to none at all
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Minimal logger contract used across the library
 *
 * Any object with these methods can be injected (pino, winston and console all fit).
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const PREFIX = "[mongo-session-scoped]";

/**
 * Creates a console-backed logger that drops messages below `level`
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("debug");
 * logger.warn("Session finalizer failed", error);
 * ```
 */
export function createConsoleLogger(level: LogLevel = "warn"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (target: LogLevel) => LOG_LEVELS.indexOf(target) >= threshold;

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(PREFIX, message, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.info(PREFIX, message, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(PREFIX, message, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(PREFIX, message, ...details);
    },
  };
}
