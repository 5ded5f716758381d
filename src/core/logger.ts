export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** The subset of Console the stores write diagnostics through */
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

const noop = (): void => {};

/**
 * Console logger filtered by level. Everything goes to stderr so command
 * output on stdout stays parseable.
 */
export function createLogger(level: LogLevel = "warn"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel) => LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: enabled("debug") ? (...args: unknown[]) => console.error("[debug]", ...args) : noop,
    info: enabled("info") ? (...args: unknown[]) => console.error(...args) : noop,
    warn: enabled("warn") ? (...args: unknown[]) => console.warn(...args) : noop,
    error: enabled("error") ? (...args: unknown[]) => console.error(...args) : noop,
  };
}
