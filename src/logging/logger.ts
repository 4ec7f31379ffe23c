/**
 * Cliniq - Logger
 *
 * The same shape plugins receive as `api.logger`; console-backed with a
 * `[cliniq:<scope>]` prefix and a level threshold.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_RANK[level];
  const prefix = `[cliniq:${scope}]`;
  const enabled = (l: Exclude<LogLevel, "silent">) => LEVEL_RANK[l] >= threshold;

  return {
    debug(message, ...meta) {
      if (enabled("debug")) console.debug(prefix, message, ...meta);
    },
    info(message, ...meta) {
      if (enabled("info")) console.info(prefix, message, ...meta);
    },
    warn(message, ...meta) {
      if (enabled("warn")) console.warn(prefix, message, ...meta);
    },
    error(message, ...meta) {
      if (enabled("error")) console.error(prefix, message, ...meta);
    },
    child(child) {
      return createLogger(`${scope}:${child}`, level);
    },
  };
}

/** Logger that drops everything; the default for library callers and tests. */
export const silentLogger: Logger = createLogger("silent", "silent");
