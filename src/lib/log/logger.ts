/**
 * Console logger with a level gate.
 *
 * Lines follow the `key=value` style used across the worker and scripts, e.g.
 * `photo=12 catalog=written sidecar=skipped-unreachable`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// No-op function used for filtered levels.
function noop(): void {}

export function createLogger(level: LogLevel = "info"): Logger {
  const min = LEVEL_RANK[level];

  return {
    debug: LEVEL_RANK.debug >= min ? console.debug.bind(console) : noop,
    info: LEVEL_RANK.info >= min ? console.log.bind(console) : noop,
    warn: LEVEL_RANK.warn >= min ? console.warn.bind(console) : noop,
    error: console.error.bind(console),
  };
}

// Swallows everything; handy in tests.
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

// Error -> message string, the way every catch block in this repo reports it.
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
