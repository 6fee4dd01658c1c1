/**
 * @fileoverview Tagged console logging.
 *
 * Every line is prefixed with the emitting module's tag, e.g.
 * `[DisjointRouteSelector] Skipping first hop b: no route`. Output goes to
 * stderr so stdout carries nothing but the report.
 *
 * @module utils/Logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Creates a logger whose lines start with `[tag]`.
 * The level is read on every call, so loggers created at module load
 * follow later `setLogLevel` calls.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message) => {
      if (enabled("debug")) console.error(`${prefix} ${message}`);
    },
    info: (message) => {
      if (enabled("info")) console.error(`${prefix} ${message}`);
    },
    warn: (message) => {
      if (enabled("warn")) console.error(`${prefix} WARN ${message}`);
    },
    error: (message) => {
      if (enabled("error")) console.error(`${prefix} ERROR ${message}`);
    },
  };
}
