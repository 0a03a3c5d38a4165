/**
 * Scoped console logger.
 *
 * Every line is prefixed with its scope (`[ledger] decision recorded`).
 * The level is process-wide: set it once from configuration.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.TALKGUARD_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Derive a logger with a nested scope (`[api:talks]`) */
  child(scope: string): Logger;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    scope,
    debug(message, ...details) {
      if (enabled("debug")) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`);
    }
  };
}
