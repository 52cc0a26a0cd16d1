/**
 * Console-backed scoped logger. Non-fatal degradations (a failed estimator,
 * a layer without text) go through `warn` so they stay diagnosable without
 * reaching the caller.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
  child: (scope: string) => Logger;
}

let globalLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  globalLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  const enabled = (target: LogLevel) => LEVEL_RANK[target] >= LEVEL_RANK[level ?? globalLevel];
  const prefix = `[beatreel:${scope}]`;

  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.info(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  };
}
