"use strict";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") {
    return arg;
  }
  if (arg instanceof Error) {
    return arg.stack || arg.message;
  }
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export function formatLog(level: string, args: unknown[], now: Date = new Date()): string {
  return `${now.toISOString()} [${level}] ${args.map(formatArg).join(" ")}`;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LOG_LEVELS[currentLevel] <= LOG_LEVELS[level];
}

/**
 * Leveled logger over the console. Reports go to stdout, problems to stderr.
 */
export const logger = {
  debug: (...args: unknown[]): void => {
    if (enabled("debug")) console.log(formatLog("DEBUG", args));
  },
  info: (...args: unknown[]): void => {
    if (enabled("info")) console.log(formatLog("INFO", args));
  },
  warn: (...args: unknown[]): void => {
    if (enabled("warn")) console.warn(formatLog("WARN", args));
  },
  error: (...args: unknown[]): void => {
    if (enabled("error")) console.error(formatLog("ERROR", args));
  },
};
