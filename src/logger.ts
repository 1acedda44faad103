// CHANGE: Structured logger with DEBUG/INFO/WARN/ERROR levels.
// WHY: Remote calls, cache transitions and non-fatal pipeline failures need distinct visibility.

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(levelWeight, value);
}

const configuredLevel = process.env.RELASSET_LOG_LEVEL?.toLowerCase();
let activeLevel: LogLevel = isLogLevel(configuredLevel) ? configuredLevel : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  warn: message => chalk.yellow(`[WARN] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Set log level for runtime diagnostics.
 *
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

/**
 * Emit information-level log entry.
 *
 * Invariant: message must be a human-readable summary of a session stage.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit debug-level log entry (HTTP statuses, cache paths, resilience state).
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit warning for a recovered or non-fatal condition.
 */
export function warn(message: string): void {
  if (shouldLog("warn")) {
    console.warn(formatters.warn(message));
  }
}

export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
