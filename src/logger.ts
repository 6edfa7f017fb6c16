/**
 * @module logger
 *
 * Structured JSON-lines logging. Each component takes a scoped logger, so
 * every line names where it came from:
 *
 * ```json
 * {"timestamp":"...","level":"WARN","scope":"lifecycle","message":"Status transition rejected","context":{...}}
 * ```
 *
 * ERROR lines go to stderr, everything else to stdout. The process-wide
 * threshold starts at `CIVICPULSE_LOG_LEVEL` and `setLogLevel` changes it;
 * a logger created with its own level ignores it.
 */

import { loadConfig } from "./config.ts";
import type { LogLevel } from "./config.ts";

export type { LogLevel };

export type LogContext = Record<string, unknown>;

export type LogEntry = Readonly<{
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  context?: LogContext;
}>;

export type Logger = Readonly<{
  error: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  debug: (message: string, context?: LogContext) => void;
}>;

const SEVERITY: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

let threshold: LogLevel = loadConfig().logLevel;

/** Process-wide switch for every logger without a pinned level. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLevelEnabled(
  level: LogLevel,
  against: LogLevel = threshold,
): boolean {
  return SEVERITY[level] <= SEVERITY[against];
}

function write(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === "ERROR") console.error(line);
  else console.log(line);
}

/**
 * Returns a logger whose entries carry `scope`. With `pinned`, it filters
 * against that level instead of the process-wide one.
 */
export function createLogger(scope?: string, pinned?: LogLevel): Logger {
  const at = (level: LogLevel) => (message: string, context?: LogContext) => {
    if (!isLevelEnabled(level, pinned ?? threshold)) return;
    write({
      timestamp: new Date().toISOString(),
      level,
      ...(scope !== undefined && { scope }),
      message,
      ...(context && { context }),
    });
  };

  return {
    error: at("ERROR"),
    warn: at("WARN"),
    info: at("INFO"),
    debug: at("DEBUG"),
  };
}
