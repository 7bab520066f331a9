/**
 * Lightweight logging utility.
 * Writes timestamped lines carrying the run ID and the component scope to
 * the console and, optionally, to a log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Component name printed with every line */
  scope?: string;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Receives every formatted line that passes the level filter */
  sink?: (line: string, level: LogLevel) => void;
}

interface ResolvedLoggerOptions {
  level: LogLevel;
  scope: string | undefined;
  logDir: string;
  logFile: string;
  console: boolean;
  file: boolean;
  sink: ((line: string, level: LogLevel) => void) | undefined;
}

const DEFAULT_OPTIONS: ResolvedLoggerOptions = {
  level: "info",
  scope: undefined,
  logDir: "output/logs",
  logFile: "build.log",
  console: true,
  file: false,
  sink: undefined,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger sharing this one's outputs, tagged with a nested scope. */
  child(scope: string): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, scope and message.
 */
function formatLogEntry(
  level: LogLevel,
  scope: string | undefined,
  message: string,
  context?: Record<string, unknown>
): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` [${scope}]` : "";

  let entry = `[${timestamp}] [${levelStr}] [${runId}]${scopeStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: ResolvedLoggerOptions = { ...DEFAULT_OPTIONS };
  if (options.level !== undefined) opts.level = options.level;
  if (options.scope !== undefined) opts.scope = options.scope;
  if (options.logDir !== undefined) opts.logDir = options.logDir;
  if (options.logFile !== undefined) opts.logFile = options.logFile;
  if (options.console !== undefined) opts.console = options.console;
  if (options.file !== undefined) opts.file = options.file;
  if (options.sink !== undefined) opts.sink = options.sink;

  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, opts.scope, message, context);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    opts.sink?.(entry, level);

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (scope) =>
      createLogger({
        ...opts,
        scope: opts.scope ? `${opts.scope}:${scope}` : scope,
      }),
  };
}

/**
 * Logger that drops everything. Used where a component is exercised
 * without a build around it.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
