/**
 * Lightweight logging utility.
 * Writes timestamped, run-scoped entries to the console, an optional log
 * file, and an optional structured sink.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured form of a single log entry, as handed to a sink.
 */
export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly runId: string;
  readonly component?: string;
  readonly message: string;
  readonly context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Component name shown in every entry */
  component?: string;
  /** Directory for log files; file output is enabled only when set */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Receives every entry that passes the level filter */
  sink?: LogSink;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Derive a logger that tags entries with a (nested) component name. */
  child(component: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Format a log entry with timestamp, level, run ID, component, and message.
 */
export function formatLogEntry(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const componentStr = entry.component ? ` [${entry.component}]` : "";

  let line = `[${entry.timestamp}] [${levelStr}] [${entry.runId}]${componentStr} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }

  return line;
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
  const level = options.level ?? "info";
  const useConsole = options.console ?? true;
  const logFilePath =
    options.logDir !== undefined ? join(options.logDir, options.logFile ?? "app.log") : undefined;

  if (options.logDir !== undefined && !existsSync(options.logDir)) {
    mkdirSync(options.logDir, { recursive: true });
  }

  function build(component: string | undefined): Logger {
    function log(
      entryLevel: LogLevel,
      message: string,
      context?: Record<string, unknown>
    ): void {
      if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
        return;
      }

      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: entryLevel,
        runId: getRunId() ?? "no-run-id",
        ...(component !== undefined ? { component } : {}),
        message,
        ...(context !== undefined ? { context } : {}),
      };

      options.sink?.(entry);

      if (useConsole) {
        getConsoleMethod(entryLevel)(formatLogEntry(entry));
      }

      if (logFilePath !== undefined) {
        try {
          appendFileSync(logFilePath, formatLogEntry(entry) + "\n");
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
      child: (name) => build(component ? `${component}.${name}` : name),
    };
  }

  return build(options.component);
}

/**
 * A logger that drops everything. Stages fall back to it when the caller
 * supplies none.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false });
}
