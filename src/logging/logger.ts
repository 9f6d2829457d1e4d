/**
 * Levelled logger for the CLI commands.
 *
 * Every entry is rendered once and handed to each enabled sink (console,
 * append-only log file):
 *
 *   [2026-10-18T09:30:00.000Z] [INFO ] [20261018-a1b2c3] Catalog loaded {"components":53}
 *
 * The core modules never log; only the commands in src/cli do.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LEVEL_SEVERITY: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_SEVERITY, value);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  /** Defaults to the current run ID */
  runId?: string;
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default: info) */
  level?: LogLevel;
  /** Directory of the log file (default: output/logs) */
  logDir?: string;
  /** Log file name (default: generator.log) */
  logFile?: string;
  /** Write to the console (default: true) */
  console?: boolean;
  /** Append to the log file (default: true) */
  file?: boolean;
  /** Fields merged into every entry's context */
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger writing to the same sinks with extra context fields */
  child(context: LogContext): Logger;
}

type LogSink = (level: LogLevel, line: string) => void;

/**
 * Render one entry as a single log line. Empty context is omitted.
 */
export function formatLogEntry(entry: LogEntry): string {
  const runId = entry.runId ?? getRunId() ?? "no-run-id";
  const level = entry.level.toUpperCase().padEnd(5);
  const line = `[${entry.timestamp.toISOString()}] [${level}] [${runId}] ${entry.message}`;

  return Object.keys(entry.context).length > 0
    ? `${line} ${JSON.stringify(entry.context)}`
    : line;
}

function consoleSink(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function fileSink(logDir: string, logFile: string): LogSink {
  mkdirSync(logDir, { recursive: true });
  const path = join(logDir, logFile);

  return (_level, line) => {
    try {
      appendFileSync(path, `${line}\n`);
    } catch (err) {
      console.error(
        `Failed to write to log file ${path}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  };
}

function buildLogger(
  sinks: ReadonlyArray<LogSink>,
  threshold: number,
  baseContext: LogContext
): Logger {
  const log = (level: LogLevel, message: string, context: LogContext = {}): void => {
    if (LEVEL_SEVERITY[level] < threshold || sinks.length === 0) {
      return;
    }
    const line = formatLogEntry({
      level,
      message,
      context: { ...baseContext, ...context },
      timestamp: new Date(),
    });
    for (const sink of sinks) {
      sink(level, line);
    }
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (context) => buildLogger(sinks, threshold, { ...baseContext, ...context }),
  };
}

/**
 * Create a logger. The log directory is created up front when file output
 * is enabled.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sinks: LogSink[] = [];
  if (options.console ?? true) {
    sinks.push(consoleSink);
  }
  if (options.file ?? true) {
    sinks.push(fileSink(options.logDir ?? "output/logs", options.logFile ?? "generator.log"));
  }

  return buildLogger(sinks, LEVEL_SEVERITY[options.level ?? "info"], options.context ?? {});
}
