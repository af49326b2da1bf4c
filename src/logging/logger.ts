/**
 * Leveled logger for the explorer.
 *
 * Entries go to stderr so stdout carries only the report, and optionally to
 * an append-only log file. Extra sinks receive every entry that passes the
 * level filter. Each line carries a timestamp and the current run ID.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly runId: string;
  readonly message: string;
  readonly context: LogContext;
}

/** Receives an entry together with its formatted line */
export type LogSink = (entry: LogEntry, line: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Write entries to stderr */
  console?: boolean;
  /** Append entries to logDir/logFile */
  file?: boolean;
  /** Fields merged into the context of every entry */
  context?: LogContext;
  sinks?: readonly LogSink[];
  /** Clock for entry timestamps */
  now?: () => Date;
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "explorer.log",
  console: true,
  file: false,
  context: {},
  sinks: [],
  now: () => new Date(),
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger whose entries also carry the given fields. */
  child(context: LogContext): Logger;
}

export function shouldLog(level: LogLevel, minimum: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minimum];
}

/**
 * `[timestamp] [LEVEL] [runId] message {context}`; the context is omitted
 * when empty.
 */
export function formatLogEntry(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  let line = `[${entry.timestamp}] [${levelStr}] [${entry.runId}] ${entry.message}`;
  if (Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  return line;
}

const stderrSink: LogSink = (_entry, line) => {
  process.stderr.write(line + "\n");
};

function fileSink(logDir: string, logFile: string): LogSink {
  mkdirSync(logDir, { recursive: true });
  const path = join(logDir, logFile);
  return (_entry, line) => {
    try {
      appendFileSync(path, line + "\n");
    } catch (err) {
      process.stderr.write(`Failed to write to log file ${path}: ${String(err)}\n`);
    }
  };
}

function buildLogger(opts: Required<LoggerOptions>, sinks: readonly LogSink[]): Logger {
  function log(level: LogLevel, message: string, context: LogContext = {}): void {
    if (!shouldLog(level, opts.level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: opts.now().toISOString(),
      level,
      runId: getRunId() ?? "no-run-id",
      message,
      context: { ...opts.context, ...context },
    };
    const line = formatLogEntry(entry);
    for (const sink of sinks) {
      sink(entry, line);
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    // Children share the parent's sinks, so the log file is opened once
    child: (context) =>
      buildLogger({ ...opts, context: { ...opts.context, ...context } }, sinks),
  };
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const sinks: LogSink[] = [...opts.sinks];
  if (opts.console) sinks.push(stderrSink);
  if (opts.file) sinks.push(fileSink(opts.logDir, opts.logFile));
  return buildLogger(opts, sinks);
}
