/**
 * Logging and run tracing.
 */

export { generateRunId, initRunId, getRunId, setRunId, isRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  shouldLog,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogSink,
  type LoggerOptions,
} from "./logger.js";
