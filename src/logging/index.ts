/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, setRunId, RUN_ID_PATTERN } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerOptions,
} from "./logger.js";
