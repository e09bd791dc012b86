/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, RUN_ID_PATTERN } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from "./logger.js";
