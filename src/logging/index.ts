/**
 * Logging and observability utilities.
 */

export { generateRunId, isRunId, RUN_ID_PREFIX } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
