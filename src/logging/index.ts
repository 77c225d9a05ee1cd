/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createMemoryLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type MemoryLogger,
} from "./logger.js";
export { getDefaultLogger } from "./default.js";
