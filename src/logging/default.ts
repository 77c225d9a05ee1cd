/**
 * Process-wide default logger, built on first use from the environment
 * configuration.
 */

import { config } from "../config/index.js";
import { createLogger, isLogLevel, type Logger } from "./logger.js";

let defaultLogger: Logger | null = null;

export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = createLogger({
      level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    });
  }
  return defaultLogger;
}
