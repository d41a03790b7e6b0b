import log from "loglevel";

export enum LoggerLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  SILENT = "silent",
}

/**
 * Default log level
 */
const DEFAULT_LOG_LEVEL = LoggerLevel.SILENT;

// Named logger so host applications can tune this package independently
export const logger = log.getLogger("structured-schema");

logger.setLevel(DEFAULT_LOG_LEVEL);

/**
 * Change the package log level, e.g. `setLogLevel(LoggerLevel.DEBUG)`
 */
export function setLogLevel(level: LoggerLevel): void {
  logger.setLevel(level);
}
