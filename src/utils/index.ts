/**
 * Utility functions and helpers
 */

// Logging
export { LoggerLevel, logger, setLogLevel } from "./logger";

// Retry utilities
export type { RetryOptions } from "./retry";
export { retry, withTimeoutAndRetry } from "./retry";

// JSON utilities
export { parseJSONResponse } from "./json";
