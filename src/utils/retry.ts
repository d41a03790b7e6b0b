/**
 * Retry utility with exponential backoff
 */

import { logger } from "./logger";

export interface RetryOptions<T> {
  operation: () => Promise<T>;
  maxRetries: number;
  delay: (attempt: number) => number;
  onRetry?: (attempt: number, error: unknown) => void;
  onFailure?: (error: unknown) => boolean;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown) => boolean;
}

export async function retry<T>(options: RetryOptions<T>): Promise<T> {
  const { operation, maxRetries, delay, onRetry, onFailure, shouldRetry } =
    options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error: unknown) {
      lastError = error;

      if (shouldRetry && !shouldRetry(error)) {
        throw error;
      }

      if (attempt === maxRetries) {
        const shouldRethrow = onFailure ? onFailure(lastError) : true;
        if (shouldRethrow) {
          throw lastError;
        }
        break;
      }

      if (onRetry) {
        onRetry(attempt, lastError);
      }

      const delayMs = delay(attempt);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError ?? new Error("Operation failed");
}

const backoff = (attempt: number): number =>
  Math.min(1000 * Math.pow(2, attempt), 5000);

export const withTimeoutAndRetry = async <T>(
  operation: () => Promise<T>,
  timeoutMs: number = 60000,
  maxRetries: number = 3,
  operationName: string = "AI operation",
  shouldRetry?: (error: unknown) => boolean
): Promise<T> => {
  const createTimeoutOperation = () => async (): Promise<T> => {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new Error(`Operation timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([operation(), timeout]);
    } finally {
      clearTimeout(timeoutId);
    }
  };

  return retry<T>({
    operation: createTimeoutOperation(),
    maxRetries,
    delay: backoff,
    shouldRetry,
    onRetry: (attempt: number, error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`[${operationName}] Failed attempt ${attempt + 1}:`, message);
      logger.debug(
        `[${operationName}] Retrying in ${backoff(attempt)}ms (attempt ${attempt + 2}/${maxRetries + 1})`
      );
    },
    onFailure: () => {
      logger.error(`[${operationName}] All ${maxRetries + 1} attempts failed`);
      return true;
    },
  });
};
