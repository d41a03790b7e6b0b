/**
 * Retry Utility Tests
 */
import { expect, test, describe, vi } from "vitest";
import { retry } from "../src/utils";

describe("retry", () => {
  test("should retry until the operation succeeds", async () => {
    let calls = 0;
    const onRetry = vi.fn();

    const result = await retry({
      operation: async () => {
        calls++;
        if (calls < 3) {
          throw new Error(`attempt ${calls}`);
        }
        return "done";
      },
      maxRetries: 3,
      delay: () => 0,
      onRetry,
    });

    expect(result).toBe("done");
    expect(calls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  test("should rethrow the last error once retries are exhausted", async () => {
    const onFailure = vi.fn(() => true);

    await expect(
      retry({
        operation: async () => {
          throw new Error("still failing");
        },
        maxRetries: 2,
        delay: () => 0,
        onFailure,
      })
    ).rejects.toThrow("still failing");
    expect(onFailure).toHaveBeenCalledTimes(1);
  });

  test("should stop at the first error that is not retryable", async () => {
    let calls = 0;

    await expect(
      retry({
        operation: async () => {
          calls++;
          throw new Error("bad request");
        },
        maxRetries: 5,
        delay: () => 0,
        shouldRetry: () => false,
      })
    ).rejects.toThrow("bad request");
    expect(calls).toBe(1);
  });
});
