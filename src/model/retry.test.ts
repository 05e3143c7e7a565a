// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { callWithRetry, retryDelay } from "./retry.ts";
import { RetriesExhaustedError } from "./types.ts";

function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: Array<number> } {
  const delays: Array<number> = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

describe("retryDelay", () => {
  it("doubles from the base and caps at the maximum", () => {
    expect(retryDelay(1, 500, 10000)).toBe(500);
    expect(retryDelay(2, 500, 10000)).toBe(1000);
    expect(retryDelay(3, 500, 10000)).toBe(2000);
    expect(retryDelay(6, 500, 10000)).toBe(10000);
  });
});

describe("callWithRetry", () => {
  describe("success path", () => {
    it("should call function once if successful on first attempt", async () => {
      let callCount = 0;

      const result = await callWithRetry(
        async () => {
          callCount++;
          return "success";
        },
        () => false
      );

      expect(result).toBe("success");
      expect(callCount).toBe(1);
    });
  });

  describe("retryable errors", () => {
    it("should retry up to maxAttempts times and then raise RetriesExhaustedError", async () => {
      let callCount = 0;
      const { sleep } = recordingSleep();

      const promise = callWithRetry(
        async () => {
          callCount++;
          throw new Error("retryable error");
        },
        (error) => error instanceof Error && error.message === "retryable error",
        { maxAttempts: 3, sleep }
      );

      await expect(promise).rejects.toBeInstanceOf(RetriesExhaustedError);
      await expect(promise).rejects.toMatchObject({ attempts: 3 });
      expect(callCount).toBe(3);
    });

    it("should succeed after retrying", async () => {
      let callCount = 0;
      const { sleep } = recordingSleep();

      const result = await callWithRetry(
        async () => {
          callCount++;
          if (callCount < 2) {
            throw new Error("retry me");
          }
          return "success after retry";
        },
        (error) => error instanceof Error && error.message === "retry me",
        { sleep }
      );

      expect(result).toBe("success after retry");
      expect(callCount).toBe(2);
    });

    it("should call onError callback with 1-based attempts", async () => {
      const attempts: Array<number> = [];
      const { sleep } = recordingSleep();

      await expect(
        callWithRetry(
          async () => {
            throw new Error("always fail");
          },
          () => true,
          { sleep, onError: (_error, attempt) => attempts.push(attempt) }
        )
      ).rejects.toThrow("retries exhausted after 3 attempts: always fail");

      expect(attempts).toEqual([1, 2, 3]);
    });

    it("should sleep with exponential backoff between attempts only", async () => {
      const { sleep, delays } = recordingSleep();

      await expect(
        callWithRetry(
          async () => {
            throw new Error("retry");
          },
          () => true,
          { maxAttempts: 4, backoffBaseMs: 100, maxDelayMs: 250, sleep }
        )
      ).rejects.toBeInstanceOf(RetriesExhaustedError);

      expect(delays).toEqual([100, 200, 250]);
    });
  });

  describe("non-retryable errors", () => {
    it("should throw the original error immediately", async () => {
      let callCount = 0;
      const { sleep, delays } = recordingSleep();
      const original = new Error("non-retryable");

      await expect(
        callWithRetry(
          async () => {
            callCount++;
            throw original;
          },
          () => false,
          { sleep }
        )
      ).rejects.toBe(original);

      expect(callCount).toBe(1);
      expect(delays).toEqual([]);
    });
  });
});
