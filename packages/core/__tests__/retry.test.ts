/**
 * Tests for the retry strategies.
 */

import {
  createRetryStrategy,
  ExponentialBackoffRetry,
  FixedWaitRetry,
  LinearGrowthRetry,
} from "../src/retry";

function delays(strategy: { delay(attempt: number): number }, count: number): number[] {
  return Array.from({ length: count }, (_, attempt) => strategy.delay(attempt));
}

describe("Retry strategies", () => {
  describe("ExponentialBackoffRetry", () => {
    it("doubles the delay and caps it at maxWaitMs", () => {
      const retry = new ExponentialBackoffRetry({ initialDelayMs: 1000, maxRetries: 10, maxWaitMs: 5000 }, 2);
      expect(delays(retry, 6)).toEqual([1000, 2000, 4000, 5000, 5000, 5000]);
    });

    it("grows without bound when no cap is set", () => {
      const retry = new ExponentialBackoffRetry({ initialDelayMs: 100, maxRetries: 10 }, 3);
      expect(delays(retry, 4)).toEqual([100, 300, 900, 2700]);
    });
  });

  describe("LinearGrowthRetry", () => {
    it("adds the increment on every attempt", () => {
      const retry = new LinearGrowthRetry({ initialDelayMs: 1000, maxRetries: 10 }, 500);
      expect(delays(retry, 4)).toEqual([1000, 1500, 2000, 2500]);
    });

    it("caps the delay at maxWaitMs", () => {
      const retry = new LinearGrowthRetry({ initialDelayMs: 1000, maxRetries: 10, maxWaitMs: 1800 }, 500);
      expect(delays(retry, 4)).toEqual([1000, 1500, 1800, 1800]);
    });
  });

  describe("FixedWaitRetry", () => {
    it("keeps the same delay", () => {
      const retry = new FixedWaitRetry({ initialDelayMs: 1000, maxRetries: 10 });
      expect(delays(retry, 3)).toEqual([1000, 1000, 1000]);
    });
  });

  describe("shouldRetry", () => {
    it("stops once maxRetries retries were made", () => {
      const retry = new FixedWaitRetry({ initialDelayMs: 10, maxRetries: 2 });
      expect(retry.shouldRetry(0)).toBe(true);
      expect(retry.shouldRetry(1)).toBe(true);
      expect(retry.shouldRetry(2)).toBe(false);
    });

    it("stops once the elapsed time reaches maxWaitMs", () => {
      const retry = new ExponentialBackoffRetry({ initialDelayMs: 10, maxRetries: 5, maxWaitMs: 1000 });
      expect(retry.shouldRetry(0, 999)).toBe(true);
      expect(retry.shouldRetry(0, 1000)).toBe(false);
    });

    it("ignores elapsed time without maxWaitMs", () => {
      const retry = new LinearGrowthRetry({ initialDelayMs: 10, maxRetries: 5 });
      expect(retry.shouldRetry(4, 1_000_000)).toBe(true);
    });

    it("never retries with maxRetries 0", () => {
      const retry = new FixedWaitRetry({ initialDelayMs: 10, maxRetries: 0 });
      expect(retry.shouldRetry(0)).toBe(false);
    });
  });

  describe("validation", () => {
    it("rejects negative delays and fractional retry counts", () => {
      expect(() => new FixedWaitRetry({ initialDelayMs: -1, maxRetries: 1 })).toThrow(RangeError);
      expect(() => new FixedWaitRetry({ initialDelayMs: 1, maxRetries: 1.5 })).toThrow(RangeError);
      expect(() => new FixedWaitRetry({ initialDelayMs: 1, maxRetries: 1, maxWaitMs: -5 })).toThrow(
        RangeError
      );
    });
  });

  describe("createRetryStrategy", () => {
    it("fills unset values from the defaults", () => {
      const retry = createRetryStrategy({ type: "exponential_backoff" });
      expect(retry).toBeInstanceOf(ExponentialBackoffRetry);
      expect(retry.config).toEqual({ initialDelayMs: 500, maxRetries: 3, maxWaitMs: undefined });
      expect(delays(retry, 3)).toEqual([500, 1000, 2000]);
    });

    it("passes the strategy parameters through", () => {
      const linear = createRetryStrategy({ type: "linear_growth", initialDelayMs: 200, incrementMs: 50 });
      expect(linear.name).toBe("linear_growth");
      expect(delays(linear, 3)).toEqual([200, 250, 300]);

      const fixed = createRetryStrategy({ type: "fixed_wait", initialDelayMs: 300, maxRetries: 1 });
      expect(fixed).toBeInstanceOf(FixedWaitRetry);
      expect(fixed.shouldRetry(1)).toBe(false);
    });
  });
});
