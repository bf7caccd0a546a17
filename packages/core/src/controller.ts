/**
 * RequestController - the single entry point for remote calls.
 * Waits on the shared rate limiter before every call and retries transient failures.
 */

import { systemClock } from "./clock.js";
import { classifyFailure, describeError, isTransient, RetryExhaustedError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { RateLimitStrategy } from "./rate-limit.js";
import type { RetryStrategy } from "./retry.js";
import type { Clock } from "./types.js";

export interface RequestControllerOptions {
  retry: RetryStrategy;
  /** Shared by every controller that talks to the same API */
  rateLimit: RateLimitStrategy;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Cumulative counters since the controller was created.
 */
export interface ControllerStats {
  /** Remote calls actually issued */
  calls: number;
  /** Calls issued as retries of a transient failure */
  retries: number;
  /** Operations that finally failed */
  failures: number;
}

export class RequestController {
  readonly retry: RetryStrategy;
  readonly rateLimit: RateLimitStrategy;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly counters: ControllerStats = { calls: 0, retries: 0, failures: 0 };

  constructor(options: RequestControllerOptions) {
    this.retry = options.retry;
    this.rateLimit = options.rateLimit;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  get stats(): Readonly<ControllerStats> {
    return { ...this.counters };
  }

  /**
   * Run one idempotent remote call.
   *
   * @param label - Short description used in logs and errors (e.g. "create rows 1-10")
   * @throws RetryExhaustedError when a transient failure outlives the retry strategy
   * @throws the original error for any non-transient failure
   */
  async execute<T>(label: string, call: () => Promise<T>): Promise<T> {
    const startedAt = this.clock.now();
    let attempt = 0;

    for (;;) {
      await this.rateLimit.waitIfNeeded();
      this.counters.calls++;
      try {
        return await call();
      } catch (error) {
        const kind = classifyFailure(error);
        if (!isTransient(kind)) {
          this.counters.failures++;
          throw error;
        }

        const elapsedMs = this.clock.now() - startedAt;
        if (!this.retry.shouldRetry(attempt, elapsedMs)) {
          this.counters.failures++;
          this.logger.error("Retries exhausted", {
            label,
            attempts: attempt + 1,
            elapsedMs,
            kind,
            error: describeError(error),
          });
          throw new RetryExhaustedError(label, attempt + 1, elapsedMs, error);
        }

        const delayMs = this.retry.delay(attempt);
        this.logger.warn("Transient failure, retrying", {
          label,
          kind,
          retry: attempt + 1,
          maxRetries: this.retry.config.maxRetries,
          delayMs,
          error: describeError(error),
        });
        await this.clock.sleep(delayMs);
        attempt++;
        this.counters.retries++;
      }
    }
  }
}
