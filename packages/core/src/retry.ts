/**
 * Retry strategies used by the request controller.
 * All durations are in milliseconds.
 */

/**
 * Settings shared by every retry strategy.
 */
export interface RetryConfig {
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Number of retries after the first attempt */
  maxRetries: number;
  /**
   * Ceiling on any single delay, and on the elapsed time after which no further
   * retry is attempted. Unset means unbounded.
   */
  maxWaitMs?: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  initialDelayMs: 500,
  maxRetries: 3,
};

export interface RetryStrategy {
  readonly name: RetryStrategyType;
  readonly config: Readonly<RetryConfig>;

  /**
   * Delay before retry number `attempt` (0 for the first retry).
   */
  delay(attempt: number): number;

  /**
   * Whether retry number `attempt` may happen after `elapsedMs` spent on the operation.
   */
  shouldRetry(attempt: number, elapsedMs?: number): boolean;
}

export type RetryStrategyType = "exponential_backoff" | "linear_growth" | "fixed_wait";

export const RETRY_STRATEGY_TYPES: readonly RetryStrategyType[] = [
  "exponential_backoff",
  "linear_growth",
  "fixed_wait",
];

abstract class CappedRetryStrategy implements RetryStrategy {
  abstract readonly name: RetryStrategyType;
  readonly config: Readonly<RetryConfig>;

  constructor(config: RetryConfig) {
    if (config.initialDelayMs < 0) {
      throw new RangeError("initialDelayMs must not be negative");
    }
    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
      throw new RangeError("maxRetries must be a non-negative integer");
    }
    if (config.maxWaitMs !== undefined && config.maxWaitMs < 0) {
      throw new RangeError("maxWaitMs must not be negative");
    }
    this.config = { ...config };
  }

  protected abstract uncappedDelay(attempt: number): number;

  delay(attempt: number): number {
    const raw = this.uncappedDelay(attempt);
    const { maxWaitMs } = this.config;
    return maxWaitMs === undefined ? raw : Math.min(raw, maxWaitMs);
  }

  shouldRetry(attempt: number, elapsedMs = 0): boolean {
    if (attempt >= this.config.maxRetries) {
      return false;
    }
    const { maxWaitMs } = this.config;
    return maxWaitMs === undefined || elapsedMs < maxWaitMs;
  }
}

/**
 * delay = initialDelay * multiplier^attempt
 */
export class ExponentialBackoffRetry extends CappedRetryStrategy {
  readonly name = "exponential_backoff" as const;
  readonly multiplier: number;

  constructor(config: RetryConfig, multiplier = 2) {
    super(config);
    this.multiplier = multiplier;
  }

  protected uncappedDelay(attempt: number): number {
    return this.config.initialDelayMs * Math.pow(this.multiplier, attempt);
  }
}

/**
 * delay = initialDelay + increment * attempt
 */
export class LinearGrowthRetry extends CappedRetryStrategy {
  readonly name = "linear_growth" as const;
  readonly incrementMs: number;

  constructor(config: RetryConfig, incrementMs = 500) {
    super(config);
    this.incrementMs = incrementMs;
  }

  protected uncappedDelay(attempt: number): number {
    return this.config.initialDelayMs + this.incrementMs * attempt;
  }
}

/**
 * delay = initialDelay
 */
export class FixedWaitRetry extends CappedRetryStrategy {
  readonly name = "fixed_wait" as const;

  protected uncappedDelay(): number {
    return this.config.initialDelayMs;
  }
}

export type RetryStrategyOptions =
  | ({ type: "exponential_backoff"; multiplier?: number } & Partial<RetryConfig>)
  | ({ type: "linear_growth"; incrementMs?: number } & Partial<RetryConfig>)
  | ({ type: "fixed_wait" } & Partial<RetryConfig>);

/**
 * Build a retry strategy from options, filling unset values from {@link DEFAULT_RETRY_CONFIG}.
 */
export function createRetryStrategy(options: RetryStrategyOptions): RetryStrategy {
  const config: RetryConfig = {
    initialDelayMs: options.initialDelayMs ?? DEFAULT_RETRY_CONFIG.initialDelayMs,
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    maxWaitMs: options.maxWaitMs,
  };
  switch (options.type) {
    case "exponential_backoff":
      return new ExponentialBackoffRetry(config, options.multiplier);
    case "linear_growth":
      return new LinearGrowthRetry(config, options.incrementMs);
    case "fixed_wait":
      return new FixedWaitRetry(config);
  }
}
