/**
 * Rate limiting strategies.
 *
 * A strategy instance holds the process-wide call history for one remote API and
 * must be shared by every component that calls that API. Callers are queued, so
 * concurrent async callers take free slots one at a time.
 */

import { systemClock } from "./clock.js";
import type { Clock } from "./types.js";

export type RateLimitStrategyType = "fixed_wait" | "sliding_window" | "fixed_window";

export const RATE_LIMIT_STRATEGY_TYPES: readonly RateLimitStrategyType[] = [
  "fixed_wait",
  "sliding_window",
  "fixed_window",
];

export interface RateLimitStrategy {
  readonly name: RateLimitStrategyType;

  /** Whether a call made now would respect the limit */
  canProceed(): boolean;

  /** Wait until a call is allowed, then record it */
  waitIfNeeded(): Promise<void>;

  /** Forget every recorded call */
  reset(): void;
}

abstract class QueuedRateLimit implements RateLimitStrategy {
  abstract readonly name: RateLimitStrategyType;
  private queue: Promise<void> = Promise.resolve();

  constructor(protected readonly clock: Clock) {}

  abstract canProceed(): boolean;
  abstract reset(): void;

  /** Milliseconds until canProceed() turns true */
  protected abstract waitTime(): number;

  protected abstract record(): void;

  waitIfNeeded(): Promise<void> {
    const turn = this.queue.then(() => this.takeSlot());
    // Keep the queue alive if a sleep rejects; the caller still sees the rejection.
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async takeSlot(): Promise<void> {
    while (!this.canProceed()) {
      await this.clock.sleep(this.waitTime());
    }
    this.record();
  }
}

export interface FixedWaitRateConfig {
  /** Minimum spacing between two calls */
  minIntervalMs: number;
}

/**
 * Allows a call when at least `minIntervalMs` elapsed since the previous one.
 */
export class FixedWaitRateLimit extends QueuedRateLimit {
  readonly name = "fixed_wait" as const;
  readonly config: Readonly<FixedWaitRateConfig>;
  private lastCallTime: number | null = null;

  constructor(config: FixedWaitRateConfig, clock: Clock = systemClock) {
    super(clock);
    if (config.minIntervalMs < 0) {
      throw new RangeError("minIntervalMs must not be negative");
    }
    this.config = { ...config };
  }

  get lastCall(): number | null {
    return this.lastCallTime;
  }

  canProceed(): boolean {
    return this.waitTime() === 0;
  }

  reset(): void {
    this.lastCallTime = null;
  }

  protected waitTime(): number {
    if (this.lastCallTime === null) {
      return 0;
    }
    const elapsed = this.clock.now() - this.lastCallTime;
    return Math.max(0, this.config.minIntervalMs - elapsed);
  }

  protected record(): void {
    this.lastCallTime = this.clock.now();
  }
}

export interface WindowRateConfig {
  windowMs: number;
  maxRequests: number;
}

function validateWindow(config: WindowRateConfig): void {
  if (config.windowMs <= 0) {
    throw new RangeError("windowMs must be positive");
  }
  if (!Number.isInteger(config.maxRequests) || config.maxRequests < 1) {
    throw new RangeError("maxRequests must be a positive integer");
  }
}

/**
 * Allows a call when fewer than `maxRequests` calls were recorded in the
 * closed interval [now - windowMs, now]. Stale timestamps are dropped lazily.
 */
export class SlidingWindowRateLimit extends QueuedRateLimit {
  readonly name = "sliding_window" as const;
  readonly config: Readonly<WindowRateConfig>;
  private timestamps: number[] = [];

  constructor(config: WindowRateConfig, clock: Clock = systemClock) {
    super(clock);
    validateWindow(config);
    this.config = { ...config };
  }

  /** Calls currently inside the window */
  get inWindow(): number {
    this.expire();
    return this.timestamps.length;
  }

  canProceed(): boolean {
    this.expire();
    return this.timestamps.length < this.config.maxRequests;
  }

  reset(): void {
    this.timestamps = [];
  }

  protected waitTime(): number {
    this.expire();
    if (this.timestamps.length < this.config.maxRequests) {
      return 0;
    }
    // The oldest call is still counted exactly windowMs after it was made.
    return this.timestamps[0] + this.config.windowMs - this.clock.now() + 1;
  }

  protected record(): void {
    this.timestamps.push(this.clock.now());
  }

  private expire(): void {
    const cutoff = this.clock.now() - this.config.windowMs;
    while (this.timestamps.length > 0 && this.timestamps[0] < cutoff) {
      this.timestamps.shift();
    }
  }
}

/**
 * Allows at most `maxRequests` calls per fixed window. A window starts with the
 * first call made after the previous one ended.
 */
export class FixedWindowRateLimit extends QueuedRateLimit {
  readonly name = "fixed_window" as const;
  readonly config: Readonly<WindowRateConfig>;
  private windowStart: number | null = null;
  private count = 0;

  constructor(config: WindowRateConfig, clock: Clock = systemClock) {
    super(clock);
    validateWindow(config);
    this.config = { ...config };
  }

  get requestsInWindow(): number {
    this.rollWindow();
    return this.count;
  }

  canProceed(): boolean {
    this.rollWindow();
    return this.count < this.config.maxRequests;
  }

  reset(): void {
    this.windowStart = null;
    this.count = 0;
  }

  protected waitTime(): number {
    this.rollWindow();
    if (this.windowStart === null || this.count < this.config.maxRequests) {
      return 0;
    }
    return this.windowStart + this.config.windowMs - this.clock.now();
  }

  protected record(): void {
    this.rollWindow();
    if (this.windowStart === null) {
      this.windowStart = this.clock.now();
    }
    this.count++;
  }

  private rollWindow(): void {
    if (
      this.windowStart !== null &&
      this.clock.now() >= this.windowStart + this.config.windowMs
    ) {
      this.windowStart = null;
      this.count = 0;
    }
  }
}

export type RateLimitStrategyOptions =
  | ({ type: "fixed_wait" } & FixedWaitRateConfig)
  | ({ type: "sliding_window" } & WindowRateConfig)
  | ({ type: "fixed_window" } & WindowRateConfig);

export function createRateLimitStrategy(
  options: RateLimitStrategyOptions,
  clock: Clock = systemClock
): RateLimitStrategy {
  switch (options.type) {
    case "fixed_wait":
      return new FixedWaitRateLimit({ minIntervalMs: options.minIntervalMs }, clock);
    case "sliding_window":
      return new SlidingWindowRateLimit(
        { windowMs: options.windowMs, maxRequests: options.maxRequests },
        clock
      );
    case "fixed_window":
      return new FixedWindowRateLimit(
        { windowMs: options.windowMs, maxRequests: options.maxRequests },
        clock
      );
  }
}
