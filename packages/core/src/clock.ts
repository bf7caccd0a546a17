import type { Clock } from "./types.js";

/**
 * Wall clock backed by performance.now() and setTimeout.
 */
export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms: number) =>
    new Promise<void>((resolve) => {
      if (ms <= 0) {
        resolve();
        return;
      }
      setTimeout(resolve, ms);
    }),
};

/**
 * Deterministic clock for tests: sleeping advances time instantly.
 */
export class ManualClock implements Clock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    if (ms > 0) {
      this.current += ms;
    }
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
