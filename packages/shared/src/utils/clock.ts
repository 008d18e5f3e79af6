/**
 * @fileoverview Time source used by everything that waits.
 *
 * Production code runs on {@link systemClock}; tests drive timing-sensitive
 * sequences with a {@link VirtualClock} instead of real delays.
 */

export interface Clock {
  /** Milliseconds since an arbitrary origin (monotonic) */
  now(): number;
  /** Resolve after `ms` milliseconds */
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms) =>
    new Promise((resolve) => {
      setTimeout(resolve, ms);
    }),
};

/**
 * Clock whose time only moves when something sleeps or `advance` is called.
 * Sleeping advances time instantly, so sequences complete without waiting
 * while their recorded timestamps stay exact.
 */
export class VirtualClock implements Clock {
  private current: number;
  private readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  /** Every sleep requested so far, in order */
  get requestedSleeps(): readonly number[] {
    return this.sleeps;
  }
}
