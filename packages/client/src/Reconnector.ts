import { describeError, type Logger } from '@shot-relay/shared';

/**
 * Delay before a reconnect attempt. Attempts are counted from 1; once the
 * list runs out its last entry repeats.
 */
export function reconnectDelay(attempt: number, delaysMs: readonly number[]): number {
  const index = Math.min(Math.max(attempt, 1), delaysMs.length) - 1;
  return delaysMs[index] ?? 0;
}

export interface ReconnectorOptions {
  readonly delaysMs: readonly number[];
  readonly maxAttempts: number;
  readonly logger: Logger;
  /** Called after a successful attempt */
  readonly onReconnected?: () => void;
  /** Called once the attempts are used up */
  readonly onGiveUp?: () => void;
}

/**
 * Retries a connect function with back-off until it succeeds or the
 * attempts run out.
 */
export class Reconnector {
  private attempts = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Bumped by cancel() so an attempt in flight is ignored */
  private generation = 0;

  constructor(
    private readonly target: string,
    private readonly connect: () => Promise<boolean>,
    private readonly options: ReconnectorOptions
  ) {}

  /**
   * Schedule the next attempt. No-op while one is already scheduled.
   */
  schedule(): void {
    if (this.timer) return;

    const { delaysMs, maxAttempts, logger } = this.options;
    if (this.attempts >= maxAttempts) {
      logger.error('Max reconnection attempts reached', {
        target: this.target,
        attempts: this.attempts,
      });
      this.options.onGiveUp?.();
      return;
    }

    this.attempts++;
    const delayMs = reconnectDelay(this.attempts, delaysMs);
    logger.info('Reconnecting', {
      target: this.target,
      attempt: this.attempts,
      maxAttempts,
      delayMs,
    });

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.attempt();
    }, delayMs);
  }

  /**
   * Cancel a scheduled or running attempt and reset the attempt count.
   */
  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.attempts = 0;
    this.generation++;
  }

  get attemptCount(): number {
    return this.attempts;
  }

  get isScheduled(): boolean {
    return this.timer !== null;
  }

  private async attempt(): Promise<void> {
    const generation = this.generation;
    let connected: boolean;
    try {
      connected = await this.connect();
    } catch (error) {
      this.options.logger.error('Reconnect attempt failed', {
        target: this.target,
        error: describeError(error),
      });
      connected = false;
    }
    if (generation !== this.generation) return;

    if (connected) {
      this.options.logger.info('Reconnected', { target: this.target, attempts: this.attempts });
      this.attempts = 0;
      this.options.onReconnected?.();
    } else {
      this.schedule();
    }
  }
}
