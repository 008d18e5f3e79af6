import { describeError, type Logger, logger as defaultLogger } from './logger.js';

/**
 * Token returned when an observer is registered.
 */
export type SubscriptionToken = number;

/**
 * Ordered set of handlers keyed by subscription token.
 *
 * Handlers run in registration order. Each one runs under its own catch, so a
 * failing handler is logged and the remaining handlers still run.
 */
export class ObserverList<TArgs extends unknown[]> {
  private readonly handlers = new Map<SubscriptionToken, (...args: TArgs) => void>();
  private nextToken: SubscriptionToken = 1;

  constructor(
    private readonly name: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  subscribe(handler: (...args: TArgs) => void): SubscriptionToken {
    const token = this.nextToken++;
    this.handlers.set(token, handler);
    return token;
  }

  /**
   * @returns true if a handler was registered under the token
   */
  unsubscribe(token: SubscriptionToken): boolean {
    return this.handlers.delete(token);
  }

  notify(...args: TArgs): void {
    for (const [token, handler] of [...this.handlers]) {
      try {
        handler(...args);
      } catch (error) {
        this.logger.error('Observer failed', {
          observers: this.name,
          token,
          error: describeError(error),
        });
      }
    }
  }

  get size(): number {
    return this.handlers.size;
  }

  clear(): void {
    this.handlers.clear();
  }
}
