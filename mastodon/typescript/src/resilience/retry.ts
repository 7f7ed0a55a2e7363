/**
 * Opt-in retry helper with exponential backoff.
 *
 * The request executor never retries on its own. Callers that want retries
 * wrap their calls:
 *
 * ```ts
 * const retry = createRetryExecutor({ maxRetries: 2 });
 * const status = await retry.execute(() => client.execute('statuses.get', { id: '1' }));
 * ```
 */

import { DEFAULT_RETRY_CONFIG, RetryConfig } from '../config/index.js';
import { RateLimitedError, isRetryableError } from '../errors/index.js';

/**
 * Retry hook callbacks.
 */
export interface RetryHooks {
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Called when all retries are exhausted */
  onExhausted?: (error: unknown, attempts: number) => void;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Backoff before retry number `attempt` (1-based):
 * `initialBackoffMs * backoffMultiplier^(attempt - 1)`, plus up to
 * `jitterFactor` of that as jitter, capped at `maxBackoffMs`.
 */
export function computeBackoff(
  attempt: number,
  config: Readonly<RetryConfig>,
  random: () => number = Math.random
): number {
  const exponentialDelay =
    config.initialBackoffMs * Math.pow(config.backoffMultiplier, Math.max(0, attempt - 1));
  const jitter = exponentialDelay * config.jitterFactor * random();
  return Math.floor(Math.min(exponentialDelay + jitter, config.maxBackoffMs));
}

/**
 * Retry executor for handling transient failures.
 */
export class RetryExecutor {
  private readonly config: Readonly<RetryConfig>;
  private readonly hooks: RetryHooks;
  private readonly wait: Sleep;

  constructor(config: Readonly<RetryConfig>, hooks: RetryHooks = {}, wait: Sleep = sleep) {
    this.config = config;
    this.hooks = hooks;
    this.wait = wait;
  }

  /**
   * Executes an operation with retry logic.
   * @throws The last error if it is not retryable or all retries are exhausted
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!isRetryableError(error)) {
          throw error;
        }
        if (attempt >= attempts) {
          this.hooks.onExhausted?.(error, attempt);
          throw error;
        }

        const delayMs = this.calculateDelay(error, attempt);
        this.hooks.onRetry?.(attempt, error, delayMs);
        await this.wait(delayMs);
      }
    }
  }

  /**
   * A rate limit with a known reset waits until the reset; everything else
   * backs off exponentially.
   */
  private calculateDelay(error: unknown, attempt: number): number {
    if (error instanceof RateLimitedError) {
      const untilReset = error.retryAfterMs();
      if (untilReset !== undefined) {
        return Math.min(untilReset, this.config.maxBackoffMs);
      }
    }
    return computeBackoff(attempt, this.config);
  }
}

/**
 * Creates a retry executor, filling unset options with the defaults.
 */
export function createRetryExecutor(
  config: Partial<RetryConfig> = {},
  hooks: RetryHooks = {},
  wait: Sleep = sleep
): RetryExecutor {
  return new RetryExecutor({ ...DEFAULT_RETRY_CONFIG, ...config }, hooks, wait);
}
