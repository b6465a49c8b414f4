// Bounded retry with exponential backoff

import { DEFAULT_RETRY_POLICY } from './constants';
import { RateLimitError, isRetryableError, toError } from './errors';

export interface RetryPolicy {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  jitter: boolean;
}

export interface RetryOptions extends RetryPolicy {
  retryCondition?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

export class RetryUtility {
  private static readonly DEFAULT_OPTIONS: RetryOptions = {
    ...DEFAULT_RETRY_POLICY,
    retryCondition: isRetryableError,
  };

  /**
   * Execute a function with retry logic
   */
  static async withRetry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
    const opts: RetryOptions = { ...this.DEFAULT_OPTIONS, ...options };

    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (caught) {
        const error = toError(caught);

        if (opts.retryCondition && !opts.retryCondition(error)) {
          throw error;
        }

        // Don't retry on the last attempt
        if (attempt >= opts.maxRetries) {
          throw error;
        }

        const delay = this.delayFor(error, attempt, opts);
        opts.onRetry?.(error, attempt + 1, delay);
        await this.delay(delay);
      }
    }
  }

  /**
   * Server-requested delay wins over the computed backoff, capped at maxDelay
   */
  static delayFor(error: Error, attempt: number, policy: RetryPolicy): number {
    if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
      return Math.min(error.retryAfterMs, policy.maxDelay);
    }
    return this.calculateDelay(attempt, policy);
  }

  /**
   * Calculate delay with exponential backoff and optional jitter
   */
  static calculateDelay(attempt: number, policy: RetryPolicy): number {
    const exponentialDelay = policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt);
    let delay = Math.min(exponentialDelay, policy.maxDelay);

    if (policy.jitter) {
      const jitterAmount = delay * 0.1; // 10% jitter
      const jitter = (Math.random() - 0.5) * 2 * jitterAmount;
      delay = Math.max(0, delay + jitter);
    }

    return Math.floor(delay);
  }

  private static delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
