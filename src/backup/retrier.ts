import { Logger } from '@nestjs/common';
import { errorMessage, isRetryable, NetworkError } from '../common/errors.js';
import type { RetryPolicy } from '../config/app-config.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff for retryable errors only. Everything else is rethrown
 * on the first attempt.
 */
export class Retrier {
  private readonly logger = new Logger(Retrier.name);

  constructor(
    private readonly policy: RetryPolicy,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  delayFor(attempt: number, error: unknown): number {
    const backoff = Math.min(this.policy.baseDelayMs * 2 ** (attempt - 1), this.policy.maxDelayMs);
    if (error instanceof NetworkError && error.retryAfterMs !== null) {
      // wait for the provider's reset, but never past the cap
      return Math.min(Math.max(backoff, error.retryAfterMs), this.policy.maxDelayMs);
    }
    return backoff;
  }

  async run<T>(label: string, fn: (attempt: number) => Promise<T>, onRetry?: () => Promise<void>): Promise<T> {
    const maxAttempts = Math.max(1, this.policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error: unknown) {
        if (!isRetryable(error)) throw error;
        if (attempt >= maxAttempts) {
          this.logger.warn(`❌ ${label} failed after ${attempt} attempts: ${errorMessage(error)}`);
          throw error;
        }
        const delay = this.delayFor(attempt, error);
        this.logger.warn(`⏳ ${label} attempt ${attempt}/${maxAttempts} failed, waiting ${delay}ms: ${errorMessage(error)}`);
        await this.sleep(delay);
        if (onRetry) await onRetry();
      }
    }
  }
}
