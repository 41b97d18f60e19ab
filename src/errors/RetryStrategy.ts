/**
 * Retry Strategy System
 *
 * Configurable retry policies for transient failures. Works with the
 * ApplicationError hierarchy: only errors flagged `retryable` (and, when a
 * policy lists codes, carrying one of those codes) are attempted again.
 */

import { ApplicationError, ErrorCode } from './ApplicationError.js';
import { logger } from '../utils/logging.js';

// ============================================
// RETRY POLICY CONFIGURATION
// ============================================

export interface RetryPolicy {
  /**
   * Maximum number of attempts, including the first one
   */
  maxAttempts: number;

  /**
   * Initial delay in milliseconds before first retry
   */
  initialDelayMs: number;

  /**
   * Maximum delay in milliseconds between retries
   */
  maxDelayMs: number;

  /**
   * Backoff multiplier (e.g., 2 for exponential backoff)
   */
  backoffMultiplier: number;

  /**
   * Jitter factor (0-1) to randomize retry delays
   */
  jitterFactor: number;

  /**
   * Error codes that should be retried
   */
  retryableErrorCodes?: ErrorCode[];

  /**
   * Custom function to determine if error is retryable
   * If provided, this overrides the error's built-in retryable flag
   */
  shouldRetry?: (error: Error, attemptNumber: number) => boolean;

  /**
   * Callback invoked before each retry attempt
   */
  onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; value: T; attemptCount: number; totalDelayMs: number }
  | { success: false; error: Error; attemptCount: number; totalDelayMs: number };

// ============================================
// PREDEFINED RETRY POLICIES
// ============================================

/**
 * Default retry policy for general operational errors
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000, // 1 second
  maxDelayMs: 30000, // 30 seconds
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Crawl policy: a crawl is expensive, so only a couple of attempts and
 * only for failures the crawler marked transient. A timeout means the
 * caller's deadline is spent and is never retried.
 */
export const CRAWL_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  initialDelayMs: 2000,
  maxDelayMs: 20000,
  backoffMultiplier: 2,
  jitterFactor: 0.3,
  retryableErrorCodes: [ErrorCode.CRAWL_FAILED],
};

// ============================================
// RETRY STRATEGY CLASS
// ============================================

export class RetryStrategy {
  constructor(private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  /**
   * Execute an operation with retry logic. Aborting `signal` cuts the
   * current backoff short and stops further attempts.
   */
  async execute<T>(
    operation: (attemptNumber: number) => Promise<T>,
    operationName: string = 'operation',
    signal?: AbortSignal
  ): Promise<T> {
    const result = await this.executeWithResult(operation, operationName, signal);
    if (result.success) {
      return result.value;
    }
    throw result.error;
  }

  /**
   * Execute an operation and return detailed result
   */
  async executeWithResult<T>(
    operation: (attemptNumber: number) => Promise<T>,
    operationName: string = 'operation',
    signal?: AbortSignal
  ): Promise<RetryResult<T>> {
    let attemptCount = 0;
    let totalDelayMs = 0;
    const maxAttempts = Math.max(1, this.policy.maxAttempts);

    for (;;) {
      attemptCount++;

      try {
        const value = await operation(attemptCount);
        return { success: true, value, attemptCount, totalDelayMs };
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (
          signal?.aborted ||
          !this.shouldRetryError(lastError, attemptCount) ||
          attemptCount >= maxAttempts
        ) {
          logger.warn(`${operationName} failed after ${attemptCount} attempt(s)`, {
            error: lastError.message,
            attemptCount,
            totalDelayMs,
          });

          return { success: false, error: lastError, attemptCount, totalDelayMs };
        }

        const delayMs = this.calculateDelay(attemptCount);
        totalDelayMs += delayMs;

        if (this.policy.onRetry) {
          this.policy.onRetry(lastError, attemptCount, delayMs);
        }

        logger.info(`Retrying ${operationName} after error`, {
          error: lastError.message,
          attemptNumber: attemptCount,
          nextAttemptIn: delayMs,
          totalAttempts: maxAttempts,
        });

        await this.sleep(delayMs, signal);

        if (signal?.aborted) {
          logger.warn(`${operationName} abandoned during backoff`, { attemptCount, totalDelayMs });
          return { success: false, error: lastError, attemptCount, totalDelayMs };
        }
      }
    }
  }

  /**
   * Determine if an error should be retried
   */
  private shouldRetryError(error: Error, attemptNumber: number): boolean {
    // Custom retry logic takes precedence
    if (this.policy.shouldRetry) {
      return this.policy.shouldRetry(error, attemptNumber);
    }

    if (error instanceof ApplicationError) {
      if (!error.retryable) {
        return false;
      }

      if (this.policy.retryableErrorCodes) {
        return this.policy.retryableErrorCodes.includes(error.code);
      }

      return true;
    }

    // Unknown errors are not retried unless shouldRetry says so
    return false;
  }

  /**
   * Exponential backoff with jitter
   */
  private calculateDelay(attemptNumber: number): number {
    const exponentialDelay =
      this.policy.initialDelayMs *
      Math.pow(this.policy.backoffMultiplier, attemptNumber - 1);

    const cappedDelay = Math.min(exponentialDelay, this.policy.maxDelayMs);

    const jitter = cappedDelay * this.policy.jitterFactor * (Math.random() - 0.5);
    const delayWithJitter = cappedDelay + jitter;

    return Math.max(0, Math.floor(delayWithJitter));
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  getPolicy(): Readonly<RetryPolicy> {
    return { ...this.policy };
  }
}

// ============================================
// HELPER FUNCTIONS
// ============================================

/**
 * Create a retry strategy with custom policy
 */
export function createRetryStrategy(
  policy: Partial<RetryPolicy>
): RetryStrategy {
  return new RetryStrategy({ ...DEFAULT_RETRY_POLICY, ...policy });
}
