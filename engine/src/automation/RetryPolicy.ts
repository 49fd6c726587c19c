/**
 * Retry Policy
 *
 * Defines when and how to retry failed node work.
 * Includes attempt limits, backoff strategies, and retry conditions.
 *
 * @module automation
 */

import type { RetryPolicyConfig } from '../types/core-types.js';
import { isFlowError } from '../errors/FlowError.js';
import { BackoffStrategy, IMMEDIATE_BACKOFF } from './BackoffStrategy.js';

/**
 * Custom predicate deciding whether an error may be retried
 */
export type RetryCondition = (error: Error, attempt: number) => boolean;

export interface RetryPolicyOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  backoffStrategy: BackoffStrategy;
  retryCondition?: RetryCondition;
}

/**
 * Only recoverable engine errors are retried; foreign errors are.
 */
export const retryRecoverable: RetryCondition = error => !isFlowError(error) || error.recoverable;

/**
 * Retry policy for node execution
 */
export class RetryPolicy {
  private readonly options: RetryPolicyOptions;

  constructor(options: RetryPolicyOptions) {
    this.options = options;
    this.validateOptions();
  }

  /**
   * Check if error should be retried
   *
   * @param attempt - Attempt number that just failed (1-indexed)
   */
  shouldRetry(error: Error, attempt: number): boolean {
    if (attempt >= this.options.maxAttempts) {
      return false;
    }

    if (this.options.retryCondition) {
      return this.options.retryCondition(error, attempt);
    }

    return true;
  }

  /**
   * Get delay before the attempt following `attempt`
   */
  getDelay(attempt: number): number {
    return this.options.backoffStrategy.calculateDelay(attempt);
  }

  getMaxAttempts(): number {
    return this.options.maxAttempts;
  }

  /**
   * Worst-case total wait across all retries
   */
  getEstimatedRetryTime(): number {
    if (this.options.maxAttempts <= 1) {
      return 0;
    }
    return this.options.backoffStrategy.getTotalDelay(this.options.maxAttempts - 1);
  }

  private validateOptions(): void {
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new Error(`Max attempts must be an integer >= 1, got: ${this.options.maxAttempts}`);
    }
  }
}

/**
 * Single attempt, no retries
 */
export const NO_RETRY = new RetryPolicy({
  maxAttempts: 1,
  backoffStrategy: IMMEDIATE_BACKOFF,
  retryCondition: retryRecoverable,
});

/**
 * Create a retry policy from a node's retry configuration
 *
 * @param config - Node retry config; `fallback` applies when absent
 */
export function createRetryPolicyFromNode(
  config?: RetryPolicyConfig,
  fallback?: RetryPolicyConfig
): RetryPolicy {
  const effective = config ?? fallback;
  if (!effective || effective.maxAttempts <= 1) {
    return NO_RETRY;
  }

  const backoff = effective.backoff;
  return new RetryPolicy({
    maxAttempts: effective.maxAttempts,
    backoffStrategy: backoff
      ? new BackoffStrategy({
          type: backoff.type,
          baseDelayMs: backoff.baseDelayMs,
          maxDelayMs: backoff.maxDelayMs,
          multiplier: backoff.multiplier,
          jitter: backoff.jitter,
        })
      : IMMEDIATE_BACKOFF,
    retryCondition: retryRecoverable,
  });
}
