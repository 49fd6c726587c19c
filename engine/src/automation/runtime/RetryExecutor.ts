/**
 * Retry Executor
 *
 * Orchestrates retry logic for node work using RetryPolicy and BackoffTimer.
 * Waits between attempts are cancellable through the run's abort signal.
 *
 * @module automation/runtime
 */

import { RetryPolicy } from '../RetryPolicy.js';
import { BackoffTimer, WaitCancelledError } from './BackoffTimer.js';

/**
 * Retry context for tracking retry state
 */
export interface RetryContext {
  /** Current attempt number (1-indexed) */
  attempt: number;

  maxAttempts: number;

  /** Errors from previous attempts */
  previousErrors: Error[];

  /** Total time spent waiting between attempts (ms) */
  totalRetryTimeMs: number;

  isFinalAttempt: boolean;
}

/**
 * Retry result
 */
export interface RetryResult<T> {
  /** Operation result (undefined unless status is success) */
  result?: T;

  /**
   * - success: an attempt resolved
   * - failed: retries exhausted or the error is not retryable
   * - cancelled: the signal aborted before or between attempts
   */
  status: 'success' | 'failed' | 'cancelled';

  /** Number of attempts made */
  attempts: number;

  /** Final error if failed */
  error?: Error;

  allErrors: Error[];

  /** Total execution time including waits (ms) */
  totalTimeMs: number;
}

/**
 * Retry event listeners
 */
export interface RetryListeners<T> {
  /** Called before each attempt */
  onAttempt?: (context: RetryContext) => void;

  /** Called after a successful attempt */
  onSuccess?: (result: T, context: RetryContext) => void;

  /** Called after a failed attempt (before the retry decision) */
  onError?: (error: Error, context: RetryContext) => void;

  /** Called when a retry is about to be scheduled */
  onRetry?: (error: Error, delayMs: number, context: RetryContext) => void;

  /** Called when retries are exhausted or refused */
  onExhausted?: (errors: Error[]) => void;
}

export interface RetryExecuteOptions<T> {
  signal?: AbortSignal;
  listeners?: RetryListeners<T>;
}

/**
 * Retry executor for orchestrating retry logic
 */
export class RetryExecutor {
  /**
   * Execute operation with retry policy
   *
   * @param operation - Receives the 1-indexed attempt number
   */
  static async execute<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    options: RetryExecuteOptions<T> = {}
  ): Promise<RetryResult<T>> {
    const { signal, listeners } = options;
    const startTime = Date.now();
    const maxAttempts = policy.getMaxAttempts();
    const allErrors: Error[] = [];
    let attempt = 0;
    let totalRetryTimeMs = 0;

    const finish = (status: RetryResult<T>['status'], error?: Error): RetryResult<T> => ({
      status,
      attempts: attempt,
      error,
      allErrors,
      totalTimeMs: Date.now() - startTime,
    });

    while (attempt < maxAttempts) {
      if (signal?.aborted) {
        return finish('cancelled');
      }

      attempt++;

      const context: RetryContext = {
        attempt,
        maxAttempts,
        previousErrors: [...allErrors],
        totalRetryTimeMs,
        isFinalAttempt: attempt === maxAttempts,
      };

      listeners?.onAttempt?.(context);

      try {
        const result = await operation(attempt);
        listeners?.onSuccess?.(result, context);
        return {
          result,
          status: 'success',
          attempts: attempt,
          allErrors,
          totalTimeMs: Date.now() - startTime,
        };
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        allErrors.push(err);

        if (signal?.aborted) {
          return finish('cancelled', err);
        }

        listeners?.onError?.(err, context);

        if (!policy.shouldRetry(err, attempt)) {
          listeners?.onExhausted?.(allErrors);
          return finish('failed', err);
        }

        const delayMs = policy.getDelay(attempt);
        listeners?.onRetry?.(err, delayMs, context);

        const retryStartTime = Date.now();
        try {
          await BackoffTimer.sleep(delayMs, signal);
        } catch (waitError) {
          if (waitError instanceof WaitCancelledError) {
            return finish('cancelled', err);
          }
          throw waitError;
        }
        totalRetryTimeMs += Date.now() - retryStartTime;
      }
    }

    return finish('failed', allErrors[allErrors.length - 1]);
  }
}
