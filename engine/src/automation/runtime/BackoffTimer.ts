/**
 * Backoff Timer
 *
 * Runtime utility for cancellable waits: retry backoff and DELAY nodes.
 *
 * @module automation/runtime
 */

/**
 * Raised when a wait is interrupted by its abort signal
 */
export class WaitCancelledError extends Error {
  constructor(message: string = 'Wait cancelled') {
    super(message);
    this.name = 'WaitCancelledError';
  }
}

export class BackoffTimer {
  /**
   * Sleep for `ms`, rejecting early with WaitCancelledError if `signal` aborts
   */
  static sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new WaitCancelledError());
    }

    if (ms <= 0) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        cleanup();
        resolve();
      }, ms);

      const onAbort = () => {
        cleanup();
        reject(new WaitCancelledError());
      };

      const cleanup = () => {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
      };

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  static formatDelay(delayMs: number): string {
    if (delayMs < 1000) {
      return `${delayMs}ms`;
    }
    if (delayMs < 60000) {
      return `${(delayMs / 1000).toFixed(1)}s`;
    }
    return `${(delayMs / 60000).toFixed(1)}m`;
  }
}
