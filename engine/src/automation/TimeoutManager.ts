/**
 * Timeout Manager
 *
 * Enforces per-attempt timeouts on node work and parses duration strings.
 *
 * @module automation
 */

/**
 * Timeout error
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly operation?: string
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Timeout configuration
 */
export interface TimeoutConfig {
  /** Timeout duration in milliseconds; 0 or less disables the timer */
  timeoutMs: number;

  /** Operation name for error messages */
  operation?: string;

  /** Outer cancellation; aborting it also aborts the attempt */
  signal?: AbortSignal;
}

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/;

/**
 * Timeout manager for execution control
 */
export class TimeoutManager {
  /**
   * Execute operation with timeout.
   *
   * The operation receives an attempt signal that aborts on timeout
   * or when the outer signal aborts.
   *
   * @throws TimeoutError if the operation times out
   */
  static async execute<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    config: TimeoutConfig
  ): Promise<T> {
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort(config.signal?.reason);

    if (config.signal?.aborted) {
      controller.abort(config.signal.reason);
    } else {
      config.signal?.addEventListener('abort', onOuterAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    const startTime = Date.now();

    const timeoutPromise = new Promise<never>((_, reject) => {
      if (config.timeoutMs <= 0) {
        return;
      }
      timer = setTimeout(() => {
        const elapsedMs = Date.now() - startTime;
        const error = new TimeoutError(
          config.operation
            ? `Operation "${config.operation}" timed out after ${config.timeoutMs}ms (elapsed: ${elapsedMs}ms)`
            : `Operation timed out after ${config.timeoutMs}ms (elapsed: ${elapsedMs}ms)`,
          config.timeoutMs,
          config.operation
        );
        controller.abort(error);
        reject(error);
      }, config.timeoutMs);
    });

    try {
      return await Promise.race([operation(controller.signal), timeoutPromise]);
    } finally {
      clearTimeout(timer);
      config.signal?.removeEventListener('abort', onOuterAbort);
    }
  }

  /**
   * Parse a duration to milliseconds
   *
   * Supported formats:
   * - "250ms" -> 250
   * - "30s" -> 30000
   * - "5m" -> 300000
   * - "2h" -> 7200000
   * - "1000" or 1000 -> 1000 (raw milliseconds)
   *
   * @throws Error if format is invalid
   */
  static parseTimeout(timeout: string | number): number {
    if (typeof timeout === 'number') {
      if (!Number.isFinite(timeout) || timeout < 0) {
        throw new Error(`Invalid timeout: ${timeout}. Expected a non-negative number of milliseconds`);
      }
      return timeout;
    }

    const trimmed = timeout.trim();

    if (/^\d+$/.test(trimmed)) {
      return parseInt(trimmed, 10);
    }

    const match = DURATION_PATTERN.exec(trimmed);
    if (!match?.[1]) {
      throw new Error(`Invalid timeout format: "${timeout}". Expected: "250ms", "30s", "5m", "2h", or raw ms`);
    }

    const value = parseFloat(match[1]);

    switch (match[2]) {
      case 'ms':
        return value;
      case 's':
        return value * 1000;
      case 'm':
        return value * 60 * 1000;
      default:
        return value * 60 * 60 * 1000;
    }
  }

  /**
   * Whether a duration parses
   */
  static isValidDuration(timeout: string | number): boolean {
    try {
      this.parseTimeout(timeout);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Format milliseconds to a human-readable string (e.g., "30.0s")
   */
  static formatTimeout(ms: number): string {
    if (ms < 1000) {
      return `${ms}ms`;
    }
    if (ms < 60000) {
      return `${(ms / 1000).toFixed(1)}s`;
    }
    if (ms < 3600000) {
      return `${(ms / 60000).toFixed(1)}m`;
    }
    return `${(ms / 3600000).toFixed(1)}h`;
  }

  static isTimeoutError(error: unknown): error is TimeoutError {
    return error instanceof TimeoutError;
  }
}
