/**
 * Backoff Strategy
 *
 * Wait between a failed attempt and the next one. The delay grows with the
 * attempt number (fixed, linear or exponential), never exceeds maxDelayMs,
 * and is exact unless jitter is set.
 *
 * @module automation
 */

import type { BackoffType } from '../types/core-types.js';

export type { BackoffType };

export interface BackoffConfig {
  type: BackoffType;
  /** Delay after the first failure, in ms */
  baseDelayMs: number;
  /** Upper bound; defaults to the larger of one minute and baseDelayMs */
  maxDelayMs?: number;
  /** Growth factor of `exponential` (2 when unset) */
  multiplier?: number;
  /** Spread as a fraction of the delay, clamped to 0..1 */
  jitter?: number;
}

export class BackoffStrategy {
  private readonly config: Required<BackoffConfig>;

  constructor(config: BackoffConfig) {
    this.config = {
      type: config.type,
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs ?? Math.max(60000, config.baseDelayMs),
      multiplier: config.multiplier ?? 2,
      jitter: Math.max(0, Math.min(1, config.jitter ?? 0)),
    };

    this.validateConfig();
  }

  /**
   * @param attempt - the attempt that just failed, counting from 1
   */
  calculateDelay(attempt: number): number {
    if (attempt < 1) {
      throw new Error(`Attempt number must be >= 1, got: ${attempt}`);
    }

    let delayMs: number;

    switch (this.config.type) {
      case 'fixed':
        delayMs = this.config.baseDelayMs;
        break;
      case 'linear':
        delayMs = this.config.baseDelayMs * attempt;
        break;
      case 'exponential':
        delayMs = this.config.baseDelayMs * Math.pow(this.config.multiplier, attempt - 1);
        break;
    }

    delayMs = Math.min(delayMs, this.config.maxDelayMs);

    if (this.config.jitter > 0) {
      const jitterAmount = delayMs * this.config.jitter;
      const randomJitter = Math.random() * jitterAmount * 2 - jitterAmount;
      delayMs = Math.max(0, delayMs + randomJitter);
    }

    return Math.round(delayMs);
  }

  /** Delay after each of the first `count` failures */
  calculateDelays(count: number): number[] {
    const delays: number[] = [];
    for (let attempt = 1; attempt <= count; attempt++) {
      delays.push(this.calculateDelay(attempt));
    }
    return delays;
  }

  getTotalDelay(count: number): number {
    return this.calculateDelays(count).reduce((sum, delay) => sum + delay, 0);
  }

  private validateConfig(): void {
    if (this.config.baseDelayMs < 0) {
      throw new Error(`Base delay must be >= 0, got: ${this.config.baseDelayMs}`);
    }

    if (this.config.maxDelayMs < this.config.baseDelayMs) {
      throw new Error(
        `Max delay (${this.config.maxDelayMs}ms) must be >= base delay (${this.config.baseDelayMs}ms)`
      );
    }

    if (this.config.multiplier <= 0) {
      throw new Error(`Multiplier must be > 0, got: ${this.config.multiplier}`);
    }
  }
}

/** Retry right away */
export const IMMEDIATE_BACKOFF = new BackoffStrategy({ type: 'fixed', baseDelayMs: 0 });

export function createBackoffStrategy(
  type: BackoffType,
  baseDelayMs: number,
  options?: {
    maxDelayMs?: number;
    multiplier?: number;
    jitter?: number;
  }
): BackoffStrategy {
  return new BackoffStrategy({
    type,
    baseDelayMs,
    ...options,
  });
}
