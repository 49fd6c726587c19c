/**
 * Automation Runtime
 *
 * Executors that carry out retry loops and cancellable waits.
 *
 * @module automation/runtime
 */

export * from './BackoffTimer.js';
export * from './RetryExecutor.js';
