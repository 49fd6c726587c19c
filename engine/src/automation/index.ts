/**
 * Automation Layer
 *
 * Retry policies, backoff strategies and timeout management for node work.
 *
 * @module automation
 */

export * from './BackoffStrategy.js';
export * from './RetryPolicy.js';
export * from './TimeoutManager.js';
export * from './runtime/index.js';
