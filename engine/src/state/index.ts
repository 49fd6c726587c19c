/**
 * State Module
 *
 * Status transition rules and run storage.
 *
 * @module state
 */

export * from './StateMachine.js';
export * from './ExecutionStore.js';
