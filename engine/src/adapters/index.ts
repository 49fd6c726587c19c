/**
 * Collaborators
 *
 * Interfaces the engine calls out through, and the in-process approval gate.
 *
 * @module adapters
 */

export * from './TaskExecutor.js';
export * from './ApprovalGate.js';
