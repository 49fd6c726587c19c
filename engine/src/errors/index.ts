/**
 * Error Module
 *
 * Structured errors with stable codes, kinds and diagnostics.
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './FlowError.js';
export * from './WorkflowError.js';
export * from './NodeError.js';
export * from './ErrorFormatter.js';
