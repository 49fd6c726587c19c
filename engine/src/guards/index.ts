/**
 * Guards Module
 *
 * Validation guards run before a workflow is accepted for execution.
 */

export * from './WorkflowGuard.js';
