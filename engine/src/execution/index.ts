/**
 * Execution Layer
 *
 * - NodeHandlers: per-kind categories, collaborators and collaborator work
 * - RunController: edge-token scheduler driving one run
 */

export * from './NodeHandlers.js';
export * from './RunController.js';
