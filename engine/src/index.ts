/**
 * flowweave - Graph-based workflow orchestration
 *
 * @example
 * ```ts
 * import { FlowEngine, createWorkflow } from '@flowweave/engine';
 *
 * const engine = new FlowEngine({ taskExecutor: agents });
 * const execution = await engine.run(engine.instantiate('sequential', { steps: ['Plan', 'Build'] }));
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { FlowEngine } from './core/FlowEngine.js';
export { createWorkflow, WorkflowBuilder, slugify } from './builder/WorkflowBuilder.js';
export type { NodeOptions, EdgeOptions, WorkflowOptions } from './builder/WorkflowBuilder.js';

// ============================================================================
// TYPES - Definitions, runs and configuration
// ============================================================================

export * from './types/core-types.js';
export * from './types/log-types.js';

export type { FlowEngineConfig, ResolvedEngineConfig } from './core/EngineConfig.js';
export { applyConfigDefaults, validateConfig, loadConfigFromEnv } from './core/EngineConfig.js';
export { EngineMetrics } from './core/EngineMetrics.js';
export type { EngineMetricsSnapshot, NodeKindMetrics, FinishedRunStatus } from './core/EngineMetrics.js';

// ============================================================================
// ADVANCED - Collaborators, validation and tooling
// ============================================================================

// Collaborators
export * from './adapters/index.js';

// Validation
export * from './guards/index.js';
export * from './graph/index.js';
export * from './nodes/NodeConfigSchemas.js';
export * from './conditions/ConditionEvaluator.js';

// Import / export
export * from './parser/index.js';

// Templates
export * from './templates/index.js';

// Execution internals
export * from './execution/index.js';
export * from './state/index.js';
export * from './context/index.js';
export * from './automation/index.js';

// Events
export * from './events/index.js';

// Errors
export * from './errors/index.js';

// Logging
export { EngineLogger, createEngineLogger } from './core/EngineLogger.js';
export { LoggerManager } from './logging/LoggerManager.js';

// Test doubles
export * from './testing/index.js';
