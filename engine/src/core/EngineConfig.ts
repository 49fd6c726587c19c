/**
 * Engine Configuration
 *
 * User-facing configuration for FlowEngine.
 * Provides defaults, validation and environment overrides.
 *
 * @module core
 */

import type { RetryPolicyConfig } from '../types/core-types.js';
import type { ConfigLogLevel, LogSink } from '../types/log-types.js';
import type { ExecutionStore } from '../state/ExecutionStore.js';
import { InMemoryExecutionStore } from '../state/ExecutionStore.js';
import { EventBus } from '../events/EventBus.js';
import type { TemplateLibrary } from '../templates/TemplateLibrary.js';
import { createDefaultTemplateLibrary } from '../templates/builtins.js';
import type { RunCollaborators } from '../execution/NodeHandlers.js';
import { WorkflowGuard } from '../guards/WorkflowGuard.js';
import { ConfigurationError } from '../errors/WorkflowError.js';
import { EngineLogger, createEngineLogger } from './EngineLogger.js';

const LOG_LEVELS: readonly ConfigLogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Engine configuration options
 *
 * All options are optional.
 *
 * @example
 * ```ts
 * const engine = new FlowEngine({
 *   taskExecutor: myAgents,
 *   approvals: new InMemoryApprovalGate(),
 *   maxConcurrentNodes: 4,
 *   logLevel: 'info',
 * });
 * ```
 */
export interface FlowEngineConfig extends RunCollaborators {
  // === Execution ===

  /**
   * In-flight work nodes per run
   * @default 10
   */
  maxConcurrentNodes?: number;

  /**
   * Per-attempt timeout for nodes without `timeoutMs` (0 = none)
   * @default 0
   */
  defaultTimeoutMs?: number;

  /**
   * Retry policy for nodes without their own
   * @default { maxAttempts: 1 }
   */
  defaultRetry?: RetryPolicyConfig;

  // === Logging ===

  /**
   * @default 'warn'
   */
  logLevel?: ConfigLogLevel;

  /**
   * Debug level with pretty output
   * @default false
   */
  verbose?: boolean;

  /** Receives formatted log lines instead of the console */
  logSink?: LogSink;

  /** Use this logger instead of building one from logLevel/verbose */
  logger?: EngineLogger;

  // === Components ===

  store?: ExecutionStore;
  eventBus?: EventBus;
  templates?: TemplateLibrary;
}

/**
 * Configuration with every default filled in
 */
export interface ResolvedEngineConfig extends RunCollaborators {
  maxConcurrentNodes: number;
  defaultTimeoutMs: number;
  defaultRetry: RetryPolicyConfig;
  logLevel: ConfigLogLevel;
  verbose: boolean;
  logger: EngineLogger;
  store: ExecutionStore;
  eventBus: EventBus;
  templates: TemplateLibrary;
}

/**
 * Apply default values to engine configuration
 */
export function applyConfigDefaults(config: FlowEngineConfig = {}): ResolvedEngineConfig {
  const logLevel = config.logLevel ?? 'warn';
  const verbose = config.verbose ?? false;
  const logger = config.logger ?? createEngineLogger(logLevel, verbose, config.logSink);

  return {
    maxConcurrentNodes: config.maxConcurrentNodes ?? 10,
    defaultTimeoutMs: config.defaultTimeoutMs ?? 0,
    defaultRetry: config.defaultRetry ?? { maxAttempts: 1 },
    logLevel,
    verbose,
    logger,
    store: config.store ?? new InMemoryExecutionStore(logger),
    eventBus: config.eventBus ?? new EventBus(logger),
    templates: config.templates ?? createDefaultTemplateLibrary(),
    taskExecutor: config.taskExecutor,
    mcpService: config.mcpService,
    webhookService: config.webhookService,
    approvals: config.approvals,
  };
}

/**
 * Validate engine configuration
 *
 * @throws ConfigurationError
 */
export function validateConfig(config: FlowEngineConfig): void {
  if (
    config.maxConcurrentNodes !== undefined &&
    (!Number.isInteger(config.maxConcurrentNodes) || config.maxConcurrentNodes < 1)
  ) {
    throw ConfigurationError.invalid('maxConcurrentNodes', 'must be an integer >= 1');
  }

  if (config.defaultTimeoutMs !== undefined && !(config.defaultTimeoutMs >= 0)) {
    throw ConfigurationError.invalid('defaultTimeoutMs', 'must be >= 0');
  }

  if (config.defaultRetry !== undefined) {
    const problem = WorkflowGuard.checkRetryPolicy(config.defaultRetry);
    if (problem) {
      throw ConfigurationError.invalid('defaultRetry', problem);
    }
  }

  if (config.logLevel !== undefined && !LOG_LEVELS.includes(config.logLevel)) {
    throw ConfigurationError.invalid('logLevel', `must be one of ${LOG_LEVELS.join(', ')}`);
  }
}

function isConfigLogLevel(value: string): value is ConfigLogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Read overrides from the environment
 *
 * - FLOWWEAVE_LOG_LEVEL: debug | info | warn | error | silent
 * - FLOWWEAVE_MAX_CONCURRENT_NODES: positive integer
 *
 * @throws ConfigurationError for values that do not parse
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): FlowEngineConfig {
  const config: FlowEngineConfig = {};

  const level = env['FLOWWEAVE_LOG_LEVEL']?.trim().toLowerCase();
  if (level) {
    if (!isConfigLogLevel(level)) {
      throw ConfigurationError.invalid('FLOWWEAVE_LOG_LEVEL', `must be one of ${LOG_LEVELS.join(', ')}`);
    }
    config.logLevel = level;
  }

  const concurrency = env['FLOWWEAVE_MAX_CONCURRENT_NODES']?.trim();
  if (concurrency) {
    const parsed = Number(concurrency);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw ConfigurationError.invalid('FLOWWEAVE_MAX_CONCURRENT_NODES', `expected a positive integer, got "${concurrency}"`);
    }
    config.maxConcurrentNodes = parsed;
  }

  return config;
}
