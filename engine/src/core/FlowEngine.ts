/**
 * Flow Engine - Main Public API
 *
 * User-facing engine class: validates definitions, starts and tracks runs,
 * forwards approval signals and exposes templates, events and metrics.
 * Each run is driven by its own RunController over the shared store.
 *
 * @module core
 */

import { randomUUID } from 'node:crypto';
import {
  NodeStatus,
  RunStatus,
  type Execution,
  type ExecutionProgress,
  type NodeState,
  type RunHandle,
  type RunOptions,
  type WorkflowDefinition,
} from '../types/core-types.js';
import { LogCategory } from '../types/log-types.js';
import { WorkflowGuard, type ValidationResult } from '../guards/WorkflowGuard.js';
import { InvalidDefinitionError, ConfigurationError } from '../errors/WorkflowError.js';
import { RunController } from '../execution/RunController.js';
import { NodeHandlers, type CollaboratorName } from '../execution/NodeHandlers.js';
import type { ExecutionFilter, ExecutionStore } from '../state/ExecutionStore.js';
import { isNodeTerminal, isRunTerminal } from '../state/StateMachine.js';
import type { EventBus, EventHandler } from '../events/EventBus.js';
import type { EngineEventType } from '../events/EngineEvents.js';
import type { TemplateLibrary } from '../templates/TemplateLibrary.js';
import { isApprovalGate, type ApprovalGate } from '../adapters/ApprovalGate.js';
import { applyConfigDefaults, validateConfig, type FlowEngineConfig, type ResolvedEngineConfig } from './EngineConfig.js';
import type { EngineLogger } from './EngineLogger.js';
import { EngineMetrics, type EngineMetricsSnapshot } from './EngineMetrics.js';

/**
 * Flow Engine
 *
 * @example
 * ```ts
 * const engine = new FlowEngine({ taskExecutor: agents });
 *
 * const definition = createWorkflow('Greeting')
 *   .start()
 *   .agentExecute('greet', { task: 'Say hello' })
 *   .end()
 *   .chain('start', 'greet', 'end')
 *   .build();
 *
 * const execution = await engine.run(definition);
 * console.log(execution.variables.greet_output);
 * ```
 */
export class FlowEngine {
  private readonly config: ResolvedEngineConfig;
  private readonly logger: EngineLogger;
  private readonly controllers = new Map<string, RunController>();
  private readonly metrics = new EngineMetrics();

  constructor(config: FlowEngineConfig = {}) {
    validateConfig(config);
    this.config = applyConfigDefaults(config);
    this.logger = this.config.logger;

    this.logger.debug(
      'Engine created',
      {
        maxConcurrentNodes: this.config.maxConcurrentNodes,
        defaultTimeoutMs: this.config.defaultTimeoutMs,
        collaborators: this.configuredCollaborators(),
      },
      LogCategory.SYSTEM
    );
  }

  get events(): EventBus {
    return this.config.eventBus;
  }

  get store(): ExecutionStore {
    return this.config.store;
  }

  get templates(): TemplateLibrary {
    return this.config.templates;
  }

  /**
   * Ids of runs driven by this engine that have not finished
   */
  get activeRuns(): string[] {
    return [...this.controllers.keys()];
  }

  // ============================================================================
  // DEFINITIONS
  // ============================================================================

  validate(definition: WorkflowDefinition): ValidationResult {
    const result = WorkflowGuard.validate(definition);
    if (!result.valid) {
      this.logger.debug(
        `Workflow "${definition.name}" has ${result.violations.length} violation(s)`,
        { definitionId: definition.id, codes: result.violations.map(v => v.code) },
        LogCategory.ANALYSIS
      );
    }
    return result;
  }

  /**
   * Instantiate a registered template into a validated definition
   */
  instantiate(templateName: string, params: Record<string, unknown> = {}): WorkflowDefinition {
    const definition = this.config.templates.instantiate(templateName, params);
    this.logger.debug(
      `Template "${templateName}" instantiated`,
      { definitionId: definition.id, nodes: Object.keys(definition.nodes).length },
      LogCategory.ANALYSIS
    );
    return definition;
  }

  // ============================================================================
  // RUNS
  // ============================================================================

  /**
   * Start a run. Default variables are seeded first, then `options.variables`.
   *
   * @throws InvalidDefinitionError when the definition does not validate
   * @throws ConfigurationError when a node needs a collaborator that is not configured
   */
  start(definition: WorkflowDefinition, options: RunOptions = {}): RunHandle {
    const result = this.validate(definition);
    if (!result.valid) {
      throw new InvalidDefinitionError(result.violations, definition.name);
    }
    this.assertCollaborators(definition);

    const runId = options.runId ?? `run-${Date.now()}-${randomUUID().split('-')[0]}`;
    if (this.config.store.has(runId)) {
      throw ConfigurationError.invalid('runId', `run "${runId}" already exists`);
    }

    const nodes: Record<string, NodeState> = {};
    for (const id of Object.keys(definition.nodes)) {
      nodes[id] = { status: NodeStatus.PENDING, attempts: 0 };
    }

    this.config.store.create({
      id: runId,
      definitionId: definition.id,
      definition,
      status: RunStatus.PENDING,
      createdAt: new Date(),
      variables: { ...structuredClone(definition.variables), ...structuredClone(options.variables ?? {}) },
      nodes,
      edges: {},
      failures: [],
      log: [],
    });

    const controller = this.createController(runId, definition);
    return { runId, completion: this.launch(controller, () => controller.start()) };
  }

  /**
   * Start a run and wait for it to finish
   */
  run(definition: WorkflowDefinition, options: RunOptions = {}): Promise<Execution> {
    return this.start(definition, options).completion;
  }

  /**
   * Take over a non-terminal run from the store that no live controller owns.
   * A run this engine is still driving returns its existing handle, and is
   * unpaused first when paused.
   */
  resume(runId: string): RunHandle {
    const live = this.controllers.get(runId);
    if (live) {
      live.unpause();
      return { runId, completion: live.completion };
    }

    const execution = this.config.store.get(runId);
    if (!execution) {
      throw new Error(`Execution "${runId}" not found`);
    }
    if (isRunTerminal(execution.status)) {
      throw new Error(`Execution "${runId}" is already ${execution.status}`);
    }
    this.assertCollaborators(execution.definition);

    const controller = this.createController(runId, execution.definition);
    return { runId, completion: this.launch(controller, () => controller.resume()) };
  }

  /**
   * @returns false when the run is unknown to this engine or already finished
   */
  cancel(runId: string, reason?: string): boolean {
    const controller = this.controllers.get(runId);
    return controller ? controller.cancel(reason) : false;
  }

  /**
   * Stop dispatching new nodes of a live run. Running nodes finish and
   * approvals are still accepted; `resume` continues the run.
   *
   * @returns false when the run is unknown to this engine, finished or already paused
   */
  pause(runId: string): boolean {
    const controller = this.controllers.get(runId);
    return controller ? controller.pause() : false;
  }

  /**
   * Signals for nodes that have not asked yet are buffered until they do.
   *
   * @returns true when a waiting node received the signal, false when it was buffered
   * @throws Error when the run is unknown or finished, or the node cannot take a decision
   */
  approve(runId: string, nodeId: string, approver?: string): boolean {
    const gate = this.approvalGate();
    this.assertDecidable(runId, nodeId);
    return gate.approve(runId, nodeId, approver);
  }

  /**
   * @returns true when a waiting node received the signal, false when it was buffered
   * @throws Error when the run is unknown or finished, or the node cannot take a decision
   */
  reject(runId: string, nodeId: string, reason: string, approver?: string): boolean {
    const gate = this.approvalGate();
    this.assertDecidable(runId, nodeId);
    return gate.reject(runId, nodeId, reason, approver);
  }

  getExecution(runId: string): Execution | undefined {
    return this.config.store.get(runId);
  }

  listExecutions(filter?: ExecutionFilter): Execution[] {
    return this.config.store.list(filter);
  }

  /**
   * Terminal nodes over all nodes
   */
  getProgress(runId: string): ExecutionProgress | undefined {
    const execution = this.config.store.get(runId);
    if (!execution) {
      return undefined;
    }

    const states = Object.values(execution.nodes);
    const completed = states.filter(state => isNodeTerminal(state.status)).length;
    const total = states.length;

    return {
      total,
      completed,
      percent: total === 0 ? 100 : Math.round((completed / total) * 100),
    };
  }

  getMetrics(): EngineMetricsSnapshot {
    return this.metrics.snapshot(this.controllers.size);
  }

  // ============================================================================
  // EVENTS & LIFECYCLE
  // ============================================================================

  on<T extends EngineEventType>(eventType: T, handler: EventHandler<T>): () => void {
    return this.config.eventBus.on(eventType, handler);
  }

  onAny(handler: EventHandler): () => void {
    return this.config.eventBus.onAny(handler);
  }

  /**
   * Cancel every live run and wait for them to settle
   */
  async shutdown(reason: string = 'Engine shutdown'): Promise<Execution[]> {
    const live = [...this.controllers.values()];
    this.logger.info(`Shutting down with ${live.length} active run(s)`, { reason }, LogCategory.SYSTEM);

    for (const controller of live) {
      controller.cancel(reason);
    }
    return Promise.all(live.map(controller => controller.completion));
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  private createController(runId: string, definition: WorkflowDefinition): RunController {
    const controller = new RunController({
      runId,
      definition,
      store: this.config.store,
      events: this.config.eventBus,
      logger: this.logger,
      collaborators: {
        taskExecutor: this.config.taskExecutor,
        mcpService: this.config.mcpService,
        webhookService: this.config.webhookService,
        approvals: this.config.approvals,
      },
      maxConcurrentNodes: this.config.maxConcurrentNodes,
      defaultTimeoutMs: this.config.defaultTimeoutMs,
      defaultRetry: this.config.defaultRetry,
      metrics: this.metrics,
      onSettled: id => {
        this.controllers.delete(id);
        this.config.approvals?.clear?.(id);
      },
    });
    this.controllers.set(runId, controller);
    return controller;
  }

  private launch(controller: RunController, begin: () => Promise<Execution>): Promise<Execution> {
    try {
      return begin();
    } catch (error) {
      this.controllers.delete(controller.runId);
      throw error;
    }
  }

  /**
   * @throws ConfigurationError naming the first missing collaborator and the nodes needing it
   */
  private assertCollaborators(definition: WorkflowDefinition): void {
    const missing = new Map<CollaboratorName, string[]>();

    for (const node of Object.values(definition.nodes)) {
      const needed = NodeHandlers.requiredCollaborator(node.kind);
      if (needed !== undefined && this.config[needed] === undefined) {
        missing.set(needed, [...(missing.get(needed) ?? []), node.id]);
      }
    }

    for (const [collaborator, nodeIds] of missing) {
      throw ConfigurationError.missingCollaborator(collaborator, nodeIds);
    }
  }

  private assertDecidable(runId: string, nodeId: string): void {
    const execution = this.config.store.get(runId);
    if (!execution) {
      throw new Error(`Execution "${runId}" not found`);
    }
    if (isRunTerminal(execution.status)) {
      throw new Error(`Execution "${runId}" is already ${execution.status}`);
    }

    const state = execution.nodes[nodeId];
    if (!state) {
      throw new Error(`Execution "${runId}" has no node "${nodeId}"`);
    }
    if (isNodeTerminal(state.status)) {
      throw new Error(`Node "${nodeId}" of execution "${runId}" is already ${state.status}`);
    }
  }

  private approvalGate(): ApprovalGate {
    const source = this.config.approvals;
    if (!source) {
      throw ConfigurationError.missingCollaborator('approvals', []);
    }
    if (!isApprovalGate(source)) {
      throw ConfigurationError.invalid('approvals', 'the configured approval source does not accept direct signals');
    }
    return source;
  }

  private configuredCollaborators(): CollaboratorName[] {
    const names: CollaboratorName[] = ['taskExecutor', 'mcpService', 'webhookService', 'approvals'];
    return names.filter(name => this.config[name] !== undefined);
  }
}
