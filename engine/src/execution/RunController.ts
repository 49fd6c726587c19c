/**
 * Run Controller
 *
 * Drives one run of a workflow definition over the execution store.
 *
 * Scheduling works on edge tokens: every edge resolves to `taken`, `dead`
 * or `failed`. A PENDING node becomes READY once all of its forward
 * incoming edges are resolved and at least one is taken; when none is
 * taken it is SKIPPED and forwards dead (or failed) tokens, so branches
 * that were not chosen drain instead of blocking a JOIN.
 *
 * READY nodes are drained synchronously. Control nodes complete inside the
 * drain; work nodes start asynchronous work and call back into the
 * synchronous transition methods when it settles, so every state change
 * happens atomically between suspension points.
 *
 * A run that goes quiet without reaching an END node fails with
 * EndNotReached. Pausing stops the drain; in-flight work still settles.
 *
 * @module execution
 */

import {
  NodeKind,
  NodeStatus,
  RunStatus,
  type EdgeState,
  type Execution,
  type RetryPolicyConfig,
  type WorkflowDefinition,
  type WorkflowNode,
} from '../types/core-types.js';
import { LogCategory } from '../types/log-types.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import type { ExecutionStore, NodeStatePatch } from '../state/ExecutionStore.js';
import type { EventBus } from '../events/EventBus.js';
import { EngineEventType, createEvent } from '../events/EngineEvents.js';
import { DependencyGraph, type IndexedEdge } from '../graph/DependencyGraph.js';
import { evaluateCondition } from '../conditions/ConditionEvaluator.js';
import { DataTransformer, TransformError } from '../context/DataTransformer.js';
import { resolvePath } from '../context/VariablePath.js';
import {
  DataTransformConfigSchema,
  HumanApprovalConfigSchema,
  JoinConfigSchema,
  LoopConfigSchema,
  type LoopConfig,
} from '../nodes/NodeConfigSchemas.js';
import { createRetryPolicyFromNode } from '../automation/RetryPolicy.js';
import { RetryExecutor } from '../automation/runtime/RetryExecutor.js';
import { BackoffTimer, WaitCancelledError } from '../automation/runtime/BackoffTimer.js';
import { TimeoutManager } from '../automation/TimeoutManager.js';
import { FlowError, errorMessage, isFlowError } from '../errors/FlowError.js';
import { ErrorKind } from '../errors/ErrorCodes.js';
import { NodeExecutionError } from '../errors/NodeError.js';
import { ConfigurationError } from '../errors/WorkflowError.js';
import type { ApprovalDecision } from '../adapters/ApprovalGate.js';
import type { EngineMetrics } from '../core/EngineMetrics.js';
import { NodeHandlers, type RunCollaborators } from './NodeHandlers.js';

export interface RunControllerOptions {
  runId: string;
  definition: WorkflowDefinition;
  store: ExecutionStore;
  events: EventBus;
  logger: EngineLogger;
  collaborators: RunCollaborators;

  /** In-flight work nodes per run */
  maxConcurrentNodes: number;

  /** Per-attempt timeout for nodes without their own (0 = none) */
  defaultTimeoutMs: number;

  /** Retry policy for nodes without their own */
  defaultRetry?: RetryPolicyConfig;

  /** Receives run and node timings */
  metrics?: EngineMetrics;

  /** Called once the run reaches a terminal status */
  onSettled?: (runId: string) => void;
}

type NodeOutcome =
  | { type: 'succeeded'; output: unknown }
  | { type: 'failed'; error: FlowError }
  | { type: 'cancelled' };

type LoopStep = { type: 'exit' } | { type: 'next' } | { type: 'item'; item: unknown };

type Timer = ReturnType<typeof setTimeout>;

const ACTIVE_STATUSES: ReadonlySet<NodeStatus> = new Set([
  NodeStatus.READY,
  NodeStatus.RUNNING,
  NodeStatus.AWAITING_APPROVAL,
]);

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class RunController {
  readonly runId: string;

  private readonly definition: WorkflowDefinition;
  private readonly store: ExecutionStore;
  private readonly graph: DependencyGraph;
  private readonly settled = createDeferred<Execution>();

  private readyQueue: string[] = [];
  private readonly inFlight = new Map<string, AbortController>();
  private readonly approvalSubscriptions = new Map<string, () => void>();
  private readonly approvalTimers = new Map<string, Timer>();
  private runTimer: Timer | undefined;
  private pumping = false;
  private paused = false;
  private finished = false;
  private startTime = Date.now();

  constructor(private readonly options: RunControllerOptions) {
    this.runId = options.runId;
    this.definition = options.definition;
    this.store = options.store;
    this.graph = DependencyGraph.build(options.definition);
  }

  /**
   * Resolves with the final snapshot once the run is terminal
   */
  get completion(): Promise<Execution> {
    return this.settled.promise;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Begin a fresh run: START becomes READY and the drain begins
   */
  start(): Promise<Execution> {
    this.startTime = Date.now();
    this.store.setRunStatus(this.runId, RunStatus.RUNNING);
    this.announceStart(false);
    this.armRunTimeout(this.startTime);

    const startNode = Object.values(this.definition.nodes).find(node => node.kind === NodeKind.START);
    if (startNode) {
      this.makeReady(startNode.id);
    }

    this.pump();
    return this.completion;
  }

  /**
   * Take over a non-terminal run held by the store: READY and RUNNING work
   * is dispatched again, awaited approvals are re-subscribed, and pending
   * nodes whose inputs already resolved are scheduled.
   */
  resume(): Promise<Execution> {
    if (this.store.getRunStatus(this.runId) === RunStatus.PENDING) {
      return this.start();
    }

    this.startTime = Date.now();
    if (this.store.getRunStatus(this.runId) === RunStatus.PAUSED) {
      this.store.setRunStatus(this.runId, RunStatus.RUNNING);
    }
    this.announceStart(true);
    this.armRunTimeout(this.store.get(this.runId)?.startedAt?.getTime() ?? this.startTime);

    const pending: string[] = [];
    const loops: string[] = [];

    for (const node of Object.values(this.definition.nodes)) {
      const status = this.store.getNodeState(this.runId, node.id)?.status;
      switch (status) {
        case NodeStatus.READY:
          this.readyQueue.push(node.id);
          break;
        case NodeStatus.RUNNING:
          if (node.kind === NodeKind.LOOP) {
            loops.push(node.id);
          } else {
            this.transition(node.id, NodeStatus.READY);
            this.readyQueue.push(node.id);
          }
          break;
        case NodeStatus.AWAITING_APPROVAL:
          this.subscribeApproval(node);
          break;
        case NodeStatus.PENDING:
          pending.push(node.id);
          break;
        default:
          break;
      }
    }

    for (const nodeId of pending) {
      this.evaluateReadiness(nodeId);
    }
    for (const loopId of loops) {
      this.onBackEdgeResolved(loopId);
    }

    this.pump();
    return this.completion;
  }

  /**
   * @returns false when the run already finished
   */
  cancel(reason?: string): boolean {
    if (this.finished) {
      return false;
    }
    this.finish(RunStatus.CANCELLED, reason);
    return true;
  }

  /**
   * Stop dispatching READY nodes. Work already running keeps going and its
   * result is applied; approvals are still accepted.
   *
   * @returns false when the run already finished or is paused
   */
  pause(): boolean {
    if (this.finished || this.paused) {
      return false;
    }
    this.paused = true;
    this.store.setRunStatus(this.runId, RunStatus.PAUSED);
    this.store.appendLog(this.runId, 'run_paused', 'Run paused');
    this.announcePauseChange(EngineEventType.RUN_PAUSED);
    return true;
  }

  /**
   * @returns false when the run already finished or is not paused
   */
  unpause(): boolean {
    if (this.finished || !this.paused) {
      return false;
    }
    this.paused = false;
    this.store.setRunStatus(this.runId, RunStatus.RUNNING);
    this.store.appendLog(this.runId, 'run_resumed', 'Run resumed after pause');
    this.announcePauseChange(EngineEventType.RUN_RESUMED);
    this.pump();
    return true;
  }

  private announcePauseChange(type: EngineEventType.RUN_PAUSED | EngineEventType.RUN_RESUMED): void {
    const inFlight = Object.keys(this.definition.nodes).filter(id => {
      const status = this.store.getNodeState(this.runId, id)?.status;
      return status === NodeStatus.RUNNING || status === NodeStatus.AWAITING_APPROVAL;
    });
    this.options.logger.info(
      `Run ${type === EngineEventType.RUN_PAUSED ? 'paused' : 'resumed'}: ${this.definition.name}`,
      { runId: this.runId, inFlight },
      LogCategory.RUNTIME
    );
    this.options.events.emit(
      createEvent(type, { runId: this.runId, definitionId: this.definition.id, inFlight }, { runId: this.runId })
    );
  }

  /**
   * Fail the run once `definition.timeoutMs` has passed since `startedAt`
   */
  private armRunTimeout(startedAt: number): void {
    const timeoutMs = this.definition.timeoutMs;
    if (timeoutMs === undefined) {
      return;
    }

    const remaining = Math.max(0, startedAt + timeoutMs - Date.now());
    this.runTimer = setTimeout(() => {
      this.runTimer = undefined;
      try {
        this.failRun(NodeExecutionError.runTimedOut(this.runId, timeoutMs));
      } catch (error) {
        this.crash(undefined, error);
      }
    }, remaining);
  }

  private announceStart(resumed: boolean): void {
    this.store.appendLog(this.runId, 'run_started', resumed ? 'Run resumed' : 'Run started');
    this.options.logger.info(
      resumed ? `Run resumed: ${this.definition.name}` : `Run started: ${this.definition.name}`,
      { runId: this.runId, definitionId: this.definition.id },
      LogCategory.RUNTIME
    );
    this.options.metrics?.recordRunStarted();
    this.options.events.emit(
      createEvent(
        EngineEventType.RUN_STARTED,
        {
          runId: this.runId,
          definitionId: this.definition.id,
          definitionName: this.definition.name,
          resumed,
        },
        { runId: this.runId }
      )
    );
  }

  // ============================================================================
  // DRAIN
  // ============================================================================

  private pump(): void {
    if (this.pumping || this.finished) {
      return;
    }

    this.pumping = true;
    try {
      let nodeId = this.takeNext();
      while (nodeId !== undefined) {
        this.dispatch(nodeId);
        nodeId = this.finished ? undefined : this.takeNext();
      }
    } finally {
      this.pumping = false;
    }

    this.checkQuiescence();
  }

  /**
   * Next dispatchable READY node; work nodes wait for a concurrency slot
   */
  private takeNext(): string | undefined {
    if (this.paused) {
      return undefined;
    }
    const slotFree = this.inFlight.size < this.options.maxConcurrentNodes;
    const index = this.readyQueue.findIndex(
      id => slotFree || NodeHandlers.categorize(this.node(id).kind) !== 'work'
    );
    if (index === -1) {
      return undefined;
    }
    const [nodeId] = this.readyQueue.splice(index, 1);
    return nodeId;
  }

  private dispatch(nodeId: string): void {
    if (this.store.getNodeState(this.runId, nodeId)?.status !== NodeStatus.READY) {
      return;
    }

    const node = this.node(nodeId);
    try {
      switch (NodeHandlers.categorize(node.kind)) {
        case 'control':
          this.runControl(node);
          break;
        case 'work':
          this.runWork(node);
          break;
        case 'approval':
          this.requestApproval(node);
          break;
      }
    } catch (error) {
      if (isFlowError(error) && this.isActive(nodeId)) {
        this.fail(node, error);
      } else {
        this.crash(nodeId, error);
      }
    }
  }

  private checkQuiescence(): void {
    if (this.finished || this.readyQueue.length > 0 || this.inFlight.size > 0) {
      return;
    }
    if (Object.keys(this.definition.nodes).some(id => this.isActive(id))) {
      return;
    }

    if (this.store.getEndNode(this.runId) !== undefined) {
      this.finish(RunStatus.SUCCEEDED);
    } else {
      this.failRun(NodeExecutionError.endNotReached(this.runId));
    }
  }

  // ============================================================================
  // TOKENS
  // ============================================================================

  private resolveEdge(indexed: IndexedEdge, state: EdgeState): void {
    if (this.finished || this.store.getEdgeState(this.runId, indexed.index) !== undefined) {
      return;
    }

    this.store.setEdgeState(this.runId, indexed.index, state);
    if (indexed.edge.loopBack) {
      this.onBackEdgeResolved(indexed.edge.to);
    } else {
      this.evaluateReadiness(indexed.edge.to);
    }
  }

  private evaluateReadiness(nodeId: string): void {
    if (this.finished || this.store.getNodeState(this.runId, nodeId)?.status !== NodeStatus.PENDING) {
      return;
    }

    const node = this.node(nodeId);
    const states = this.graph.incomingEdges(nodeId).map(e => this.store.getEdgeState(this.runId, e.index));
    const anyFailed = states.includes('failed');

    if (node.kind === NodeKind.JOIN && anyFailed && JoinConfigSchema.parse(node.config).failurePolicy === 'fail_fast') {
      this.makeReady(nodeId);
      return;
    }
    if (states.length === 0 || states.includes(undefined)) {
      return;
    }

    if (states.includes('taken') || (node.kind === NodeKind.JOIN && anyFailed)) {
      this.makeReady(nodeId);
    } else {
      this.skip(nodeId, anyFailed ? 'failed' : 'dead');
    }
  }

  private makeReady(nodeId: string): void {
    this.transition(nodeId, NodeStatus.READY);
    this.readyQueue.push(nodeId);
  }

  private skip(nodeId: string, forward: EdgeState): void {
    this.transition(nodeId, NodeStatus.SKIPPED, { finishedAt: new Date() });
    this.store.appendLog(this.runId, 'node_skipped', `Node "${nodeId}" skipped`, nodeId);
    for (const edge of this.graph.outgoingEdges(nodeId)) {
      this.resolveEdge(edge, edge.edge.fallback ? 'dead' : forward);
    }
  }

  // ============================================================================
  // CONTROL NODES
  // ============================================================================

  private runControl(node: WorkflowNode): void {
    this.startNode(node.id);

    switch (node.kind) {
      case NodeKind.START:
      case NodeKind.PARALLEL:
        this.succeed(node, undefined, this.normalEdges(node.id));
        break;

      case NodeKind.END:
        this.store.setEndNode(this.runId, node.id);
        this.succeed(node, undefined, []);
        break;

      case NodeKind.CONDITION:
        this.route(node);
        break;

      case NodeKind.JOIN:
        this.join(node);
        break;

      case NodeKind.LOOP:
        this.advanceLoop(node, 0);
        break;

      case NodeKind.DATA_TRANSFORM:
        this.transform(node);
        break;

      default:
        throw new Error(`Node kind "${node.kind}" is not a control node`);
    }
  }

  /**
   * First outgoing edge whose predicate holds wins; an unconditioned edge is the default
   */
  private route(node: WorkflowNode): void {
    const variables = this.store.getVariables(this.runId);
    const branches = this.normalEdges(node.id);
    const chosen = branches.find(e => e.edge.condition === undefined || evaluateCondition(e.edge.condition, variables));

    if (!chosen) {
      throw NodeExecutionError.noMatchingBranch(node.id, branches.length);
    }
    this.succeed(node, { branch: chosen.edge.to }, [chosen]);
  }

  private join(node: WorkflowNode): void {
    const config = JoinConfigSchema.parse(node.config);
    const incoming = this.graph.incomingEdges(node.id);
    const sources = (state: EdgeState) =>
      incoming.filter(e => this.store.getEdgeState(this.runId, e.index) === state).map(e => e.edge.from);

    const arrived = sources('taken');
    const failed = sources('failed');

    if (failed.length > 0 && (config.failurePolicy === 'fail_fast' || arrived.length === 0)) {
      throw NodeExecutionError.joinedBranchFailed(node.id, failed);
    }
    this.succeed(node, { arrived, failed }, this.normalEdges(node.id));
  }

  private transform(node: WorkflowNode): void {
    const config = DataTransformConfigSchema.parse(node.config);
    let value: unknown;
    try {
      value = DataTransformer.apply(config, this.store.getVariables(this.runId));
    } catch (error) {
      if (error instanceof TransformError) {
        throw NodeExecutionError.transformFailed(node.id, config.operation, error.message);
      }
      throw error;
    }

    this.store.setVariable(this.runId, config.output, value, node.id);
    this.succeed(node, value, this.normalEdges(node.id));
  }

  // ============================================================================
  // LOOPS
  // ============================================================================

  /**
   * Decide after `completed` iterations: run the body again, or exit.
   * The LOOP stays RUNNING while its body executes.
   */
  private advanceLoop(node: WorkflowNode, completed: number): void {
    const config = LoopConfigSchema.parse(node.config);
    const variables = this.store.getVariables(this.runId);
    const step = this.loopStep(node.id, config, completed, variables);
    const again =
      step.type !== 'exit' &&
      (config.condition === undefined || evaluateCondition(config.condition, variables)) &&
      (config.iterations === undefined || completed < config.iterations);

    this.store.updateNode(this.runId, node.id, { iteration: completed });
    const bodyEdges = this.normalEdges(node.id).filter(e => !e.edge.loopBack && e.edge.to === config.body);

    if (!again) {
      const exits = this.normalEdges(node.id).filter(e => !bodyEdges.includes(e));
      this.succeed(node, { iterations: completed }, exits);
      return;
    }

    if (completed >= config.maxIterations) {
      throw NodeExecutionError.loopBoundExceeded(node.id, config.maxIterations);
    }

    if (completed > 0) {
      this.resetLoopBody(node.id);
    }
    this.store.setVariable(this.runId, config.indexVariable ?? `${node.id}_index`, completed, node.id);
    if (step.type === 'item') {
      this.store.setVariable(this.runId, config.itemVariable ?? `${node.id}_item`, step.item, node.id);
    }

    for (const edge of bodyEdges) {
      this.resolveEdge(edge, 'taken');
    }
  }

  /**
   * Position in a `for` / `foreach` sequence after `completed` iterations.
   * A foreach over a missing or non-array variable runs no iterations.
   */
  private loopStep(
    loopId: string,
    config: LoopConfig,
    completed: number,
    variables: Readonly<Record<string, unknown>>
  ): LoopStep {
    switch (config.loopType ?? 'while') {
      case 'for': {
        const stride = config.step ?? 1;
        const value = (config.start ?? 0) + completed * stride;
        if (config.end === undefined || (stride > 0 ? value >= config.end : value <= config.end)) {
          return { type: 'exit' };
        }
        return { type: 'item', item: value };
      }
      case 'foreach': {
        const items = config.items === undefined ? undefined : resolvePath(variables, config.items);
        if (items !== undefined && !Array.isArray(items)) {
          this.options.logger.warn(
            `Loop "${loopId}" items variable "${config.items}" is not an array`,
            { runId: this.runId, nodeId: loopId },
            LogCategory.RUNTIME
          );
        }
        if (!Array.isArray(items) || completed >= items.length) {
          return { type: 'exit' };
        }
        return { type: 'item', item: structuredClone(items[completed]) };
      }
      default:
        return { type: 'next' };
    }
  }

  private onBackEdgeResolved(loopId: string): void {
    const state = this.store.getNodeState(this.runId, loopId);
    if (this.finished || state?.status !== NodeStatus.RUNNING) {
      return;
    }

    const backEdges = this.graph.incomingEdges(loopId, true).filter(e => e.edge.loopBack);
    if (backEdges.some(e => this.store.getEdgeState(this.runId, e.index) === undefined)) {
      return;
    }

    const loop = this.node(loopId);
    try {
      this.advanceLoop(loop, (state.iteration ?? 0) + 1);
    } catch (error) {
      if (!isFlowError(error)) {
        throw error;
      }
      this.fail(loop, error);
    }
  }

  /**
   * Fresh NodeStates for the body; tokens produced inside the body are cleared
   */
  private resetLoopBody(loopId: string): void {
    const body = this.graph.loopBody(loopId);

    for (const nodeId of body) {
      const from = this.store.resetNode(this.runId, nodeId);
      if (from !== NodeStatus.PENDING) {
        this.store.appendLog(this.runId, 'node_reset', `Node "${nodeId}" reset for next iteration`, nodeId);
        this.emitStatus(nodeId, from, NodeStatus.PENDING);
      }
    }

    this.definition.edges.forEach((edge, index) => {
      if (body.has(edge.from) || (edge.from === loopId && body.has(edge.to))) {
        this.store.clearEdgeState(this.runId, index);
      }
    });
  }

  // ============================================================================
  // WORK NODES
  // ============================================================================

  private runWork(node: WorkflowNode): void {
    const controller = new AbortController();
    this.inFlight.set(node.id, controller);

    void this.perform(node, controller.signal)
      .then(outcome => this.settle(node, outcome, controller.signal))
      .finally(() => {
        if (this.inFlight.get(node.id) === controller) {
          this.inFlight.delete(node.id);
        }
        this.pump();
      })
      .catch((error: unknown) => this.crash(node.id, error));
  }

  private async perform(node: WorkflowNode, signal: AbortSignal): Promise<NodeOutcome> {
    if (node.kind === NodeKind.DELAY) {
      this.startNode(node.id);
      try {
        await BackoffTimer.sleep(NodeHandlers.delayMs(node), signal);
        return { type: 'succeeded', output: undefined };
      } catch (error) {
        if (error instanceof WaitCancelledError) {
          return { type: 'cancelled' };
        }
        throw error;
      }
    }

    const policy = createRetryPolicyFromNode(node.retry, this.options.defaultRetry);
    const timeoutMs = node.timeoutMs ?? this.options.defaultTimeoutMs;

    const result = await RetryExecutor.execute(attempt => this.attempt(node, attempt, timeoutMs, signal), policy, {
      signal,
      listeners: {
        onAttempt: context => {
          if (!this.finished) {
            this.startNode(node.id, context.attempt);
          }
        },
        onRetry: (error, delayMs, context) => {
          if (!this.finished) {
            this.retrying(node.id, error, delayMs, context.attempt, context.maxAttempts);
          }
        },
      },
    });

    switch (result.status) {
      case 'success':
        return { type: 'succeeded', output: result.result };
      case 'cancelled':
        return { type: 'cancelled' };
      case 'failed':
        return { type: 'failed', error: this.toNodeError(node.id, result.error) };
    }
  }

  private async attempt(node: WorkflowNode, attempt: number, timeoutMs: number, signal: AbortSignal): Promise<unknown> {
    try {
      return await TimeoutManager.execute(
        attemptSignal =>
          NodeHandlers.perform({
            runId: this.runId,
            node,
            variables: structuredClone(this.store.getVariables(this.runId)),
            attempt,
            signal: attemptSignal,
            collaborators: this.options.collaborators,
          }),
        { timeoutMs, operation: node.id, signal }
      );
    } catch (error) {
      if (TimeoutManager.isTimeoutError(error)) {
        throw NodeExecutionError.timeout(node.id, timeoutMs);
      }
      throw error;
    }
  }

  private retrying(nodeId: string, error: Error, delayMs: number, attempt: number, maxAttempts: number): void {
    this.transition(nodeId, NodeStatus.READY);
    this.store.appendLog(
      this.runId,
      'node_retrying',
      `Attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms: ${error.message}`,
      nodeId
    );
    this.options.logger.warn(
      `Node "${nodeId}" attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`,
      { runId: this.runId, nodeId, error: error.message },
      LogCategory.RUNTIME
    );
    this.options.events.emit(
      createEvent(
        EngineEventType.NODE_RETRYING,
        { runId: this.runId, nodeId, attempt, maxAttempts, delayMs, error: error.message },
        { runId: this.runId, nodeId }
      )
    );
  }

  /**
   * Apply a work node's outcome; late results after cancellation are dropped
   */
  private settle(node: WorkflowNode, outcome: NodeOutcome, signal: AbortSignal): void {
    if (this.finished || signal.aborted || !this.isActive(node.id)) {
      return;
    }

    switch (outcome.type) {
      case 'succeeded': {
        const key = NodeHandlers.outputKey(node);
        if (key !== undefined) {
          this.store.setVariable(this.runId, key, outcome.output, node.id);
        }
        this.succeed(node, outcome.output, this.normalEdges(node.id));
        break;
      }
      case 'failed':
        this.fail(node, outcome.error);
        break;
      case 'cancelled':
        break;
    }
  }

  private toNodeError(nodeId: string, error: Error | undefined): FlowError {
    if (isFlowError(error)) {
      return error;
    }
    return NodeExecutionError.executorFailure(nodeId, error ?? new Error('Unknown failure'));
  }

  // ============================================================================
  // APPROVALS
  // ============================================================================

  private requestApproval(node: WorkflowNode): void {
    const config = HumanApprovalConfigSchema.parse(node.config);
    this.transition(node.id, NodeStatus.AWAITING_APPROVAL, { startedAt: new Date(), attempts: 1 });
    this.store.appendLog(
      this.runId,
      'approval_requested',
      config.message ?? `Approval requested for node "${node.id}"`,
      node.id
    );
    this.options.logger.info(
      `Awaiting approval for node "${node.id}"`,
      { runId: this.runId, nodeId: node.id },
      LogCategory.RUNTIME
    );
    this.options.events.emit(
      createEvent(
        EngineEventType.APPROVAL_REQUESTED,
        {
          runId: this.runId,
          nodeId: node.id,
          ...(config.message !== undefined && { message: config.message }),
          ...(config.approvers !== undefined && { approvers: config.approvers }),
        },
        { runId: this.runId, nodeId: node.id }
      )
    );

    this.subscribeApproval(node);
  }

  private subscribeApproval(node: WorkflowNode): void {
    const source = this.options.collaborators.approvals;
    if (!source) {
      throw ConfigurationError.missingCollaborator('approvals', [node.id]);
    }

    const unsubscribe = source.subscribe(this.runId, node.id, decision => {
      try {
        this.onDecision(node, decision);
      } catch (error) {
        this.crash(node.id, error);
      }
    });

    // A source may answer synchronously inside subscribe()
    if (this.isAwaiting(node.id)) {
      this.approvalSubscriptions.set(node.id, unsubscribe);
      this.armApprovalTimeout(node);
    } else {
      unsubscribe();
    }
  }

  /**
   * Apply `defaultAction` once the node's timeoutMs has passed since it started waiting
   */
  private armApprovalTimeout(node: WorkflowNode): void {
    const timeoutMs = node.timeoutMs;
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return;
    }

    const waitingSince = this.store.getNodeState(this.runId, node.id)?.startedAt?.getTime() ?? Date.now();
    const remaining = Math.max(0, waitingSince + timeoutMs - Date.now());
    this.approvalTimers.set(
      node.id,
      setTimeout(() => {
        this.approvalTimers.delete(node.id);
        try {
          this.onApprovalTimeout(node, timeoutMs);
        } catch (error) {
          this.crash(node.id, error);
        }
      }, remaining)
    );
  }

  private onApprovalTimeout(node: WorkflowNode, timeoutMs: number): void {
    if (!this.isAwaiting(node.id)) {
      return;
    }

    const { defaultAction = 'reject' } = HumanApprovalConfigSchema.parse(node.config);
    this.releaseApproval(node.id);
    this.store.appendLog(
      this.runId,
      'approval_timed_out',
      `No decision for node "${node.id}" within ${timeoutMs}ms, applying "${defaultAction}"`,
      node.id
    );

    if (defaultAction === 'approve') {
      this.succeed(node, { approved: true, timedOut: true }, this.normalEdges(node.id));
    } else {
      this.fail(node, NodeExecutionError.approvalTimedOut(node.id, timeoutMs));
    }

    this.pump();
  }

  private onDecision(node: WorkflowNode, decision: ApprovalDecision): void {
    if (!this.isAwaiting(node.id)) {
      return;
    }

    this.releaseApproval(node.id);

    if (decision.approved) {
      const output = decision.approver === undefined ? { approved: true } : { approved: true, approver: decision.approver };
      this.succeed(node, output, this.normalEdges(node.id));
    } else {
      this.fail(node, NodeExecutionError.approvalRejected(node.id, decision.reason));
    }

    this.pump();
  }

  private releaseApproval(nodeId: string): void {
    this.approvalSubscriptions.get(nodeId)?.();
    this.approvalSubscriptions.delete(nodeId);

    const timer = this.approvalTimers.get(nodeId);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.approvalTimers.delete(nodeId);
    }
  }

  private isAwaiting(nodeId: string): boolean {
    return !this.finished && this.store.getNodeState(this.runId, nodeId)?.status === NodeStatus.AWAITING_APPROVAL;
  }

  // ============================================================================
  // COMPLETION
  // ============================================================================

  private startNode(nodeId: string, attempt: number = 1): void {
    this.transition(nodeId, NodeStatus.RUNNING, {
      attempts: attempt,
      ...(attempt === 1 && { startedAt: new Date() }),
    });
    this.store.appendLog(
      this.runId,
      'node_started',
      attempt === 1 ? `Node "${nodeId}" started` : `Node "${nodeId}" attempt ${attempt}`,
      nodeId
    );
  }

  private succeed(node: WorkflowNode, output: unknown, taken: readonly IndexedEdge[]): void {
    if (this.finished) {
      return;
    }

    this.recordNodeTiming(node, 'succeeded');
    this.transition(node.id, NodeStatus.SUCCEEDED, {
      finishedAt: new Date(),
      ...(output !== undefined && { output }),
    });
    this.store.appendLog(this.runId, 'node_succeeded', `Node "${node.id}" succeeded`, node.id);

    for (const edge of this.graph.outgoingEdges(node.id)) {
      this.resolveEdge(edge, !edge.edge.fallback && taken.includes(edge) ? 'taken' : 'dead');
    }
  }

  /**
   * Permanent failure: an optional node forwards failed tokens and takes its
   * fallback edges, any other node fails the run.
   */
  private fail(node: WorkflowNode, error: FlowError): void {
    if (this.finished) {
      return;
    }

    const at = new Date();
    this.recordNodeTiming(node, 'failed');
    this.store.setVariable(this.runId, `${node.id}_error`, error.message, node.id);
    this.transition(node.id, NodeStatus.FAILED, {
      finishedAt: at,
      error: { kind: error.kind, code: error.code, message: error.message },
    });
    this.store.recordFailure(this.runId, { nodeId: node.id, kind: error.kind, message: error.message, at });
    this.store.appendLog(this.runId, 'node_failed', error.message, node.id);

    if (node.optional) {
      this.options.logger.warn(
        `Optional node "${node.id}" failed: ${error.message}`,
        { runId: this.runId, nodeId: node.id, kind: error.kind },
        LogCategory.RUNTIME
      );
      for (const edge of this.graph.outgoingEdges(node.id)) {
        this.resolveEdge(edge, edge.edge.fallback ? 'taken' : 'failed');
      }
      return;
    }

    this.options.logger.error(
      `Node "${node.id}" failed`,
      error,
      { runId: this.runId, nodeId: node.id, kind: error.kind },
      LogCategory.RUNTIME
    );
    this.finish(RunStatus.FAILED);
  }

  /**
   * Failure of the run as a whole (timeout, END not reached)
   */
  private failRun(error: FlowError): void {
    if (this.finished) {
      return;
    }

    this.store.recordFailure(this.runId, { kind: error.kind, message: error.message, at: new Date() });
    this.options.logger.error(
      `Run "${this.runId}" failed`,
      error,
      { runId: this.runId, kind: error.kind },
      LogCategory.RUNTIME
    );
    this.finish(RunStatus.FAILED);
  }

  /**
   * Unexpected error outside node semantics: the run fails
   */
  private crash(nodeId: string | undefined, error: unknown): void {
    this.options.logger.error(
      nodeId === undefined ? `Unexpected error in run "${this.runId}"` : `Unexpected error while running node "${nodeId}"`,
      error instanceof Error ? error : new Error(String(error)),
      { runId: this.runId, nodeId },
      LogCategory.RUNTIME
    );
    if (this.finished) {
      return;
    }

    try {
      this.store.recordFailure(this.runId, {
        ...(nodeId !== undefined && { nodeId }),
        kind: ErrorKind.EXECUTOR_FAILURE,
        message: errorMessage(error),
        at: new Date(),
      });
      this.finish(RunStatus.FAILED);
    } catch (finishError) {
      this.finished = true;
      this.settled.reject(finishError instanceof Error ? finishError : new Error(String(finishError)));
    }
  }

  private finish(status: RunStatus.SUCCEEDED | RunStatus.FAILED | RunStatus.CANCELLED, reason?: string): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.readyQueue = [];
    if (this.runTimer !== undefined) {
      clearTimeout(this.runTimer);
      this.runTimer = undefined;
    }
    this.cancelActive(reason);

    this.store.appendLog(this.runId, 'run_finished', reason ? `Run ${status}: ${reason}` : `Run ${status}`);
    this.store.setRunStatus(this.runId, status, reason !== undefined ? { cancelReason: reason } : {});

    const snapshot = this.store.get(this.runId);
    if (!snapshot) {
      this.settled.reject(new Error(`Execution "${this.runId}" disappeared from the store`));
      return;
    }

    this.options.metrics?.recordRunFinished(status, Date.now() - this.startTime);
    this.announceFinish(snapshot);
    this.options.onSettled?.(this.runId);
    this.settled.resolve(snapshot);
  }

  private announceFinish(snapshot: Execution): void {
    const { events, logger } = this.options;
    const base = { runId: this.runId, definitionId: this.definition.id };
    const durationMs = Date.now() - this.startTime;
    const context = { runId: this.runId };

    switch (snapshot.status) {
      case RunStatus.SUCCEEDED:
        logger.info(`Run succeeded: ${this.definition.name}`, { ...base, durationMs }, LogCategory.RUNTIME);
        events.emit(
          createEvent(
            EngineEventType.RUN_SUCCEEDED,
            { ...base, durationMs, ...(snapshot.endNodeId !== undefined && { endNodeId: snapshot.endNodeId }) },
            context
          )
        );
        break;
      case RunStatus.FAILED:
        logger.info(
          `Run failed: ${this.definition.name}`,
          { ...base, durationMs, failures: snapshot.failures.length },
          LogCategory.RUNTIME
        );
        events.emit(createEvent(EngineEventType.RUN_FAILED, { ...base, durationMs, failures: snapshot.failures }, context));
        break;
      case RunStatus.CANCELLED:
        logger.info(`Run cancelled: ${this.definition.name}`, { ...base, reason: snapshot.cancelReason }, LogCategory.RUNTIME);
        events.emit(
          createEvent(
            EngineEventType.RUN_CANCELLED,
            { ...base, ...(snapshot.cancelReason !== undefined && { reason: snapshot.cancelReason }) },
            context
          )
        );
        break;
      default:
        break;
    }
  }

  /**
   * Abort in-flight work, drop approval subscriptions and timers, cancel active nodes
   */
  private cancelActive(reason?: string): void {
    const abortReason = NodeExecutionError.runCancelled(this.runId, reason);
    for (const controller of this.inFlight.values()) {
      controller.abort(abortReason);
    }
    this.inFlight.clear();

    for (const nodeId of [...this.approvalSubscriptions.keys(), ...this.approvalTimers.keys()]) {
      this.releaseApproval(nodeId);
    }

    for (const nodeId of Object.keys(this.definition.nodes)) {
      if (this.isActive(nodeId)) {
        this.transition(nodeId, NodeStatus.CANCELLED, { finishedAt: new Date() });
        this.store.appendLog(this.runId, 'node_cancelled', `Node "${nodeId}" cancelled`, nodeId);
      }
    }
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private transition(nodeId: string, to: NodeStatus, patch: NodeStatePatch = {}): void {
    const from = this.store.transitionNode(this.runId, nodeId, to, patch);
    this.emitStatus(nodeId, from, to);
  }

  private emitStatus(nodeId: string, from: NodeStatus, to: NodeStatus): void {
    this.options.logger.debug(`Node "${nodeId}" ${from} → ${to}`, { runId: this.runId, nodeId }, LogCategory.RUNTIME);
    this.options.events.emit(
      createEvent(
        EngineEventType.NODE_STATUS_CHANGED,
        { runId: this.runId, nodeId, from, to, timestamp: new Date() },
        { runId: this.runId, nodeId }
      )
    );
  }

  private recordNodeTiming(node: WorkflowNode, outcome: 'succeeded' | 'failed'): void {
    const startedAt = this.store.getNodeState(this.runId, node.id)?.startedAt;
    this.options.metrics?.recordNode(node.kind, outcome, startedAt ? Date.now() - startedAt.getTime() : 0);
  }

  private isActive(nodeId: string): boolean {
    const status = this.store.getNodeState(this.runId, nodeId)?.status;
    return status !== undefined && ACTIVE_STATUSES.has(status);
  }

  /**
   * Outgoing edges other than fallbacks, in declaration order
   */
  private normalEdges(nodeId: string): IndexedEdge[] {
    return this.graph.outgoingEdges(nodeId).filter(e => !e.edge.fallback);
  }

  private node(nodeId: string): WorkflowNode {
    const node = this.definition.nodes[nodeId];
    if (!node) {
      throw new Error(`Node "${nodeId}" is not part of workflow "${this.definition.id}"`);
    }
    return node;
  }
}
