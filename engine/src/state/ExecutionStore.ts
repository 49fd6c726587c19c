/**
 * Execution Store
 *
 * Owns run records: status, per-node state, shared variables, failures and
 * the execution log. Every status change goes through the state machine.
 * Runs in a terminal status are read-only.
 *
 * The interface is synchronous so the run controller can apply
 * transitions atomically between suspension points.
 *
 * @module state
 */

import {
  NodeStatus,
  RunStatus,
  type EdgeState,
  type Execution,
  type ExecutionLogEvent,
  type NodeFailure,
  type NodeState,
} from '../types/core-types.js';
import { LogCategory } from '../types/log-types.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { isRunTerminal, validateNodeTransition, validateRunTransition } from './StateMachine.js';

export interface ExecutionFilter {
  definitionId?: string;
  status?: RunStatus | readonly RunStatus[];
}

export type NodeStatePatch = Partial<Omit<NodeState, 'status'>>;

export interface ExecutionStore {
  create(execution: Execution): void;
  has(runId: string): boolean;

  /** Deep snapshot, detached from the store */
  get(runId: string): Execution | undefined;

  /** Snapshots ordered by creation time */
  list(filter?: ExecutionFilter): Execution[];

  getRunStatus(runId: string): RunStatus | undefined;
  getNodeState(runId: string, nodeId: string): Readonly<NodeState> | undefined;

  /** @returns Previous status */
  setRunStatus(runId: string, status: RunStatus, details?: { cancelReason?: string }): RunStatus;
  setEndNode(runId: string, nodeId: string): void;
  getEndNode(runId: string): string | undefined;

  /** @returns Previous status */
  transitionNode(runId: string, nodeId: string, to: NodeStatus, patch?: NodeStatePatch): NodeStatus;
  updateNode(runId: string, nodeId: string, patch: NodeStatePatch): void;

  /**
   * Replace a node's state with a fresh PENDING one
   *
   * @returns Previous status
   */
  resetNode(runId: string, nodeId: string): NodeStatus;

  getEdgeState(runId: string, edgeIndex: number): EdgeState | undefined;
  setEdgeState(runId: string, edgeIndex: number, state: EdgeState): void;
  clearEdgeState(runId: string, edgeIndex: number): void;

  setVariable(runId: string, name: string, value: unknown, writer?: string): void;

  /** Read-only view of the live variables */
  getVariables(runId: string): Readonly<Record<string, unknown>>;
  lastWriter(runId: string, name: string): string | undefined;

  recordFailure(runId: string, failure: NodeFailure): void;
  appendLog(runId: string, event: ExecutionLogEvent, message: string, nodeId?: string): void;

  delete(runId: string): boolean;
}

/**
 * Process-local store
 */
export class InMemoryExecutionStore implements ExecutionStore {
  private readonly executions = new Map<string, Execution>();
  private readonly writers = new Map<string, Map<string, string>>();

  constructor(private readonly logger: EngineLogger = LoggerManager.getLogger()) {}

  create(execution: Execution): void {
    if (this.executions.has(execution.id)) {
      throw new Error(`Execution "${execution.id}" already exists`);
    }
    this.executions.set(execution.id, structuredClone(execution));
    this.writers.set(execution.id, new Map());
  }

  has(runId: string): boolean {
    return this.executions.has(runId);
  }

  get(runId: string): Execution | undefined {
    const execution = this.executions.get(runId);
    return execution ? structuredClone(execution) : undefined;
  }

  list(filter: ExecutionFilter = {}): Execution[] {
    const statuses: readonly RunStatus[] | undefined =
      typeof filter.status === 'string' ? [filter.status] : filter.status;

    return [...this.executions.values()]
      .filter(e => filter.definitionId === undefined || e.definitionId === filter.definitionId)
      .filter(e => statuses === undefined || statuses.includes(e.status))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(e => structuredClone(e));
  }

  getRunStatus(runId: string): RunStatus | undefined {
    return this.executions.get(runId)?.status;
  }

  getNodeState(runId: string, nodeId: string): Readonly<NodeState> | undefined {
    return this.executions.get(runId)?.nodes[nodeId];
  }

  setRunStatus(runId: string, status: RunStatus, details: { cancelReason?: string } = {}): RunStatus {
    const execution = this.mutable(runId);
    const from = execution.status;
    validateRunTransition(from, status);

    execution.status = status;
    const now = new Date();
    if (status === RunStatus.RUNNING && !execution.startedAt) {
      execution.startedAt = now;
    }
    if (isRunTerminal(status)) {
      execution.finishedAt = now;
    }
    if (details.cancelReason !== undefined) {
      execution.cancelReason = details.cancelReason;
    }
    return from;
  }

  setEndNode(runId: string, nodeId: string): void {
    const execution = this.mutable(runId);
    execution.endNodeId ??= nodeId;
  }

  getEndNode(runId: string): string | undefined {
    return this.executions.get(runId)?.endNodeId;
  }

  transitionNode(runId: string, nodeId: string, to: NodeStatus, patch: NodeStatePatch = {}): NodeStatus {
    const state = this.node(runId, nodeId);
    const from = state.status;
    validateNodeTransition(from, to);
    Object.assign(state, patch, { status: to });
    return from;
  }

  updateNode(runId: string, nodeId: string, patch: NodeStatePatch): void {
    Object.assign(this.node(runId, nodeId), patch);
  }

  resetNode(runId: string, nodeId: string): NodeStatus {
    const execution = this.mutable(runId);
    const state = this.node(runId, nodeId);
    const from = state.status;
    if (from === NodeStatus.PENDING && state.attempts === 0) {
      return from;
    }
    if (from !== NodeStatus.PENDING) {
      validateNodeTransition(from, NodeStatus.PENDING);
    }
    execution.nodes[nodeId] = { status: NodeStatus.PENDING, attempts: 0 };
    return from;
  }

  getEdgeState(runId: string, edgeIndex: number): EdgeState | undefined {
    return this.executions.get(runId)?.edges[edgeIndex];
  }

  setEdgeState(runId: string, edgeIndex: number, state: EdgeState): void {
    this.mutable(runId).edges[edgeIndex] = state;
  }

  clearEdgeState(runId: string, edgeIndex: number): void {
    delete this.mutable(runId).edges[edgeIndex];
  }

  setVariable(runId: string, name: string, value: unknown, writer?: string): void {
    const execution = this.mutable(runId);
    const writers = this.writers.get(runId) ?? new Map<string, string>();
    const previous = writers.get(name);

    if (writer !== undefined && previous !== undefined && previous !== writer) {
      this.logger.warn(
        `Variable "${name}" from node "${previous}" overwritten by node "${writer}"`,
        { runId, variable: name, previousWriter: previous, writer },
        LogCategory.RUNTIME
      );
    }

    execution.variables[name] = value;
    if (writer !== undefined) {
      writers.set(name, writer);
    } else {
      writers.delete(name);
    }
    this.writers.set(runId, writers);
  }

  getVariables(runId: string): Readonly<Record<string, unknown>> {
    return this.require(runId).variables;
  }

  lastWriter(runId: string, name: string): string | undefined {
    return this.writers.get(runId)?.get(name);
  }

  recordFailure(runId: string, failure: NodeFailure): void {
    this.mutable(runId).failures.push({ ...failure });
  }

  appendLog(runId: string, event: ExecutionLogEvent, message: string, nodeId?: string): void {
    this.mutable(runId).log.push({
      timestamp: new Date(),
      event,
      message,
      ...(nodeId !== undefined && { nodeId }),
    });
  }

  delete(runId: string): boolean {
    this.writers.delete(runId);
    return this.executions.delete(runId);
  }

  private require(runId: string): Execution {
    const execution = this.executions.get(runId);
    if (!execution) {
      throw new Error(`Execution "${runId}" not found`);
    }
    return execution;
  }

  private mutable(runId: string): Execution {
    const execution = this.require(runId);
    if (isRunTerminal(execution.status)) {
      throw new Error(`Execution "${runId}" is ${execution.status} and read-only`);
    }
    return execution;
  }

  private node(runId: string, nodeId: string): NodeState {
    const state = this.mutable(runId).nodes[nodeId];
    if (!state) {
      throw new Error(`Node "${nodeId}" not found in execution "${runId}"`);
    }
    return state;
  }
}
