/**
 * Core Types
 *
 * Shared data model for workflow definitions and their runs.
 * Definitions are immutable values; runs are owned by an ExecutionStore.
 *
 * @module types
 */

import type { ErrorKind } from '../errors/ErrorCodes.js';

// ============================================================================
// NODE KINDS & STATUSES
// ============================================================================

/**
 * Closed set of node kinds.
 * Each kind has a configuration schema in `nodes/NodeConfigSchemas.ts`
 * and exactly one handler branch in the run controller.
 */
export enum NodeKind {
  START = 'start',
  END = 'end',
  AGENT_SPAWN = 'agent_spawn',
  AGENT_EXECUTE = 'agent_execute',
  CONDITION = 'condition',
  PARALLEL = 'parallel',
  JOIN = 'join',
  LOOP = 'loop',
  DELAY = 'delay',
  MCP_CALL = 'mcp_call',
  WEBHOOK = 'webhook',
  HUMAN_APPROVAL = 'human_approval',
  DATA_TRANSFORM = 'data_transform',
}

/**
 * Status of a single node within a run
 */
export enum NodeStatus {
  PENDING = 'pending',
  READY = 'ready',
  RUNNING = 'running',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  SKIPPED = 'skipped',
  CANCELLED = 'cancelled',
  AWAITING_APPROVAL = 'awaiting_approval',
}

/**
 * Overall run status
 */
export enum RunStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  PAUSED = 'paused',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

// ============================================================================
// CONDITIONS
// ============================================================================

export type ConditionOperator =
  | '=='
  | '!='
  | '>'
  | '<'
  | '>='
  | '<='
  | 'contains'
  | 'not_contains'
  | 'matches'
  | 'exists'
  | 'not_exists';

/**
 * Structured predicate over one shared variable.
 * `variable` may be a dotted path (e.g. `review.score`).
 */
export interface ConditionClause {
  readonly variable: string;
  readonly operator: ConditionOperator;
  readonly value?: unknown;
}

export interface AllCondition {
  readonly all: readonly Condition[];
}

export interface AnyCondition {
  readonly any: readonly Condition[];
}

/**
 * Edge / loop predicate.
 * A string is parsed with the condition grammar (`x > 5`, `status == 'done'`, `result exists`).
 */
export type Condition = string | ConditionClause | AllCondition | AnyCondition;

// ============================================================================
// DEFINITION
// ============================================================================

export type BackoffType = 'fixed' | 'linear' | 'exponential';

/**
 * Per-node retry policy
 */
export interface RetryPolicyConfig {
  /** Total attempts including the first one */
  readonly maxAttempts: number;
  readonly backoff?: {
    readonly type: BackoffType;
    readonly baseDelayMs: number;
    /** Upper bound for a single wait */
    readonly maxDelayMs?: number;
    readonly multiplier?: number;
    /** Jitter factor 0-1 (default 0) */
    readonly jitter?: number;
  };
}

/**
 * Opaque per-kind configuration map
 */
export type NodeConfig = Readonly<Record<string, unknown>>;

export interface WorkflowNode {
  readonly id: string;
  readonly kind: NodeKind;
  readonly config: NodeConfig;
  readonly label?: string;
  readonly retry?: RetryPolicyConfig;
  readonly timeoutMs?: number;
  /** Best-effort node: a permanent failure does not fail the run */
  readonly optional?: boolean;
  readonly tags?: readonly string[];
}

export interface WorkflowEdge {
  readonly from: string;
  readonly to: string;
  readonly condition?: Condition;
  /** Back-edge closing a LOOP body; only permitted into LOOP nodes */
  readonly loopBack?: boolean;
  /** Followed only when `from` is optional and failed */
  readonly fallback?: boolean;
  readonly label?: string;
}

export interface WorkflowDefinition {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly version: string;
  readonly nodes: Readonly<Record<string, WorkflowNode>>;
  readonly edges: readonly WorkflowEdge[];
  /** Default shared variables, seeded into every run */
  readonly variables: Readonly<Record<string, unknown>>;
  readonly metadata: Readonly<Record<string, unknown>>;
  /** Wall-clock limit for a whole run, paused time included */
  readonly timeoutMs?: number;
}

// ============================================================================
// EXECUTION
// ============================================================================

export interface NodeErrorInfo {
  kind: ErrorKind;
  code: string;
  message: string;
}

export interface NodeState {
  status: NodeStatus;
  attempts: number;
  error?: NodeErrorInfo;
  output?: unknown;
  startedAt?: Date;
  finishedAt?: Date;
  /** Completed iterations (LOOP nodes only) */
  iteration?: number;
}

/**
 * Resolution of one edge during a run
 * - taken: the source succeeded and chose this edge
 * - dead: the branch was not chosen
 * - failed: an optional source failed permanently
 */
export type EdgeState = 'taken' | 'dead' | 'failed';

/**
 * One failure recorded on a run; run-level failures (timeout, END not reached) carry no nodeId
 */
export interface NodeFailure {
  nodeId?: string;
  kind: ErrorKind;
  message: string;
  at: Date;
}

export type ExecutionLogEvent =
  | 'run_started'
  | 'run_finished'
  | 'run_paused'
  | 'run_resumed'
  | 'node_started'
  | 'node_succeeded'
  | 'node_failed'
  | 'node_skipped'
  | 'node_retrying'
  | 'node_cancelled'
  | 'node_reset'
  | 'approval_requested'
  | 'approval_timed_out';

export interface ExecutionLogEntry {
  timestamp: Date;
  event: ExecutionLogEvent;
  nodeId?: string;
  message: string;
}

/**
 * One run of a workflow definition
 */
export interface Execution {
  id: string;
  definitionId: string;
  definition: WorkflowDefinition;
  status: RunStatus;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  variables: Record<string, unknown>;
  nodes: Record<string, NodeState>;
  /** Resolved edges by declaration index */
  edges: Record<number, EdgeState>;
  failures: NodeFailure[];
  /** First END node reached */
  endNodeId?: string;
  cancelReason?: string;
  log: ExecutionLogEntry[];
}

export interface ExecutionProgress {
  total: number;
  completed: number;
  /** Terminal nodes / total * 100, rounded */
  percent: number;
}

/**
 * Run options
 */
export interface RunOptions {
  /** Overrides the definition's default variables */
  variables?: Record<string, unknown>;
  /** Explicit run id (generated when omitted) */
  runId?: string;
}

/**
 * Handle to a started run
 */
export interface RunHandle {
  readonly runId: string;
  /** Resolves with the final snapshot; never rejects for node failures */
  readonly completion: Promise<Execution>;
}
