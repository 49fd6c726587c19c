/**
 * Event Types and Interfaces for the flow engine
 *
 * Events are emitted at run and node lifecycle moments. They can be
 * consumed by logging systems, monitoring dashboards and external
 * integrations.
 */

import type { NodeFailure, NodeStatus } from '../types/core-types.js';

/**
 * Engine-wide event types
 */
export enum EngineEventType {
  // Run-level events
  RUN_STARTED = 'run.started',
  RUN_SUCCEEDED = 'run.succeeded',
  RUN_FAILED = 'run.failed',
  RUN_CANCELLED = 'run.cancelled',
  RUN_PAUSED = 'run.paused',
  RUN_RESUMED = 'run.resumed',

  // Node-level events
  NODE_STATUS_CHANGED = 'node.status_changed',
  NODE_RETRYING = 'node.retrying',
  APPROVAL_REQUESTED = 'approval.requested',
}

export interface RunStartedPayload {
  runId: string;
  definitionId: string;
  definitionName: string;
  resumed: boolean;
}

export interface RunSucceededPayload {
  runId: string;
  definitionId: string;
  durationMs: number;
  endNodeId?: string;
}

export interface RunFailedPayload {
  runId: string;
  definitionId: string;
  durationMs: number;
  failures: NodeFailure[];
}

export interface RunCancelledPayload {
  runId: string;
  definitionId: string;
  reason?: string;
}

/**
 * Shared by run.paused and run.resumed
 */
export interface RunPauseChangedPayload {
  runId: string;
  definitionId: string;
  /** Nodes still RUNNING or AWAITING_APPROVAL at the moment of the change */
  inFlight: string[];
}

/**
 * Emitted for every node transition, loop resets to PENDING included
 */
export interface NodeStatusChangedPayload {
  runId: string;
  nodeId: string;
  from: NodeStatus;
  to: NodeStatus;
  timestamp: Date;
}

export interface NodeRetryingPayload {
  runId: string;
  nodeId: string;
  /** Attempt that just failed */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: string;
}

export interface ApprovalRequestedPayload {
  runId: string;
  nodeId: string;
  message?: string;
  approvers?: string[];
}

export interface EngineEventPayloads {
  [EngineEventType.RUN_STARTED]: RunStartedPayload;
  [EngineEventType.RUN_SUCCEEDED]: RunSucceededPayload;
  [EngineEventType.RUN_FAILED]: RunFailedPayload;
  [EngineEventType.RUN_CANCELLED]: RunCancelledPayload;
  [EngineEventType.RUN_PAUSED]: RunPauseChangedPayload;
  [EngineEventType.RUN_RESUMED]: RunPauseChangedPayload;
  [EngineEventType.NODE_STATUS_CHANGED]: NodeStatusChangedPayload;
  [EngineEventType.NODE_RETRYING]: NodeRetryingPayload;
  [EngineEventType.APPROVAL_REQUESTED]: ApprovalRequestedPayload;
}

/**
 * Core event shape
 */
export interface FlowEvent<T extends EngineEventType = EngineEventType> {
  type: T;

  /** Unix timestamp in milliseconds */
  timestamp: number;

  runId: string;

  nodeId?: string;

  payload: EngineEventPayloads[T];
}

/**
 * Helper to create well-formed events
 */
export function createEvent<T extends EngineEventType>(
  type: T,
  payload: EngineEventPayloads[T],
  context: { runId: string; nodeId?: string }
): FlowEvent<T> {
  return {
    type,
    timestamp: Date.now(),
    runId: context.runId,
    ...(context.nodeId !== undefined && { nodeId: context.nodeId }),
    payload,
  };
}

/**
 * Narrow an event to one type
 */
export function isEventOf<T extends EngineEventType>(event: FlowEvent, type: T): event is FlowEvent<T> {
  return event.type === type;
}
