/**
 * Collaborator interfaces
 *
 * The engine never performs agent work or network I/O itself. AGENT_* nodes
 * delegate to a TaskExecutor; MCP_CALL and WEBHOOK nodes delegate to an
 * ExternalService. Every request carries the attempt's AbortSignal, which
 * fires on timeout or run cancellation.
 *
 * @module adapters
 */

import type { NodeConfig, NodeKind } from '../types/core-types.js';

/**
 * Work request for AGENT_SPAWN / AGENT_EXECUTE nodes
 */
export interface TaskRequest {
  runId: string;
  nodeId: string;
  kind: NodeKind.AGENT_SPAWN | NodeKind.AGENT_EXECUTE;
  config: NodeConfig;
  /** Snapshot of the run's shared variables */
  variables: Readonly<Record<string, unknown>>;
  /** 1-indexed attempt number */
  attempt: number;
  signal: AbortSignal;
}

export interface TaskExecutor {
  /**
   * Perform the task; the resolved value becomes the node output
   */
  execute(request: TaskRequest): Promise<unknown>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Call request for MCP_CALL / WEBHOOK nodes
 */
export interface ServiceRequest {
  runId: string;
  nodeId: string;
  kind: NodeKind.MCP_CALL | NodeKind.WEBHOOK;
  target: string;
  /** Payload with `{{var}}` references already resolved */
  payload: unknown;
  method?: HttpMethod;
  attempt: number;
  signal: AbortSignal;
}

export interface ExternalService {
  call(request: ServiceRequest): Promise<unknown>;
}
