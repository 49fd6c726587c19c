/**
 * State Machine
 *
 * Enforces valid status transitions for runs and nodes.
 *
 * This is about RULES, not execution. It answers:
 * - Can this transition happen?
 * - What are the valid next statuses?
 * - Is this status terminal?
 *
 * @module state
 */

import { NodeStatus, RunStatus } from '../types/core-types.js';

/**
 * Node transitions
 *
 * PENDING → READY → RUNNING → SUCCEEDED (happy path)
 * PENDING → SKIPPED (dead path)
 * RUNNING → READY (waiting out a retry backoff)
 * READY/RUNNING → AWAITING_APPROVAL → SUCCEEDED | FAILED
 * READY/RUNNING/AWAITING_APPROVAL → CANCELLED
 * SUCCEEDED/FAILED/SKIPPED → PENDING (loop body reset)
 */
const NODE_TRANSITIONS = new Map<NodeStatus, readonly NodeStatus[]>([
  [NodeStatus.PENDING, [NodeStatus.READY, NodeStatus.SKIPPED]],
  [
    NodeStatus.READY,
    [NodeStatus.RUNNING, NodeStatus.AWAITING_APPROVAL, NodeStatus.CANCELLED, NodeStatus.PENDING],
  ],
  [
    NodeStatus.RUNNING,
    [
      NodeStatus.SUCCEEDED,
      NodeStatus.FAILED,
      NodeStatus.READY,
      NodeStatus.AWAITING_APPROVAL,
      NodeStatus.CANCELLED,
    ],
  ],
  [NodeStatus.AWAITING_APPROVAL, [NodeStatus.SUCCEEDED, NodeStatus.FAILED, NodeStatus.CANCELLED]],
  [NodeStatus.SUCCEEDED, [NodeStatus.PENDING]],
  [NodeStatus.FAILED, [NodeStatus.PENDING]],
  [NodeStatus.SKIPPED, [NodeStatus.PENDING]],
  [NodeStatus.CANCELLED, []],
]);

const NODE_TERMINAL_STATES = new Set<NodeStatus>([
  NodeStatus.SUCCEEDED,
  NodeStatus.FAILED,
  NodeStatus.SKIPPED,
  NodeStatus.CANCELLED,
]);

/**
 * Run transitions
 *
 * PENDING → RUNNING → SUCCEEDED | FAILED | CANCELLED
 * PENDING → CANCELLED | FAILED
 * RUNNING ⇄ PAUSED (in-flight work still settles while paused)
 * PAUSED → SUCCEEDED | FAILED | CANCELLED
 */
const RUN_TRANSITIONS = new Map<RunStatus, readonly RunStatus[]>([
  [RunStatus.PENDING, [RunStatus.RUNNING, RunStatus.CANCELLED, RunStatus.FAILED]],
  [RunStatus.RUNNING, [RunStatus.SUCCEEDED, RunStatus.FAILED, RunStatus.CANCELLED, RunStatus.PAUSED]],
  [RunStatus.PAUSED, [RunStatus.RUNNING, RunStatus.SUCCEEDED, RunStatus.FAILED, RunStatus.CANCELLED]],
  [RunStatus.SUCCEEDED, []], // Terminal
  [RunStatus.FAILED, []], // Terminal
  [RunStatus.CANCELLED, []], // Terminal
]);

const RUN_TERMINAL_STATES = new Set<RunStatus>([RunStatus.SUCCEEDED, RunStatus.FAILED, RunStatus.CANCELLED]);

/**
 * Validate node status transition
 * Throws if invalid
 */
export function validateNodeTransition(from: NodeStatus, to: NodeStatus): void {
  const allowed = NODE_TRANSITIONS.get(from) ?? [];
  if (!allowed.includes(to)) {
    throw new Error(
      `Invalid node status transition: ${from} → ${to}. ` +
        `Allowed: ${allowed.join(', ') || 'none (terminal state)'}`
    );
  }
}

/**
 * Validate run status transition
 * Throws if invalid
 */
export function validateRunTransition(from: RunStatus, to: RunStatus): void {
  const allowed = RUN_TRANSITIONS.get(from) ?? [];
  if (!allowed.includes(to)) {
    throw new Error(
      `Invalid run status transition: ${from} → ${to}. ` +
        `Allowed: ${allowed.join(', ') || 'none (terminal state)'}`
    );
  }
}

export function canTransitionNode(from: NodeStatus, to: NodeStatus): boolean {
  return (NODE_TRANSITIONS.get(from) ?? []).includes(to);
}

/**
 * Terminal for scheduling purposes; loop resets may still move it back to PENDING
 */
export function isNodeTerminal(status: NodeStatus): boolean {
  return NODE_TERMINAL_STATES.has(status);
}

export function isRunTerminal(status: RunStatus): boolean {
  return RUN_TERMINAL_STATES.has(status);
}

export function getRunTransitions(from: RunStatus): readonly RunStatus[] {
  return RUN_TRANSITIONS.get(from) ?? [];
}
