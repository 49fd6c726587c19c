/**
 * Node Execution Error
 *
 * Structured error for node-level failures during a run.
 * The kind decides whether the node's retry policy applies
 * (see isRecoverable in ErrorCodes).
 *
 * @module errors
 */

import { FlowError, errorMessage } from './FlowError.js';
import { FlowErrorCode } from './ErrorCodes.js';

export class NodeExecutionError extends FlowError {
  static executorFailure(nodeId: string, cause: unknown): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.EXECUTOR_FAILURE,
      message: `Task executor failed for node "${nodeId}": ${errorMessage(cause)}`,
      nodeId,
      cause,
    });
  }

  static serviceFailure(nodeId: string, target: string, cause: unknown): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.SERVICE_FAILURE,
      message: `Service call to "${target}" failed for node "${nodeId}": ${errorMessage(cause)}`,
      nodeId,
      context: { target },
      cause,
    });
  }

  static timeout(nodeId: string, timeoutMs: number): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.TIMEOUT_EXCEEDED,
      message: `Node "${nodeId}" timed out after ${timeoutMs}ms`,
      nodeId,
      context: { timeoutMs },
    });
  }

  static approvalTimedOut(nodeId: string, timeoutMs: number): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.TIMEOUT_EXCEEDED,
      message: `Approval for node "${nodeId}" timed out after ${timeoutMs}ms`,
      nodeId,
      hint: 'Set config.defaultAction to "approve" to continue when nobody answers',
      context: { timeoutMs },
    });
  }

  static noMatchingBranch(nodeId: string, edgeCount: number): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.NO_MATCHING_BRANCH,
      message: `No outgoing condition of node "${nodeId}" matched (${edgeCount} evaluated)`,
      nodeId,
      hint: 'Add an unconditioned edge last as the default branch',
    });
  }

  static joinedBranchFailed(nodeId: string, failedSources: readonly string[]): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.JOINED_BRANCH_FAILED,
      message: `Join "${nodeId}" has failed branch${failedSources.length === 1 ? '' : 'es'} from ${failedSources.join(', ')}`,
      nodeId,
      hint: 'Use failurePolicy "tolerate_partial" to proceed with the branches that arrived',
      context: { failedSources: [...failedSources] },
    });
  }

  static loopBoundExceeded(nodeId: string, maxIterations: number): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.LOOP_BOUND_EXCEEDED,
      message: `Loop "${nodeId}" exceeded its maximum of ${maxIterations} iteration${maxIterations === 1 ? '' : 's'}`,
      nodeId,
      context: { maxIterations },
    });
  }

  static approvalRejected(nodeId: string, reason: string): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.APPROVAL_REJECTED,
      message: `Approval for node "${nodeId}" was rejected: ${reason}`,
      nodeId,
      context: { reason },
    });
  }

  static runCancelled(runId: string, reason?: string): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.RUN_CANCELLED,
      message: reason ? `Run "${runId}" was cancelled: ${reason}` : `Run "${runId}" was cancelled`,
      runId,
    });
  }

  static endNotReached(runId: string): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.END_NOT_REACHED,
      message: `Run "${runId}" stopped without reaching an END node`,
      runId,
      hint: 'Give optional nodes a fallback edge, or make sure some branch leads to END',
    });
  }

  static runTimedOut(runId: string, timeoutMs: number): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.RUN_TIMEOUT,
      message: `Run "${runId}" exceeded its timeout of ${timeoutMs}ms`,
      runId,
      context: { timeoutMs },
    });
  }

  static transformFailed(nodeId: string, operation: string, detail: string): NodeExecutionError {
    return new NodeExecutionError({
      code: FlowErrorCode.TRANSFORM_FAILED,
      message: `Transform "${operation}" failed in node "${nodeId}": ${detail}`,
      nodeId,
      context: { operation },
    });
  }
}
