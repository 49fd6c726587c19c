/**
 * Approval sources
 *
 * HUMAN_APPROVAL nodes subscribe to an ApprovalSource keyed by
 * (runId, nodeId) and resume when a decision arrives.
 *
 * @module adapters
 */

export type ApprovalDecision =
  | { approved: true; approver?: string }
  | { approved: false; reason: string; approver?: string };

export type ApprovalHandler = (decision: ApprovalDecision) => void;

export interface ApprovalSource {
  /**
   * Receive the decision for one node. At most one decision is delivered
   * per subscription.
   *
   * @returns Unsubscribe function
   */
  subscribe(runId: string, nodeId: string, handler: ApprovalHandler): () => void;

  /**
   * Forget everything held for a run. Called once the run is terminal.
   */
  clear?(runId: string): void;
}

/**
 * Approval source that can also be signalled directly
 */
export interface ApprovalGate extends ApprovalSource {
  approve(runId: string, nodeId: string, approver?: string): boolean;
  reject(runId: string, nodeId: string, reason: string, approver?: string): boolean;
}

export function isApprovalGate(source: ApprovalSource): source is ApprovalGate {
  return 'approve' in source && typeof source.approve === 'function' && 'reject' in source && typeof source.reject === 'function';
}

const keyOf = (runId: string, nodeId: string): string => `${runId}\u0000${nodeId}`;

/**
 * Process-local approval gate.
 * Decisions sent before anyone subscribes are buffered and delivered on
 * subscription (asynchronously, on the microtask queue).
 */
export class InMemoryApprovalGate implements ApprovalGate {
  private readonly handlers = new Map<string, ApprovalHandler>();
  private readonly buffered = new Map<string, ApprovalDecision>();

  subscribe(runId: string, nodeId: string, handler: ApprovalHandler): () => void {
    const key = keyOf(runId, nodeId);
    const early = this.buffered.get(key);

    if (early) {
      this.buffered.delete(key);
      let active = true;
      queueMicrotask(() => {
        if (active) {
          active = false;
          handler(early);
        }
      });
      return () => {
        active = false;
      };
    }

    this.handlers.set(key, handler);
    return () => {
      if (this.handlers.get(key) === handler) {
        this.handlers.delete(key);
      }
    };
  }

  /**
   * @returns true when delivered to a waiting subscriber, false when buffered
   */
  approve(runId: string, nodeId: string, approver?: string): boolean {
    return this.decide(runId, nodeId, approver === undefined ? { approved: true } : { approved: true, approver });
  }

  /**
   * @returns true when delivered to a waiting subscriber, false when buffered
   */
  reject(runId: string, nodeId: string, reason: string, approver?: string): boolean {
    return this.decide(
      runId,
      nodeId,
      approver === undefined ? { approved: false, reason } : { approved: false, reason, approver }
    );
  }

  clear(runId: string): void {
    const prefix = `${runId}\u0000`;
    for (const map of [this.handlers, this.buffered]) {
      for (const key of [...map.keys()]) {
        if (key.startsWith(prefix)) {
          map.delete(key);
        }
      }
    }
  }

  isWaiting(runId: string, nodeId: string): boolean {
    return this.handlers.has(keyOf(runId, nodeId));
  }

  get bufferedCount(): number {
    return this.buffered.size;
  }

  private decide(runId: string, nodeId: string, decision: ApprovalDecision): boolean {
    const key = keyOf(runId, nodeId);
    const handler = this.handlers.get(key);

    if (!handler) {
      this.buffered.set(key, decision);
      return false;
    }

    this.handlers.delete(key);
    handler(decision);
    return true;
  }
}
