/**
 * Mock Collaborator
 *
 * Shared behaviour for the in-process task executor and service mocks:
 * configurable responses (global or per node), scripted failures,
 * delays that honour the request's abort signal, and call recording.
 *
 * @module testing
 */

import { BackoffTimer } from '../automation/runtime/BackoffTimer.js';

/**
 * Behaviour for one node (or for every node when used as the default)
 */
export interface MockBehaviour<TRequest> {
  /** Value to resolve with */
  response?: unknown;

  /** Computes the response; takes precedence over `response` */
  handler?: (request: TRequest) => unknown;

  /** Fail the first N calls for the node, then behave normally */
  failTimes?: number;

  /** Fail every call */
  shouldFail?: boolean;

  /** Error to throw when failing */
  error?: Error;

  /** Simulated latency (ms); aborted by the request signal */
  delay?: number;
}

export interface MockCollaboratorConfig<TRequest> extends MockBehaviour<TRequest> {
  /** Per-node overrides, merged over the defaults */
  nodes?: Record<string, MockBehaviour<TRequest>>;
}

export interface RecordedCall<TRequest> {
  request: TRequest;
  timestamp: Date;
}

interface BaseRequest {
  nodeId: string;
  signal: AbortSignal;
}

export abstract class MockCollaborator<TRequest extends BaseRequest> {
  private calls: RecordedCall<TRequest>[] = [];

  constructor(protected config: MockCollaboratorConfig<TRequest> = {}) {}

  /**
   * Override behaviour for one node
   */
  forNode(nodeId: string, behaviour: MockBehaviour<TRequest>): this {
    this.config = {
      ...this.config,
      nodes: { ...this.config.nodes, [nodeId]: behaviour },
    };
    return this;
  }

  getCallCount(nodeId?: string): number {
    return this.getCalls(nodeId).length;
  }

  getCalls(nodeId?: string): TRequest[] {
    return this.calls
      .filter(call => nodeId === undefined || call.request.nodeId === nodeId)
      .map(call => call.request);
  }

  getLastCall(): TRequest | undefined {
    return this.calls[this.calls.length - 1]?.request;
  }

  reset(): void {
    this.calls = [];
  }

  protected async respond(request: TRequest): Promise<unknown> {
    this.calls.push({ request, timestamp: new Date() });
    const behaviour: MockBehaviour<TRequest> = {
      ...this.config,
      ...this.config.nodes?.[request.nodeId],
    };

    if (behaviour.delay) {
      await BackoffTimer.sleep(behaviour.delay, request.signal);
    }

    const callNumber = this.getCallCount(request.nodeId);
    if (behaviour.shouldFail || (behaviour.failTimes !== undefined && callNumber <= behaviour.failTimes)) {
      throw behaviour.error ?? new Error(`${this.describe()} failed for node "${request.nodeId}" (call ${callNumber})`);
    }

    if (behaviour.handler) {
      return behaviour.handler(request);
    }

    return behaviour.response !== undefined ? behaviour.response : this.defaultResponse(request);
  }

  protected abstract describe(): string;

  protected abstract defaultResponse(request: TRequest): unknown;
}
