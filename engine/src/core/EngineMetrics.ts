/**
 * Engine Metrics
 *
 * Run counters and per-kind node timings, fed by the run controllers of
 * one engine. Durations are wall time from a node's first start to its
 * final status, retries and backoff included.
 *
 * @module core
 */

import { RunStatus, type NodeKind } from '../types/core-types.js';

export interface NodeKindMetrics {
  /** Nodes that reached SUCCEEDED or FAILED */
  count: number;
  succeeded: number;
  failed: number;
  /** Average duration (ms) */
  avgDurationMs: number;
  /** Longest duration (ms) */
  maxDurationMs: number;
}

export interface EngineMetricsSnapshot {
  /** Runs driven by the engine right now */
  activeRuns: number;
  /** Runs started or taken over */
  runsStarted: number;
  runsSucceeded: number;
  runsFailed: number;
  runsCancelled: number;
  /** Average duration of finished runs (ms) */
  avgRunDurationMs: number;
  nodes: Partial<Record<NodeKind, NodeKindMetrics>>;
}

interface KindTotals {
  succeeded: number;
  failed: number;
  totalMs: number;
  maxMs: number;
}

export type FinishedRunStatus = RunStatus.SUCCEEDED | RunStatus.FAILED | RunStatus.CANCELLED;

export class EngineMetrics {
  private runsStarted = 0;
  private readonly runsFinished = new Map<FinishedRunStatus, number>();
  private runTotalMs = 0;
  private readonly kinds = new Map<NodeKind, KindTotals>();

  recordRunStarted(): void {
    this.runsStarted++;
  }

  recordRunFinished(status: FinishedRunStatus, durationMs: number): void {
    this.runsFinished.set(status, (this.runsFinished.get(status) ?? 0) + 1);
    this.runTotalMs += durationMs;
  }

  recordNode(kind: NodeKind, outcome: 'succeeded' | 'failed', durationMs: number): void {
    const totals = this.kinds.get(kind) ?? { succeeded: 0, failed: 0, totalMs: 0, maxMs: 0 };
    totals[outcome]++;
    totals.totalMs += durationMs;
    totals.maxMs = Math.max(totals.maxMs, durationMs);
    this.kinds.set(kind, totals);
  }

  snapshot(activeRuns: number): EngineMetricsSnapshot {
    const finished = [...this.runsFinished.values()].reduce((sum, count) => sum + count, 0);

    const nodes: Partial<Record<NodeKind, NodeKindMetrics>> = {};
    for (const [kind, totals] of this.kinds) {
      const count = totals.succeeded + totals.failed;
      nodes[kind] = {
        count,
        succeeded: totals.succeeded,
        failed: totals.failed,
        avgDurationMs: count > 0 ? totals.totalMs / count : 0,
        maxDurationMs: totals.maxMs,
      };
    }

    return {
      activeRuns,
      runsStarted: this.runsStarted,
      runsSucceeded: this.runsFinished.get(RunStatus.SUCCEEDED) ?? 0,
      runsFailed: this.runsFinished.get(RunStatus.FAILED) ?? 0,
      runsCancelled: this.runsFinished.get(RunStatus.CANCELLED) ?? 0,
      avgRunDurationMs: finished > 0 ? this.runTotalMs / finished : 0,
      nodes,
    };
  }

  reset(): void {
    this.runsStarted = 0;
    this.runsFinished.clear();
    this.runTotalMs = 0;
    this.kinds.clear();
  }
}
