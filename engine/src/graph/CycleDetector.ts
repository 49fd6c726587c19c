/**
 * CycleDetector
 *
 * Detects cycles in the forward (non loop-back) edge graph using DFS.
 *
 * Algorithm: DFS with three-color marking
 * - WHITE (unvisited): Node not yet explored
 * - GRAY (visiting): Node currently in DFS path (on stack)
 * - BLACK (visited): Node fully explored, all descendants visited
 *
 * A cycle exists if we encounter a GRAY node during traversal.
 *
 * What it does NOT do:
 * - Does NOT decide which edges are legal back-edges (the guard strips those first)
 * - Does NOT schedule anything (that's the run controller's job)
 *
 * @module graph
 */

enum VisitState {
  WHITE,
  GRAY,
  BLACK,
}

export type Adjacency = ReadonlyMap<string, readonly string[]>;

/**
 * Detects cycles in adjacency lists.
 * Pure functions - take a graph, return cycle information.
 */
export class CycleDetector {
  /**
   * Find one closed path per DFS back-edge.
   * Every edge that participates in some cycle is covered by at least one path.
   */
  static findAll(adjacency: Adjacency): readonly (readonly string[])[] {
    const visitState = new Map<string, VisitState>();
    const parent = new Map<string, string>();
    const cycles: string[][] = [];

    for (const nodeId of adjacency.keys()) {
      visitState.set(nodeId, VisitState.WHITE);
    }

    for (const nodeId of adjacency.keys()) {
      if (visitState.get(nodeId) === VisitState.WHITE) {
        this.dfs(nodeId, adjacency, visitState, parent, cycles);
      }
    }

    return cycles;
  }

  private static dfs(
    nodeId: string,
    adjacency: Adjacency,
    visitState: Map<string, VisitState>,
    parent: Map<string, string>,
    cycles: string[][]
  ): void {
    visitState.set(nodeId, VisitState.GRAY);

    for (const next of adjacency.get(nodeId) ?? []) {
      const state = visitState.get(next) ?? VisitState.WHITE;

      if (state === VisitState.GRAY) {
        cycles.push([...this.reconstructCycle(nodeId, next, parent), next]);
        continue;
      }

      if (state === VisitState.WHITE) {
        parent.set(next, nodeId);
        this.dfs(next, adjacency, visitState, parent, cycles);
      }
    }

    visitState.set(nodeId, VisitState.BLACK);
  }

  /**
   * Walk parent pointers back from `start` to the GRAY node.
   */
  private static reconstructCycle(start: string, cycleNode: string, parent: Map<string, string>): string[] {
    const cycle: string[] = [start];
    let current = start;

    while (current !== cycleNode) {
      const parentNode = parent.get(current);
      if (parentNode === undefined) {
        break;
      }
      cycle.unshift(parentNode);
      current = parentNode;
    }

    return cycle;
  }
}
