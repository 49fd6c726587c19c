/**
 * Dependency Graph
 *
 * Indexed view of a workflow definition: outgoing/incoming edges per node,
 * forward reachability and loop body resolution. Edges whose endpoints do not
 * exist are left out of the index (the guard reports them separately).
 *
 * @module graph
 */

import { NodeKind, type WorkflowDefinition, type WorkflowEdge } from '../types/core-types.js';

/**
 * Edge together with its declaration index
 */
export interface IndexedEdge {
  readonly index: number;
  readonly edge: WorkflowEdge;
}

export class DependencyGraph {
  private readonly outgoing = new Map<string, IndexedEdge[]>();
  private readonly incoming = new Map<string, IndexedEdge[]>();
  private readonly loopBodies = new Map<string, ReadonlySet<string>>();

  private constructor(private readonly definition: WorkflowDefinition) {
    for (const id of Object.keys(definition.nodes)) {
      this.outgoing.set(id, []);
      this.incoming.set(id, []);
    }

    definition.edges.forEach((edge, index) => {
      const out = this.outgoing.get(edge.from);
      const inc = this.incoming.get(edge.to);
      if (out && inc) {
        out.push({ index, edge });
        inc.push({ index, edge });
      }
    });
  }

  static build(definition: WorkflowDefinition): DependencyGraph {
    return new DependencyGraph(definition);
  }

  get nodeIds(): readonly string[] {
    return [...this.outgoing.keys()];
  }

  has(nodeId: string): boolean {
    return this.outgoing.has(nodeId);
  }

  /**
   * Outgoing edges in declaration order
   */
  outgoingEdges(nodeId: string): readonly IndexedEdge[] {
    return this.outgoing.get(nodeId) ?? [];
  }

  /**
   * Incoming edges, loop back-edges excluded unless asked for
   */
  incomingEdges(nodeId: string, includeLoopBack: boolean = false): readonly IndexedEdge[] {
    const edges = this.incoming.get(nodeId) ?? [];
    return includeLoopBack ? edges : edges.filter(e => !e.edge.loopBack);
  }

  /**
   * Adjacency lists without loop back-edges
   */
  forwardAdjacency(): Map<string, string[]> {
    const adjacency = new Map<string, string[]>();
    for (const [id, edges] of this.outgoing) {
      adjacency.set(
        id,
        edges.filter(e => !e.edge.loopBack).map(e => e.edge.to)
      );
    }
    return adjacency;
  }

  /**
   * Nodes reachable from `from` (inclusive) over forward edges
   */
  reachableFrom(from: string): Set<string> {
    return this.walk([from], id => this.outgoingEdges(id).filter(e => !e.edge.loopBack).map(e => e.edge.to));
  }

  /**
   * Nodes from which any of `targets` is reachable (inclusive) over forward edges
   */
  reaching(targets: readonly string[]): Set<string> {
    return this.walk(targets, id => this.incomingEdges(id).map(e => e.edge.from));
  }

  /**
   * Nodes re-entered on every iteration of a LOOP: reachable from the body
   * entry and able to reach one of the loop's back-edge sources.
   */
  loopBody(loopId: string): ReadonlySet<string> {
    const cached = this.loopBodies.get(loopId);
    if (cached) {
      return cached;
    }

    const node = this.definition.nodes[loopId];
    const entry = node?.config['body'];
    const body = new Set<string>();

    if (node?.kind === NodeKind.LOOP && typeof entry === 'string' && this.has(entry)) {
      const tails = this.backEdgeSources(loopId);
      const forward = this.reachableFrom(entry);
      const backward = this.reaching(tails);
      for (const id of forward) {
        if (id !== loopId && backward.has(id)) {
          body.add(id);
        }
      }
    }

    this.loopBodies.set(loopId, body);
    return body;
  }

  /**
   * Sources of loop back-edges pointing at `loopId`
   */
  backEdgeSources(loopId: string): string[] {
    return this.incomingEdges(loopId, true)
      .filter(e => e.edge.loopBack)
      .map(e => e.edge.from);
  }

  private walk(start: readonly string[], next: (id: string) => readonly string[]): Set<string> {
    const seen = new Set<string>();
    const stack = start.filter(id => this.has(id));

    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) {
        continue;
      }
      seen.add(id);
      for (const n of next(id)) {
        if (!seen.has(n)) {
          stack.push(n);
        }
      }
    }

    return seen;
  }
}
