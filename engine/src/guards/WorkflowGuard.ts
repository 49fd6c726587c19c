/**
 * Workflow Guard
 *
 * Validates workflow definitions before execution:
 * - Node id uniqueness and edge referential integrity
 * - START / END placement and END reachability
 * - Cycle detection (only loop back-edges into LOOP nodes may close a cycle)
 * - Per-kind configuration, retry policies and timeouts
 * - CONDITION, JOIN and LOOP structure
 *
 * Pure: collects every violation instead of stopping at the first.
 *
 * @module guards
 */

import type { z } from 'zod';
import { NodeKind, type RetryPolicyConfig, type WorkflowDefinition } from '../types/core-types.js';
import { FlowErrorCode } from '../errors/ErrorCodes.js';
import type { Violation } from '../errors/WorkflowError.js';
import { DependencyGraph } from '../graph/DependencyGraph.js';
import { CycleDetector } from '../graph/CycleDetector.js';
import { NODE_CONFIG_SCHEMAS } from '../nodes/NodeConfigSchemas.js';
import { checkCondition } from '../conditions/ConditionEvaluator.js';

/**
 * Result of validating a definition; empty `violations` means executable
 */
export interface ValidationResult {
  valid: boolean;
  violations: Violation[];
}

const NODE_KINDS: ReadonlySet<string> = new Set(Object.values(NodeKind));

function isNodeKind(value: unknown): value is NodeKind {
  return typeof value === 'string' && NODE_KINDS.has(value);
}

/**
 * Workflow validation guard
 */
export class WorkflowGuard {
  /**
   * Validate a definition
   */
  static validate(definition: WorkflowDefinition): ValidationResult {
    const violations: Violation[] = [];
    const graph = DependencyGraph.build(definition);

    this.validateNodeIds(definition, violations);
    this.validateEdges(definition, violations);
    this.validateStart(definition, graph, violations);
    this.validateEnds(definition, graph, violations);
    this.detectCycles(graph, violations);
    this.validateNodeConfigs(definition, violations);
    this.validateConditions(definition, graph, violations);
    this.validateJoins(definition, violations);
    this.validateLoops(definition, graph, violations);

    if (definition.timeoutMs !== undefined && (!Number.isFinite(definition.timeoutMs) || definition.timeoutMs <= 0)) {
      violations.push({
        code: FlowErrorCode.VALIDATION_INVALID_POLICY,
        message: 'Workflow timeoutMs must be a positive number',
        path: 'timeoutMs',
      });
    }

    return { valid: violations.length === 0, violations };
  }

  private static validateNodeIds(definition: WorkflowDefinition, violations: Violation[]): void {
    const seen = new Set<string>();

    for (const [key, node] of Object.entries(definition.nodes)) {
      if (typeof node.id !== 'string' || node.id === '') {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_SHAPE,
          message: `Node under key "${key}" has no id`,
          path: `nodes.${key}`,
        });
        continue;
      }

      if (node.id !== key) {
        violations.push({
          code: FlowErrorCode.VALIDATION_DUPLICATE_ID,
          message: `Node key "${key}" does not match node id "${node.id}"`,
          nodeId: node.id,
          path: `nodes.${key}.id`,
        });
      }

      if (seen.has(node.id)) {
        violations.push({
          code: FlowErrorCode.VALIDATION_DUPLICATE_ID,
          message: `Duplicate node id "${node.id}"`,
          nodeId: node.id,
          path: `nodes.${key}`,
        });
      }
      seen.add(node.id);

      if (!isNodeKind(node.kind)) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_CONFIG,
          message: `Node "${node.id}" has unknown kind "${String(node.kind)}"`,
          nodeId: node.id,
          path: `nodes.${key}.kind`,
        });
      }
    }
  }

  private static validateEdges(definition: WorkflowDefinition, violations: Violation[]): void {
    definition.edges.forEach((edge, index) => {
      for (const end of ['from', 'to'] as const) {
        const id = edge[end];
        if (!Object.prototype.hasOwnProperty.call(definition.nodes, id)) {
          violations.push({
            code: FlowErrorCode.VALIDATION_DANGLING_EDGE,
            message: `Edge ${index} (${edge.from} -> ${edge.to}) references unknown ${end === 'from' ? 'source' : 'target'} node "${id}"`,
            edgeIndex: index,
            path: `edges[${index}].${end}`,
          });
        }
      }

      if (edge.loopBack) {
        const target = definition.nodes[edge.to];
        if (target && target.kind !== NodeKind.LOOP) {
          violations.push({
            code: FlowErrorCode.VALIDATION_INVALID_LOOP_EDGE,
            message: `Loop back-edge ${index} (${edge.from} -> ${edge.to}) must point at a LOOP node`,
            edgeIndex: index,
            nodeId: edge.to,
            path: `edges[${index}].loopBack`,
          });
        }
      }
    });
  }

  private static validateStart(
    definition: WorkflowDefinition,
    graph: DependencyGraph,
    violations: Violation[]
  ): void {
    const starts = Object.values(definition.nodes).filter(n => n.kind === NodeKind.START);

    if (starts.length === 0) {
      violations.push({
        code: FlowErrorCode.VALIDATION_MISSING_START,
        message: 'Workflow has no START node',
      });
      return;
    }

    if (starts.length > 1) {
      for (const extra of starts.slice(1)) {
        violations.push({
          code: FlowErrorCode.VALIDATION_MULTIPLE_START,
          message: `Multiple START nodes: "${extra.id}" in addition to "${starts[0]?.id}"`,
          nodeId: extra.id,
          path: `nodes.${extra.id}`,
        });
      }
    }

    for (const start of starts) {
      if (graph.incomingEdges(start.id, true).length > 0) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_START,
          message: `START node "${start.id}" cannot have incoming edges`,
          nodeId: start.id,
        });
      }

      const outgoing = graph.outgoingEdges(start.id);
      const [only] = outgoing;
      if (outgoing.length !== 1 || only === undefined || only.edge.condition !== undefined || only.edge.fallback) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_START,
          message: `START node "${start.id}" must have exactly one unconditional outgoing edge (has ${outgoing.length})`,
          nodeId: start.id,
        });
      }
    }
  }

  private static validateEnds(
    definition: WorkflowDefinition,
    graph: DependencyGraph,
    violations: Violation[]
  ): void {
    const ends = Object.values(definition.nodes).filter(n => n.kind === NodeKind.END);

    if (ends.length === 0) {
      violations.push({
        code: FlowErrorCode.VALIDATION_MISSING_END,
        message: 'Workflow has no END node',
      });
      return;
    }

    for (const end of ends) {
      if (graph.outgoingEdges(end.id).length > 0) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_END,
          message: `END node "${end.id}" cannot have outgoing edges`,
          nodeId: end.id,
        });
      }
    }

    const starts = Object.values(definition.nodes).filter(n => n.kind === NodeKind.START);
    const [start] = starts;
    if (starts.length !== 1 || start === undefined) {
      return;
    }

    const reachable = graph.reachableFrom(start.id);
    if (!ends.some(end => reachable.has(end.id))) {
      violations.push({
        code: FlowErrorCode.VALIDATION_END_UNREACHABLE,
        message: `No END node is reachable from START node "${start.id}"`,
        nodeId: start.id,
      });
    }
  }

  private static detectCycles(graph: DependencyGraph, violations: Violation[]): void {
    const reported = new Set<string>();

    for (const cycle of CycleDetector.findAll(graph.forwardAdjacency())) {
      const rendered = cycle.join(' → ');
      if (reported.has(rendered)) {
        continue;
      }
      reported.add(rendered);
      violations.push({
        code: FlowErrorCode.VALIDATION_CYCLE,
        message: `Cycle detected: ${rendered} (mark the closing edge as a loop back-edge into a LOOP node)`,
        nodeId: cycle[0],
      });
    }
  }

  private static validateNodeConfigs(definition: WorkflowDefinition, violations: Violation[]): void {
    for (const node of Object.values(definition.nodes)) {
      if (!isNodeKind(node.kind)) {
        continue;
      }

      const schema: z.ZodTypeAny = NODE_CONFIG_SCHEMAS[node.kind];
      const result = schema.safeParse(node.config);
      if (!result.success) {
        for (const issue of result.error.issues) {
          const key = issue.path.join('.');
          violations.push({
            code: FlowErrorCode.VALIDATION_INVALID_CONFIG,
            message: `Node "${node.id}" (${node.kind}) ${key ? `config.${key}` : 'config'}: ${issue.message}`,
            nodeId: node.id,
            path: key ? `nodes.${node.id}.config.${key}` : `nodes.${node.id}.config`,
          });
        }
      }

      if (node.retry !== undefined) {
        const problem = this.checkRetryPolicy(node.retry);
        if (problem) {
          violations.push({
            code: FlowErrorCode.VALIDATION_INVALID_POLICY,
            message: `Node "${node.id}" retry policy: ${problem}`,
            nodeId: node.id,
            path: `nodes.${node.id}.retry`,
          });
        }
      }

      if (node.timeoutMs !== undefined && (!Number.isFinite(node.timeoutMs) || node.timeoutMs < 0)) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_POLICY,
          message: `Node "${node.id}" timeoutMs must be a non-negative number`,
          nodeId: node.id,
          path: `nodes.${node.id}.timeoutMs`,
        });
      }
    }
  }

  /**
   * @returns Problem description, or null when the policy is usable
   */
  static checkRetryPolicy(retry: RetryPolicyConfig): string | null {
    if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
      return 'maxAttempts must be an integer >= 1';
    }
    const backoff = retry.backoff;
    if (!backoff) {
      return null;
    }
    if (!['fixed', 'linear', 'exponential'].includes(backoff.type)) {
      return `unknown backoff type "${String(backoff.type)}"`;
    }
    if (!(backoff.baseDelayMs >= 0)) {
      return 'backoff.baseDelayMs must be >= 0';
    }
    if (backoff.maxDelayMs !== undefined && backoff.maxDelayMs < backoff.baseDelayMs) {
      return 'backoff.maxDelayMs must be >= backoff.baseDelayMs';
    }
    if (backoff.multiplier !== undefined && !(backoff.multiplier > 0)) {
      return 'backoff.multiplier must be > 0';
    }
    if (backoff.jitter !== undefined && !(backoff.jitter >= 0 && backoff.jitter <= 1)) {
      return 'backoff.jitter must be between 0 and 1';
    }
    return null;
  }

  private static validateConditions(
    definition: WorkflowDefinition,
    graph: DependencyGraph,
    violations: Violation[]
  ): void {
    definition.edges.forEach((edge, index) => {
      if (edge.condition === undefined) {
        return;
      }

      const source = definition.nodes[edge.from];
      if (source && source.kind !== NodeKind.CONDITION) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_CONDITION,
          message: `Edge ${index} (${edge.from} -> ${edge.to}) has a condition but "${edge.from}" is not a CONDITION node`,
          edgeIndex: index,
          path: `edges[${index}].condition`,
        });
      }

      const problem = checkCondition(edge.condition);
      if (problem) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_CONDITION,
          message: `Edge ${index} (${edge.from} -> ${edge.to}): ${problem}`,
          edgeIndex: index,
          path: `edges[${index}].condition`,
        });
      }
    });

    for (const node of Object.values(definition.nodes)) {
      if (node.kind !== NodeKind.CONDITION) {
        continue;
      }

      const branches = graph.outgoingEdges(node.id).filter(e => !e.edge.fallback);
      if (branches.length === 0) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_CONDITION,
          message: `CONDITION node "${node.id}" has no outgoing edges`,
          nodeId: node.id,
        });
        continue;
      }

      const defaults = branches.filter(e => e.edge.condition === undefined);
      const lastBranch = branches[branches.length - 1];
      if (defaults.length > 1) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_CONDITION,
          message: `CONDITION node "${node.id}" has ${defaults.length} default (unconditioned) edges; at most one is allowed`,
          nodeId: node.id,
        });
      } else if (defaults.length === 1 && defaults[0] !== lastBranch) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_CONDITION,
          message: `CONDITION node "${node.id}" must declare its default (unconditioned) edge last`,
          nodeId: node.id,
        });
      }
    }
  }

  private static validateJoins(definition: WorkflowDefinition, violations: Violation[]): void {
    const groups = new Set<string>();
    for (const node of Object.values(definition.nodes)) {
      const group = node.config['joinGroup'];
      if (node.kind === NodeKind.PARALLEL && typeof group === 'string') {
        groups.add(group);
      }
    }

    for (const node of Object.values(definition.nodes)) {
      const group = node.config['joinGroup'];
      if (node.kind === NodeKind.JOIN && typeof group === 'string' && !groups.has(group)) {
        violations.push({
          code: FlowErrorCode.VALIDATION_UNMATCHED_JOIN,
          message: `JOIN node "${node.id}" joins group "${group}" but no PARALLEL node forks it`,
          nodeId: node.id,
          path: `nodes.${node.id}.config.joinGroup`,
        });
      }
    }
  }

  private static validateLoops(
    definition: WorkflowDefinition,
    graph: DependencyGraph,
    violations: Violation[]
  ): void {
    for (const node of Object.values(definition.nodes)) {
      if (node.kind !== NodeKind.LOOP) {
        continue;
      }

      const body = node.config['body'];
      if (typeof body !== 'string') {
        // reported by the config schema
        continue;
      }

      const forward = graph.outgoingEdges(node.id).filter(e => !e.edge.loopBack);
      if (!forward.some(e => e.edge.to === body)) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_LOOP,
          message: `LOOP node "${node.id}" body "${body}" must be the target of one of its outgoing edges`,
          nodeId: node.id,
          path: `nodes.${node.id}.config.body`,
        });
        continue;
      }

      const tails = graph.backEdgeSources(node.id);
      if (tails.length === 0) {
        violations.push({
          code: FlowErrorCode.VALIDATION_INVALID_LOOP,
          message: `LOOP node "${node.id}" has no loop back-edge closing its body`,
          nodeId: node.id,
        });
        continue;
      }

      const reachable = graph.reachableFrom(body);
      for (const tail of tails) {
        if (!reachable.has(tail)) {
          violations.push({
            code: FlowErrorCode.VALIDATION_INVALID_LOOP_EDGE,
            message: `Loop back-edge from "${tail}" is not reachable from the body of LOOP node "${node.id}"`,
            nodeId: tail,
          });
        }
      }
    }
  }
}

/**
 * Validate a workflow definition
 */
export function validate(definition: WorkflowDefinition): ValidationResult {
  return WorkflowGuard.validate(definition);
}
