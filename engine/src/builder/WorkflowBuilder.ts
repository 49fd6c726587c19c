/**
 * Workflow Builder
 *
 * Fluent API for assembling workflow definitions in code.
 * `build()` validates the whole graph and returns a deeply frozen value.
 *
 * @example
 * ```typescript
 * const definition = createWorkflow('greeting')
 *   .start()
 *   .agentExecute('greet', { task: 'Say hello' })
 *   .end()
 *   .chain('start', 'greet', 'end')
 *   .build();
 * ```
 *
 * @module builder
 */

import {
  NodeKind,
  type Condition,
  type NodeConfig,
  type RetryPolicyConfig,
  type WorkflowDefinition,
  type WorkflowEdge,
  type WorkflowNode,
} from '../types/core-types.js';
import type { NodeConfigInput } from '../nodes/NodeConfigSchemas.js';
import { FlowErrorCode } from '../errors/ErrorCodes.js';
import { InvalidDefinitionError, type Violation } from '../errors/WorkflowError.js';
import { WorkflowGuard } from '../guards/WorkflowGuard.js';

/**
 * Per-node options shared by every kind
 */
export interface NodeOptions {
  label?: string;
  retry?: RetryPolicyConfig;
  timeoutMs?: number;
  optional?: boolean;
  tags?: readonly string[];
}

export interface EdgeOptions {
  condition?: Condition;
  loopBack?: boolean;
  fallback?: boolean;
  label?: string;
}

export interface WorkflowOptions {
  /** Defaults to a slug of the name */
  id?: string;
  description?: string;
  /** Defaults to "1.0.0" */
  version?: string;
  variables?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  /** Run-level timeout */
  timeoutMs?: number;
}

/**
 * Drop keys whose value is undefined
 */
function compact<T extends object>(value: T): T {
  const result = { ...value };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'workflow';
}

export class WorkflowBuilder {
  private readonly nodes = new Map<string, WorkflowNode>();
  private readonly edges: WorkflowEdge[] = [];
  private readonly duplicates: Violation[] = [];
  private readonly variables: Record<string, unknown>;
  private readonly meta: Record<string, unknown>;

  constructor(
    private readonly name: string,
    private readonly options: WorkflowOptions = {}
  ) {
    this.variables = { ...options.variables };
    this.meta = { ...options.metadata };
  }

  // ============================================================================
  // NODES
  // ============================================================================

  /**
   * Add a node of any kind. Configuration is checked at build time.
   */
  node(id: string, kind: NodeKind, config: NodeConfig = {}, options: NodeOptions = {}): this {
    if (this.nodes.has(id)) {
      this.duplicates.push({
        code: FlowErrorCode.VALIDATION_DUPLICATE_ID,
        message: `Duplicate node id "${id}"`,
        nodeId: id,
        path: `nodes.${id}`,
      });
      return this;
    }

    this.nodes.set(
      id,
      compact({
        id,
        kind,
        config: structuredClone(config),
        label: options.label,
        retry: options.retry === undefined ? undefined : structuredClone(options.retry),
        timeoutMs: options.timeoutMs,
        optional: options.optional,
        tags: options.tags === undefined ? undefined : [...options.tags],
      })
    );
    return this;
  }

  start(id: string = 'start', options?: NodeOptions): this {
    return this.node(id, NodeKind.START, {}, options);
  }

  end(id: string = 'end', options?: NodeOptions): this {
    return this.node(id, NodeKind.END, {}, options);
  }

  agentSpawn(id: string, config: NodeConfigInput<NodeKind.AGENT_SPAWN>, options?: NodeOptions): this {
    return this.node(id, NodeKind.AGENT_SPAWN, config, options);
  }

  agentExecute(id: string, config: NodeConfigInput<NodeKind.AGENT_EXECUTE>, options?: NodeOptions): this {
    return this.node(id, NodeKind.AGENT_EXECUTE, config, options);
  }

  condition(id: string, options?: NodeOptions): this {
    return this.node(id, NodeKind.CONDITION, {}, options);
  }

  parallel(id: string, config: NodeConfigInput<NodeKind.PARALLEL> = {}, options?: NodeOptions): this {
    return this.node(id, NodeKind.PARALLEL, config, options);
  }

  join(id: string, config: NodeConfigInput<NodeKind.JOIN>, options?: NodeOptions): this {
    return this.node(id, NodeKind.JOIN, config, options);
  }

  loop(id: string, config: NodeConfigInput<NodeKind.LOOP>, options?: NodeOptions): this {
    return this.node(id, NodeKind.LOOP, config, options);
  }

  delay(id: string, config: NodeConfigInput<NodeKind.DELAY>, options?: NodeOptions): this {
    return this.node(id, NodeKind.DELAY, config, options);
  }

  mcpCall(id: string, config: NodeConfigInput<NodeKind.MCP_CALL>, options?: NodeOptions): this {
    return this.node(id, NodeKind.MCP_CALL, config, options);
  }

  webhook(id: string, config: NodeConfigInput<NodeKind.WEBHOOK>, options?: NodeOptions): this {
    return this.node(id, NodeKind.WEBHOOK, config, options);
  }

  approval(id: string, config: NodeConfigInput<NodeKind.HUMAN_APPROVAL> = {}, options?: NodeOptions): this {
    return this.node(id, NodeKind.HUMAN_APPROVAL, config, options);
  }

  transform(id: string, config: NodeConfigInput<NodeKind.DATA_TRANSFORM>, options?: NodeOptions): this {
    return this.node(id, NodeKind.DATA_TRANSFORM, config, options);
  }

  // ============================================================================
  // EDGES
  // ============================================================================

  edge(from: string, to: string, options: EdgeOptions = {}): this {
    this.edges.push(
      compact({
        from,
        to,
        condition: options.condition === undefined ? undefined : structuredClone(options.condition),
        loopBack: options.loopBack,
        fallback: options.fallback,
        label: options.label,
      })
    );
    return this;
  }

  /**
   * Conditional branch out of a CONDITION node
   */
  when(from: string, to: string, condition: Condition): this {
    return this.edge(from, to, { condition });
  }

  /**
   * Default branch out of a CONDITION node; declare it last
   */
  otherwise(from: string, to: string): this {
    return this.edge(from, to);
  }

  /**
   * Close a loop body back into its LOOP node
   */
  loopBack(from: string, loopId: string): this {
    return this.edge(from, loopId, { loopBack: true });
  }

  /**
   * Edge followed only when the optional node `from` fails
   */
  fallback(from: string, to: string): this {
    return this.edge(from, to, { fallback: true });
  }

  /**
   * Connect nodes in sequence
   */
  chain(...ids: string[]): this {
    for (let i = 1; i < ids.length; i++) {
      const from = ids[i - 1];
      const to = ids[i];
      if (from !== undefined && to !== undefined) {
        this.edge(from, to);
      }
    }
    return this;
  }

  // ============================================================================
  // VARIABLES & METADATA
  // ============================================================================

  variable(name: string, value: unknown): this {
    this.variables[name] = value;
    return this;
  }

  metadata(key: string, value: unknown): this;
  metadata(entries: Record<string, unknown>): this;
  metadata(keyOrEntries: string | Record<string, unknown>, value?: unknown): this {
    if (typeof keyOrEntries === 'string') {
      this.meta[keyOrEntries] = value;
    } else {
      Object.assign(this.meta, keyOrEntries);
    }
    return this;
  }

  // ============================================================================
  // BUILD
  // ============================================================================

  /**
   * Assemble the definition without validating it
   */
  draft(): WorkflowDefinition {
    return compact({
      id: this.options.id ?? slugify(this.name),
      name: this.name,
      description: this.options.description,
      version: this.options.version ?? '1.0.0',
      nodes: Object.fromEntries(this.nodes),
      edges: [...this.edges],
      variables: structuredClone(this.variables),
      metadata: structuredClone(this.meta),
      timeoutMs: this.options.timeoutMs,
    });
  }

  /**
   * Validate and freeze
   *
   * @throws InvalidDefinitionError listing every violation
   */
  build(): WorkflowDefinition {
    const definition = this.draft();
    const { violations } = WorkflowGuard.validate(definition);
    const all = [...this.duplicates, ...violations];

    if (all.length > 0) {
      throw new InvalidDefinitionError(all, this.name);
    }

    return deepFreeze(definition);
  }
}

/**
 * Start a new workflow definition
 */
export function createWorkflow(name: string, options?: WorkflowOptions): WorkflowBuilder {
  return new WorkflowBuilder(name, options);
}
