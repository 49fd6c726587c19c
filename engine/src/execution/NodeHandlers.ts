/**
 * Node Handlers
 *
 * Per-kind knowledge the run controller needs: which nodes complete
 * synchronously, which suspend on a collaborator, which collaborator a kind
 * requires, where outputs go, and the single attempt of collaborator work.
 *
 * @module execution
 */

import { NodeKind, type WorkflowNode } from '../types/core-types.js';
import type { ExternalService, TaskExecutor } from '../adapters/TaskExecutor.js';
import type { ApprovalSource } from '../adapters/ApprovalGate.js';
import { TimeoutManager } from '../automation/TimeoutManager.js';
import { interpolateDeep, resolvePath } from '../context/VariablePath.js';
import {
  AgentExecuteConfigSchema,
  AgentSpawnConfigSchema,
  DelayConfigSchema,
  McpCallConfigSchema,
  WebhookConfigSchema,
} from '../nodes/NodeConfigSchemas.js';
import { NodeExecutionError } from '../errors/NodeError.js';
import { ConfigurationError } from '../errors/WorkflowError.js';

/**
 * Collaborators a run may call out to
 */
export interface RunCollaborators {
  taskExecutor?: TaskExecutor;
  mcpService?: ExternalService;
  webhookService?: ExternalService;
  approvals?: ApprovalSource;
}

export type CollaboratorName = keyof RunCollaborators;

/**
 * - control: completes inside the scheduler's drain
 * - work: suspends on a timer or collaborator call, counted against concurrency
 * - approval: suspends until a human decision arrives
 */
export type NodeCategory = 'control' | 'work' | 'approval';

export interface AttemptContext {
  runId: string;
  node: WorkflowNode;
  variables: Readonly<Record<string, unknown>>;
  attempt: number;
  signal: AbortSignal;
  collaborators: RunCollaborators;
}

export class NodeHandlers {
  static categorize(kind: NodeKind): NodeCategory {
    switch (kind) {
      case NodeKind.START:
      case NodeKind.END:
      case NodeKind.CONDITION:
      case NodeKind.PARALLEL:
      case NodeKind.JOIN:
      case NodeKind.LOOP:
      case NodeKind.DATA_TRANSFORM:
        return 'control';
      case NodeKind.AGENT_SPAWN:
      case NodeKind.AGENT_EXECUTE:
      case NodeKind.MCP_CALL:
      case NodeKind.WEBHOOK:
      case NodeKind.DELAY:
        return 'work';
      case NodeKind.HUMAN_APPROVAL:
        return 'approval';
    }
  }

  static requiredCollaborator(kind: NodeKind): CollaboratorName | undefined {
    switch (kind) {
      case NodeKind.AGENT_SPAWN:
      case NodeKind.AGENT_EXECUTE:
        return 'taskExecutor';
      case NodeKind.MCP_CALL:
        return 'mcpService';
      case NodeKind.WEBHOOK:
        return 'webhookService';
      case NodeKind.HUMAN_APPROVAL:
        return 'approvals';
      case NodeKind.START:
      case NodeKind.END:
      case NodeKind.CONDITION:
      case NodeKind.PARALLEL:
      case NodeKind.JOIN:
      case NodeKind.LOOP:
      case NodeKind.DELAY:
      case NodeKind.DATA_TRANSFORM:
        return undefined;
    }
  }

  /**
   * Variable a successful node's output is stored under, if any.
   * Agents always store (default `<id>_output`); service calls only with `outputKey`.
   */
  static outputKey(node: WorkflowNode): string | undefined {
    switch (node.kind) {
      case NodeKind.AGENT_SPAWN:
        return AgentSpawnConfigSchema.parse(node.config).outputKey ?? `${node.id}_output`;
      case NodeKind.AGENT_EXECUTE:
        return AgentExecuteConfigSchema.parse(node.config).outputKey ?? `${node.id}_output`;
      case NodeKind.MCP_CALL:
        return McpCallConfigSchema.parse(node.config).outputKey;
      case NodeKind.WEBHOOK:
        return WebhookConfigSchema.parse(node.config).outputKey;
      default:
        return undefined;
    }
  }

  static delayMs(node: WorkflowNode): number {
    return TimeoutManager.parseTimeout(DelayConfigSchema.parse(node.config).duration);
  }

  /**
   * One attempt of collaborator work. Failures surface as recoverable
   * ExecutorFailure / ServiceFailure errors.
   */
  static async perform(context: AttemptContext): Promise<unknown> {
    const { node, runId, attempt, signal, collaborators } = context;
    const kind = node.kind;

    switch (kind) {
      case NodeKind.AGENT_SPAWN:
      case NodeKind.AGENT_EXECUTE: {
        const executor = this.require(collaborators.taskExecutor, 'taskExecutor', node.id);
        const inputs =
          kind === NodeKind.AGENT_SPAWN
            ? AgentSpawnConfigSchema.parse(node.config).inputs
            : AgentExecuteConfigSchema.parse(node.config).inputs;
        try {
          return await executor.execute({
            runId,
            nodeId: node.id,
            kind,
            config: node.config,
            variables: this.selectInputs(inputs, context.variables),
            attempt,
            signal,
          });
        } catch (error) {
          throw NodeExecutionError.executorFailure(node.id, error);
        }
      }

      case NodeKind.MCP_CALL: {
        const service = this.require(collaborators.mcpService, 'mcpService', node.id);
        const config = McpCallConfigSchema.parse(node.config);
        try {
          return await service.call({
            runId,
            nodeId: node.id,
            kind,
            target: config.target,
            payload: interpolateDeep(config.payload, context.variables),
            attempt,
            signal,
          });
        } catch (error) {
          throw NodeExecutionError.serviceFailure(node.id, config.target, error);
        }
      }

      case NodeKind.WEBHOOK: {
        const service = this.require(collaborators.webhookService, 'webhookService', node.id);
        const config = WebhookConfigSchema.parse(node.config);
        try {
          return await service.call({
            runId,
            nodeId: node.id,
            kind,
            target: config.target,
            payload: interpolateDeep(config.payload, context.variables),
            ...(config.method !== undefined && { method: config.method }),
            attempt,
            signal,
          });
        } catch (error) {
          throw NodeExecutionError.serviceFailure(node.id, config.target, error);
        }
      }

      default:
        throw new Error(`Node kind "${kind}" has no collaborator work`);
    }
  }

  /**
   * Variables handed to an agent: the declared `inputs` only, or everything
   */
  private static selectInputs(
    inputs: readonly string[] | undefined,
    variables: Readonly<Record<string, unknown>>
  ): Readonly<Record<string, unknown>> {
    if (inputs === undefined) {
      return variables;
    }

    const selected: Record<string, unknown> = {};
    for (const name of inputs) {
      const value = resolvePath(variables, name);
      if (value !== undefined) {
        selected[name] = value;
      }
    }
    return selected;
  }

  private static require<T>(collaborator: T | undefined, name: CollaboratorName, nodeId: string): T {
    if (collaborator === undefined) {
      throw ConfigurationError.missingCollaborator(name, [nodeId]);
    }
    return collaborator;
  }
}
