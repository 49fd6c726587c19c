/**
 * Workflow Serializer
 *
 * Exports definitions to the portable tree form and to JSON / YAML text.
 * Output is accepted unchanged by WorkflowParser.
 *
 * @module parser
 */

import { writeFile } from 'fs/promises';
import { extname, resolve } from 'path';
import YAML from 'yaml';
import type { WorkflowDefinition } from '../types/core-types.js';
import { FlowErrorCode } from '../errors/ErrorCodes.js';
import { InvalidDefinitionError } from '../errors/WorkflowError.js';
import type { WorkflowTree } from './SchemaValidator.js';

export class WorkflowSerializer {
  /**
   * Plain tree of objects, arrays and scalars; nodes in declaration order
   */
  static toTree(definition: WorkflowDefinition): WorkflowTree {
    const tree: WorkflowTree = {
      id: definition.id,
      name: definition.name,
      version: definition.version,
      nodes: Object.values(definition.nodes).map(node => {
        const entry: WorkflowTree['nodes'][number] = {
          id: node.id,
          kind: node.kind,
          config: structuredClone(node.config),
        };
        if (node.label !== undefined) entry.label = node.label;
        if (node.retry !== undefined) entry.retry = structuredClone(node.retry);
        if (node.timeoutMs !== undefined) entry.timeoutMs = node.timeoutMs;
        if (node.optional !== undefined) entry.optional = node.optional;
        if (node.tags !== undefined) entry.tags = [...node.tags];
        return entry;
      }),
      edges: definition.edges.map(edge => {
        const entry: NonNullable<WorkflowTree['edges']>[number] = { from: edge.from, to: edge.to };
        if (edge.condition !== undefined) entry.condition = structuredClone(edge.condition);
        if (edge.loopBack !== undefined) entry.loopBack = edge.loopBack;
        if (edge.fallback !== undefined) entry.fallback = edge.fallback;
        if (edge.label !== undefined) entry.label = edge.label;
        return entry;
      }),
      variables: structuredClone(definition.variables),
      metadata: structuredClone(definition.metadata),
    };

    if (definition.description !== undefined) {
      tree.description = definition.description;
    }
    if (definition.timeoutMs !== undefined) {
      tree.timeoutMs = definition.timeoutMs;
    }

    return tree;
  }

  static toJSON(definition: WorkflowDefinition, indent: number = 2): string {
    return JSON.stringify(this.toTree(definition), null, indent);
  }

  static toYAML(definition: WorkflowDefinition): string {
    return YAML.stringify(this.toTree(definition));
  }

  /**
   * Write a definition to disk; the format follows the extension
   * (.json, .yaml or .yml)
   *
   * @returns The absolute path written
   */
  static async toFile(definition: WorkflowDefinition, filePath: string): Promise<string> {
    const absolutePath = resolve(filePath);
    const extension = extname(absolutePath).toLowerCase();

    if (extension !== '.json' && extension !== '.yaml' && extension !== '.yml') {
      throw new InvalidDefinitionError(
        [
          {
            code: FlowErrorCode.VALIDATION_PARSE_ERROR,
            message: `Unsupported workflow file extension "${extension}" (expected .json, .yaml or .yml)`,
            path: absolutePath,
          },
        ],
        definition.name
      );
    }

    await writeFile(absolutePath, extension === '.json' ? this.toJSON(definition) : this.toYAML(definition), 'utf-8');
    return absolutePath;
  }
}
