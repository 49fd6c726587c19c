/**
 * Workflow Parser
 *
 * Main entry point for importing workflows from YAML/JSON.
 * Orchestrates shape validation and hands the tree to the builder, so
 * every imported definition passes the same structural checks as one
 * built in code.
 *
 * @module parser
 */

import { readFile } from 'fs/promises';
import { extname, resolve } from 'path';
import YAML from 'yaml';
import type { WorkflowDefinition } from '../types/core-types.js';
import { FlowErrorCode } from '../errors/ErrorCodes.js';
import { errorMessage } from '../errors/FlowError.js';
import { InvalidDefinitionError } from '../errors/WorkflowError.js';
import { createWorkflow } from '../builder/WorkflowBuilder.js';
import { SchemaValidator } from './SchemaValidator.js';

/**
 * Main workflow parser class
 */
export class WorkflowParser {
  /**
   * Build a definition from a decoded tree
   *
   * @throws InvalidDefinitionError for shape or structural problems
   */
  static fromTree(tree: unknown): WorkflowDefinition {
    const parsed = SchemaValidator.validate(tree);

    const builder = createWorkflow(parsed.name, {
      id: parsed.id,
      description: parsed.description,
      version: parsed.version,
      variables: parsed.variables,
      metadata: parsed.metadata,
      timeoutMs: parsed.timeoutMs,
    });

    for (const node of parsed.nodes) {
      builder.node(node.id, node.kind, node.config, {
        label: node.label,
        retry: node.retry,
        timeoutMs: node.timeoutMs,
        optional: node.optional,
        tags: node.tags,
      });
    }

    for (const edge of parsed.edges) {
      builder.edge(edge.from, edge.to, {
        condition: edge.condition,
        loopBack: edge.loopBack,
        fallback: edge.fallback,
        label: edge.label,
      });
    }

    return builder.build();
  }

  /**
   * Parse workflow from JSON string
   */
  static fromJSON(jsonContent: string): WorkflowDefinition {
    let tree: unknown;
    try {
      tree = JSON.parse(jsonContent);
    } catch (error) {
      throw InvalidDefinitionError.parseError('JSON', errorMessage(error));
    }
    return this.fromTree(tree);
  }

  /**
   * Parse workflow from YAML string
   */
  static fromYAML(yamlContent: string): WorkflowDefinition {
    let tree: unknown;
    try {
      tree = YAML.parse(yamlContent);
    } catch (error) {
      throw InvalidDefinitionError.parseError('YAML', errorMessage(error));
    }
    return this.fromTree(tree);
  }

  /**
   * Load a workflow file; the format follows the extension
   * (.json, .yaml or .yml)
   */
  static async fromFile(filePath: string): Promise<WorkflowDefinition> {
    const absolutePath = resolve(filePath);
    const extension = extname(absolutePath).toLowerCase();

    if (extension !== '.json' && extension !== '.yaml' && extension !== '.yml') {
      throw new InvalidDefinitionError([
        {
          code: FlowErrorCode.VALIDATION_PARSE_ERROR,
          message: `Unsupported workflow file extension "${extension}" (expected .json, .yaml or .yml)`,
          path: absolutePath,
        },
      ]);
    }

    const content = await readFile(absolutePath, 'utf-8');
    return extension === '.json' ? this.fromJSON(content) : this.fromYAML(content);
  }

  /**
   * Check whether JSON or YAML text imports cleanly
   */
  static isValid(content: string): boolean {
    try {
      this.fromYAML(content);
      return true;
    } catch (error) {
      if (error instanceof InvalidDefinitionError) {
        return false;
      }
      throw error;
    }
  }
}
