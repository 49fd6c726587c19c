/**
 * Schema Validator
 *
 * Checks the shape of an imported workflow tree (decoded JSON/YAML) with zod
 * and turns zod issues into definition violations. Structural rules
 * (START/END, cycles, per-kind config) are left to the guard.
 *
 * @module parser
 */

import { z } from 'zod';
import { NodeKind } from '../types/core-types.js';
import { ConditionSchema } from '../nodes/NodeConfigSchemas.js';
import { FlowErrorCode } from '../errors/ErrorCodes.js';
import { InvalidDefinitionError, type Violation } from '../errors/WorkflowError.js';

export const RetryTreeSchema = z
  .object({
    maxAttempts: z.number(),
    backoff: z
      .object({
        type: z.enum(['fixed', 'linear', 'exponential']),
        baseDelayMs: z.number(),
        maxDelayMs: z.number().optional(),
        multiplier: z.number().optional(),
        jitter: z.number().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const NodeTreeSchema = z
  .object({
    id: z.string().min(1),
    kind: z.nativeEnum(NodeKind),
    config: z.record(z.unknown()).default({}),
    label: z.string().optional(),
    retry: RetryTreeSchema.optional(),
    timeoutMs: z.number().optional(),
    optional: z.boolean().optional(),
    tags: z.array(z.string()).optional(),
  })
  .strict();

export const EdgeTreeSchema = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1),
    condition: ConditionSchema.optional(),
    loopBack: z.boolean().optional(),
    fallback: z.boolean().optional(),
    label: z.string().optional(),
  })
  .strict();

/**
 * Portable tree form of a definition: nodes as an ordered list
 */
export const WorkflowTreeSchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().min(1),
    description: z.string().optional(),
    version: z.string().min(1).optional(),
    nodes: z.array(NodeTreeSchema),
    edges: z.array(EdgeTreeSchema).default([]),
    variables: z.record(z.unknown()).default({}),
    metadata: z.record(z.unknown()).default({}),
    timeoutMs: z.number().optional(),
  })
  .strict();

export type WorkflowTree = z.input<typeof WorkflowTreeSchema>;
export type ParsedWorkflowTree = z.output<typeof WorkflowTreeSchema>;

function formatPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

export class SchemaValidator {
  /**
   * Validate an imported tree
   *
   * @throws InvalidDefinitionError with one violation per zod issue
   */
  static validate(tree: unknown): ParsedWorkflowTree {
    const result = WorkflowTreeSchema.safeParse(tree);
    if (result.success) {
      return result.data;
    }
    throw new InvalidDefinitionError(this.toViolations(result.error), this.nameOf(tree));
  }

  static toViolations(error: z.ZodError): Violation[] {
    return error.issues.map(issue => {
      const path = formatPath(issue.path);
      return {
        code: FlowErrorCode.VALIDATION_INVALID_SHAPE,
        message: path ? `${path}: ${issue.message}` : issue.message,
        path: path || undefined,
      };
    });
  }

  private static nameOf(tree: unknown): string | undefined {
    if (tree !== null && typeof tree === 'object' && 'name' in tree && typeof tree.name === 'string') {
      return tree.name;
    }
    return undefined;
  }
}
