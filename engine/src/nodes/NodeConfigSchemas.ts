/**
 * Node Configuration Schemas
 *
 * One zod schema per node kind. The guard validates every node's
 * configuration against its kind's schema; handlers parse with the same
 * schema to get typed configuration. Unknown keys pass through so
 * configuration stays round-trippable.
 *
 * @module nodes
 */

import { z } from 'zod';
import { NodeKind, type Condition } from '../types/core-types.js';
import { TRANSFORM_OPERATIONS } from '../context/DataTransformer.js';
import { TimeoutManager } from '../automation/TimeoutManager.js';

export const CONDITION_OPERATORS = [
  '==',
  '!=',
  '>',
  '<',
  '>=',
  '<=',
  'contains',
  'not_contains',
  'matches',
  'exists',
  'not_exists',
] as const;

/**
 * Edge / loop predicate
 */
export const ConditionSchema: z.ZodType<Condition> = z.lazy(() =>
  z.union([
    z.string().min(1),
    z.object({
      variable: z.string().min(1),
      operator: z.enum(CONDITION_OPERATORS),
      value: z.unknown().optional(),
    }),
    z.object({ all: z.array(ConditionSchema).min(1) }),
    z.object({ any: z.array(ConditionSchema).min(1) }),
  ])
);

const outputKey = z.string().min(1).optional();
const inputNames = z.array(z.string().min(1)).optional();

export const StartConfigSchema = z.object({}).passthrough();

export const EndConfigSchema = z.object({}).passthrough();

export const AgentSpawnConfigSchema = z
  .object({
    agent: z.string().min(1),
    task: z.string().optional(),
    outputKey,
    inputs: inputNames,
  })
  .passthrough();

export const AgentExecuteConfigSchema = z
  .object({
    task: z.string().min(1),
    agent: z.string().optional(),
    outputKey,
    inputs: inputNames,
  })
  .passthrough();

export const ConditionConfigSchema = z.object({}).passthrough();

export const ParallelConfigSchema = z
  .object({
    joinGroup: z.string().min(1).optional(),
  })
  .passthrough();

export const JoinFailurePolicySchema = z.enum(['fail_fast', 'tolerate_partial']);

export const JoinConfigSchema = z
  .object({
    joinGroup: z.string().min(1),
    failurePolicy: JoinFailurePolicySchema,
  })
  .passthrough();

export const LoopTypeSchema = z.enum(['while', 'for', 'foreach']);

/**
 * - while: repeat while `condition` holds and/or fewer than `iterations` ran
 * - for: count from `start` (default 0) towards `end` (exclusive) by `step` (default 1)
 * - foreach: one iteration per element of the array variable named by `items`
 *
 * `for` and `foreach` write the current value to `itemVariable` (default `<loopId>_item`);
 * `condition` and `iterations` still apply to them as extra stop rules.
 */
export const LoopConfigSchema = z
  .object({
    body: z.string().min(1),
    maxIterations: z.number().int().positive(),
    loopType: LoopTypeSchema.optional(),
    condition: ConditionSchema.optional(),
    iterations: z.number().int().nonnegative().optional(),
    indexVariable: z.string().min(1).optional(),
    start: z.number().int().optional(),
    end: z.number().int().optional(),
    step: z
      .number()
      .int()
      .refine(step => step !== 0, { message: 'step cannot be 0' })
      .optional(),
    items: z.string().min(1).optional(),
    itemVariable: z.string().min(1).optional(),
  })
  .passthrough()
  .superRefine((config, ctx) => {
    switch (config.loopType ?? 'while') {
      case 'while':
        if (config.condition === undefined && config.iterations === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'LOOP needs a condition or an iteration count',
            path: ['condition'],
          });
        }
        break;
      case 'for':
        if (config.end === undefined) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'A "for" LOOP needs an end value', path: ['end'] });
        }
        break;
      case 'foreach':
        if (config.items === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'A "foreach" LOOP needs the name of its items variable',
            path: ['items'],
          });
        }
        break;
    }
  });

export const DelayConfigSchema = z
  .object({
    duration: z.union([
      z.number().nonnegative(),
      z.string().refine(value => TimeoutManager.isValidDuration(value), {
        message: 'Expected a duration such as "250ms", "2s" or "1m"',
      }),
    ]),
  })
  .passthrough();

export const McpCallConfigSchema = z
  .object({
    target: z.string().min(1),
    payload: z.unknown().optional(),
    outputKey,
  })
  .passthrough();

export const WebhookConfigSchema = z
  .object({
    target: z.string().min(1),
    method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']).optional(),
    payload: z.unknown().optional(),
    outputKey,
  })
  .passthrough();

/**
 * The node's `timeoutMs` bounds the wait; `defaultAction` (default "reject")
 * decides what a timeout means.
 */
export const HumanApprovalConfigSchema = z
  .object({
    message: z.string().optional(),
    approvers: z.array(z.string().min(1)).optional(),
    defaultAction: z.enum(['approve', 'reject']).optional(),
  })
  .passthrough();

export const DataTransformConfigSchema = z
  .object({
    inputs: z.array(z.string().min(1)),
    operation: z.enum(TRANSFORM_OPERATIONS),
    output: z.string().min(1),
    options: z.record(z.unknown()).optional(),
  })
  .passthrough();

/**
 * Schema per kind
 */
export const NODE_CONFIG_SCHEMAS = {
  [NodeKind.START]: StartConfigSchema,
  [NodeKind.END]: EndConfigSchema,
  [NodeKind.AGENT_SPAWN]: AgentSpawnConfigSchema,
  [NodeKind.AGENT_EXECUTE]: AgentExecuteConfigSchema,
  [NodeKind.CONDITION]: ConditionConfigSchema,
  [NodeKind.PARALLEL]: ParallelConfigSchema,
  [NodeKind.JOIN]: JoinConfigSchema,
  [NodeKind.LOOP]: LoopConfigSchema,
  [NodeKind.DELAY]: DelayConfigSchema,
  [NodeKind.MCP_CALL]: McpCallConfigSchema,
  [NodeKind.WEBHOOK]: WebhookConfigSchema,
  [NodeKind.HUMAN_APPROVAL]: HumanApprovalConfigSchema,
  [NodeKind.DATA_TRANSFORM]: DataTransformConfigSchema,
} as const satisfies Record<NodeKind, z.ZodTypeAny>;

/**
 * Configuration accepted for a kind (what the builder takes)
 */
export type NodeConfigInput<K extends NodeKind> = z.input<(typeof NODE_CONFIG_SCHEMAS)[K]>;

/**
 * Configuration after parsing (what handlers read)
 */
export type NodeConfigOutput<K extends NodeKind> = z.output<(typeof NODE_CONFIG_SCHEMAS)[K]>;

export type JoinFailurePolicy = z.infer<typeof JoinFailurePolicySchema>;
export type LoopConfig = z.infer<typeof LoopConfigSchema>;
export type JoinConfig = z.infer<typeof JoinConfigSchema>;
export type DataTransformConfig = z.infer<typeof DataTransformConfigSchema>;
