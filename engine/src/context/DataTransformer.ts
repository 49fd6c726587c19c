/**
 * Data Transformer
 *
 * Pure, synchronous transformations for DATA_TRANSFORM nodes.
 * A transform reads its input variables (dotted paths allowed), applies one
 * operation and returns the value to store under the output variable.
 *
 * Operations:
 * - copy            value of the single input
 * - collect         array of all input values
 * - merge           shallow merge of object inputs, later inputs win
 * - concat          arrays concatenated, or scalars joined with `options.separator`
 * - sum             numeric sum (array inputs are flattened)
 * - count           length of an array/string, key count of an object
 * - pick            `options.path` read from the single input
 * - format          `options.template` with `{{name}}` placeholders filled in
 * - uppercase       / lowercase on a string input
 * - json_parse      / json_stringify (`options.indent`)
 *
 * @module context
 */

import { interpolate, isRecord, resolvePath } from './VariablePath.js';

export const TRANSFORM_OPERATIONS = [
  'copy',
  'collect',
  'merge',
  'concat',
  'sum',
  'count',
  'pick',
  'format',
  'uppercase',
  'lowercase',
  'json_parse',
  'json_stringify',
] as const;

export type TransformOperation = (typeof TRANSFORM_OPERATIONS)[number];

export interface TransformSpec {
  readonly inputs: readonly string[];
  readonly operation: TransformOperation;
  readonly output: string;
  readonly options?: Readonly<Record<string, unknown>>;
}

/**
 * Raised when inputs do not fit the operation
 */
export class TransformError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransformError';
  }
}

export class DataTransformer {
  /**
   * Apply a transform to the current variables
   *
   * @returns Value for `spec.output`
   * @throws TransformError
   */
  static apply(spec: TransformSpec, variables: Readonly<Record<string, unknown>>): unknown {
    const values = () => spec.inputs.map(name => this.read(name, variables));

    switch (spec.operation) {
      case 'copy':
        return this.single(spec, variables);

      case 'collect':
        return values();

      case 'merge':
        return values().reduce<Record<string, unknown>>((merged, value, index) => {
          if (!isRecord(value)) {
            throw new TransformError(`merge input "${spec.inputs[index]}" is not an object`);
          }
          return { ...merged, ...value };
        }, {});

      case 'concat': {
        const items = values();
        if (items.every(item => Array.isArray(item))) {
          return items.flat();
        }
        const rawSeparator = spec.options?.['separator'];
        const separator = typeof rawSeparator === 'string' ? rawSeparator : '';
        return items
          .map((item, index) => {
            if (typeof item !== 'string' && typeof item !== 'number' && typeof item !== 'boolean') {
              throw new TransformError(`concat input "${spec.inputs[index]}" must be a scalar or every input an array`);
            }
            return String(item);
          })
          .join(separator);
      }

      case 'sum':
        return values()
          .flat()
          .reduce<number>((total, item) => {
            if (typeof item !== 'number' || Number.isNaN(item)) {
              throw new TransformError(`sum received a non-numeric value: ${JSON.stringify(item)}`);
            }
            return total + item;
          }, 0);

      case 'count': {
        const value = this.single(spec, variables);
        if (Array.isArray(value) || typeof value === 'string') {
          return value.length;
        }
        if (isRecord(value)) {
          return Object.keys(value).length;
        }
        throw new TransformError(`count input "${spec.inputs[0]}" has no length`);
      }

      case 'pick': {
        const path = spec.options?.['path'];
        if (typeof path !== 'string' || path === '') {
          throw new TransformError('pick requires options.path');
        }
        const picked = resolvePath({ value: this.single(spec, variables) }, `value.${path}`);
        if (picked === undefined) {
          throw new TransformError(`pick path "${path}" not found in "${spec.inputs[0]}"`);
        }
        return picked;
      }

      case 'format': {
        const template = spec.options?.['template'];
        if (typeof template !== 'string') {
          throw new TransformError('format requires options.template');
        }
        const formatted = interpolate(template, variables);
        if (typeof formatted === 'string') {
          return formatted;
        }
        return formatted === undefined ? '' : JSON.stringify(formatted);
      }

      case 'uppercase':
      case 'lowercase': {
        const value = this.single(spec, variables);
        if (typeof value !== 'string') {
          throw new TransformError(`${spec.operation} input "${spec.inputs[0]}" is not a string`);
        }
        return spec.operation === 'uppercase' ? value.toUpperCase() : value.toLowerCase();
      }

      case 'json_parse': {
        const value = this.single(spec, variables);
        if (typeof value !== 'string') {
          throw new TransformError(`json_parse input "${spec.inputs[0]}" is not a string`);
        }
        try {
          const parsed: unknown = JSON.parse(value);
          return parsed;
        } catch (error) {
          throw new TransformError(`json_parse failed: ${error instanceof Error ? error.message : String(error)}`);
        }
      }

      case 'json_stringify': {
        const rawIndent = spec.options?.['indent'];
        const indent = typeof rawIndent === 'number' ? rawIndent : undefined;
        return JSON.stringify(this.single(spec, variables), null, indent);
      }
    }
  }

  private static read(name: string, variables: Readonly<Record<string, unknown>>): unknown {
    const value = resolvePath(variables, name);
    if (value === undefined) {
      throw new TransformError(`Input variable "${name}" is not set`);
    }
    return value;
  }

  private static single(spec: TransformSpec, variables: Readonly<Record<string, unknown>>): unknown {
    const [name] = spec.inputs;
    if (spec.inputs.length !== 1 || name === undefined) {
      throw new TransformError(`${spec.operation} takes exactly one input, got ${spec.inputs.length}`);
    }
    return this.read(name, variables);
  }
}
