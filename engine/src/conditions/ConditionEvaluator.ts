/**
 * Condition Evaluator
 *
 * Parses and evaluates edge / loop predicates against shared variables.
 *
 * Forms:
 * - String:     `x > 5`, `status == 'done'`, `tags contains urgent`, `result exists`
 * - Clause:     `{ variable: 'x', operator: '>', value: 5 }`
 * - Compound:   `{ all: [...] }`, `{ any: [...] }`
 *
 * Rules:
 * - A missing variable makes every operator false except `not_exists`
 * - Ordering operators compare numerically; a non-numeric side is false
 * - `matches` tests a regular expression against a string value
 *
 * @module conditions
 */

import { isDeepStrictEqual } from 'node:util';
import type { Condition, ConditionClause, ConditionOperator } from '../types/core-types.js';
import { isRecord, resolvePath } from '../context/VariablePath.js';

const OPERATORS: readonly ConditionOperator[] = [
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
];

const UNARY_PATTERN = /^\s*([A-Za-z_][\w.]*)\s+(exists|not_exists)\s*$/;
const BINARY_PATTERN = /^\s*([A-Za-z_][\w.]*)\s*(==|!=|>=|<=|>|<|\s(?:not_contains|contains|matches)\s)\s*(.+?)\s*$/;

/**
 * Raised for conditions that cannot be parsed
 */
export class ConditionSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConditionSyntaxError';
  }
}

function isOperator(value: unknown): value is ConditionOperator {
  return typeof value === 'string' && OPERATORS.some(op => op === value);
}

/**
 * Parse a literal on the right-hand side of a string condition
 */
function parseLiteral(raw: string): unknown {
  const quoted = /^(['"])(.*)\1$/.exec(raw);
  if (quoted) {
    return quoted[2];
  }
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === 'null') return null;
  const numeric = Number(raw);
  if (raw.trim() !== '' && !Number.isNaN(numeric)) {
    return numeric;
  }
  return raw;
}

/**
 * Parse the string form into a clause
 *
 * @throws ConditionSyntaxError
 */
export function parseConditionString(expression: string): ConditionClause {
  const unary = UNARY_PATTERN.exec(expression);
  if (unary?.[1] !== undefined && isOperator(unary[2])) {
    return { variable: unary[1], operator: unary[2] };
  }

  const binary = BINARY_PATTERN.exec(expression);
  const operator = binary?.[2]?.trim();
  if (binary?.[1] !== undefined && binary[3] !== undefined && isOperator(operator)) {
    return { variable: binary[1], operator, value: parseLiteral(binary[3]) };
  }

  throw new ConditionSyntaxError(`Cannot parse condition "${expression}"`);
}

/**
 * Check a condition's structure without evaluating it
 *
 * @returns Problem description, or null when well-formed
 */
export function checkCondition(condition: Condition): string | null {
  try {
    normalize(condition);
    return null;
  } catch (error) {
    if (error instanceof ConditionSyntaxError) {
      return error.message;
    }
    throw error;
  }
}

type Normalized =
  | { type: 'clause'; clause: ConditionClause }
  | { type: 'all'; items: Normalized[] }
  | { type: 'any'; items: Normalized[] };

function normalize(condition: Condition): Normalized {
  if (typeof condition === 'string') {
    return { type: 'clause', clause: checkClause(parseConditionString(condition)) };
  }
  if ('all' in condition) {
    return { type: 'all', items: condition.all.map(normalize) };
  }
  if ('any' in condition) {
    return { type: 'any', items: condition.any.map(normalize) };
  }
  return { type: 'clause', clause: checkClause(condition) };
}

function checkClause(clause: ConditionClause): ConditionClause {
  if (typeof clause.variable !== 'string' || clause.variable === '') {
    throw new ConditionSyntaxError('Condition clause needs a variable name');
  }
  if (!isOperator(clause.operator)) {
    throw new ConditionSyntaxError(`Unknown condition operator "${String(clause.operator)}"`);
  }
  if (clause.operator === 'matches') {
    try {
      new RegExp(String(clause.value));
    } catch {
      throw new ConditionSyntaxError(`Invalid regular expression "${String(clause.value)}"`);
    }
  }
  return clause;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return Number.NaN;
}

function equals(left: unknown, right: unknown): boolean {
  if (isDeepStrictEqual(left, right)) {
    return true;
  }
  // 10 == '10' when one side is a numeric string
  if (typeof left === 'number' || typeof right === 'number') {
    const a = toNumber(left);
    const b = toNumber(right);
    return !Number.isNaN(a) && !Number.isNaN(b) && a === b;
  }
  return false;
}

function contains(container: unknown, item: unknown): boolean {
  if (typeof container === 'string') {
    return container.includes(String(item));
  }
  if (Array.isArray(container)) {
    return container.some(entry => equals(entry, item));
  }
  if (isRecord(container)) {
    return Object.prototype.hasOwnProperty.call(container, String(item));
  }
  return false;
}

function compare(left: unknown, right: unknown, test: (a: number, b: number) => boolean): boolean {
  const a = toNumber(left);
  const b = toNumber(right);
  if (Number.isNaN(a) || Number.isNaN(b)) {
    return false;
  }
  return test(a, b);
}

function evaluateClause(clause: ConditionClause, variables: Readonly<Record<string, unknown>>): boolean {
  const actual = resolvePath(variables, clause.variable);
  const present = actual !== undefined && actual !== null;

  if (actual === undefined && clause.operator !== 'exists' && clause.operator !== 'not_exists') {
    return false;
  }

  switch (clause.operator) {
    case 'exists':
      return present;
    case 'not_exists':
      return !present;
    case '==':
      return equals(actual, clause.value);
    case '!=':
      return !equals(actual, clause.value);
    case '>':
      return compare(actual, clause.value, (a, b) => a > b);
    case '<':
      return compare(actual, clause.value, (a, b) => a < b);
    case '>=':
      return compare(actual, clause.value, (a, b) => a >= b);
    case '<=':
      return compare(actual, clause.value, (a, b) => a <= b);
    case 'contains':
      return contains(actual, clause.value);
    case 'not_contains':
      return !contains(actual, clause.value);
    case 'matches':
      return typeof actual === 'string' && new RegExp(String(clause.value)).test(actual);
  }
}

function evaluateNormalized(condition: Normalized, variables: Readonly<Record<string, unknown>>): boolean {
  switch (condition.type) {
    case 'clause':
      return evaluateClause(condition.clause, variables);
    case 'all':
      return condition.items.every(item => evaluateNormalized(item, variables));
    case 'any':
      return condition.items.some(item => evaluateNormalized(item, variables));
  }
}

/**
 * Evaluate a condition against shared variables
 *
 * @throws ConditionSyntaxError for malformed conditions
 */
export function evaluateCondition(condition: Condition, variables: Readonly<Record<string, unknown>>): boolean {
  return evaluateNormalized(normalize(condition), variables);
}
