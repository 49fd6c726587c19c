/**
 * Error Formatter
 *
 * Renders engine errors and validation violations for terminals.
 *
 * USAGE:
 * =====
 * ```typescript
 * try {
 *   builder.build();
 * } catch (error) {
 *   if (error instanceof InvalidDefinitionError) {
 *     console.error(formatViolations(error.violations));
 *   }
 * }
 * ```
 *
 * @module errors
 */

import { Chalk, type ChalkInstance } from 'chalk';
import type { FlowError } from './FlowError.js';
import type { Violation } from './WorkflowError.js';

function palette(useColors: boolean): ChalkInstance {
  return new Chalk({ level: useColors ? 1 : 0 });
}

/**
 * Format a single error
 *
 * @param verbose - Adds kind, recoverability and context
 */
export function formatError(error: FlowError, useColors: boolean = true, verbose: boolean = false): string {
  const c = palette(useColors);
  const lines: string[] = [];

  lines.push(`${c.red(`✖ ${error.name}`)} ${c.gray(`[${error.code}]`)}`);

  if (error.nodeId) {
    lines.push(c.dim(`in node ${c.cyan(error.nodeId)}`));
  }
  if (error.path) {
    lines.push(c.dim(`at ${c.cyan(error.path)}`));
  }

  lines.push('');
  lines.push(c.bold(error.message));

  if (error.hint) {
    lines.push('');
    lines.push(`${c.blue('→ Hint:')} ${error.hint}`);
  }

  if (verbose) {
    lines.push('');
    lines.push(`${c.dim('Kind:')} ${error.kind}`);
    lines.push(`${c.dim('Recoverable:')} ${error.recoverable ? 'yes' : 'no'}`);
    const context = error.diagnostic.context;
    if (context && Object.keys(context).length > 0) {
      lines.push(`${c.dim('Context:')}`);
      lines.push(c.gray(JSON.stringify(context, null, 2)));
    }
  }

  return lines.join('\n');
}

/**
 * Format a list of violations, one per line
 *
 * @example
 * ```
 * Found 2 violation(s):
 *   [FLW-V-002] edges[0]: Edge 0 references unknown target node "b"
 *   [FLW-V-006] Workflow has no END node
 * ```
 */
export function formatViolations(violations: readonly Violation[], useColors: boolean = true): string {
  const c = palette(useColors);
  const lines = [c.red.bold(`Found ${violations.length} violation(s):`)];

  for (const violation of violations) {
    const location = violation.path ? `${c.cyan(violation.path)}: ` : '';
    lines.push(`  ${c.gray(`[${violation.code}]`)} ${location}${violation.message}`);
  }

  return lines.join('\n');
}
