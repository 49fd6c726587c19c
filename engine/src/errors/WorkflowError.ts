/**
 * Workflow Errors
 *
 * Errors raised before a run starts: definition violations, template
 * lookup and parameter problems, engine configuration problems.
 *
 * @module errors
 */

import { FlowError } from './FlowError.js';
import { ErrorKind, FlowErrorCode } from './ErrorCodes.js';

/**
 * One structural problem found in a definition
 */
export interface Violation {
  code: FlowErrorCode;
  message: string;
  nodeId?: string;
  edgeIndex?: number;
  /** Dotted location (e.g., "edges[3].to") */
  path?: string;
}

/**
 * A definition failed validation.
 * Carries every violation, not just the first.
 */
export class InvalidDefinitionError extends FlowError {
  public readonly violations: readonly Violation[];

  constructor(violations: readonly Violation[], workflowName?: string) {
    const subject = workflowName ? `Workflow "${workflowName}"` : 'Workflow';
    const summary = violations.map(v => `  - ${v.message}`).join('\n');
    super({
      code: FlowErrorCode.VALIDATION_INVALID_SHAPE,
      kind: ErrorKind.INVALID_DEFINITION,
      message: `${subject} is invalid (${violations.length} violation${violations.length === 1 ? '' : 's'}):\n${summary}`,
      context: { violationCount: violations.length },
    });
    this.violations = violations;
  }

  /**
   * Wrap a decode failure (bad JSON/YAML text)
   */
  static parseError(format: 'JSON' | 'YAML', detail: string): InvalidDefinitionError {
    return new InvalidDefinitionError([
      {
        code: FlowErrorCode.VALIDATION_PARSE_ERROR,
        message: `${format} parsing failed: ${detail}`,
      },
    ]);
  }
}

/**
 * Template lookup and parameter errors
 */
export class TemplateError extends FlowError {
  static notFound(name: string, available: readonly string[]): TemplateError {
    return new TemplateError({
      code: FlowErrorCode.TEMPLATE_NOT_FOUND,
      message: `Template "${name}" is not registered`,
      hint: available.length > 0 ? `Available templates: ${available.join(', ')}` : undefined,
      context: { template: name },
    });
  }

  static missingParameters(name: string, missing: readonly string[]): TemplateError {
    return new TemplateError({
      code: FlowErrorCode.TEMPLATE_MISSING_PARAMETER,
      message: `Template "${name}" is missing required parameter${missing.length === 1 ? '' : 's'}: ${missing.join(', ')}`,
      context: { template: name, missing: [...missing] },
    });
  }

  static invalidParameter(name: string, parameter: string, expected: string): TemplateError {
    return new TemplateError({
      code: FlowErrorCode.TEMPLATE_INVALID_PARAMETER,
      message: `Template "${name}" parameter "${parameter}" must be of type ${expected}`,
      context: { template: name, parameter, expected },
    });
  }
}

/**
 * Engine configuration errors
 */
export class ConfigurationError extends FlowError {
  static invalid(field: string, message: string): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_INVALID,
      message: `Invalid engine configuration "${field}": ${message}`,
      path: field,
    });
  }

  static missingCollaborator(collaborator: string, nodeIds: readonly string[]): ConfigurationError {
    return new ConfigurationError({
      code: FlowErrorCode.CONFIG_MISSING_COLLABORATOR,
      message:
        nodeIds.length === 0
          ? `No ${collaborator} configured`
          : `No ${collaborator} configured, required by node${nodeIds.length === 1 ? '' : 's'} ${nodeIds.join(', ')}`,
      hint: `Pass "${collaborator}" in the engine configuration`,
      context: { collaborator, nodeIds: [...nodeIds] },
    });
  }
}
