/**
 * Base Flow Error Class
 *
 * Foundation for all engine errors. Carries a structured diagnostic
 * (kind, code, location, hint, context) for callers, loggers and
 * run failure records.
 *
 * @module errors
 */

import {
  ErrorKind,
  FlowErrorCode,
  getErrorCategory,
  getErrorDescription,
  getKindForCode,
  isRecoverable,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface FlowErrorDiagnostic {
  /** Structured error code (e.g., FLW-V-001) */
  code: FlowErrorCode;

  /** Taxonomy kind; derived from the code when omitted */
  kind?: ErrorKind;

  message: string;

  /** Location in the definition (e.g., "nodes.review.config.task") */
  path?: string;

  /** Node the error belongs to */
  nodeId?: string;

  /** Run the error belongs to */
  runId?: string;

  /** Suggestion for fixing the error */
  hint?: string;

  context?: Record<string, unknown>;

  cause?: unknown;
}

/**
 * Base error class for all engine errors
 *
 * @example
 * ```typescript
 * throw new FlowError({
 *   code: FlowErrorCode.CONFIG_INVALID,
 *   message: 'maxConcurrentNodes must be positive',
 *   hint: 'Set maxConcurrentNodes to 1 or more',
 * });
 * ```
 */
export class FlowError extends Error {
  public readonly diagnostic: Readonly<FlowErrorDiagnostic>;
  public readonly kind: ErrorKind;
  public readonly timestamp: Date;

  constructor(diagnostic: FlowErrorDiagnostic) {
    super(diagnostic.message, diagnostic.cause === undefined ? undefined : { cause: diagnostic.cause });
    this.name = getErrorCategory(diagnostic.code);
    this.kind = diagnostic.kind ?? getKindForCode(diagnostic.code);
    this.diagnostic = { ...diagnostic, kind: this.kind };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): FlowErrorCode {
    return this.diagnostic.code;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get nodeId(): string | undefined {
    return this.diagnostic.nodeId;
  }

  get runId(): string | undefined {
    return this.diagnostic.runId;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get context(): Record<string, unknown> {
    return this.diagnostic.context ?? {};
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * Whether a retry policy may re-attempt the failed work
   */
  get recoverable(): boolean {
    return isRecoverable(this.kind);
  }

  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.nodeId) {
      msg += ` in node "${this.nodeId}"`;
    }
    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `: ${this.message}`;

    if (this.hint) {
      msg += `\nHint: ${this.hint}`;
    }

    return msg;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      path: this.path,
      nodeId: this.nodeId,
      runId: this.runId,
      hint: this.hint,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Narrow unknown thrown values to FlowError
 */
export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}

/**
 * Best-effort message extraction for thrown values
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
