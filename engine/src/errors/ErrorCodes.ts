/**
 * Error Codes
 *
 * Two layers:
 * 1. ErrorKind: the engine's error taxonomy. Retry decisions and run
 *    failure records are keyed by kind.
 * 2. FlowErrorCode (FLW-[Category]-[Number]): precise diagnostic codes,
 *    used for validation violations and error output.
 *
 * Categories:
 * - V: Validation/Definition errors (duplicate ids, dangling edges, cycles)
 * - T: Template errors
 * - E: Execution errors (node failures, timeouts, cancellation)
 * - C: Configuration errors
 *
 * ADDING NEW ERRORS:
 * =================
 * 1. Add the code below
 * 2. Add a description in getErrorDescription()
 * 3. Map it to a kind in getKindForCode() if it is raised as an error
 *
 * @module errors
 */

/**
 * Error taxonomy
 */
export enum ErrorKind {
  INVALID_DEFINITION = 'InvalidDefinition',
  EXECUTOR_FAILURE = 'ExecutorFailure',
  SERVICE_FAILURE = 'ServiceFailure',
  TIMEOUT_EXCEEDED = 'TimeoutExceeded',
  NO_MATCHING_BRANCH = 'NoMatchingBranch',
  JOINED_BRANCH_FAILED = 'JoinedBranchFailed',
  LOOP_BOUND_EXCEEDED = 'LoopBoundExceeded',
  APPROVAL_REJECTED = 'ApprovalRejected',
  RUN_CANCELLED = 'RunCancelled',
  END_NOT_REACHED = 'EndNotReached',
  TEMPLATE_NOT_FOUND = 'TemplateNotFound',
  MISSING_PARAMETER = 'MissingParameter',
  INVALID_PARAMETER = 'InvalidParameter',
  TRANSFORM_FAILED = 'TransformFailed',
  CONFIGURATION_ERROR = 'ConfigurationError',
}

export enum FlowErrorCode {
  // ============================================================================
  // VALIDATION ERRORS (V) - Definition structure
  // ============================================================================

  /** Two nodes share an id */
  VALIDATION_DUPLICATE_ID = 'FLW-V-001',

  /** Edge references a node that does not exist */
  VALIDATION_DANGLING_EDGE = 'FLW-V-002',

  /** No START node */
  VALIDATION_MISSING_START = 'FLW-V-003',

  /** More than one START node */
  VALIDATION_MULTIPLE_START = 'FLW-V-004',

  /** START has incoming edges or not exactly one unconditional outgoing edge */
  VALIDATION_INVALID_START = 'FLW-V-005',

  /** No END node */
  VALIDATION_MISSING_END = 'FLW-V-006',

  /** END node has outgoing edges */
  VALIDATION_INVALID_END = 'FLW-V-007',

  /** No END reachable from START */
  VALIDATION_END_UNREACHABLE = 'FLW-V-008',

  /** Cycle not closed by a loop back-edge */
  VALIDATION_CYCLE = 'FLW-V-009',

  /** Misplaced or unusable loop back-edge */
  VALIDATION_INVALID_LOOP_EDGE = 'FLW-V-010',

  /** Node configuration missing a key or holding a bad value */
  VALIDATION_INVALID_CONFIG = 'FLW-V-011',

  /** CONDITION edge layout or predicate problem */
  VALIDATION_INVALID_CONDITION = 'FLW-V-012',

  /** JOIN group without a matching PARALLEL */
  VALIDATION_UNMATCHED_JOIN = 'FLW-V-013',

  /** LOOP structure problem (body, back-edge, bound) */
  VALIDATION_INVALID_LOOP = 'FLW-V-014',

  /** Imported tree does not have the expected shape */
  VALIDATION_INVALID_SHAPE = 'FLW-V-015',

  /** Text could not be decoded as JSON/YAML */
  VALIDATION_PARSE_ERROR = 'FLW-V-016',

  /** Invalid retry policy or timeout on a node */
  VALIDATION_INVALID_POLICY = 'FLW-V-017',

  // ============================================================================
  // TEMPLATE ERRORS (T)
  // ============================================================================

  TEMPLATE_NOT_FOUND = 'FLW-T-001',
  TEMPLATE_MISSING_PARAMETER = 'FLW-T-002',
  TEMPLATE_INVALID_PARAMETER = 'FLW-T-003',

  // ============================================================================
  // EXECUTION ERRORS (E)
  // ============================================================================

  EXECUTOR_FAILURE = 'FLW-E-001',
  SERVICE_FAILURE = 'FLW-E-002',
  TIMEOUT_EXCEEDED = 'FLW-E-003',
  NO_MATCHING_BRANCH = 'FLW-E-004',
  JOINED_BRANCH_FAILED = 'FLW-E-005',
  LOOP_BOUND_EXCEEDED = 'FLW-E-006',
  APPROVAL_REJECTED = 'FLW-E-007',
  RUN_CANCELLED = 'FLW-E-008',
  TRANSFORM_FAILED = 'FLW-E-009',

  /** Run went quiet without reaching an END node */
  END_NOT_REACHED = 'FLW-E-010',

  /** Run exceeded the workflow's timeoutMs */
  RUN_TIMEOUT = 'FLW-E-011',

  // ============================================================================
  // CONFIGURATION ERRORS (C)
  // ============================================================================

  CONFIG_INVALID = 'FLW-C-001',
  CONFIG_MISSING_COLLABORATOR = 'FLW-C-002',
}

/**
 * Kinds that are retried per the node's retry policy
 */
const RECOVERABLE_KINDS: ReadonlySet<ErrorKind> = new Set([
  ErrorKind.EXECUTOR_FAILURE,
  ErrorKind.SERVICE_FAILURE,
  ErrorKind.TIMEOUT_EXCEEDED,
]);

export function isRecoverable(kind: ErrorKind): boolean {
  return RECOVERABLE_KINDS.has(kind);
}

/**
 * Get error category name from code
 */
export function getErrorCategory(code: FlowErrorCode): string {
  const segment = code.split('-')[1];
  switch (segment) {
    case 'V':
      return 'ValidationError';
    case 'T':
      return 'TemplateError';
    case 'E':
      return 'ExecutionError';
    case 'C':
      return 'ConfigurationError';
    default:
      return 'FlowError';
  }
}

/**
 * Map a diagnostic code to the kind it is raised as
 */
export function getKindForCode(code: FlowErrorCode): ErrorKind {
  switch (code) {
    case FlowErrorCode.TEMPLATE_NOT_FOUND:
      return ErrorKind.TEMPLATE_NOT_FOUND;
    case FlowErrorCode.TEMPLATE_MISSING_PARAMETER:
      return ErrorKind.MISSING_PARAMETER;
    case FlowErrorCode.TEMPLATE_INVALID_PARAMETER:
      return ErrorKind.INVALID_PARAMETER;
    case FlowErrorCode.EXECUTOR_FAILURE:
      return ErrorKind.EXECUTOR_FAILURE;
    case FlowErrorCode.SERVICE_FAILURE:
      return ErrorKind.SERVICE_FAILURE;
    case FlowErrorCode.TIMEOUT_EXCEEDED:
    case FlowErrorCode.RUN_TIMEOUT:
      return ErrorKind.TIMEOUT_EXCEEDED;
    case FlowErrorCode.NO_MATCHING_BRANCH:
      return ErrorKind.NO_MATCHING_BRANCH;
    case FlowErrorCode.JOINED_BRANCH_FAILED:
      return ErrorKind.JOINED_BRANCH_FAILED;
    case FlowErrorCode.LOOP_BOUND_EXCEEDED:
      return ErrorKind.LOOP_BOUND_EXCEEDED;
    case FlowErrorCode.APPROVAL_REJECTED:
      return ErrorKind.APPROVAL_REJECTED;
    case FlowErrorCode.RUN_CANCELLED:
      return ErrorKind.RUN_CANCELLED;
    case FlowErrorCode.TRANSFORM_FAILED:
      return ErrorKind.TRANSFORM_FAILED;
    case FlowErrorCode.END_NOT_REACHED:
      return ErrorKind.END_NOT_REACHED;
    case FlowErrorCode.CONFIG_INVALID:
    case FlowErrorCode.CONFIG_MISSING_COLLABORATOR:
      return ErrorKind.CONFIGURATION_ERROR;
    default:
      return ErrorKind.INVALID_DEFINITION;
  }
}

/**
 * Get a short description for a code
 */
export function getErrorDescription(code: FlowErrorCode): string {
  const descriptions: Record<FlowErrorCode, string> = {
    [FlowErrorCode.VALIDATION_DUPLICATE_ID]: 'Node ids must be unique',
    [FlowErrorCode.VALIDATION_DANGLING_EDGE]: 'Edge references an unknown node',
    [FlowErrorCode.VALIDATION_MISSING_START]: 'Workflow has no START node',
    [FlowErrorCode.VALIDATION_MULTIPLE_START]: 'Workflow has more than one START node',
    [FlowErrorCode.VALIDATION_INVALID_START]: 'START must have no incoming and one unconditional outgoing edge',
    [FlowErrorCode.VALIDATION_MISSING_END]: 'Workflow has no END node',
    [FlowErrorCode.VALIDATION_INVALID_END]: 'END nodes cannot have outgoing edges',
    [FlowErrorCode.VALIDATION_END_UNREACHABLE]: 'No END node is reachable from START',
    [FlowErrorCode.VALIDATION_CYCLE]: 'Cycle not closed by a loop back-edge',
    [FlowErrorCode.VALIDATION_INVALID_LOOP_EDGE]: 'Loop back-edge is misplaced',
    [FlowErrorCode.VALIDATION_INVALID_CONFIG]: 'Node configuration is invalid',
    [FlowErrorCode.VALIDATION_INVALID_CONDITION]: 'Condition routing is invalid',
    [FlowErrorCode.VALIDATION_UNMATCHED_JOIN]: 'JOIN group has no matching PARALLEL',
    [FlowErrorCode.VALIDATION_INVALID_LOOP]: 'LOOP structure is invalid',
    [FlowErrorCode.VALIDATION_INVALID_SHAPE]: 'Workflow document has an unexpected shape',
    [FlowErrorCode.VALIDATION_PARSE_ERROR]: 'Workflow document could not be parsed',
    [FlowErrorCode.VALIDATION_INVALID_POLICY]: 'Retry policy or timeout is invalid',
    [FlowErrorCode.TEMPLATE_NOT_FOUND]: 'Template is not registered',
    [FlowErrorCode.TEMPLATE_MISSING_PARAMETER]: 'Required template parameter is missing',
    [FlowErrorCode.TEMPLATE_INVALID_PARAMETER]: 'Template parameter has the wrong type',
    [FlowErrorCode.EXECUTOR_FAILURE]: 'Task executor failed',
    [FlowErrorCode.SERVICE_FAILURE]: 'External service call failed',
    [FlowErrorCode.TIMEOUT_EXCEEDED]: 'Node exceeded its timeout',
    [FlowErrorCode.NO_MATCHING_BRANCH]: 'No outgoing condition matched',
    [FlowErrorCode.JOINED_BRANCH_FAILED]: 'A joined branch failed',
    [FlowErrorCode.LOOP_BOUND_EXCEEDED]: 'Loop exceeded its maximum iterations',
    [FlowErrorCode.APPROVAL_REJECTED]: 'Approval was rejected',
    [FlowErrorCode.RUN_CANCELLED]: 'Run was cancelled',
    [FlowErrorCode.TRANSFORM_FAILED]: 'Data transformation failed',
    [FlowErrorCode.END_NOT_REACHED]: 'Run finished without reaching an END node',
    [FlowErrorCode.RUN_TIMEOUT]: 'Run exceeded the workflow timeout',
    [FlowErrorCode.CONFIG_INVALID]: 'Engine configuration is invalid',
    [FlowErrorCode.CONFIG_MISSING_COLLABORATOR]: 'A required collaborator is not configured',
  };

  return descriptions[code];
}
