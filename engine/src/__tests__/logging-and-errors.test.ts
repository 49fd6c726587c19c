/**
 * EngineLogger, LoggerManager, error classes and error formatting tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { EngineLogger, createEngineLogger } from '../core/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategory, LogLevel, type EngineLoggerConfig } from '../types/log-types.js';
import { NodeExecutionError } from '../errors/NodeError.js';
import { ConfigurationError, TemplateError } from '../errors/WorkflowError.js';
import { ErrorKind, FlowErrorCode } from '../errors/ErrorCodes.js';
import { formatError, formatViolations } from '../errors/ErrorFormatter.js';

function capture(config: Omit<EngineLoggerConfig, 'sink'>): { logger: EngineLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new EngineLogger({ colors: false, timestamp: false, ...config, sink: line => lines.push(line) });
  return { logger, lines };
}

describe('EngineLogger', () => {
  it('should render text lines with source, category and context', () => {
    const { logger, lines } = capture({ level: LogLevel.DEBUG });

    logger.info('Run started', { runId: 'run-1' }, LogCategory.RUNTIME);
    logger.error('Executor crashed', new Error('socket closed'));
    logger.debug('No context', {});

    expect(lines).toEqual([
      'INFO  [flowweave:runtime] Run started {"runId":"run-1"}',
      'ERROR [flowweave:system] Executor crashed - socket closed',
      'DEBUG [flowweave:system] No context',
    ]);
  });

  it('should filter by level', () => {
    const { logger, lines } = capture({ level: LogLevel.WARN });

    logger.info('dropped');
    logger.warn('kept');
    logger.setLevel(null);
    logger.fatal('silenced');

    expect(lines).toEqual(['WARN  [flowweave:system] kept']);
    expect(logger.willLog(LogLevel.FATAL)).toBe(false);
  });

  it('should render JSON entries', () => {
    const { logger, lines } = capture({ level: LogLevel.INFO, format: 'json', source: 'worker' });

    logger.warn('Slow node', { nodeId: 'greet' }, LogCategory.RUNTIME);
    const [line] = lines;
    const parsed: unknown = JSON.parse(line ?? '');

    expect(parsed).toMatchObject({
      level: 'warn',
      category: 'runtime',
      source: 'worker',
      message: 'Slow node',
      context: { nodeId: 'greet' },
    });
  });

  it('should render pretty multi-line entries', () => {
    const { logger, lines } = capture({ level: LogLevel.INFO, format: 'pretty' });

    logger.error('Node failed', new Error('late'), { nodeId: 'greet', attempts: 2 }, LogCategory.RUNTIME);

    expect(lines[0]?.split('\n')).toEqual([
      'ERROR Node failed (flowweave:runtime)',
      '  nodeId: greet',
      '  attempts: 2',
      '  Error: late',
    ]);
  });

  it('should keep a bounded buffer of recent entries', () => {
    const { logger } = capture({ level: LogLevel.INFO, bufferSize: 2 });

    logger.info('one');
    logger.info('two');
    logger.info('three');

    expect(logger.getEntries().map(e => e.message)).toEqual(['two', 'three']);
    logger.clearEntries();
    expect(logger.getEntries()).toEqual([]);
  });

  it('should map configuration levels', () => {
    expect(createEngineLogger('silent').willLog(LogLevel.FATAL)).toBe(false);
    expect(createEngineLogger('warn').getConfig()).toMatchObject({
      level: LogLevel.WARN,
      format: 'text',
      timestamp: false,
    });
    expect(createEngineLogger('info', true).getConfig()).toMatchObject({
      level: LogLevel.DEBUG,
      format: 'pretty',
      timestamp: true,
    });
    expect(createEngineLogger('silent', true).getConfig().level).toBeNull();
  });
});

describe('LoggerManager', () => {
  afterEach(() => {
    LoggerManager.reset();
  });

  it('should create a warn-level logger on first use', () => {
    LoggerManager.reset();
    expect(LoggerManager.isReady()).toBe(false);

    const logger = LoggerManager.getLogger();

    expect(logger.getConfig().level).toBe(LogLevel.WARN);
    expect(LoggerManager.getLogger()).toBe(logger);
  });

  it('should keep the first initialized logger', () => {
    LoggerManager.reset();
    const lines: string[] = [];
    const first = LoggerManager.initialize({ level: LogLevel.WARN, colors: false, timestamp: false, sink: line => lines.push(line) });

    const second = LoggerManager.initialize({ level: LogLevel.DEBUG });

    expect(second).toBe(first);
    expect(lines).toEqual(['WARN  [flowweave:system] LoggerManager already initialized; keeping the existing logger']);
  });
});

describe('FlowError', () => {
  it('should derive name and kind from the code', () => {
    const error = NodeExecutionError.timeout('fetch', 50);

    expect(error.name).toBe('ExecutionError');
    expect(error.kind).toBe(ErrorKind.TIMEOUT_EXCEEDED);
    expect(error.code).toBe(FlowErrorCode.TIMEOUT_EXCEEDED);
    expect(error.recoverable).toBe(true);
    expect(error.description).toBe('Node exceeded its timeout');
    expect(error.toString()).toBe('ExecutionError [FLW-E-003] in node "fetch": Node "fetch" timed out after 50ms');
  });

  it('should keep the cause of executor failures', () => {
    const cause = new Error('connection reset');
    const error = NodeExecutionError.executorFailure('greet', cause);

    expect(error.message).toBe('Task executor failed for node "greet": connection reset');
    expect(error.cause).toBe(cause);
  });

  it('should serialise to JSON', () => {
    const json = TemplateError.notFound('nope', ['linear', 'review']).toJSON();

    expect(json).toMatchObject({
      name: 'TemplateError',
      kind: ErrorKind.TEMPLATE_NOT_FOUND,
      code: FlowErrorCode.TEMPLATE_NOT_FOUND,
      message: 'Template "nope" is not registered',
      hint: 'Available templates: linear, review',
      context: { template: 'nope' },
    });
  });

  it('should not retry non-recoverable kinds', () => {
    expect(NodeExecutionError.loopBoundExceeded('repeat', 1).message).toBe(
      'Loop "repeat" exceeded its maximum of 1 iteration'
    );
    expect(NodeExecutionError.loopBoundExceeded('repeat', 1).recoverable).toBe(false);
    expect(NodeExecutionError.joinedBranchFailed('merge', ['a', 'b']).message).toBe(
      'Join "merge" has failed branches from a, b'
    );
  });
});

describe('ErrorFormatter', () => {
  it('should format an error with its node', () => {
    expect(formatError(NodeExecutionError.timeout('fetch', 50), false)).toBe(
      ['✖ ExecutionError [FLW-E-003]', 'in node fetch', '', 'Node "fetch" timed out after 50ms'].join('\n')
    );
  });

  it('should add hint and verbose details', () => {
    const error = ConfigurationError.missingCollaborator('taskExecutor', ['greet']);

    expect(formatError(error, false, true)).toBe(
      [
        '✖ ConfigurationError [FLW-C-002]',
        '',
        'No taskExecutor configured, required by node greet',
        '',
        '→ Hint: Pass "taskExecutor" in the engine configuration',
        '',
        'Kind: ConfigurationError',
        'Recoverable: no',
        'Context:',
        JSON.stringify({ collaborator: 'taskExecutor', nodeIds: ['greet'] }, null, 2),
      ].join('\n')
    );
  });

  it('should list violations with their location', () => {
    const text = formatViolations(
      [
        {
          code: FlowErrorCode.VALIDATION_DANGLING_EDGE,
          message: 'Edge 0 (start -> b) references unknown target node "b"',
          path: 'edges[0].to',
        },
        { code: FlowErrorCode.VALIDATION_MISSING_END, message: 'Workflow has no END node' },
      ],
      false
    );

    expect(text.split('\n')).toEqual([
      'Found 2 violation(s):',
      '  [FLW-V-002] edges[0].to: Edge 0 (start -> b) references unknown target node "b"',
      '  [FLW-V-006] Workflow has no END node',
    ]);
  });
});
