/**
 * FlowEngine integration tests: failures, retries and joins.
 *
 * Covers:
 * - Retry policies (recovery and exhaustion)
 * - Per-attempt timeouts
 * - JOIN failure policies with optional branches
 * - Fallback edges
 * - Loop bounds, unmatched conditions and transform failures
 * - Runs that stop short of END or outlive the workflow timeout
 * - Start-time errors (invalid definition, missing collaborator, duplicate run id)
 */

import { describe, it, expect } from 'vitest';
import { createWorkflow } from '../builder/WorkflowBuilder.js';
import { MockTaskExecutor } from '../testing/MockTaskExecutor.js';
import type { TaskExecutor } from '../adapters/TaskExecutor.js';
import { NodeKind, NodeStatus, RunStatus, type WorkflowDefinition } from '../types/core-types.js';
import { EngineEventType } from '../events/EngineEvents.js';
import { ErrorKind, FlowErrorCode } from '../errors/ErrorCodes.js';
import { ConfigurationError, InvalidDefinitionError } from '../errors/WorkflowError.js';
import { createTestEngine, greetingWorkflow } from './engine-test-helpers.js';

function singleTask(options: { retry?: { maxAttempts: number }; timeoutMs?: number } = {}): WorkflowDefinition {
  return createWorkflow('Single task')
    .start()
    .agentExecute('work', { task: 'Do the work' }, options)
    .end()
    .chain('start', 'work', 'end')
    .build();
}

function fanOut(failurePolicy: 'fail_fast' | 'tolerate_partial'): WorkflowDefinition {
  return createWorkflow('Fan out')
    .start()
    .parallel('fork', { joinGroup: 'g' })
    .agentExecute('a', { task: 'Branch A' }, { optional: true })
    .agentExecute('b', { task: 'Branch B' })
    .join('merge', { joinGroup: 'g', failurePolicy })
    .end()
    .chain('start', 'fork')
    .chain('fork', 'a', 'merge')
    .chain('fork', 'b', 'merge')
    .chain('merge', 'end')
    .build();
}

describe('FlowEngine Integration: Errors', () => {
  // =====================================================
  // 1. Retries
  // =====================================================
  describe('Retry policy', () => {
    it('should recover when an attempt within maxAttempts succeeds', async () => {
      const executor = MockTaskExecutor.create({ failTimes: 2, response: 'done' });
      const engine = createTestEngine({ taskExecutor: executor });
      const retries: number[] = [];
      engine.on(EngineEventType.NODE_RETRYING, event => {
        retries.push(event.payload.attempt);
      });

      const execution = await engine.run(singleTask({ retry: { maxAttempts: 3 } }));

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['work']?.attempts).toBe(3);
      expect(execution.variables['work_output']).toBe('done');
      expect(executor.getCalls('work').map(call => call.attempt)).toEqual([1, 2, 3]);
      expect(retries).toEqual([1, 2]);
      expect(execution.log.filter(entry => entry.event === 'node_retrying')).toHaveLength(2);
    });

    it('should fail the run once attempts are exhausted', async () => {
      const executor = MockTaskExecutor.create({ failTimes: 5 });
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(singleTask({ retry: { maxAttempts: 2 } }));

      expect(execution.status).toBe(RunStatus.FAILED);
      expect(executor.getCallCount('work')).toBe(2);
      expect(execution.nodes['work']?.error).toEqual({
        kind: ErrorKind.EXECUTOR_FAILURE,
        code: FlowErrorCode.EXECUTOR_FAILURE,
        message: 'Task executor failed for node "work": Mock task executor failed for node "work" (call 2)',
      });
      expect(execution.variables['work_error']).toBe(
        'Task executor failed for node "work": Mock task executor failed for node "work" (call 2)'
      );
      expect(execution.failures.map(f => [f.nodeId, f.kind])).toEqual([['work', ErrorKind.EXECUTOR_FAILURE]]);
      expect(execution.nodes['end']?.status).toBe(NodeStatus.PENDING);
    });

    it('should apply the engine default retry policy to nodes without one', async () => {
      const executor = MockTaskExecutor.create({ failTimes: 1 });
      const engine = createTestEngine({ taskExecutor: executor, defaultRetry: { maxAttempts: 2 } });

      const execution = await engine.run(singleTask());

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['work']?.attempts).toBe(2);
    });
  });

  // =====================================================
  // 2. Timeouts
  // =====================================================
  describe('Timeouts', () => {
    it('should fail a node whose attempt exceeds timeoutMs', async () => {
      const executor = MockTaskExecutor.createSlow(500, 'late');
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(singleTask({ timeoutMs: 20 }));

      expect(execution.status).toBe(RunStatus.FAILED);
      expect(execution.nodes['work']?.error?.kind).toBe(ErrorKind.TIMEOUT_EXCEEDED);
      expect(execution.nodes['work']?.error?.message).toBe('Node "work" timed out after 20ms');
      expect(executor.getLastCall()?.signal.aborted).toBe(true);
    });

    it('should retry a timed out attempt', async () => {
      let calls = 0;
      const executor: TaskExecutor = {
        execute: async () => {
          calls++;
          if (calls === 1) {
            await new Promise(resolve => setTimeout(resolve, 200));
          }
          return 'second try';
        },
      };
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(singleTask({ retry: { maxAttempts: 2 }, timeoutMs: 20 }));

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.variables['work_output']).toBe('second try');
      expect(calls).toBe(2);
    });
  });

  // =====================================================
  // 3. Joins
  // =====================================================
  describe('Join policies', () => {
    it('should proceed with the branches that arrived under tolerate_partial', async () => {
      const executor = new MockTaskExecutor().forNode('a', { shouldFail: true, error: new Error('branch down') });
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(fanOut('tolerate_partial'));

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['a']?.status).toBe(NodeStatus.FAILED);
      expect(execution.nodes['merge']?.output).toEqual({ arrived: ['b'], failed: ['a'] });
      expect(execution.variables['a_error']).toBe('Task executor failed for node "a": branch down');
      expect(execution.failures.map(f => f.nodeId)).toEqual(['a']);
    });

    it('should fail the join as soon as a branch fails under fail_fast', async () => {
      const executor = new MockTaskExecutor()
        .forNode('a', { shouldFail: true })
        .forNode('b', { delay: 500 });
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(fanOut('fail_fast'));

      expect(execution.status).toBe(RunStatus.FAILED);
      expect(execution.nodes['merge']?.error?.kind).toBe(ErrorKind.JOINED_BRANCH_FAILED);
      expect(execution.nodes['merge']?.error?.message).toBe('Join "merge" has failed branch from a');
      expect(execution.nodes['b']?.status).toBe(NodeStatus.CANCELLED);
      expect(executor.getCalls('b')[0]?.signal.aborted).toBe(true);
    });

    it('should wait for every branch before a join succeeds', async () => {
      const executor = new MockTaskExecutor({ response: 'ok' }).forNode('a', { delay: 30 });
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(fanOut('fail_fast'));

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['merge']?.output).toEqual({ arrived: ['a', 'b'], failed: [] });
    });

    it('should limit in-flight work nodes to maxConcurrentNodes', async () => {
      let active = 0;
      let peak = 0;
      const executor: TaskExecutor = {
        execute: async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise(resolve => setTimeout(resolve, 10));
          active--;
          return 'ok';
        },
      };
      const builder = createWorkflow('Wide')
        .start()
        .parallel('fork', { joinGroup: 'g' })
        .join('merge', { joinGroup: 'g', failurePolicy: 'fail_fast' })
        .end()
        .chain('start', 'fork')
        .chain('merge', 'end');
      for (const id of ['a', 'b', 'c', 'd']) {
        builder.agentExecute(id, { task: id }).chain('fork', id, 'merge');
      }
      const definition = builder.build();

      const limited = await createTestEngine({ taskExecutor: executor, maxConcurrentNodes: 2 }).run(definition);
      expect(limited.status).toBe(RunStatus.SUCCEEDED);
      expect(peak).toBe(2);

      peak = 0;
      await createTestEngine({ taskExecutor: executor }).run(definition);
      expect(peak).toBe(4);
    });
  });

  // =====================================================
  // 4. Fallback edges
  // =====================================================
  describe('Fallback edges', () => {
    const guarded = () =>
      createWorkflow('Guarded')
        .start()
        .agentExecute('risky', { task: 'Try the fast path' }, { optional: true })
        .agentExecute('recover', { task: 'Take the slow path' })
        .end()
        .chain('start', 'risky', 'end')
        .fallback('risky', 'recover')
        .chain('recover', 'end')
        .build();

    it('should follow the fallback edge when an optional node fails', async () => {
      const executor = new MockTaskExecutor().forNode('risky', { shouldFail: true });
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(guarded());

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['risky']?.status).toBe(NodeStatus.FAILED);
      expect(execution.nodes['recover']?.status).toBe(NodeStatus.SUCCEEDED);
      expect(execution.nodes['end']?.status).toBe(NodeStatus.SUCCEEDED);
    });

    it('should skip the fallback target when the optional node succeeds', async () => {
      const executor = new MockTaskExecutor();
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(guarded());

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['recover']?.status).toBe(NodeStatus.SKIPPED);
      expect(executor.getCallCount('recover')).toBe(0);
    });
  });

  // =====================================================
  // 5. Control node failures
  // =====================================================
  describe('Control node failures', () => {
    it('should fail with LoopBoundExceeded when the condition keeps holding', async () => {
      const executor = new MockTaskExecutor();
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Unbounded', { variables: { keep: true } })
        .start()
        .loop('repeat', { body: 'work', maxIterations: 3, condition: 'keep == true' })
        .agentExecute('work', { task: 'Work' })
        .end()
        .chain('start', 'repeat', 'work')
        .loopBack('work', 'repeat')
        .chain('repeat', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.FAILED);
      expect(executor.getCallCount('work')).toBe(3);
      expect(execution.nodes['repeat']?.error).toEqual({
        kind: ErrorKind.LOOP_BOUND_EXCEEDED,
        code: FlowErrorCode.LOOP_BOUND_EXCEEDED,
        message: 'Loop "repeat" exceeded its maximum of 3 iterations',
      });
      expect(execution.variables['repeat_index']).toBe(2);
    });

    it('should fail with NoMatchingBranch when no condition holds and there is no default', async () => {
      const engine = createTestEngine({ taskExecutor: new MockTaskExecutor() });
      const definition = createWorkflow('Strict router')
        .start()
        .condition('route')
        .agentExecute('a', { task: 'A' })
        .agentExecute('b', { task: 'B' })
        .end()
        .chain('start', 'route')
        .when('route', 'a', 'x > 5')
        .when('route', 'b', 'x < 0')
        .chain('a', 'end')
        .chain('b', 'end')
        .build();

      const execution = await engine.run(definition, { variables: { x: 2 } });

      expect(execution.status).toBe(RunStatus.FAILED);
      expect(execution.nodes['route']?.error?.kind).toBe(ErrorKind.NO_MATCHING_BRANCH);
      expect(execution.nodes['route']?.error?.message).toBe('No outgoing condition of node "route" matched (2 evaluated)');
    });

    it('should fail with TransformFailed when an input is missing', async () => {
      const engine = createTestEngine();
      const definition = createWorkflow('Broken transform')
        .start()
        .transform('shout', { inputs: ['missing'], operation: 'uppercase', output: 'loud' })
        .end()
        .chain('start', 'shout', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.FAILED);
      expect(execution.nodes['shout']?.error?.message).toBe(
        'Transform "uppercase" failed in node "shout": Input variable "missing" is not set'
      );
    });
  });

  // =====================================================
  // 6. Run-level failures
  // =====================================================
  describe('Run-level failures', () => {
    it('should fail with EndNotReached when an optional node without fallback fails', async () => {
      const executor = new MockTaskExecutor().forNode('risky', { shouldFail: true, error: new Error('no route') });
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Dead end')
        .start()
        .agentExecute('risky', { task: 'Try the only path' }, { optional: true })
        .end()
        .chain('start', 'risky', 'end')
        .build();

      const execution = await engine.run(definition, { runId: 'run-dead-end' });

      expect(execution.status).toBe(RunStatus.FAILED);
      expect(execution.endNodeId).toBeUndefined();
      expect(execution.cancelReason).toBeUndefined();
      expect(execution.nodes['end']?.status).toBe(NodeStatus.SKIPPED);
      expect(execution.failures.map(f => [f.nodeId, f.kind])).toEqual([
        ['risky', ErrorKind.EXECUTOR_FAILURE],
        [undefined, ErrorKind.END_NOT_REACHED],
      ]);
      expect(execution.failures[1]?.message).toBe('Run "run-dead-end" stopped without reaching an END node');
    });

    it('should fail the run once the workflow timeout passes', async () => {
      const executor = MockTaskExecutor.createSlow(500, 'late');
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Bounded', { timeoutMs: 30 })
        .start()
        .agentExecute('work', { task: 'Take too long' })
        .end()
        .chain('start', 'work', 'end')
        .build();

      const execution = await engine.run(definition, { runId: 'run-bounded' });

      expect(execution.status).toBe(RunStatus.FAILED);
      expect(execution.nodes['work']?.status).toBe(NodeStatus.CANCELLED);
      expect(execution.failures.map(f => [f.nodeId, f.kind, f.message])).toEqual([
        [undefined, ErrorKind.TIMEOUT_EXCEEDED, 'Run "run-bounded" exceeded its timeout of 30ms'],
      ]);
      expect(executor.getLastCall()?.signal.aborted).toBe(true);
    });

    it('should not fire the workflow timeout after the run finished', async () => {
      const engine = createTestEngine({ taskExecutor: MockTaskExecutor.createSuccess('quick') });
      const definition = createWorkflow('Quick', { timeoutMs: 20 })
        .start()
        .agentExecute('work', { task: 'Finish fast' })
        .end()
        .chain('start', 'work', 'end')
        .build();

      const execution = await engine.run(definition, { runId: 'run-quick' });
      await new Promise(resolve => setTimeout(resolve, 40));

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(engine.getExecution('run-quick')?.status).toBe(RunStatus.SUCCEEDED);
      expect(engine.getExecution('run-quick')?.failures).toEqual([]);
    });
  });

  // =====================================================
  // 7. Start-time errors
  // =====================================================
  describe('Start-time errors', () => {
    it('should reject an invalid definition with every violation', () => {
      const engine = createTestEngine();
      const draft = createWorkflow('No end').start().agentExecute('work', { task: 'x' }).chain('start', 'work').draft();

      expect(() => engine.start(draft)).toThrow(InvalidDefinitionError);
      expect(engine.validate(draft).violations.map(v => v.code)).toEqual([FlowErrorCode.VALIDATION_MISSING_END]);
    });

    it('should reject a run that needs a collaborator the engine lacks', () => {
      const engine = createTestEngine();

      let caught: unknown;
      try {
        engine.start(greetingWorkflow());
      } catch (error) {
        caught = error;
      }

      const error = caught instanceof ConfigurationError ? caught : undefined;
      expect(error?.code).toBe(FlowErrorCode.CONFIG_MISSING_COLLABORATOR);
      expect(error?.kind).toBe(ErrorKind.CONFIGURATION_ERROR);
      expect(error?.message).toBe('No taskExecutor configured, required by node greet');
      expect(engine.listExecutions()).toEqual([]);
    });

    it('should reject a duplicate run id', async () => {
      const engine = createTestEngine({ taskExecutor: new MockTaskExecutor() });
      await engine.run(greetingWorkflow(), { runId: 'run-dup' });

      expect(() => engine.start(greetingWorkflow(), { runId: 'run-dup' })).toThrow(
        'Invalid engine configuration "runId": run "run-dup" already exists'
      );
    });

    it('should name the node kinds that need each collaborator', () => {
      const engine = createTestEngine({ taskExecutor: new MockTaskExecutor() });
      const definition = createWorkflow('Hooked')
        .start()
        .node('notify', NodeKind.WEBHOOK, { target: 'https://hooks.example.test' })
        .end()
        .chain('start', 'notify', 'end')
        .build();

      expect(() => engine.start(definition)).toThrow('No webhookService configured, required by node notify');
    });
  });
});
