/**
 * FlowEngine integration tests: normal flow scenarios.
 *
 * Covers:
 * - Linear runs and output variables
 * - Event emission order
 * - CONDITION routing and dead branches
 * - LOOP with a fixed iteration count, for and foreach loops
 * - Approvals and retries inside a loop body
 * - DATA_TRANSFORM, MCP_CALL, WEBHOOK and DELAY nodes
 * - Pausing and resuming a live run
 * - Progress, execution listing and engine metrics
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createWorkflow } from '../builder/WorkflowBuilder.js';
import { MockTaskExecutor } from '../testing/MockTaskExecutor.js';
import { MockExternalService } from '../testing/MockExternalService.js';
import { InMemoryApprovalGate } from '../adapters/ApprovalGate.js';
import { EngineEventType } from '../events/EngineEvents.js';
import { NodeKind, NodeStatus, RunStatus } from '../types/core-types.js';
import { createTestEngine, greetingWorkflow, nodeStatuses, recordEvents } from './engine-test-helpers.js';

describe('FlowEngine Integration: Happy Path', () => {
  let executor: MockTaskExecutor;

  beforeEach(() => {
    executor = MockTaskExecutor.createSuccess('hello');
  });

  // =====================================================
  // 1. Linear runs
  // =====================================================
  describe('Linear run', () => {
    it('should store the agent output under <id>_output and finish at END', async () => {
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(greetingWorkflow());

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.variables['greet_output']).toBe('hello');
      expect(execution.endNodeId).toBe('end');
      expect(execution.nodes['greet']?.attempts).toBe(1);
      expect(execution.nodes['greet']?.output).toBe('hello');
      expect(nodeStatuses(execution)).toEqual({
        start: NodeStatus.SUCCEEDED,
        greet: NodeStatus.SUCCEEDED,
        end: NodeStatus.SUCCEEDED,
      });
      expect(execution.failures).toEqual([]);
    });

    it('should use the explicit run id and seed run variables over definition defaults', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Seeded', { variables: { tone: 'formal', lang: 'en' } })
        .start()
        .agentExecute('greet', { task: 'Say hello' })
        .end()
        .chain('start', 'greet', 'end')
        .build();

      const execution = await engine.run(definition, { runId: 'run-seeded', variables: { tone: 'casual' } });

      expect(execution.id).toBe('run-seeded');
      expect(executor.getLastCall()?.variables).toEqual({ tone: 'casual', lang: 'en' });
    });

    it('should hand an agent only its declared inputs', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Summary', { variables: { doc: 'text', secret: 'test-secret' } })
        .start()
        .agentExecute('summarize', { task: 'Summarize', inputs: ['doc'] })
        .end()
        .chain('start', 'summarize', 'end')
        .build();

      await engine.run(definition);

      expect(executor.getLastCall()?.variables).toEqual({ doc: 'text' });
    });

    it('should store outputs under a custom outputKey', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Custom key')
        .start()
        .agentExecute('greet', { task: 'Say hello', outputKey: 'greeting' })
        .end()
        .chain('start', 'greet', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.variables['greeting']).toBe('hello');
      expect(execution.variables['greet_output']).toBeUndefined();
    });

    it('should run a template end to end in declaration order', async () => {
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(engine.instantiate('sequential', { steps: ['Plan', 'Build'] }));

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(executor.getCalls().map(call => call.nodeId)).toEqual(['step_1', 'step_2']);
    });
  });

  // =====================================================
  // 2. Events
  // =====================================================
  describe('Event emissions', () => {
    it('should emit run and node events in transition order', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const events = recordEvents(engine);

      await engine.run(greetingWorkflow());

      expect(events).toEqual([
        'run.started',
        'start:pending->ready',
        'start:ready->running',
        'start:running->succeeded',
        'greet:pending->ready',
        'greet:ready->running',
        'greet:running->succeeded',
        'end:pending->ready',
        'end:ready->running',
        'end:running->succeeded',
        'run.succeeded',
      ]);
    });
  });

  // =====================================================
  // 3. Conditions
  // =====================================================
  describe('Condition routing', () => {
    const router = () =>
      createWorkflow('Router')
        .start()
        .condition('route')
        .agentExecute('a', { task: 'Handle big values' })
        .agentExecute('b', { task: 'Handle small values' })
        .end()
        .chain('start', 'route')
        .when('route', 'a', 'x > 5')
        .otherwise('route', 'b')
        .chain('a', 'end')
        .chain('b', 'end')
        .build();

    it('should take the first matching branch and skip the other', async () => {
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(router(), { variables: { x: 10 } });

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['route']?.output).toEqual({ branch: 'a' });
      expect(execution.nodes['a']?.status).toBe(NodeStatus.SUCCEEDED);
      expect(execution.nodes['b']?.status).toBe(NodeStatus.SKIPPED);
      expect(executor.getCallCount('b')).toBe(0);
    });

    it('should fall through to the default branch', async () => {
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(router(), { variables: { x: 2 } });

      expect(execution.nodes['route']?.output).toEqual({ branch: 'b' });
      expect(execution.nodes['a']?.status).toBe(NodeStatus.SKIPPED);
      expect(execution.nodes['b']?.status).toBe(NodeStatus.SUCCEEDED);
      expect(executor.getCallCount('a')).toBe(0);
    });
  });

  // =====================================================
  // 4. Loops
  // =====================================================
  describe('Loops', () => {
    const counted = (iterations: number) =>
      createWorkflow('Counted')
        .start()
        .loop('repeat', { body: 'work', maxIterations: 5, iterations })
        .agentExecute('work', { task: 'Work' })
        .end()
        .chain('start', 'repeat', 'work')
        .loopBack('work', 'repeat')
        .chain('repeat', 'end')
        .build();

    it('should run the body the requested number of times and expose the index', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const events = recordEvents(engine);

      const execution = await engine.run(counted(3));

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(executor.getCallCount('work')).toBe(3);
      expect(executor.getCalls('work').map(call => call.variables['repeat_index'])).toEqual([0, 1, 2]);
      expect(execution.nodes['repeat']?.output).toEqual({ iterations: 3 });
      expect(execution.nodes['repeat']?.iteration).toBe(3);
      expect(events.filter(event => event === 'work:succeeded->pending')).toHaveLength(2);
    });

    it('should skip the body when zero iterations are requested', async () => {
      const engine = createTestEngine({ taskExecutor: executor });

      const execution = await engine.run(counted(0));

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['work']?.status).toBe(NodeStatus.SKIPPED);
      expect(execution.nodes['repeat']?.output).toEqual({ iterations: 0 });
      expect(executor.getCallCount()).toBe(0);
    });

    it('should stop once the loop condition no longer holds', async () => {
      const counter = MockTaskExecutor.create({ handler: request => Number(request.variables['count'] ?? 0) + 1 });
      const engine = createTestEngine({ taskExecutor: counter });
      const definition = createWorkflow('Until three')
        .start()
        .loop('repeat', { body: 'bump', maxIterations: 10, condition: 'count < 3', indexVariable: 'round' })
        .agentExecute('bump', { task: 'Increment', outputKey: 'count' })
        .end()
        .chain('start', 'repeat', 'bump')
        .loopBack('bump', 'repeat')
        .chain('repeat', 'end')
        .build();

      const execution = await engine.run(definition, { variables: { count: 0 } });

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.variables['count']).toBe(3);
      expect(execution.variables['round']).toBe(2);
      expect(counter.getCallCount('bump')).toBe(3);
    });

    it('should step a for loop from start towards end', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Stepped')
        .start()
        .loop('up', { body: 'work', maxIterations: 10, loopType: 'for', start: 2, end: 8, step: 3 })
        .agentExecute('work', { task: 'Work' })
        .loop('down', { body: 'again', maxIterations: 10, loopType: 'for', start: 3, end: 0, step: -1, itemVariable: 'n' })
        .agentExecute('again', { task: 'Again' })
        .end()
        .chain('start', 'up', 'work')
        .loopBack('work', 'up')
        .chain('up', 'down', 'again')
        .loopBack('again', 'down')
        .chain('down', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(executor.getCalls('work').map(call => call.variables['up_item'])).toEqual([2, 5]);
      expect(executor.getCalls('again').map(call => call.variables['n'])).toEqual([3, 2, 1]);
      expect(execution.nodes['up']?.output).toEqual({ iterations: 2 });
      expect(execution.nodes['down']?.output).toEqual({ iterations: 3 });
    });

    it('should visit each item of a foreach loop in order', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Each file', { variables: { review: { files: ['a.ts', 'b.ts'] } } })
        .start()
        .loop('files', { body: 'lint', maxIterations: 10, loopType: 'foreach', items: 'review.files', itemVariable: 'file' })
        .agentExecute('lint', { task: 'Lint {{file}}' })
        .end()
        .chain('start', 'files', 'lint')
        .loopBack('lint', 'files')
        .chain('files', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(executor.getCalls('lint').map(call => [call.variables['file'], call.variables['files_index']])).toEqual([
        ['a.ts', 0],
        ['b.ts', 1],
      ]);
      expect(execution.nodes['files']?.output).toEqual({ iterations: 2 });
    });

    it('should run no iterations of a foreach over a missing variable', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const definition = createWorkflow('Nothing to do')
        .start()
        .loop('each', { body: 'work', maxIterations: 3, loopType: 'foreach', items: 'pending' })
        .agentExecute('work', { task: 'Work' })
        .end()
        .chain('start', 'each', 'work')
        .loopBack('work', 'each')
        .chain('each', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.nodes['work']?.status).toBe(NodeStatus.SKIPPED);
      expect(execution.nodes['each']?.output).toEqual({ iterations: 0 });
    });

    it('should ask for approval again on every iteration', async () => {
      const gate = new InMemoryApprovalGate();
      const engine = createTestEngine({ taskExecutor: executor, approvals: gate });
      const asked: string[] = [];
      engine.on(EngineEventType.APPROVAL_REQUESTED, event => {
        asked.push(event.payload.nodeId);
        engine.approve(event.runId, event.payload.nodeId);
      });
      const definition = createWorkflow('Reviewed rounds')
        .start()
        .loop('rounds', { body: 'draft', maxIterations: 5, iterations: 2 })
        .agentExecute('draft', { task: 'Draft' })
        .approval('review', { message: 'Good enough?' })
        .end()
        .chain('start', 'rounds', 'draft', 'review')
        .loopBack('review', 'rounds')
        .chain('rounds', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(asked).toEqual(['review', 'review']);
      expect(execution.nodes['review']?.output).toEqual({ approved: true });
      expect(executor.getCallCount('draft')).toBe(2);
      expect(gate.bufferedCount).toBe(0);
    });

    it('should restart retry attempts on every iteration', async () => {
      const flaky = MockTaskExecutor.create({ failTimes: 1, response: 'done' });
      const engine = createTestEngine({ taskExecutor: flaky });
      const definition = createWorkflow('Flaky rounds')
        .start()
        .loop('rounds', { body: 'work', maxIterations: 5, iterations: 2 })
        .agentExecute('work', { task: 'Work' }, { retry: { maxAttempts: 2 } })
        .end()
        .chain('start', 'rounds', 'work')
        .loopBack('work', 'rounds')
        .chain('rounds', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(flaky.getCalls('work').map(call => call.attempt)).toEqual([1, 2, 1]);
      expect(execution.nodes['work']?.attempts).toBe(1);
    });
  });

  // =====================================================
  // 5. Transforms and services
  // =====================================================
  describe('Transforms and external services', () => {
    it('should write a DATA_TRANSFORM result to its output variable', async () => {
      const engine = createTestEngine();
      const definition = createWorkflow('Pair')
        .start()
        .transform('pair', { inputs: ['a', 'b'], operation: 'collect', output: 'both' })
        .end()
        .chain('start', 'pair', 'end')
        .build();

      const execution = await engine.run(definition, { variables: { a: 1, b: 2 } });

      expect(execution.variables['both']).toEqual([1, 2]);
      expect(execution.nodes['pair']?.output).toEqual([1, 2]);
    });

    it('should call MCP and webhook targets with interpolated payloads', async () => {
      const mcp = new MockExternalService();
      const hooks = new MockExternalService();
      const engine = createTestEngine({ mcpService: mcp, webhookService: hooks });
      const definition = createWorkflow('Lookup', { variables: { topic: 'zod' } })
        .start()
        .mcpCall('search', { target: 'docs.search', payload: { q: '{{topic}}' }, outputKey: 'hits' })
        .webhook('notify', { target: 'https://hooks.example.test/done', method: 'POST', payload: { found: '{{hits}}' } })
        .end()
        .chain('start', 'search', 'notify', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(execution.variables['hits']).toEqual({ target: 'docs.search', payload: { q: 'zod' } });
      expect(hooks.getCallsTo('https://hooks.example.test/done')[0]?.payload).toEqual({
        found: { target: 'docs.search', payload: { q: 'zod' } },
      });
      expect(hooks.getLastCall()?.method).toBe('POST');
      expect(execution.nodes['notify']?.output).toEqual({
        target: 'https://hooks.example.test/done',
        method: 'POST',
        payload: { found: { target: 'docs.search', payload: { q: 'zod' } } },
      });
      expect(execution.variables['notify_output']).toBeUndefined();
    });

    it('should wait out a DELAY node', async () => {
      const engine = createTestEngine();
      const definition = createWorkflow('Pause')
        .start()
        .delay('wait', { duration: '20ms' })
        .end()
        .chain('start', 'wait', 'end')
        .build();

      const started = Date.now();
      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(Date.now() - started).toBeGreaterThanOrEqual(15);
    });

    it('should let a sibling branch finish while another sleeps in a DELAY', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      const events = recordEvents(engine);
      const definition = createWorkflow('Staggered')
        .start()
        .parallel('fork', { joinGroup: 'g' })
        .delay('wait', { duration: '20ms' })
        .agentExecute('late', { task: 'After the pause' })
        .agentExecute('quick', { task: 'Right away' })
        .join('merge', { joinGroup: 'g', failurePolicy: 'fail_fast' })
        .end()
        .chain('start', 'fork')
        .chain('fork', 'wait', 'late', 'merge')
        .chain('fork', 'quick', 'merge')
        .chain('merge', 'end')
        .build();

      const execution = await engine.run(definition);

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(events.indexOf('quick:running->succeeded')).toBeLessThan(events.indexOf('wait:running->succeeded'));
      expect(events.indexOf('wait:running->succeeded')).toBeLessThan(events.indexOf('merge:pending->ready'));
      expect(execution.nodes['merge']?.output).toEqual({ arrived: ['late', 'quick'], failed: [] });
    });
  });

  // =====================================================
  // 6. Pause and resume
  // =====================================================
  describe('Pause and resume', () => {
    it('should hold ready nodes while paused and continue on resume', async () => {
      const slow = MockTaskExecutor.createSlow(10, 'ok');
      const engine = createTestEngine({ taskExecutor: slow });
      const events = recordEvents(engine);
      const definition = createWorkflow('Two steps')
        .start()
        .agentExecute('first', { task: 'First' })
        .agentExecute('second', { task: 'Second' })
        .end()
        .chain('start', 'first', 'second', 'end')
        .build();

      const handle = engine.start(definition, { runId: 'run-paused' });
      expect(engine.pause('run-paused')).toBe(true);
      expect(engine.pause('run-paused')).toBe(false);

      await new Promise(resolve => setTimeout(resolve, 40));
      const paused = engine.getExecution('run-paused');
      expect(paused?.status).toBe(RunStatus.PAUSED);
      expect(paused?.nodes['first']?.status).toBe(NodeStatus.SUCCEEDED);
      expect(paused?.nodes['second']?.status).toBe(NodeStatus.READY);
      expect(slow.getCallCount('second')).toBe(0);

      expect(engine.resume('run-paused').completion).toBe(handle.completion);
      const execution = await handle.completion;

      expect(execution.status).toBe(RunStatus.SUCCEEDED);
      expect(slow.getCalls().map(call => call.nodeId)).toEqual(['first', 'second']);
      expect(execution.log.filter(entry => entry.event === 'run_paused' || entry.event === 'run_resumed').map(e => e.event)).toEqual([
        'run_paused',
        'run_resumed',
      ]);
      expect(events.filter(event => event === 'run.paused' || event === 'run.resumed')).toEqual(['run.paused', 'run.resumed']);
      expect(engine.pause('run-paused')).toBe(false);
    });

    it('should not pause a run the engine does not drive', () => {
      expect(createTestEngine().pause('run-unknown')).toBe(false);
    });
  });

  // =====================================================
  // 7. Inspection
  // =====================================================
  describe('Inspection', () => {
    it('should report progress for finished and unknown runs', async () => {
      const engine = createTestEngine({ taskExecutor: executor });

      await engine.run(greetingWorkflow(), { runId: 'run-progress' });

      expect(engine.getProgress('run-progress')).toEqual({ total: 3, completed: 3, percent: 100 });
      expect(engine.getProgress('run-unknown')).toBeUndefined();
    });

    it('should list executions by status and drop finished runs from activeRuns', async () => {
      const engine = createTestEngine({ taskExecutor: executor });

      await engine.run(greetingWorkflow(), { runId: 'run-one' });
      await engine.run(greetingWorkflow(), { runId: 'run-two' });

      expect(engine.listExecutions({ status: RunStatus.SUCCEEDED }).map(e => e.id)).toEqual(['run-one', 'run-two']);
      expect(engine.listExecutions({ status: RunStatus.FAILED })).toEqual([]);
      expect(engine.activeRuns).toEqual([]);
    });

    it('should count runs and node outcomes per kind', async () => {
      const flaky = MockTaskExecutor.create({ failTimes: 1, response: 'hello' });
      const engine = createTestEngine({ taskExecutor: flaky });

      await engine.run(greetingWorkflow());
      await engine.run(greetingWorkflow());
      const metrics = engine.getMetrics();

      expect(metrics).toMatchObject({
        activeRuns: 0,
        runsStarted: 2,
        runsSucceeded: 1,
        runsFailed: 1,
        runsCancelled: 0,
      });
      expect(metrics.nodes[NodeKind.START]).toMatchObject({ count: 2, succeeded: 2, failed: 0 });
      expect(metrics.nodes[NodeKind.AGENT_EXECUTE]).toMatchObject({ count: 2, succeeded: 1, failed: 1 });
      expect(metrics.nodes[NodeKind.END]).toMatchObject({ count: 1, succeeded: 1, failed: 0 });
      expect(metrics.nodes[NodeKind.LOOP]).toBeUndefined();
    });

    it('should return detached snapshots', async () => {
      const engine = createTestEngine({ taskExecutor: executor });
      await engine.run(greetingWorkflow(), { runId: 'run-snapshot' });

      const snapshot = engine.getExecution('run-snapshot');
      if (snapshot) {
        snapshot.variables['greet_output'] = 'changed';
      }

      expect(engine.getExecution('run-snapshot')?.variables['greet_output']).toBe('hello');
    });
  });
});
