/**
 * WorkflowBuilder tests
 */

import { describe, it, expect } from 'vitest';
import { createWorkflow, slugify } from '../builder/WorkflowBuilder.js';
import { InvalidDefinitionError } from '../errors/WorkflowError.js';
import { FlowErrorCode } from '../errors/ErrorCodes.js';
import { NodeKind } from '../types/core-types.js';

describe('WorkflowBuilder', () => {
  describe('slugify', () => {
    it('should lowercase and collapse separators', () => {
      expect(slugify('Nightly Report: v2!')).toBe('nightly_report_v2');
    });

    it('should fall back to "workflow" when nothing is left', () => {
      expect(slugify('***')).toBe('workflow');
    });
  });

  describe('build', () => {
    it('should assemble ids, defaults and edges in declaration order', () => {
      const definition = createWorkflow('Daily Digest', { description: 'Summarise the day' })
        .start()
        .agentExecute('summarise', { task: 'Summarise', outputKey: 'digest' }, { timeoutMs: 5000 })
        .end()
        .chain('start', 'summarise', 'end')
        .variable('channel', 'ops')
        .metadata('owner', 'platform')
        .build();

      expect(definition.id).toBe('daily_digest');
      expect(definition.version).toBe('1.0.0');
      expect(definition.description).toBe('Summarise the day');
      expect(definition.variables).toEqual({ channel: 'ops' });
      expect(definition.metadata).toEqual({ owner: 'platform' });
      expect(definition.edges).toEqual([
        { from: 'start', to: 'summarise' },
        { from: 'summarise', to: 'end' },
      ]);
      expect(definition.nodes['summarise']).toEqual({
        id: 'summarise',
        kind: NodeKind.AGENT_EXECUTE,
        config: { task: 'Summarise', outputKey: 'digest' },
        timeoutMs: 5000,
      });
    });

    it('should honour an explicit id and version', () => {
      const definition = createWorkflow('Anything', { id: 'custom', version: '2.1.0' })
        .start()
        .end()
        .chain('start', 'end')
        .build();

      expect(definition.id).toBe('custom');
      expect(definition.version).toBe('2.1.0');
    });

    it('should return a deeply frozen definition', () => {
      const definition = createWorkflow('Frozen')
        .start()
        .agentExecute('work', { task: 'Do it', inputs: ['a'] })
        .end()
        .chain('start', 'work', 'end')
        .build();

      expect(Object.isFrozen(definition)).toBe(true);
      expect(Object.isFrozen(definition.nodes)).toBe(true);
      expect(Object.isFrozen(definition.nodes['work']?.config)).toBe(true);
      expect(Object.isFrozen(definition.edges[0])).toBe(true);
    });

    it('should not share configuration objects with the caller', () => {
      const config = { task: 'Do it', inputs: ['a'] };
      const definition = createWorkflow('Copy')
        .start()
        .agentExecute('work', config)
        .end()
        .chain('start', 'work', 'end')
        .build();

      config.inputs.push('b');

      expect(definition.nodes['work']?.config['inputs']).toEqual(['a']);
    });

    it('should merge metadata entries', () => {
      const definition = createWorkflow('Meta', { metadata: { team: 'core' } })
        .start()
        .end()
        .chain('start', 'end')
        .metadata({ tier: 1 })
        .build();

      expect(definition.metadata).toEqual({ team: 'core', tier: 1 });
    });
  });

  describe('validation', () => {
    it('should reject duplicate node ids together with graph violations', () => {
      const builder = createWorkflow('Dup')
        .start()
        .agentExecute('work', { task: 'First' })
        .agentExecute('work', { task: 'Second' })
        .end()
        .chain('start', 'work', 'end');

      let caught: unknown;
      try {
        builder.build();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidDefinitionError);
      const error = caught instanceof InvalidDefinitionError ? caught : undefined;
      expect(error?.violations.map(v => v.code)).toEqual([FlowErrorCode.VALIDATION_DUPLICATE_ID]);
      expect(error?.message).toBe('Workflow "Dup" is invalid (1 violation):\n  - Duplicate node id "work"');
    });

    it('should keep the first node when an id repeats', () => {
      const definition = createWorkflow('Dup')
        .start()
        .agentExecute('work', { task: 'First' })
        .agentExecute('work', { task: 'Second' })
        .end()
        .chain('start', 'work', 'end')
        .draft();

      expect(definition.nodes['work']?.config).toEqual({ task: 'First' });
    });

    it('should hand out an unvalidated draft', () => {
      const draft = createWorkflow('Draft').agentExecute('work', { task: 'Do it' }).draft();

      expect(Object.keys(draft.nodes)).toEqual(['work']);
      expect(() => createWorkflow('Draft').agentExecute('work', { task: 'Do it' }).build()).toThrow(
        InvalidDefinitionError
      );
    });
  });
});
