/**
 * Condition evaluation and variable path tests
 */

import { describe, it, expect } from 'vitest';
import {
  ConditionSyntaxError,
  checkCondition,
  evaluateCondition,
  parseConditionString,
} from '../conditions/ConditionEvaluator.js';
import { interpolate, interpolateDeep, resolvePath } from '../context/VariablePath.js';

describe('ConditionEvaluator', () => {
  describe('parseConditionString', () => {
    it('should parse literals on the right-hand side', () => {
      expect(parseConditionString("status == 'done'")).toEqual({ variable: 'status', operator: '==', value: 'done' });
      expect(parseConditionString('score >= 7.5')).toEqual({ variable: 'score', operator: '>=', value: 7.5 });
      expect(parseConditionString('flag != true')).toEqual({ variable: 'flag', operator: '!=', value: true });
      expect(parseConditionString('owner == null')).toEqual({ variable: 'owner', operator: '==', value: null });
      expect(parseConditionString('tags contains urgent')).toEqual({
        variable: 'tags',
        operator: 'contains',
        value: 'urgent',
      });
    });

    it('should parse unary operators and dotted paths', () => {
      expect(parseConditionString('review.result exists')).toEqual({ variable: 'review.result', operator: 'exists' });
      expect(parseConditionString('token not_exists')).toEqual({ variable: 'token', operator: 'not_exists' });
    });

    it('should throw on unparseable text', () => {
      expect(() => parseConditionString('just words')).toThrow(ConditionSyntaxError);
      expect(() => parseConditionString('just words')).toThrow('Cannot parse condition "just words"');
    });
  });

  describe('checkCondition', () => {
    it('should return null for well-formed conditions', () => {
      expect(checkCondition({ all: ['x > 1', { variable: 'y', operator: 'exists' }] })).toBeNull();
    });

    it('should describe malformed conditions', () => {
      expect(checkCondition({ any: ['x > 1', 'nonsense'] })).toBe('Cannot parse condition "nonsense"');
      expect(checkCondition({ variable: 'name', operator: 'matches', value: '[' })).toBe(
        'Invalid regular expression "["'
      );
    });
  });

  describe('evaluateCondition', () => {
    const variables = {
      count: 10,
      label: '10',
      status: 'done',
      tags: ['urgent', 'ops'],
      review: { score: 8, notes: null },
      title: 'Release 2.0',
    };

    it('should compare numbers and numeric strings', () => {
      expect(evaluateCondition("count == '10'", variables)).toBe(true);
      expect(evaluateCondition('label == 10', variables)).toBe(true);
      expect(evaluateCondition('count > 9', variables)).toBe(true);
      expect(evaluateCondition('count < 10', variables)).toBe(false);
      expect(evaluateCondition('status > 1', variables)).toBe(false);
    });

    it('should read dotted paths', () => {
      expect(evaluateCondition('review.score >= 8', variables)).toBe(true);
      expect(evaluateCondition('review.notes exists', variables)).toBe(false);
      expect(evaluateCondition('review.notes not_exists', variables)).toBe(true);
    });

    it('should treat a missing variable as false for everything but not_exists', () => {
      expect(evaluateCondition('missing != 1', variables)).toBe(false);
      expect(evaluateCondition('missing not_contains x', variables)).toBe(false);
      expect(evaluateCondition('missing exists', variables)).toBe(false);
      expect(evaluateCondition('missing not_exists', variables)).toBe(true);
    });

    it('should test containment in strings, arrays and objects', () => {
      expect(evaluateCondition('tags contains urgent', variables)).toBe(true);
      expect(evaluateCondition('tags not_contains billing', variables)).toBe(true);
      expect(evaluateCondition('title contains 2.0', variables)).toBe(true);
      expect(evaluateCondition({ variable: 'review', operator: 'contains', value: 'score' }, variables)).toBe(true);
    });

    it('should match regular expressions against strings only', () => {
      expect(evaluateCondition({ variable: 'title', operator: 'matches', value: '^Release \\d' }, variables)).toBe(true);
      expect(evaluateCondition({ variable: 'count', operator: 'matches', value: '1' }, variables)).toBe(false);
    });

    it('should combine clauses with all and any', () => {
      expect(evaluateCondition({ all: ['count > 5', "status == 'done'"] }, variables)).toBe(true);
      expect(evaluateCondition({ all: ['count > 5', "status == 'open'"] }, variables)).toBe(false);
      expect(evaluateCondition({ any: ["status == 'open'", { all: ['tags contains ops'] }] }, variables)).toBe(true);
    });
  });
});

describe('VariablePath', () => {
  const variables = {
    user: { name: 'Ada', roles: ['admin', 'dev'] },
    count: 3,
    empty: null,
  };

  it('should resolve dotted paths into objects and arrays', () => {
    expect(resolvePath(variables, 'user.name')).toBe('Ada');
    expect(resolvePath(variables, 'user.roles.1')).toBe('dev');
    expect(resolvePath(variables, 'user.roles.x')).toBeUndefined();
    expect(resolvePath(variables, 'user.email')).toBeUndefined();
    expect(resolvePath(variables, 'nope')).toBeUndefined();
  });

  it('should keep the raw value for a lone placeholder', () => {
    expect(interpolate('{{count}}', variables)).toBe(3);
    expect(interpolate('{{ user.roles }}', variables)).toEqual(['admin', 'dev']);
  });

  it('should render embedded placeholders as text', () => {
    expect(interpolate('Hi {{user.name}}, you have {{count}} items', variables)).toBe('Hi Ada, you have 3 items');
    expect(interpolate('roles={{user.roles}} none={{empty}}{{missing}}', variables)).toBe(
      'roles=["admin","dev"] none='
    );
  });

  it('should interpolate nested structures', () => {
    expect(interpolateDeep({ to: '{{user.name}}', meta: [{ n: '{{count}}' }, 7] }, variables)).toEqual({
      to: 'Ada',
      meta: [{ n: 3 }, 7],
    });
  });
});
