import { describe, it, expect } from 'vitest';
import {
  ActionSchema,
  ConditionSchema,
  RuleInputSchema,
  RuleSchema,
  RuleSetSchema,
} from '../../src/schemas/rule.schema.js';

describe('ConditionSchema', () => {
  it('validates a correct condition', () => {
    expect(ConditionSchema.parse(['cgpa', '>=', 3.7])).toEqual(['cgpa', '>=', 3.7]);
  });

  it('validates all operator types', () => {
    for (const op of ['==', '!=', '>', '>=', '<', '<=']) {
      expect(ConditionSchema.parse(['x', op, 1])).toEqual(['x', op, 1]);
    }
  });

  it('rejects invalid operator', () => {
    expect(() => ConditionSchema.parse(['x', 'in', 1])).toThrow();
  });

  it('rejects wrong arity', () => {
    expect(() => ConditionSchema.parse(['x', '=='])).toThrow();
    expect(() => ConditionSchema.parse(['x', '==', 1, 2])).toThrow();
  });

  it('rejects non-scalar values', () => {
    expect(() => ConditionSchema.parse(['x', '==', null])).toThrow();
    expect(() => ConditionSchema.parse(['x', '==', { a: 1 }])).toThrow();
  });
});

describe('ActionSchema', () => {
  it('rejects missing reason', () => {
    expect(() => ActionSchema.parse({ decision: 'REJECT' })).toThrow();
  });
});

describe('RuleSchema', () => {
  it('validates a correct rule', () => {
    const valid = {
      name: 'Low CGPA not eligible',
      priority: 95,
      conditions: [['cgpa', '<', 2.5]],
      action: { decision: 'REJECT', reason: 'CGPA below minimum scholarship requirement' },
    };
    expect(RuleSchema.parse(valid)).toEqual(valid);
  });

  it('rejects non-integer priority', () => {
    expect(() =>
      RuleSchema.parse({ name: 'x', priority: 1.5, conditions: [], action: { decision: 'd', reason: 'r' } }),
    ).toThrow();
  });
});

describe('RuleInputSchema', () => {
  it('fills in defaults', () => {
    expect(RuleInputSchema.parse({})).toEqual({ name: '(unnamed)', priority: 0, conditions: [] });
  });

  it('keeps malformed conditions and actions for the engine to handle', () => {
    const rule = { name: 'Loose', priority: 3, conditions: [['cgpa', '~', 1], 'junk'], action: 'REJECT' };
    expect(RuleInputSchema.parse(rule)).toEqual(rule);
  });

  it('rejects a non-array condition list', () => {
    expect(() => RuleInputSchema.parse({ name: 'x', conditions: 'cgpa > 3' })).toThrow();
  });
});

describe('RuleSetSchema', () => {
  it('validates empty list', () => {
    expect(RuleSetSchema.parse([])).toEqual([]);
  });

  it('rejects an object', () => {
    expect(() => RuleSetSchema.parse({ rules: [] })).toThrow();
  });
});
