import { describe, it, expect } from 'vitest';
import { DEFAULT_APPLICANT, SCHOLARSHIP_RULES } from '../../src/rules/scholarship.js';
import { RuleSchema } from '../../src/schemas/rule.schema.js';
import { ApplicantFactsSchema } from '../../src/schemas/fact.schema.js';
import { resolve } from '../../src/engine/resolution-engine.js';

describe('SCHOLARSHIP_RULES', () => {
  it('contains only well-formed rules', () => {
    for (const rule of SCHOLARSHIP_RULES) {
      expect(() => RuleSchema.parse(rule)).not.toThrow();
    }
  });

  it('ends with an unconditional catch-all', () => {
    const last = SCHOLARSHIP_RULES[SCHOLARSHIP_RULES.length - 1];
    expect(last.name).toBe('Default non-qualifier');
    expect(last.conditions).toEqual([]);
    expect(last.priority).toBe(1);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(SCHOLARSHIP_RULES)).toBe(true);
  });
});

describe('DEFAULT_APPLICANT', () => {
  it('is a valid applicant', () => {
    expect(ApplicantFactsSchema.parse(DEFAULT_APPLICANT)).toEqual(DEFAULT_APPLICANT);
  });

  it('qualifies for a partial scholarship', () => {
    // cgpa 3.5 and score 75 miss top merit but meet the partial thresholds
    expect(resolve(DEFAULT_APPLICANT, SCHOLARSHIP_RULES).action.decision).toBe('AWARD PARTIAL');
  });
});
