import { describe, it, expect, beforeEach } from 'vitest';
import { EvaluationMetrics } from '../../src/metrics/collector.js';
import { resolve } from '../../src/engine/resolution-engine.js';
import { SCHOLARSHIP_RULES } from '../../src/rules/scholarship.js';
import type { RuleInput } from '../../src/types/index.js';

describe('EvaluationMetrics', () => {
  let metrics: EvaluationMetrics;

  beforeEach(() => {
    metrics = new EvaluationMetrics();
  });

  it('starts empty', () => {
    const snapshot = metrics.snapshot();
    expect(snapshot.evaluations).toBe(0);
    expect(snapshot.outcomes).toEqual({ matched: 0, no_match: 0, missing_action: 0 });
    expect(snapshot.decisions).toEqual({});
    expect(snapshot.diagnostics).toBe(0);
  });

  it('counts outcomes, decisions and rule hits', () => {
    metrics.recordResult(
      resolve({ cgpa: 3.8, co_curricular_score: 85, family_income: 5000, disciplinary_actions: 0 }, SCHOLARSHIP_RULES),
    );
    metrics.recordResult(
      resolve({ cgpa: 3.9, co_curricular_score: 0, family_income: 20000, disciplinary_actions: 0 }, SCHOLARSHIP_RULES),
    );
    metrics.recordResult(resolve({}, []));

    const snapshot = metrics.snapshot();
    expect(snapshot.evaluations).toBe(3);
    expect(snapshot.outcomes).toEqual({ matched: 2, no_match: 1, missing_action: 0 });
    expect(snapshot.decisions).toEqual({ 'AWARD FULL': 1, 'NOT ELIGIBLE': 1, MANUAL_REVIEW: 1 });
    expect(snapshot.ruleHits).toEqual({
      'Top merit candidate': 1,
      'Good candidate partial scholarship': 1,
      'Default non-qualifier': 2,
    });
  });

  it('counts diagnostics through the hook', () => {
    const rules: RuleInput[] = [
      { name: 'Typo', priority: 2, conditions: [['cgpa', '>', '3']], action: { decision: 'AWARD FULL', reason: 'x' } },
    ];
    resolve({ cgpa: 3.5 }, rules, { onDiagnostic: metrics.onDiagnostic });
    resolve({ cgpa: 3.6 }, rules, { onDiagnostic: metrics.onDiagnostic });

    const snapshot = metrics.snapshot();
    expect(snapshot.diagnostics).toBe(2);
    expect(snapshot.diagnosticsByRule).toEqual({ Typo: 2 });
  });

  it('counts rule names and decisions that shadow object members', () => {
    const rules: RuleInput[] = [
      { name: 'constructor', priority: 3, conditions: [], action: { decision: 'toString', reason: 'r' } },
      { name: '__proto__', priority: 1, conditions: [], action: { decision: 'hasOwnProperty', reason: 'r' } },
    ];
    metrics.recordResult(resolve({}, rules));
    resolve({ cgpa: 3 }, [{ name: 'constructor', priority: 1, conditions: [['cgpa', '<', 'x']] }], {
      onDiagnostic: metrics.onDiagnostic,
    });

    const snapshot = metrics.snapshot();
    expect(snapshot.ruleHits).toEqual({ constructor: 1, ['__proto__']: 1 });
    expect(snapshot.decisions).toEqual({ toString: 1 });
    expect(snapshot.diagnosticsByRule).toEqual({ constructor: 1 });
  });

  it('returns copies from snapshot', () => {
    const snapshot = metrics.snapshot();
    snapshot.outcomes.matched = 99;
    expect(metrics.snapshot().outcomes.matched).toBe(0);
  });

  it('resets counters', () => {
    metrics.recordResult(resolve({}, []));
    metrics.reset();
    expect(metrics.snapshot().evaluations).toBe(0);
    expect(metrics.snapshot().decisions).toEqual({});
  });
});
