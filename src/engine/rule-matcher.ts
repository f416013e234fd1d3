import type { ConditionOutcome, EngineOptions, FactMap, RuleInput } from '../types/index.js';
import { evaluateCondition, inspectCondition } from './condition-evaluator.js';

export interface RuleExplanation {
  name: string;
  matched: boolean;
  conditions: { condition: unknown; outcome: ConditionOutcome }[];
}

/** A rule matches when all of its conditions hold; no conditions always matches. */
export function matchesRule(facts: FactMap, rule: RuleInput, options: EngineOptions = {}): boolean {
  return rule.conditions.every((condition) =>
    evaluateCondition(facts, condition, { ...options, ruleName: rule.name }),
  );
}

export function explainRule(facts: FactMap, rule: RuleInput): RuleExplanation {
  const conditions = rule.conditions.map((condition) => ({
    condition,
    outcome: inspectCondition(facts, condition),
  }));

  return {
    name: rule.name,
    matched: conditions.every((c) => c.outcome.status === 'passed'),
    conditions,
  };
}
