import type { EngineOptions, FactMap, MatchResult, RuleInput } from '../types/index.js';
import { matchesRule } from './rule-matcher.js';
import { NO_MATCH_ACTION, actionOrGuard, isWellFormedAction } from './default-policy.js';

function byPriorityDesc<R extends RuleInput>(
  indexed: { rule: R; index: number }[],
): R[] {
  // Ties fall back to the position in the supplied rule list.
  return [...indexed]
    .sort((a, b) => b.rule.priority - a.rule.priority || a.index - b.index)
    .map(({ rule }) => rule);
}

/**
 * Runs every rule against the facts and picks the action of the
 * highest-priority match. The full sorted match list is returned with it so
 * callers can show how the decision was reached.
 */
export function resolve<R extends RuleInput>(
  facts: FactMap,
  rules: readonly R[],
  options: EngineOptions = {},
): MatchResult<R> {
  // Step 1: Collect matching rules in input order
  const matched: { rule: R; index: number }[] = [];
  rules.forEach((rule, index) => {
    if (matchesRule(facts, rule, options)) {
      matched.push({ rule, index });
    }
  });

  // Step 2: Nothing matched
  if (matched.length === 0) {
    return { action: NO_MATCH_ACTION, fired: [], outcome: 'no_match' };
  }

  // Step 3: Order by priority
  const fired = byPriorityDesc(matched);

  // Step 4: Winner, guarded against a missing or malformed action
  const winner = fired[0].action;
  return {
    action: actionOrGuard(winner),
    fired,
    outcome: isWellFormedAction(winner) ? 'matched' : 'missing_action',
  };
}

export function createResolver(options: EngineOptions = {}) {
  return <R extends RuleInput>(facts: FactMap, rules: readonly R[]): MatchResult<R> =>
    resolve(facts, rules, options);
}
