import type { Action, RuleInput } from './rule.js';

export type ResolutionOutcome = 'matched' | 'no_match' | 'missing_action';

export interface MatchResult<R extends RuleInput = RuleInput> {
  action: Action;
  fired: readonly R[];
  outcome: ResolutionOutcome;
}

export type DecisionTone = 'success' | 'error' | 'warning';
