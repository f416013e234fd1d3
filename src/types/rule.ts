import type { Scalar } from './fact.js';

export type ComparisonOperator = '==' | '!=' | '>' | '>=' | '<' | '<=';

export type Condition = readonly [field: string, op: ComparisonOperator, value: Scalar];

export interface Action {
  decision: string;
  reason: string;
}

export interface Rule {
  name: string;
  priority: number;
  conditions: readonly Condition[];
  action: Action;
}

/**
 * Shape accepted by the engine. Conditions and actions are checked one by one
 * while evaluating, so a single bad entry only affects its own rule.
 */
export interface RuleInput {
  name: string;
  priority: number;
  conditions: readonly unknown[];
  action?: unknown;
}

export type RuleSet = readonly Rule[];
