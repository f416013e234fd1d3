export * from './types/index.js';
export * from './schemas/index.js';

export { COMPARISON_OPERATORS, isComparisonOperator, lookupOperator, tagScalar } from './engine/operators.js';
export type { OperatorFn } from './engine/operators.js';
export { evaluateCondition, inspectCondition } from './engine/condition-evaluator.js';
export type { EvaluateContext } from './engine/condition-evaluator.js';
export { matchesRule, explainRule } from './engine/rule-matcher.js';
export type { RuleExplanation } from './engine/rule-matcher.js';
export { resolve, createResolver } from './engine/resolution-engine.js';
export {
  NO_MATCH_ACTION,
  MISSING_ACTION_GUARD,
  isWellFormedAction,
  actionOrGuard,
} from './engine/default-policy.js';

export { SCHOLARSHIP_RULES, DEFAULT_APPLICANT } from './rules/scholarship.js';
export { parseRuleSet, loadRuleSet, loadRuleSetFile, parseApplicantFacts } from './rules/loader.js';
export type { RuleSetParseResult, LoadedRuleSet } from './rules/loader.js';

export {
  classifyDecision,
  formatCondition,
  buildDecisionReport,
  renderDecisionReport,
} from './report/decision-report.js';
export type { DecisionHeadline, DecisionReport, FiredRuleEntry } from './report/decision-report.js';

export { EvaluationMetrics } from './metrics/collector.js';
export type { EvaluationMetricsSnapshot } from './metrics/collector.js';
export { DecisionLogger } from './logging/decision-logger.js';
export type { DecisionLogEntry } from './logging/decision-logger.js';
export { runEvaluation, EvaluateInputSchema } from './cli/evaluate-command.js';
export type { EvaluationEvent, EvaluationRun } from './cli/evaluate-command.js';
