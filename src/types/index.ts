export type { Scalar, FactMap, TaggedScalar, ApplicantFacts } from './fact.js';
export type {
  ComparisonOperator,
  Condition,
  Action,
  Rule,
  RuleInput,
  RuleSet,
} from './rule.js';
export type {
  SkipReason,
  DiagnosticType,
  Diagnostic,
  ConditionOutcome,
  EngineOptions,
} from './diagnostics.js';
export type { ResolutionOutcome, MatchResult, DecisionTone } from './decision.js';
