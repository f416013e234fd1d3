import type { Scalar } from './fact.js';

export type SkipReason =
  | 'MalformedCondition'
  | 'UnknownOperator'
  | 'MissingFact'
  | 'UnsupportedComparison';

export type DiagnosticType = 'UnsupportedComparison';

export interface Diagnostic {
  type: DiagnosticType;
  condition: unknown;
  factValue: Scalar;
  ruleName?: string;
  message: string;
}

export type ConditionOutcome =
  | { status: 'passed' }
  | { status: 'failed' }
  | { status: 'skipped'; reason: SkipReason };

export interface EngineOptions {
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}
