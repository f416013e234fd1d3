import type { Diagnostic, MatchResult, ResolutionOutcome, RuleInput } from '../types/index.js';

export interface EvaluationMetricsSnapshot {
  startedAt: string;
  evaluations: number;
  outcomes: Record<ResolutionOutcome, number>;
  decisions: Record<string, number>;
  ruleHits: Record<string, number>;
  diagnostics: number;
  diagnosticsByRule: Record<string, number>;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export class EvaluationMetrics {
  private startedAt = new Date().toISOString();
  private evaluations = 0;
  private outcomes: Record<ResolutionOutcome, number> = { matched: 0, no_match: 0, missing_action: 0 };
  private decisions = new Map<string, number>();
  private ruleHits = new Map<string, number>();
  private diagnostics = 0;
  private diagnosticsByRule = new Map<string, number>();

  reset(): void {
    this.startedAt = new Date().toISOString();
    this.evaluations = 0;
    this.outcomes = { matched: 0, no_match: 0, missing_action: 0 };
    this.decisions.clear();
    this.ruleHits.clear();
    this.diagnostics = 0;
    this.diagnosticsByRule.clear();
  }

  recordResult(result: MatchResult<RuleInput>): void {
    this.evaluations++;
    this.outcomes[result.outcome]++;
    const { decision } = result.action;
    increment(this.decisions, decision);
    for (const rule of result.fired) {
      increment(this.ruleHits, rule.name);
    }
  }

  recordDiagnostic(diagnostic: Diagnostic): void {
    this.diagnostics++;
    const rule = diagnostic.ruleName ?? '(unknown)';
    increment(this.diagnosticsByRule, rule);
  }

  /** Hook to pass as `onDiagnostic`. */
  readonly onDiagnostic = (diagnostic: Diagnostic): void => {
    this.recordDiagnostic(diagnostic);
  };

  snapshot(): EvaluationMetricsSnapshot {
    return {
      startedAt: this.startedAt,
      evaluations: this.evaluations,
      outcomes: { ...this.outcomes },
      decisions: Object.fromEntries(this.decisions),
      ruleHits: Object.fromEntries(this.ruleHits),
      diagnostics: this.diagnostics,
      diagnosticsByRule: Object.fromEntries(this.diagnosticsByRule),
    };
  }
}
