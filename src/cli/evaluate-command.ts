import { z } from 'zod';
import type { Diagnostic, FactMap, MatchResult, RuleInput } from '../types/index.js';
import { FactMapSchema } from '../schemas/index.js';
import { resolve } from '../engine/resolution-engine.js';
import { explainRule } from '../engine/rule-matcher.js';
import type { RuleExplanation } from '../engine/rule-matcher.js';
import { EvaluationMetrics } from '../metrics/collector.js';
import type { EvaluationMetricsSnapshot } from '../metrics/collector.js';
import { loadRuleSet } from '../rules/loader.js';
import { DEFAULT_APPLICANT } from '../rules/scholarship.js';
import { buildDecisionReport } from '../report/decision-report.js';
import type { DecisionReport } from '../report/decision-report.js';
import { DecisionLogger } from '../logging/decision-logger.js';

export const EvaluateInputSchema = z.object({
  facts: z.record(z.unknown()).optional(),
  rules: z.unknown().optional(),
  rulesText: z.string().optional(),
  options: z
    .object({
      logDir: z.string().optional(),
      explain: z.boolean().optional(),
    })
    .optional(),
});

export type EvaluationEvent =
  | { type: 'evaluation_start'; ruleCount: number; source: 'custom' | 'default' }
  | { type: 'rules_fallback'; error: string }
  | { type: 'diagnostic'; diagnostic: Diagnostic }
  | { type: 'rule_explained'; explanation: RuleExplanation }
  | { type: 'rule_fired'; rank: number; name: string; priority: number; decision: string | null }
  | { type: 'decision'; report: DecisionReport; outcome: MatchResult['outcome'] }
  | { type: 'metrics'; snapshot: EvaluationMetricsSnapshot }
  | { type: 'evaluation_error'; error: string };

export interface EvaluationRun {
  facts: FactMap;
  result: MatchResult<RuleInput>;
  report: DecisionReport;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function rulesTextOf(input: z.infer<typeof EvaluateInputSchema>): string | undefined {
  if (input.rulesText !== undefined) return input.rulesText;
  if (input.rules !== undefined) return JSON.stringify(input.rules);
  return undefined;
}

/**
 * Evaluates one request (`{ facts?, rules?, rulesText?, options? }`) and
 * reports progress through `emit`. Returns `null` when the request itself is
 * invalid; an `evaluation_error` event has been emitted in that case.
 *
 * Pass a shared `metrics` collector to accumulate counts across requests.
 */
export async function runEvaluation(
  input: unknown,
  emit: (event: EvaluationEvent) => void,
  metrics: EvaluationMetrics = new EvaluationMetrics(),
): Promise<EvaluationRun | null> {
  const request = EvaluateInputSchema.safeParse(input);
  if (!request.success) {
    emit({ type: 'evaluation_error', error: `Invalid request: ${request.error.issues[0]?.message ?? 'unknown'}` });
    return null;
  }

  const factsParsed = FactMapSchema.safeParse({ ...DEFAULT_APPLICANT, ...request.data.facts });
  if (!factsParsed.success) {
    const issue = factsParsed.error.issues[0];
    emit({
      type: 'evaluation_error',
      error: `Invalid facts: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`,
    });
    return null;
  }
  const facts: FactMap = factsParsed.data;

  // 1. Rules, falling back to the built-in set
  const loaded = loadRuleSet(rulesTextOf(request.data));
  emit({ type: 'evaluation_start', ruleCount: loaded.rules.length, source: loaded.source });
  if (loaded.error !== undefined) {
    emit({ type: 'rules_fallback', error: loaded.error });
  }

  // 2. Resolve
  const diagnostics: Diagnostic[] = [];
  const result = resolve(facts, loaded.rules, {
    onDiagnostic: (diagnostic) => {
      diagnostics.push(diagnostic);
      metrics.recordDiagnostic(diagnostic);
      emit({ type: 'diagnostic', diagnostic });
    },
  });
  metrics.recordResult(result);

  if (request.data.options?.explain) {
    for (const rule of loaded.rules) {
      emit({ type: 'rule_explained', explanation: explainRule(facts, rule) });
    }
  }

  // 3. Report
  const report = buildDecisionReport(result);
  for (const entry of report.firedRules) {
    emit({
      type: 'rule_fired',
      rank: entry.rank,
      name: entry.name,
      priority: entry.priority,
      decision: entry.decision,
    });
  }
  emit({ type: 'decision', report, outcome: result.outcome });
  emit({ type: 'metrics', snapshot: metrics.snapshot() });

  // 4. Optional decision log
  const logDir = request.data.options?.logDir;
  if (logDir !== undefined) {
    try {
      await new DecisionLogger(logDir).logDecision(facts, result, diagnostics);
    } catch (err) {
      emit({ type: 'evaluation_error', error: `Decision log failed: ${errorMessage(err)}` });
    }
  }

  return { facts, result, report };
}
