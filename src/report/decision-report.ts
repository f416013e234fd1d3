import type { DecisionTone, MatchResult, RuleInput } from '../types/index.js';
import { isWellFormedAction } from '../engine/default-policy.js';

export interface DecisionHeadline {
  tone: DecisionTone;
  headline: string;
}

export interface FiredRuleEntry {
  rank: number;
  name: string;
  priority: number;
  decision: string | null;
  conditions: string[];
}

export interface DecisionReport extends DecisionHeadline {
  decision: string;
  reason: string;
  firedRules: FiredRuleEntry[];
}

const HEADLINES: Record<string, DecisionHeadline> = {
  'AWARD FULL': { tone: 'success', headline: 'FULL SCHOLARSHIP RECOMMENDED' },
  'AWARD PARTIAL': { tone: 'success', headline: 'PARTIAL SCHOLARSHIP RECOMMENDED' },
  REJECT: { tone: 'error', headline: 'REJECTION RECOMMENDED' },
};

const REVIEW_HEADLINE: DecisionHeadline = { tone: 'warning', headline: 'MANUAL REVIEW REQUIRED' };

export function classifyDecision(decision: string): DecisionHeadline {
  return Object.prototype.hasOwnProperty.call(HEADLINES, decision)
    ? HEADLINES[decision]
    : REVIEW_HEADLINE;
}

export function formatCondition(condition: unknown): string {
  if (Array.isArray(condition) && condition.length === 3) {
    const [field, op, value]: unknown[] = condition;
    return `Fact: ${String(field)} ${String(op)} ${String(value)}`;
  }
  return `Fact: ${JSON.stringify(condition)}`;
}

export function buildDecisionReport(result: MatchResult<RuleInput>): DecisionReport {
  const { decision, reason } = result.action;

  return {
    decision,
    reason,
    ...classifyDecision(decision),
    firedRules: result.fired.map((rule, i) => ({
      rank: i + 1,
      name: rule.name || '(unnamed)',
      priority: rule.priority,
      decision: isWellFormedAction(rule.action) ? rule.action.decision : null,
      conditions: rule.conditions.map(formatCondition),
    })),
  };
}

export function renderDecisionReport(report: DecisionReport): string[] {
  const lines = [report.headline, `Decision: ${report.decision}`, `Reason: ${report.reason}`];

  if (report.firedRules.length === 0) {
    lines.push('No rules matched the applicant profile.');
    return lines;
  }

  lines.push('Fired rules:');
  for (const entry of report.firedRules) {
    lines.push(`  ${entry.rank}. ${entry.name} (priority ${entry.priority}) -> ${entry.decision ?? '(no action)'}`);
    for (const condition of entry.conditions) {
      lines.push(`       ${condition}`);
    }
  }
  return lines;
}
