import type {
  ConditionOutcome,
  Diagnostic,
  EngineOptions,
  FactMap,
  Scalar,
} from '../types/index.js';
import { lookupOperator, tagScalar } from './operators.js';

export interface EvaluateContext extends EngineOptions {
  ruleName?: string;
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

function readFact(facts: FactMap, field: string): Scalar | undefined {
  if (!Object.prototype.hasOwnProperty.call(facts, field)) return undefined;
  const value: unknown = facts[field];
  return isScalar(value) ? value : undefined;
}

interface Inspection {
  outcome: ConditionOutcome;
  factValue?: Scalar;
}

function inspect(facts: FactMap, condition: unknown): Inspection {
  if (!Array.isArray(condition) || condition.length !== 3) {
    return { outcome: { status: 'skipped', reason: 'MalformedCondition' } };
  }

  const [field, symbol, expected]: unknown[] = condition;
  if (typeof field !== 'string' || !isScalar(expected)) {
    return { outcome: { status: 'skipped', reason: 'MalformedCondition' } };
  }

  const op = lookupOperator(symbol);
  if (!op) {
    return { outcome: { status: 'skipped', reason: 'UnknownOperator' } };
  }

  const factValue = readFact(facts, field);
  if (factValue === undefined) {
    return { outcome: { status: 'skipped', reason: 'MissingFact' } };
  }

  const result = op(tagScalar(factValue), tagScalar(expected));
  if (result === null) {
    return { outcome: { status: 'skipped', reason: 'UnsupportedComparison' }, factValue };
  }

  return { outcome: { status: result ? 'passed' : 'failed' } };
}

function report(context: EvaluateContext, diagnostic: Diagnostic): boolean {
  if (!context.onDiagnostic) return false;
  try {
    context.onDiagnostic(diagnostic);
    return true;
  } catch {
    return false;
  }
}

/**
 * Explains how one condition fared against the facts, without side effects.
 */
export function inspectCondition(facts: FactMap, condition: unknown): ConditionOutcome {
  return inspect(facts, condition).outcome;
}

/**
 * Evaluates one `[field, op, value]` condition. Never throws: anything that
 * cannot be compared counts as a failed condition. Unsupported comparisons are
 * passed to `onDiagnostic`.
 */
export function evaluateCondition(
  facts: FactMap,
  condition: unknown,
  context: EvaluateContext = {},
): boolean {
  const { outcome, factValue } = inspect(facts, condition);

  if (
    outcome.status === 'skipped' &&
    outcome.reason === 'UnsupportedComparison' &&
    factValue !== undefined
  ) {
    report(context, {
      type: 'UnsupportedComparison',
      condition,
      factValue,
      ...(context.ruleName !== undefined ? { ruleName: context.ruleName } : {}),
      message: `Cannot compare ${JSON.stringify(factValue)} with condition ${JSON.stringify(condition)}`,
    });
  }

  return outcome.status === 'passed';
}
