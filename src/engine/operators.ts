import type { ComparisonOperator, Scalar, TaggedScalar } from '../types/index.js';

/** `null` means the operator has no rule for this pairing of kinds. */
export type OperatorFn = (left: TaggedScalar, right: TaggedScalar) => boolean | null;

export function tagScalar(value: Scalar): TaggedScalar {
  switch (typeof value) {
    case 'number':
      return { kind: 'number', value };
    case 'string':
      return { kind: 'text', value };
    default:
      return { kind: 'boolean', value };
  }
}

function equals(left: TaggedScalar, right: TaggedScalar): boolean {
  return left.kind === right.kind && left.value === right.value;
}

function order(left: TaggedScalar, right: TaggedScalar): -1 | 0 | 1 | null {
  if (left.kind === 'number' && right.kind === 'number') {
    if (Number.isNaN(left.value) || Number.isNaN(right.value)) return null;
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  if (left.kind === 'text' && right.kind === 'text') {
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  return null;
}

function ordered(test: (cmp: -1 | 0 | 1) => boolean): OperatorFn {
  return (left, right) => {
    const cmp = order(left, right);
    return cmp === null ? null : test(cmp);
  };
}

const OPERATORS: Readonly<Record<ComparisonOperator, OperatorFn>> = {
  '==': equals,
  '!=': (left, right) => !equals(left, right),
  '>': ordered((cmp) => cmp > 0),
  '>=': ordered((cmp) => cmp >= 0),
  '<': ordered((cmp) => cmp < 0),
  '<=': ordered((cmp) => cmp <= 0),
};
Object.freeze(OPERATORS);

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['==', '!=', '>', '>=', '<', '<='];

export function isComparisonOperator(symbol: unknown): symbol is ComparisonOperator {
  return typeof symbol === 'string' && Object.prototype.hasOwnProperty.call(OPERATORS, symbol);
}

export function lookupOperator(symbol: unknown): OperatorFn | undefined {
  return isComparisonOperator(symbol) ? OPERATORS[symbol] : undefined;
}
