import type { Action } from '../types/index.js';
import { ActionSchema } from '../schemas/rule.schema.js';

// Downstream rendering branches on these decision strings; keep them exact.
export const NO_MATCH_ACTION: Readonly<Action> = Object.freeze({
  decision: 'MANUAL_REVIEW',
  reason: 'No specific rule matched',
});

export const MISSING_ACTION_GUARD: Readonly<Action> = Object.freeze({
  decision: 'REVIEW',
  reason: 'Matching rule has no defined action',
});

export function isWellFormedAction(value: unknown): value is Action {
  return ActionSchema.safeParse(value).success;
}

export function actionOrGuard(value: unknown): Action {
  return isWellFormedAction(value) ? value : MISSING_ACTION_GUARD;
}
