import { z } from 'zod';
import { ScalarSchema } from './fact.schema.js';

export const ComparisonOperatorSchema = z.enum(['==', '!=', '>', '>=', '<', '<=']);

export const ConditionSchema = z.tuple([z.string(), ComparisonOperatorSchema, ScalarSchema]);

export const ActionSchema = z.object({
  decision: z.string(),
  reason: z.string(),
});

export const RuleSchema = z.object({
  name: z.string(),
  priority: z.number().int(),
  conditions: z.array(ConditionSchema),
  action: ActionSchema,
});

// Lenient element shapes: a bad condition or action degrades its rule at
// evaluation time instead of rejecting the whole set.
export const RuleInputSchema = z.object({
  name: z.string().default('(unnamed)'),
  priority: z.number().int().default(0),
  conditions: z.array(z.unknown()).default([]),
  action: z.unknown().optional(),
});

export const RuleSetSchema = z.array(RuleInputSchema);
