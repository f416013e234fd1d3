import { z } from 'zod';

export const ScalarSchema = z.union([z.number(), z.string(), z.boolean()]);

export const FactMapSchema = z.record(ScalarSchema);

export const ApplicantFactsSchema = z.object({
  cgpa: z.number().min(1).max(4),
  family_income: z.number().int().min(0).max(20_000),
  co_curricular_score: z.number().int().min(0).max(100),
  disciplinary_actions: z.number().int().min(0).max(5),
});
