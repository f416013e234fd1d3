export { ScalarSchema, FactMapSchema, ApplicantFactsSchema } from './fact.schema.js';
export {
  ComparisonOperatorSchema,
  ConditionSchema,
  ActionSchema,
  RuleSchema,
  RuleInputSchema,
  RuleSetSchema,
} from './rule.schema.js';
