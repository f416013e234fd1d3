import { readFile } from 'node:fs/promises';
import type { ZodError } from 'zod';
import type { ApplicantFacts, RuleInput } from '../types/index.js';
import { ApplicantFactsSchema, RuleSetSchema } from '../schemas/index.js';
import { SCHOLARSHIP_RULES } from './scholarship.js';

export type RuleSetParseResult =
  | { ok: true; rules: RuleInput[] }
  | { ok: false; error: string };

export interface LoadedRuleSet {
  rules: readonly RuleInput[];
  source: 'custom' | 'default';
  error?: string;
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function parseRuleSet(text: string): RuleSetParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  if (!Array.isArray(raw)) {
    return { ok: false, error: 'Rules must be a JSON array' };
  }

  const parsed = RuleSetSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: formatZodError(parsed.error) };
  }
  return { ok: true, rules: parsed.data };
}

/**
 * Parses user-supplied rule JSON, falling back to `fallback` when the text is
 * absent or does not describe a rule list. The parse error is returned so the
 * caller can show it.
 */
export function loadRuleSet(
  text: string | undefined,
  fallback: readonly RuleInput[] = SCHOLARSHIP_RULES,
): LoadedRuleSet {
  if (text === undefined || text.trim() === '') {
    return { rules: fallback, source: 'default' };
  }

  const result = parseRuleSet(text);
  if (!result.ok) {
    return { rules: fallback, source: 'default', error: result.error };
  }
  return { rules: result.rules, source: 'custom' };
}

export async function loadRuleSetFile(
  filePath: string,
  fallback: readonly RuleInput[] = SCHOLARSHIP_RULES,
): Promise<LoadedRuleSet> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    return {
      rules: fallback,
      source: 'default',
      error: `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  return loadRuleSet(text, fallback);
}

export function parseApplicantFacts(input: unknown): ApplicantFacts {
  return ApplicantFactsSchema.parse(input);
}
