#!/usr/bin/env node
/**
 * CLI: Evaluate applicant facts from stdin JSON → JSONL events on stdout.
 *
 * Usage: echo '{"facts":{"cgpa":3.8}}' | npx tsx src/cli/evaluate.ts [--text]
 *
 * The request may carry `rules` (an array) or `rulesText` (JSON text); when
 * neither validates, the built-in scholarship rules are used. With `--text`
 * a readable report is printed instead of events.
 */

import { runEvaluation } from './evaluate-command.js';
import type { EvaluationEvent } from './evaluate-command.js';
import { renderDecisionReport } from '../report/decision-report.js';

// ── helpers ────────────────────────────────────────

function emit(event: EvaluationEvent): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const textMode = process.argv.includes('--text');
  const raw = await readStdin();

  let input: unknown;
  try {
    input = raw.trim() === '' ? {} : JSON.parse(raw);
  } catch {
    emit({ type: 'evaluation_error', error: 'Invalid JSON on stdin' });
    process.exitCode = 1;
    return;
  }

  const sink = textMode
    ? (event: EvaluationEvent) => {
        if (event.type === 'evaluation_error' || event.type === 'rules_fallback') {
          process.stderr.write(`${event.error}\n`);
        }
      }
    : emit;

  const run = await runEvaluation(input, sink);
  if (!run) {
    process.exitCode = 1;
    return;
  }

  if (textMode) {
    process.stdout.write(renderDecisionReport(run.report).join('\n') + '\n');
  }
}

main().catch((err: unknown) => {
  emit({ type: 'evaluation_error', error: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
});
