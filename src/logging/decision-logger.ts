import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { Diagnostic, FactMap, MatchResult, RuleInput } from '../types/index.js';

export interface DecisionLogEntry {
  timestamp: string;
  facts: FactMap;
  decision: string;
  reason: string;
  outcome: MatchResult['outcome'];
  firedRules: string[];
  diagnostics: Diagnostic[];
}

export class DecisionLogger {
  private logPath: string;
  private initialized = false;

  constructor(private logDir: string) {
    this.logPath = join(logDir, 'decisions.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.logDir, { recursive: true });
    this.initialized = true;
  }

  async logDecision(
    facts: FactMap,
    result: MatchResult<RuleInput>,
    diagnostics: Diagnostic[] = [],
  ): Promise<DecisionLogEntry> {
    await this.ensureDir();
    const entry: DecisionLogEntry = {
      timestamp: new Date().toISOString(),
      facts,
      decision: result.action.decision,
      reason: result.action.reason,
      outcome: result.outcome,
      firedRules: result.fired.map((rule) => rule.name),
      diagnostics,
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
    return entry;
  }

  getLogPath(): string {
    return this.logPath;
  }
}
