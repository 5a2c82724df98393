/**
 * Memory Store - recall of past strategy outcomes by goal fingerprint
 */

import { existsSync, readFileSync } from 'fs';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { errorMessage } from '../errors';
import type { StrategyOutcome, StrategyRecord } from '../types';
import { writeJsonAtomic } from '../state/atomic';
import { getLogger } from '../utils/logger';
import { fingerprint, goalTokens, tokenSimilarity } from './fingerprint';

export interface MemoryHit {
  record: StrategyRecord;
  score: number;
}

export interface RecallOptions {
  k?: number;
  outcome?: StrategyOutcome;
}

export interface RecordInput {
  goal: string;
  outcome: StrategyOutcome;
  narrative: string;
  source?: StrategyRecord['source'];
}

interface MemoryStoreOptions {
  file?: string;
  topK: number;
  minSimilarity: number;
}

const StrategyRecordSchema = z.object({
  id: z.string(),
  goalFingerprint: z.string(),
  goal: z.string(),
  outcome: z.enum(['success', 'failed']),
  narrative: z.string(),
  createdAt: z.string(),
  source: z.enum(['settlement', 'consolidation']),
});

const MemoryFileSchema = z.object({ records: z.array(StrategyRecordSchema) });

export class MemoryStore {
  private records: StrategyRecord[];
  private tokens: Map<string, string[]>;
  private options: MemoryStoreOptions;

  constructor(options: MemoryStoreOptions) {
    this.records = [];
    this.tokens = new Map();
    this.options = options;
  }

  /**
   * Load records from the configured file, if any
   */
  load(): number {
    const logger = getLogger();
    const file = this.options.file;
    if (!file || !existsSync(file)) {
      return 0;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      logger.warn('Ignoring unreadable memory file', { file, error: errorMessage(error) });
      return 0;
    }

    const parsed = MemoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Ignoring malformed memory file', { file, issues: parsed.error.issues.length });
      return 0;
    }

    for (const record of parsed.data.records) {
      this.index(record);
    }
    logger.info('Memory loaded', { file, records: parsed.data.records.length });
    return parsed.data.records.length;
  }

  /**
   * Append a record. Records are never updated in place.
   */
  record(input: RecordInput): StrategyRecord {
    const record: StrategyRecord = Object.freeze({
      id: `sr_${randomBytes(6).toString('hex')}`,
      goalFingerprint: fingerprint(input.goal),
      goal: input.goal,
      outcome: input.outcome,
      narrative: input.narrative,
      createdAt: new Date().toISOString(),
      source: input.source ?? 'settlement',
    });

    this.index(record);
    this.persist();
    return record;
  }

  /**
   * Top-k records ranked by similarity to `goal`. Exact fingerprint
   * matches score 1; newer records win ties.
   */
  recall(goal: string, options: RecallOptions = {}): MemoryHit[] {
    const k = options.k ?? this.options.topK;
    const target = fingerprint(goal);
    const targetTokens = goalTokens(goal);

    const hits: Array<MemoryHit & { order: number }> = [];
    this.records.forEach((record, order) => {
      if (options.outcome && record.outcome !== options.outcome) return;
      const score =
        record.goalFingerprint === target
          ? 1
          : tokenSimilarity(targetTokens, this.tokens.get(record.id) ?? goalTokens(record.goal));
      if (score >= this.options.minSimilarity) {
        hits.push({ record, score, order });
      }
    });

    return hits
      .sort((a, b) => b.score - a.score || b.order - a.order)
      .slice(0, k)
      .map(({ record, score }) => ({ record, score }));
  }

  all(): readonly StrategyRecord[] {
    return this.records;
  }

  size(): number {
    return this.records.length;
  }

  private index(record: StrategyRecord): void {
    this.records.push(record);
    this.tokens.set(record.id, goalTokens(record.goal));
  }

  private persist(): void {
    if (!this.options.file) return;
    try {
      writeJsonAtomic(this.options.file, { records: this.records });
    } catch (error) {
      // The in-memory record stays; only the file copy is stale
      getLogger().warn('Failed to persist memory', {
        file: this.options.file,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}
