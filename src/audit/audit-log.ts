/**
 * Audit Log - append-only ledger of every decision and action
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { createHash } from 'crypto';
import { dirname } from 'path';
import { errorMessage } from '../errors';
import type { AuditActor, AuditEntry } from '../types';
import { getLogger } from '../utils/logger';

export interface AuditInput {
  runId: string;
  nodeId?: string;
  actor: AuditActor;
  action: string;
  outcome: string;
  payload?: unknown;
  detail?: string;
}

export interface AuditFilter {
  runId?: string;
  nodeId?: string;
  actor?: AuditActor;
  action?: string;
  sinceSeq?: number;
}

type AuditListener = (entry: AuditEntry) => void;

/** Actors whose entries make up a node's decision chain */
const DECISION_ACTORS: ReadonlySet<AuditActor> = new Set(['planner', 'executor', 'verifier', 'human']);

/**
 * JSON with object keys sorted, so equal payloads hash equally
 */
function canonicalJson(value: unknown): string {
  if (value === undefined) return 'null';
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
}

export function digestPayload(payload: unknown): string {
  return createHash('sha256').update(canonicalJson(payload)).digest('hex');
}

export class AuditLog {
  private log: AuditEntry[];
  private listeners: Set<AuditListener>;
  private file?: string;

  constructor(options: { file?: string } = {}) {
    this.log = [];
    this.listeners = new Set();
    this.file = options.file;

    if (this.file) {
      const dir = dirname(this.file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  /**
   * Append an entry. The stored entry is frozen and never mutated.
   */
  append(input: AuditInput): AuditEntry {
    const entry: AuditEntry = Object.freeze({
      seq: this.log.length + 1,
      timestamp: new Date().toISOString(),
      runId: input.runId,
      nodeId: input.nodeId,
      actor: input.actor,
      action: input.action,
      payloadDigest: digestPayload(input.payload),
      outcome: input.outcome,
      detail: input.detail,
    });

    this.log.push(entry);

    if (this.file) {
      appendFileSync(this.file, JSON.stringify(entry) + '\n');
    }

    // the entry is already stored; a failing listener must not undo the append
    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (error) {
        getLogger().warn('Audit listener failed', { runId: entry.runId, seq: entry.seq, error: errorMessage(error) });
      }
    }

    return entry;
  }

  entries(filter: AuditFilter = {}): readonly AuditEntry[] {
    return this.log.filter(
      (e) =>
        (filter.runId === undefined || e.runId === filter.runId) &&
        (filter.nodeId === undefined || e.nodeId === filter.nodeId) &&
        (filter.actor === undefined || e.actor === filter.actor) &&
        (filter.action === undefined || e.action === filter.action) &&
        (filter.sinceSeq === undefined || e.seq > filter.sinceSeq)
    );
  }

  /**
   * Agent and human decisions recorded for one node, in order
   */
  chain(runId: string, nodeId: string): readonly AuditEntry[] {
    return this.entries({ runId, nodeId }).filter((e) => DECISION_ACTORS.has(e.actor));
  }

  onAppend(listener: AuditListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  lastSeq(): number {
    return this.log.length;
  }

  size(): number {
    return this.log.length;
  }
}
