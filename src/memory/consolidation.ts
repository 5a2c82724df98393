/**
 * Consolidation - distils raw audit entries into strategy records.
 *
 * Best-effort and skippable: the hot path never waits on it and a failed
 * pass only delays what later recalls can see. Verdicts of a node that can
 * still be retried are held until it settles.
 */

import type { AuditLog } from '../audit/audit-log';
import type { AuditEntry, StrategyOutcome } from '../types';
import { getLogger } from '../utils/logger';
import type { MemoryStore } from './memory-store';

export interface NodeInfo {
  goal: string;
  /** No further verdict can arrive: the node is terminal or was decomposed */
  settled: boolean;
}

export type NodeResolver = (runId: string, nodeId: string) => NodeInfo | undefined;

export type Distiller = (goal: string, entries: readonly AuditEntry[]) => Promise<string>;

export interface ConsolidationReport {
  scanned: number;
  recorded: number;
  skipped: number;
  /** Nodes with verdicts held for a later pass */
  pending: number;
}

const VERDICT_ACTION = 'verify';

export class ConsolidationJob {
  private audit: AuditLog;
  private memory: MemoryStore;
  private resolveNode: NodeResolver;
  private distiller?: Distiller;
  private cursor: number;
  private consolidated: Set<string>;
  private held: Map<string, AuditEntry[]>;
  private running: boolean;
  private timer: NodeJS.Timeout | null;

  constructor(audit: AuditLog, memory: MemoryStore, resolveNode: NodeResolver, distiller?: Distiller) {
    this.audit = audit;
    this.memory = memory;
    this.resolveNode = resolveNode;
    this.distiller = distiller;
    this.cursor = 0;
    this.consolidated = new Set();
    this.held = new Map();
    this.running = false;
    this.timer = null;
  }

  /**
   * One pass over entries appended since the previous pass
   */
  async runOnce(): Promise<ConsolidationReport> {
    if (this.running) {
      return { scanned: 0, recorded: 0, skipped: 0, pending: 0 };
    }
    this.running = true;

    try {
      const fresh = this.audit.entries({ sinceSeq: this.cursor });
      const report: ConsolidationReport = { scanned: fresh.length, recorded: 0, skipped: 0, pending: 0 };
      if (fresh.length === 0 && this.held.size === 0) {
        return report;
      }
      if (fresh.length > 0) {
        this.cursor = fresh[fresh.length - 1].seq;
      }

      for (const entry of fresh) {
        if (entry.action !== VERDICT_ACTION || entry.nodeId === undefined) continue;
        const key = `${entry.runId}/${entry.nodeId}`;
        const list = this.held.get(key) ?? [];
        list.push(entry);
        this.held.set(key, list);
      }

      for (const [key, verdicts] of Array.from(this.held)) {
        const last = verdicts[verdicts.length - 1];
        const info = last.nodeId === undefined ? undefined : this.resolveNode(last.runId, last.nodeId);
        if (info === undefined || this.consolidated.has(key)) {
          this.held.delete(key);
          report.skipped++;
          continue;
        }
        if (!info.settled) {
          report.pending++;
          continue;
        }

        this.held.delete(key);
        const outcome: StrategyOutcome = last.outcome === 'approve' ? 'success' : 'failed';
        const narrative = await this.narrate(info.goal, verdicts);
        this.memory.record({ goal: info.goal, outcome, narrative, source: 'consolidation' });
        this.consolidated.add(key);
        report.recorded++;
      }

      getLogger().debug('Consolidation pass finished', { ...report });
      return report;
    } finally {
      this.running = false;
    }
  }

  /**
   * Schedule passes every `intervalMs`. Failures are logged and skipped.
   */
  start(intervalMs: number): void {
    if (this.timer || intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        getLogger().warn('Consolidation pass failed', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async narrate(goal: string, verdicts: readonly AuditEntry[]): Promise<string> {
    if (this.distiller) {
      try {
        return await this.distiller(goal, verdicts);
      } catch (error) {
        getLogger().warn('Distiller failed, using plain summary', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }
    return summarize(verdicts);
  }
}

export function summarize(verdicts: readonly AuditEntry[]): string {
  const approvals = verdicts.filter((v) => v.outcome === 'approve').length;
  const rejects = verdicts.length - approvals;
  const reasons = verdicts.flatMap((v) => (v.outcome !== 'approve' && v.detail ? [v.detail] : []));
  const base = `${approvals} approved, ${rejects} rejected`;
  return reasons.length > 0 ? `${base}; rejections: ${reasons.join(' | ')}` : base;
}
