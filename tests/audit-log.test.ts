/**
 * Tests for AuditLog
 */

import { describe, test, expect } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AuditLog, digestPayload } from '../src/audit/audit-log';
import type { AuditEntry } from '../src/types';

describe('AuditLog', () => {
  test('should number entries from 1 and freeze them', () => {
    const audit = new AuditLog();
    const first = audit.append({ runId: 'r', actor: 'graph', action: 'submit', outcome: 'pending' });
    const second = audit.append({ runId: 'r', nodeId: '1', actor: 'planner', action: 'plan', outcome: 'ok' });

    expect([first.seq, second.seq]).toEqual([1, 2]);
    expect(Object.isFrozen(first)).toBe(true);
    expect(audit.lastSeq()).toBe(2);
  });

  test('should filter entries', () => {
    const audit = new AuditLog();
    audit.append({ runId: 'r1', nodeId: '1', actor: 'planner', action: 'plan', outcome: 'ok' });
    audit.append({ runId: 'r2', nodeId: '1', actor: 'planner', action: 'plan', outcome: 'ok' });
    audit.append({ runId: 'r1', nodeId: '1', actor: 'verifier', action: 'verify', outcome: 'approve' });

    expect(audit.entries({ runId: 'r1' }).map((e) => e.seq)).toEqual([1, 3]);
    expect(audit.entries({ actor: 'planner' }).map((e) => e.runId)).toEqual(['r1', 'r2']);
    expect(audit.entries({ sinceSeq: 2 }).map((e) => e.seq)).toEqual([3]);
  });

  test('should build a decision chain without bookkeeping entries', () => {
    const audit = new AuditLog();
    audit.append({ runId: 'r', nodeId: '1', actor: 'graph', action: 'transition', outcome: 'pending->active' });
    audit.append({ runId: 'r', nodeId: '1', actor: 'planner', action: 'plan', outcome: 'ok' });
    audit.append({ runId: 'r', nodeId: '1', actor: 'gate', action: 'hold', outcome: 'approved' });
    audit.append({ runId: 'r', nodeId: '1', actor: 'executor', action: 'execute', outcome: 'ok' });
    audit.append({ runId: 'r', nodeId: '1', actor: 'human', action: 'feedback', outcome: 'approve' });

    expect(audit.chain('r', '1').map((e) => e.actor)).toEqual(['planner', 'executor', 'human']);
  });

  test('should hash payloads independent of key order', () => {
    expect(digestPayload({ a: 1, b: [1, { c: 2, d: 3 }] })).toBe(digestPayload({ b: [1, { d: 3, c: 2 }], a: 1 }));
    expect(digestPayload({ a: 1 })).not.toBe(digestPayload({ a: 2 }));
    expect(digestPayload(undefined)).toBe(digestPayload(null));
  });

  test('should notify listeners until they unsubscribe', () => {
    const audit = new AuditLog();
    const seen: AuditEntry[] = [];
    const off = audit.onAppend((entry) => seen.push(entry));

    audit.append({ runId: 'r', actor: 'graph', action: 'submit', outcome: 'pending' });
    off();
    audit.append({ runId: 'r', actor: 'graph', action: 'archive', outcome: 'success' });

    expect(seen.map((e) => e.action)).toEqual(['submit']);
  });

  test('should keep appending when a listener throws', () => {
    const audit = new AuditLog();
    const seen: number[] = [];
    audit.onAppend(() => {
      throw new Error('listener broke');
    });
    audit.onAppend((entry) => seen.push(entry.seq));

    const entry = audit.append({ runId: 'r', actor: 'graph', action: 'submit', outcome: 'pending' });

    expect(entry.seq).toBe(1);
    expect(seen).toEqual([1]);
    expect(audit.lastSeq()).toBe(1);
  });

  test('should append JSON lines to its file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'taskloom-audit-'));
    try {
      const file = join(dir, 'logs', 'audit.jsonl');
      const audit = new AuditLog({ file });
      audit.append({ runId: 'r', actor: 'graph', action: 'submit', outcome: 'pending', detail: 'hello' });

      const lines = readFileSync(file, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({ seq: 1, action: 'submit', detail: 'hello' });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
