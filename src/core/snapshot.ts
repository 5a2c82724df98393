/**
 * Versioned run snapshots with a subscription channel
 */

import { EventEmitter } from 'events';
import type { AuditEntry, RunSnapshot } from '../types';
import { errorMessage } from '../errors';
import { getLogger } from '../utils/logger';

const SNAPSHOT_EVENT = 'snapshot';

export type SnapshotListener = (snapshot: RunSnapshot) => void;

export function formatAuditLine(entry: AuditEntry): string {
  const node = entry.nodeId ? ` ${entry.nodeId}` : '';
  const detail = entry.detail ? ` (${entry.detail})` : '';
  return `#${entry.seq} ${entry.actor}.${entry.action}${node} -> ${entry.outcome}${detail}`;
}

export class SnapshotChannel {
  private version: number;
  private bus: EventEmitter;
  private build: (version: number) => RunSnapshot;

  constructor(build: (version: number) => RunSnapshot) {
    this.version = 0;
    this.bus = new EventEmitter();
    this.build = build;
  }

  /**
   * Bump the version; subscribers receive the new snapshot
   */
  publish(): number {
    this.version += 1;
    if (this.bus.listenerCount(SNAPSHOT_EVENT) > 0) {
      this.bus.emit(SNAPSHOT_EVENT, this.build(this.version));
    }
    return this.version;
  }

  current(): RunSnapshot {
    return this.build(this.version);
  }

  /**
   * A listener that throws is logged and skipped; it never reaches publish()
   */
  subscribe(listener: SnapshotListener): () => void {
    const guarded = (snapshot: RunSnapshot): void => {
      try {
        listener(snapshot);
      } catch (error) {
        getLogger().warn('Snapshot listener failed', { runId: snapshot.runId, version: snapshot.version, error: errorMessage(error) });
      }
    };
    this.bus.on(SNAPSHOT_EVENT, guarded);
    return () => {
      this.bus.off(SNAPSHOT_EVENT, guarded);
    };
  }
}
