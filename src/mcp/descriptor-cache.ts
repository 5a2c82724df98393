/**
 * Per-server tool descriptor cache with a TTL. Concurrent refreshes of the
 * same server share one load.
 */

import type { ToolDescriptor } from '../types';

interface CacheEntry {
  descriptors: ToolDescriptor[];
  loadedAt: number;
}

export type DescriptorLoader = () => Promise<ToolDescriptor[]>;

export class DescriptorCache {
  private ttlMs: number;
  private now: () => number;
  private entries: Map<string, CacheEntry>;
  private inFlight: Map<string, Promise<ToolDescriptor[]>>;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
    this.entries = new Map();
    this.inFlight = new Map();
  }

  async get(serverId: string, loader: DescriptorLoader): Promise<ToolDescriptor[]> {
    const entry = this.entries.get(serverId);
    if (entry && this.now() - entry.loadedAt < this.ttlMs) {
      return entry.descriptors;
    }

    const pending = this.inFlight.get(serverId);
    if (pending) {
      return pending;
    }

    const load = loader()
      .then((descriptors) => {
        this.entries.set(serverId, { descriptors, loadedAt: this.now() });
        return descriptors;
      })
      .finally(() => {
        this.inFlight.delete(serverId);
      });
    this.inFlight.set(serverId, load);
    return load;
  }

  peek(serverId: string): ToolDescriptor[] | undefined {
    return this.entries.get(serverId)?.descriptors;
  }

  invalidate(serverId?: string): void {
    if (serverId === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(serverId);
    }
  }
}
