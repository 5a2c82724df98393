/**
 * Token bucket pacing requests to the LLM provider
 */

import { sleep } from './backoff';

export interface TokenBucketOptions {
  capacity: number;
  refillPerMinute: number;
  now?: () => number;
}

export class TokenBucket {
  readonly capacity: number;
  private perMs: number;
  private level: number;
  private stamp: number;
  private now: () => number;

  constructor(options: TokenBucketOptions) {
    this.capacity = options.capacity;
    this.perMs = options.refillPerMinute / 60000;
    this.now = options.now ?? (() => Date.now());
    this.level = options.capacity;
    this.stamp = this.now();
  }

  available(): number {
    const now = this.now();
    this.level = Math.min(this.capacity, this.level + (now - this.stamp) * this.perMs);
    this.stamp = now;
    return this.level;
  }

  tryTake(count = 1): boolean {
    if (this.available() < count) return false;
    this.level -= count;
    return true;
  }

  /**
   * Milliseconds until `count` tokens are in the bucket
   */
  waitTime(count = 1): number {
    const deficit = count - this.available();
    return deficit <= 0 ? 0 : Math.ceil(deficit / this.perMs);
  }

  /**
   * Take `count` tokens, sleeping until they refill. Rejects with the
   * signal's reason when aborted while waiting.
   */
  async acquire(count = 1, signal?: AbortSignal): Promise<void> {
    while (!this.tryTake(count)) {
      signal?.throwIfAborted();
      await sleep(this.waitTime(count), signal);
    }
  }
}
