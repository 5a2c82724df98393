/**
 * Tests for the worker pool, deadlines and metrics
 */

import { describe, test, expect } from 'vitest';
import { Cancelled, DeadlineExceeded, remainingBudget, untilAborted, withDeadline } from '../src/utils/deadline';
import { MetricsCollector } from '../src/utils/metrics';
import { independentBatches, runBounded } from '../src/utils/worker-pool';
import { never } from './helpers/harness';

describe('runBounded', () => {
  test('should keep input order and collect failures', async () => {
    const results = await runBounded([30, 10, 20], 2, async (ms, index) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      if (index === 1) throw new Error('second failed');
      return ms * 2;
    });

    expect(results[0]).toEqual({ status: 'fulfilled', value: 60 });
    expect(results[1].status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 40 });
  });

  test('should never exceed the limit', async () => {
    let running = 0;
    let peak = 0;

    await runBounded([1, 2, 3, 4, 5], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    });

    expect(peak).toBe(2);
  });

  test('should handle an empty list', async () => {
    expect(await runBounded([], 3, async () => 1)).toEqual([]);
  });
});

describe('independentBatches', () => {
  test('should group adjacent independent items', () => {
    const items = [
      { id: 'a', free: true },
      { id: 'b', free: true },
      { id: 'c', free: false },
      { id: 'd', free: true },
    ];

    const batches = independentBatches(items, (item) => item.free);

    expect(batches.map((batch) => batch.map((item) => item.id))).toEqual([['a', 'b'], ['c'], ['d']]);
  });
});

describe('withDeadline', () => {
  test('should resolve with the value in time', async () => {
    expect(await withDeadline(async () => 'done', 100, 'quick')).toBe('done');
  });

  test('should reject with DeadlineExceeded and abort the inner signal', async () => {
    let inner: AbortSignal | undefined;

    const pending = withDeadline(
      (signal) => {
        inner = signal;
        return never();
      },
      10,
      'slow'
    );

    await expect(pending).rejects.toBeInstanceOf(DeadlineExceeded);
    await expect(pending).rejects.toThrow('Timeout: slow exceeded 10ms');
    expect(inner?.aborted).toBe(true);
  });

  test('should reject with Cancelled when the parent aborts', async () => {
    const parent = new AbortController();
    const pending = withDeadline(() => never(), 1000, 'call', parent.signal);

    parent.abort();

    await expect(pending).rejects.toBeInstanceOf(Cancelled);
  });

  test('should pass through errors from the work', async () => {
    await expect(
      withDeadline(
        async () => {
          throw new Error('broken');
        },
        100,
        'work'
      )
    ).rejects.toThrow('broken');
  });
});

describe('untilAborted', () => {
  test('should resolve with the value while the signal is live', async () => {
    const controller = new AbortController();
    await expect(untilAborted(async () => 'done', controller.signal, 'work')).resolves.toBe('done');
  });

  test('should reject with Cancelled as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = untilAborted(() => never<string>(), controller.signal, 'approval');

    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(Cancelled);
  });

  test('should not start the work for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;

    await expect(
      untilAborted(async () => {
        started = true;
      }, controller.signal, 'work')
    ).rejects.toThrow('Cancelled: work');
    expect(started).toBe(false);
  });
});

describe('remainingBudget', () => {
  test('should use the fallback without a deadline', () => {
    expect(remainingBudget(undefined, 500)).toBe(500);
  });

  test('should clamp to the time left', () => {
    expect(remainingBudget(Date.now() - 1000, 500)).toBe(0);
    expect(remainingBudget(Date.now() + 60000, 500)).toBe(500);
  });
});

describe('MetricsCollector', () => {
  test('should count events and tokens', () => {
    const metrics = new MetricsCollector();
    metrics.increment('plans');
    metrics.increment('toolCalls', 3);
    metrics.recordTokens({ input: 10, output: 5, total: 15 });

    const snapshot = metrics.snapshot();
    expect(snapshot.plans).toBe(1);
    expect(snapshot.toolCalls).toBe(3);
    expect(snapshot.llmRequests).toBe(1);
    expect(snapshot.tokensUsed).toEqual({ input: 10, output: 5, total: 15 });
  });

  test('should freeze the duration once stopped', async () => {
    const metrics = new MetricsCollector();
    metrics.stop();
    const duration = metrics.getTotalDuration();

    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(metrics.getTotalDuration()).toBe(duration);
  });
});
