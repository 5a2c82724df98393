/**
 * Bounded worker pool
 */

/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep the
 * order of `items`; a rejected worker does not stop the others.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}

/**
 * Split an ordered list into batches: each run of adjacent independent
 * items forms one batch, every other item is a batch of its own.
 */
export function independentBatches<T>(items: readonly T[], isIndependent: (item: T) => boolean): T[][] {
  const batches: T[][] = [];
  let current: T[] = [];

  for (const item of items) {
    if (isIndependent(item)) {
      current.push(item);
      continue;
    }
    if (current.length > 0) {
      batches.push(current);
      current = [];
    }
    batches.push([item]);
  }
  if (current.length > 0) {
    batches.push(current);
  }
  return batches;
}
