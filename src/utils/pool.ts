import { setTimeout as delay } from 'node:timers/promises';

export interface PoolOptions {
  concurrency: number;
  /** Pause a worker slot takes after each completed task before picking the next one. */
  throttleMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Runs `task` over every item with at most `concurrency` tasks in flight. Failures are
 * captured per item; the returned array lines up with `items`. Rejects when
 * `concurrency` is not a positive integer.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${options.concurrency}`);
  }

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  const throttleMs = options.throttleMs ?? 0;
  const sleep = options.sleep ?? delay;
  const queue = items.map((item, index) => ({ item, index }));

  const worker = async (): Promise<void> => {
    for (let entry = queue.shift(); entry; entry = queue.shift()) {
      try {
        results[entry.index] = { status: 'fulfilled', value: await task(entry.item, entry.index) };
      } catch (reason: unknown) {
        results[entry.index] = { status: 'rejected', reason };
      }
      if (throttleMs > 0 && queue.length > 0) {
        await sleep(throttleMs);
      }
    }
  };

  const slots = Math.max(1, Math.min(options.concurrency, items.length));
  await Promise.all(Array.from({ length: slots }, () => worker()));
  return results;
}
