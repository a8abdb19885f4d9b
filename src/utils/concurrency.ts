import { throwIfCancelled } from './error-handling';

export interface PoolOptions {
  /** Stops handing out new items once aborted; running workers finish on their own. */
  signal?: AbortSignal;
}

/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Items are
 * handed out in index order. The first worker error stops scheduling and is
 * rethrown once the running calls have settled.
 */
export async function runPool<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions = {}
): Promise<void> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Pool limit must be a positive integer, got ${limit}`);
  }

  let next = 0;
  let failed = false;
  let firstError: unknown = null;

  const drain = async (): Promise<void> => {
    while (!failed && !options.signal?.aborted && next < items.length) {
      const index = next;
      next += 1;
      try {
        await worker(items[index], index);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  };

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => drain());
  await Promise.all(lanes);

  if (failed) {
    throw firstError;
  }
}

/**
 * Ordered map over a bounded pool. Throws a CancelledError when the signal
 * aborts before every item was processed.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<R>,
  options: PoolOptions = {}
): Promise<R[]> {
  const slots: Array<{ value: R } | undefined> = new Array(items.length);
  await runPool(
    items,
    limit,
    async (item, index) => {
      slots[index] = { value: await mapper(item, index) };
    },
    options
  );

  const ordered: R[] = [];
  for (const slot of slots) {
    if (!slot) {
      throwIfCancelled(options.signal);
      throw new Error('Pool finished without processing every item.');
    }
    ordered.push(slot.value);
  }
  return ordered;
}
