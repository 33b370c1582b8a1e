export type PoolResult<T, R> =
  | { item: T; success: true; value: R }
  | { item: T; success: false; error: Error };

/**
 * Runs `handler` over `items` with at most `maxConcurrency` calls in flight.
 * Every item yields exactly one result; results are returned in input order
 * even though completion order is not defined.
 */
export async function processPool<T, R>(
  items: readonly T[],
  handler: (item: T) => Promise<R>,
  maxConcurrency: number,
): Promise<Array<PoolResult<T, R>>> {
  if (items.length === 0) {
    return [];
  }

  const requested = Number.isFinite(maxConcurrency)
    ? Math.floor(maxConcurrency)
    : 1;
  const workerCount = Math.max(1, Math.min(requested, items.length));
  const settled = new Map<number, PoolResult<T, R>>();
  const queue = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      try {
        settled.set(index, { item, success: true, value: await handler(item) });
      } catch (error) {
        settled.set(index, {
          item,
          success: false,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return items.map((item, index) => {
    const result = settled.get(index);
    return result ?? { item, success: false, error: new Error('not processed') };
  });
}
