/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results land in input order; each slot is written exactly once by the
 * worker that claimed its index.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const runWorker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const requested = Number.isFinite(limit) ? Math.floor(limit) : 1;
  const poolSize = Math.max(1, Math.min(requested, items.length));
  await Promise.all(Array.from({ length: poolSize }, () => runWorker()));
  return results;
}
