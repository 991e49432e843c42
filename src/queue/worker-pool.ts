/**
 * WorkerPool - bounded parallel processing with per-worker state
 *
 * Up to `limit` workers pull items from a shared cursor. Each worker owns
 * one accumulator, so handlers never write to shared state; the caller
 * merges the accumulators once every worker has finished.
 */

export type WorkerHandler<T, A> = (item: T, accumulator: A, index: number) => Promise<void>;

/**
 * Process items with at most `limit` handlers in flight
 *
 * @returns One accumulator per worker that ran, in worker order
 */
export async function runWorkerPool<T, A>(
  items: readonly T[],
  limit: number,
  createAccumulator: (workerId: number) => A,
  handler: WorkerHandler<T, A>,
): Promise<A[]> {
  const concurrency = Math.max(1, Math.floor(limit));
  if (items.length === 0) {
    return [];
  }

  let nextIndex = 0;
  const accumulators = Array.from({ length: Math.min(concurrency, items.length) }, (_, workerId) =>
    createAccumulator(workerId),
  );

  const workers = accumulators.map(async (accumulator) => {
    for (;;) {
      const currentIndex = nextIndex;
      nextIndex += 1;
      const item = items[currentIndex];
      if (currentIndex >= items.length || item === undefined) {
        return;
      }
      await handler(item, accumulator, currentIndex);
    }
  });

  await Promise.all(workers);
  return accumulators;
}
