export interface PoolResult {
  processed: number;
  skipped: number;
}

/**
 * Runs `worker` over `items` with at most `limit` in flight. Stops handing out
 * new items once `signal` aborts or a worker throws; the first error is rethrown
 * after in-flight work settles.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<PoolResult> {
  let next = 0;
  let processed = 0;
  const state: { failure: { error: unknown } | null } = { failure: null };

  const width = Number.isFinite(limit) ? Math.floor(limit) : 1;
  const laneCount = Math.max(1, Math.min(width, items.length));
  const lanes = Array.from({ length: laneCount }, async () => {
    while (state.failure === null && !signal?.aborted && next < items.length) {
      const index = next;
      next += 1;
      try {
        await worker(items[index], index);
        processed += 1;
      } catch (error) {
        state.failure ??= { error };
      }
    }
  });
  await Promise.all(lanes);

  if (state.failure !== null) {
    throw state.failure.error;
  }
  return { processed, skipped: items.length - processed };
}
