/**
 * Parallel processing utilities
 */

/**
 * Process items in parallel with concurrency limit
 *
 * Workers stop taking new items once `signal` is aborted; items never started
 * are left out of the result.
 *
 * @param items - Items to process
 * @param fn - Async function to apply to each item
 * @param concurrency - Maximum concurrent operations
 * @param signal - Stops the pool before the next item
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number = 8,
  signal?: AbortSignal
): Promise<R[]> {
  const results: R[] = [];
  const done: boolean[] = new Array<boolean>(items.length).fill(false);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length && !signal?.aborted) {
      const index = currentIndex++;
      results[index] = await fn(items[index], index);
      done[index] = true;
    }
  }

  // Create workers up to concurrency limit
  const workers = Array(Math.max(1, Math.min(concurrency, items.length)))
    .fill(null)
    .map(() => worker());

  await Promise.all(workers);
  return results.filter((_, index) => done[index]);
}

/**
 * Process items in parallel, collecting successful results.
 * Failures are handed to `onError` and left out of the result.
 */
export async function parallelMapSafe<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  onError: (error: unknown, item: T, index: number) => void,
  concurrency: number = 8
): Promise<R[]> {
  const settled = await parallelMap(
    items,
    async (item, index): Promise<{ ok: true; value: R } | { ok: false }> => {
      try {
        return { ok: true, value: await fn(item, index) };
      } catch (error) {
        onError(error, item, index);
        return { ok: false };
      }
    },
    concurrency
  );
  return settled.flatMap((entry) => (entry.ok ? [entry.value] : []));
}
