/**
 * Bounded Worker Pool
 *
 * Runs independent async jobs with at most `limit` in flight. Each worker
 * pulls the next unclaimed index, so results line up with the input order
 * regardless of completion order.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/worker-pool
 */

/**
 * Map items through an async worker with bounded concurrency.
 *
 * @param items - Inputs, processed in claim order
 * @param limit - Maximum concurrent workers (positive integer)
 * @param worker - Job for one item; rejections propagate to the caller
 * @returns Results in input order
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Worker pool limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const runners = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await worker(items[index], index);
    }
  });

  await Promise.all(runners);
  return results;
}
