/**
 * Default number of in-flight tasks for data-parallel maps
 */
export const DEFAULT_CONCURRENCY = 8;

/**
 * Map over items with at most `limit` calls of `fn` in flight.
 *
 * Output order matches input order regardless of completion order.
 * A rejection from `fn` rejects the whole map; callers that must not
 * fail convert their errors into values first.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      results[index] = await fn(item, index);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
