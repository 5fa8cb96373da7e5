/**
 * Runs `task` over `items` with at most `limit` in flight.
 * Results are stored by input index, so output order matches input order
 * regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  }

  const cap = Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : 1;
  const workerCount = Math.max(1, Math.min(cap, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
