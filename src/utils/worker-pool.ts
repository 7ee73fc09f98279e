/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 *
 * Results come back in input order. Each task owns its result slot, so workers
 * never touch shared counters; a rejected task rejects the whole pool, so callers
 * that want per-item isolation catch inside `task`.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const requested = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  const size = Math.max(1, Math.min(requested, items.length));
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  }

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < size; i++) workers.push(worker());
  await Promise.all(workers);
  return results;
}
