/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 *
 * A fixed set of runners pulls from a shared cursor, so items start in input
 * order and may finish in any order. Resolves once every item has finished.
 * A rejection from `worker` rejects the whole run; callers that need per-item
 * isolation catch inside `worker`.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let cursor = 0;
  const runnerCount = Math.min(Math.max(limit, 1), items.length);

  const runners = Array.from({ length: runnerCount }, async () => {
    while (cursor < items.length) {
      const index = cursor++;
      const item = items[index];
      if (item === undefined) continue;
      await worker(item, index);
    }
  });

  await Promise.all(runners);
}
