export type PoolResult<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown }
  | { status: "skipped" };

/**
 * Runs `worker` over `items` with at most `concurrency` in flight.
 * Once `shouldStop()` turns true no new item starts; those items come back as "skipped".
 * Results keep input order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldStop: () => boolean = () => false,
): Promise<PoolResult<R>[]> {
  const results: PoolResult<R>[] = items.map((): PoolResult<R> => ({ status: "skipped" }));
  let cursor = 0;

  const lane = async () => {
    while (cursor < items.length && !shouldStop()) {
      const index = cursor;
      cursor += 1;
      try {
        results[index] = { status: "fulfilled", value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
