/**
 * Bounded fan-out for region and VPC scans.
 */

export type SettledTask<T, R> =
  | { item: T; status: "fulfilled"; value: R }
  | { item: T; status: "rejected"; reason: unknown }
  | { item: T; status: "skipped" };

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 *
 * Results keep input order. Items not started before `signal` fires are
 * reported as "skipped"; calls already running are left to finish.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<SettledTask<T, R>[]> {
  const results: SettledTask<T, R>[] = items.map((item) => ({ item, status: "skipped" }));
  const width = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      if (signal?.aborted) return;
      const index = cursor++;
      const item = items[index];
      try {
        results[index] = { item, status: "fulfilled", value: await fn(item, index) };
      } catch (reason) {
        results[index] = { item, status: "rejected", reason };
      }
    }
  };

  await Promise.all(Array.from({ length: width }, () => worker()));
  return results;
}
