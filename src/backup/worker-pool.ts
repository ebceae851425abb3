export type PoolOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Items not
 * yet started when `signal` aborts are reported as skipped. Outcomes keep the
 * input order; a rejection never stops the other items.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PoolOutcome<R>[]> {
  const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: 'skipped' }));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      try {
        outcomes[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason: unknown) {
        outcomes[index] = { status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return outcomes;
}
