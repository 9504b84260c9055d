/**
 * Run `processor` over `items` with at most `concurrency` in flight per batch.
 * Results come back in input order.
 */
export async function runInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T) => Promise<R>,
): Promise<R[]> {
  const size = Math.max(1, Math.floor(concurrency));
  const results: R[] = [];

  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    results.push(...(await Promise.all(batch.map((item) => processor(item)))));
  }

  return results;
}
