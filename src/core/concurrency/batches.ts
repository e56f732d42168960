/**
 * Map `items` through `worker` with at most `maxConcurrency` calls in flight.
 * Runs in consecutive batches; results keep input order.
 */
export async function mapInBatches<T, R>(
    items: readonly T[],
    maxConcurrency: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const size = Math.max(1, Math.floor(maxConcurrency));
    const results: R[] = [];

    for (let i = 0; i < items.length; i += size) {
        const batch = items.slice(i, i + size);
        const batchResults = await Promise.all(batch.map((item, j) => worker(item, i + j)));
        results.push(...batchResults);
    }
    return results;
}
