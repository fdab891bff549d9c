/**
 * Runs `task` over every item with at most `limit` tasks in flight and
 * resolves once all of them have settled. Outcomes are stored by input index,
 * whatever order the tasks finish in.
 *
 * A rejected task never stops the others; the caller inspects the outcomes.
 *
 * @param limit - Worker count. `Infinity` starts every item at once.
 *
 * @example
 * ```typescript
 * const outcomes = await settleWithConcurrency(urls, 4, (url) => fetchPage(url));
 * const pages = outcomes.filter((o) => o.status === "fulfilled");
 * ```
 */
export async function settleWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    task: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
    if (!(limit >= 1)) {
        throw new RangeError(`Concurrency limit must be at least 1, got ${limit}`);
    }
    const outcomes = new Array<PromiseSettledResult<R>>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            try {
                outcomes[index] = { status: "fulfilled", value: await task(items[index], index) };
            } catch (reason) {
                outcomes[index] = { status: "rejected", reason };
            }
        }
    };

    const workerCount = Math.min(limit, items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return outcomes;
}
