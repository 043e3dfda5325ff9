export type Task<T, R> = (item: T, signal: AbortSignal) => Promise<R>;

/**
 * Maps `items` through `task` with at most `limit` calls in flight.
 * Results keep the input order whatever order the calls finish in.
 *
 * Fail-fast: the first rejection aborts `controller`, no further items are
 * started, and once the in-flight calls have settled (their results are
 * dropped) the first error is rethrown.
 */
export async function mapConcurrent<T, R>(
    items: readonly T[],
    limit: number,
    task: Task<T, R>,
    controller: AbortController = new AbortController(),
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    let failure: { error: unknown } | undefined;

    const worker = async (): Promise<void> => {
        while (next < items.length && !failure && !controller.signal.aborted) {
            const position = next++;
            try {
                results[position] = await task(items[position], controller.signal);
            } catch (error) {
                if (!failure) {
                    failure = { error };
                    controller.abort(error);
                }
            }
        }
    };

    const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
    await Promise.all(workers);

    if (failure) throw failure.error;
    if (controller.signal.aborted) throw controller.signal.reason;
    return results;
}
