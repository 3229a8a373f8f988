/**
 * pLimit
 *
 * Limits the concurrency of async operations.
 *
 * @param concurrency - Max number of concurrent operations
 * @returns A function that accepts a thunk and runs it once a slot is free
 */
export function pLimit(concurrency: number): <T>(fn: () => Promise<T>) => Promise<T> {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: (() => void)[] = [];
    let activeCount = 0;

    const next = () => {
        activeCount--;
        const nextFn = queue.shift();
        if (nextFn) {
            nextFn();
        }
    };

    return <T>(fn: () => Promise<T>): Promise<T> => {
        const execute = async (): Promise<T> => {
            activeCount++;
            try {
                return await fn();
            } finally {
                next();
            }
        };

        if (activeCount < concurrency) {
            return execute();
        }
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    };
}

/**
 * Map items through an async function with at most `limit` in flight.
 * Results keep the order of `items`, regardless of completion order.
 * Items are started in input order.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const limitFn = pLimit(limit);
    return Promise.all(items.map((item, index) => limitFn(() => fn(item, index))));
}
