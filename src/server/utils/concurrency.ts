/**
 * ConcurrencyLimiter
 *
 * Limits the concurrency of async operations.
 * Similar to p-limit but lightweight and built-in: thunks beyond the limit
 * wait in FIFO order until a running one settles.
 */
export class ConcurrencyLimiter {
    private readonly queue: (() => void)[] = [];
    private active = 0;

    /**
     * @param concurrency - Max number of concurrent operations
     */
    constructor(private readonly concurrency: number) {
        if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
            throw new TypeError('Expected `concurrency` to be a number from 1 and up');
        }
    }

    get activeCount(): number {
        return this.active;
    }

    get pendingCount(): number {
        return this.queue.length;
    }

    run<T>(fn: () => Promise<T>): Promise<T> {
        if (this.active < this.concurrency) {
            return this.execute(fn);
        }
        return new Promise<T>((resolve, reject) => {
            this.queue.push(() => {
                this.execute(fn).then(resolve, reject);
            });
        });
    }

    private async execute<T>(fn: () => Promise<T>): Promise<T> {
        this.active++;
        try {
            return await fn();
        } finally {
            this.active--;
            const nextFn = this.queue.shift();
            if (nextFn) {
                nextFn();
            }
        }
    }
}

/**
 * Run `fn` over every item through `limiter` and wait for all of them,
 * keeping each item's outcome in input order. A rejection never short-circuits
 * its siblings.
 */
export function settleWithLimit<T, R>(
    items: readonly T[],
    limiter: ConcurrencyLimiter,
    fn: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
    return Promise.allSettled(items.map(item => limiter.run(() => fn(item))));
}
