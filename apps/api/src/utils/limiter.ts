/**
 * Caps the number of tasks running at once. Tasks beyond the cap wait in FIFO
 * order; a waiter whose signal aborts leaves the queue and rejects with the
 * abort reason.
 */
export class RequestLimiter {
    private active = 0;
    private readonly waiters: Array<() => void> = [];

    constructor(private readonly maxConcurrent: number) {
        if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
            throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
        }
    }

    async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        await this.acquire(signal);
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    private acquire(signal?: AbortSignal): Promise<void> {
        signal?.throwIfAborted();
        if (this.active < this.maxConcurrent) {
            this.active++;
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const onAbort = () => {
                const index = this.waiters.indexOf(grant);
                if (index !== -1) this.waiters.splice(index, 1);
                reject(signal?.reason);
            };
            const grant = () => {
                signal?.removeEventListener('abort', onAbort);
                this.active++;
                resolve();
            };
            this.waiters.push(grant);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    private release(): void {
        this.active--;
        const next = this.waiters.shift();
        if (next) next();
    }
}
