// concurrency_limiter.ts - FIFO counting semaphore

import { RunAbortedError } from './structured_error';

type Waiter = () => void;

export class ConcurrencyLimiter {
    private activeCount = 0;
    private queue: Waiter[] = [];

    constructor(private readonly maxSlots: number) {
        if (!Number.isInteger(maxSlots) || maxSlots < 1) {
            throw new RangeError(`maxSlots must be a positive integer, got ${maxSlots}`);
        }
    }

    get active(): number {
        return this.activeCount;
    }

    get waiting(): number {
        return this.queue.length;
    }

    /**
     * Resolves once a slot is held. Rejects with RunAbortedError if `signal`
     * fires first; a slot is never held after rejection.
     */
    async acquireSlot(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) throw new RunAbortedError();

        if (this.activeCount < this.maxSlots) {
            this.activeCount++;
            return;
        }

        return new Promise<void>((resolve, reject) => {
            const waiter: Waiter = () => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            };
            const onAbort = () => {
                const i = this.queue.indexOf(waiter);
                if (i !== -1) this.queue.splice(i, 1);
                reject(new RunAbortedError());
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.queue.push(waiter);
        });
    }

    releaseSlot(): void {
        // Hand the slot straight to the next waiter; activeCount is unchanged
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.activeCount--;
        }
    }

    async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        await this.acquireSlot(signal);
        try {
            return await task();
        } finally {
            this.releaseSlot();
        }
    }
}
