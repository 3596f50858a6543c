import { SyncCancelledError } from "./errors.js";

interface Waiter {
    resolve: () => void;
    reject: (error: Error) => void;
    signal?: AbortSignal;
    onAbort?: () => void;
}

/**
 * Counting semaphore bounding how many file operations are in flight.
 * Waiters are admitted in FIFO order.
 *
 *   await semaphore.acquire(signal);
 *   try {
 *     await work();
 *   } finally {
 *     semaphore.release();
 *   }
 */
export class Semaphore {
    private permits: number;
    private readonly maxPermits: number;
    private waitQueue: Waiter[] = [];

    constructor(maxPermits: number) {
        if (!Number.isInteger(maxPermits) || maxPermits < 1) {
            throw new RangeError(`Semaphore needs at least one permit, got ${maxPermits}`);
        }
        this.maxPermits = maxPermits;
        this.permits = maxPermits;
    }

    /**
     * Acquire a permit, waiting if none is free.
     * @throws SyncCancelledError if the signal is aborted before a permit is granted
     */
    async acquire(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            throw new SyncCancelledError(undefined, { cause: signal.reason });
        }

        if (this.permits > 0) {
            this.permits--;
            return;
        }

        return new Promise<void>((resolve, reject) => {
            const waiter: Waiter = { resolve, reject, signal };

            if (signal) {
                waiter.onAbort = () => {
                    const index = this.waitQueue.indexOf(waiter);
                    if (index >= 0) {
                        this.waitQueue.splice(index, 1);
                        reject(new SyncCancelledError(undefined, { cause: signal.reason }));
                    }
                };
                signal.addEventListener("abort", waiter.onAbort, { once: true });
            }

            this.waitQueue.push(waiter);
        });
    }

    /**
     * Release a permit, handing it straight to the oldest waiter if there is one.
     */
    release(): void {
        const waiter = this.waitQueue.shift();
        if (waiter) {
            if (waiter.signal && waiter.onAbort) {
                waiter.signal.removeEventListener("abort", waiter.onAbort);
            }
            waiter.resolve();
        } else if (this.permits < this.maxPermits) {
            this.permits++;
        }
    }

    /**
     * Number of permits currently free.
     */
    available(): number {
        return this.permits;
    }

    /**
     * Number of callers waiting for a permit.
     */
    waiting(): number {
        return this.waitQueue.length;
    }

    /**
     * Maximum number of permits.
     */
    capacity(): number {
        return this.maxPermits;
    }
}
