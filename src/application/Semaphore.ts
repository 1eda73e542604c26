import { CancelledError } from '../domain/errors/RenderErrors';

/**
 * Simple semaphore for limiting concurrent operations.
 * Waiters whose signal fires leave the queue with a CancelledError.
 */
export class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        if (permits < 1) {
            throw new Error('Semaphore needs at least one permit');
        }
        this.permits = permits;
    }

    async acquire(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            throw new CancelledError();
        }
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise<void>((resolve, reject) => {
            const waiter = () => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            };
            const onAbort = () => {
                this.waiting = this.waiting.filter(w => w !== waiter);
                reject(new CancelledError());
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiting.push(waiter);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }

    /**
     * Runs fn while holding a permit.
     */
    async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        await this.acquire(signal);
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    get queued(): number {
        return this.waiting.length;
    }
}
