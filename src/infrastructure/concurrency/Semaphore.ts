/**
 * Simple semaphore for limiting concurrent operations.
 * With one permit it serialises read-modify-write sequences.
 */
export class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number = 1) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new Error('Semaphore requires at least one permit');
        }
        this.permits = permits;
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
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
     * Runs `fn` holding one permit, releasing it however `fn` settles.
     */
    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }
}
