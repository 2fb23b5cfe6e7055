/**
 * Semaphore
 *
 * A small counting semaphore. The coordinator holds a one-permit instance
 * per device so the scheduled poll, a manual refresh and a confirmatory
 * poll never fetch concurrently for the same device.
 *
 * @example
 * const gate = new Semaphore(1);
 *
 * async function pollOnce() {
 *     return gate.use(() => source.fetchSnapshot(deviceId));
 * }
 */
export class Semaphore {
    private permits: number;
    private waiting: (() => void)[] = [];

    /**
     * @param permits Maximum concurrent holders
     */
    constructor(permits: number) {
        if (!Number.isInteger(permits) || permits < 1) {
            throw new Error('Semaphore permits must be a positive integer');
        }
        this.permits = permits;
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        await new Promise<void>(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            // Permit passes straight to the next waiter
            next();
        } else {
            this.permits++;
        }
    }

    /**
     * Run a task while holding a permit. The permit is released whether
     * the task resolves or rejects.
     */
    async use<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    get available(): number {
        return this.permits;
    }

    get queueLength(): number {
        return this.waiting.length;
    }
}
