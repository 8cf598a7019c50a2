/**
 * Async mutual exclusion.
 *
 * Waiters are served in FIFO order. The lock may be held across awaits,
 * which is what the batched repositories need: a flush keeps it for the
 * whole storage transaction.
 */
export class Mutex {
    private locked = false;
    private readonly queue: Array<() => void> = [];

    async acquire(): Promise<() => void> {
        if (!this.locked) {
            this.locked = true;
            return this.createRelease();
        }

        return new Promise(resolve => {
            this.queue.push(() => resolve(this.createRelease()));
        });
    }

    async runExclusive<T>(callback: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await callback();
        } finally {
            release();
        }
    }

    isLocked(): boolean {
        return this.locked;
    }

    private createRelease(): () => void {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.release();
        };
    }

    private release(): void {
        const next = this.queue.shift();
        if (next) {
            // Ownership passes straight to the next waiter.
            next();
        } else {
            this.locked = false;
        }
    }
}
