/**
 * FIFO async mutex.
 *
 * Used for the registry's coarse lock and for each subscription's delivery
 * lock. Waiters are resumed in arrival order; the lock is handed directly to
 * the next waiter on release, so no third party can slip in between.
 */
export class Mutex {
    private queue: Array<() => void> = [];
    private locked = false;

    get isLocked(): boolean {
        return this.locked;
    }

    /** Number of callers waiting behind the current holder */
    get waiting(): number {
        return this.queue.length;
    }

    /**
     * Resolves with a release function once the caller holds the lock.
     * Calling the release function more than once has no effect.
     */
    acquire(): Promise<() => void> {
        return new Promise((resolve) => {
            const grant = () => {
                this.locked = true;
                let released = false;
                resolve(() => {
                    if (released) return;
                    released = true;
                    this.handOff();
                });
            };

            if (this.locked) {
                this.queue.push(grant);
            } else {
                grant();
            }
        });
    }

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire();
        try {
            return await fn();
        } finally {
            release();
        }
    }

    private handOff(): void {
        const next = this.queue.shift();
        if (next) {
            next();
        } else {
            this.locked = false;
        }
    }
}
