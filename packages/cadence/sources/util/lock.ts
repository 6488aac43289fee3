/**
 * Serializes async critical sections in arrival order.
 * Note: the lock is not re-entrant; calling inLock from inside inLock deadlocks.
 */
export class AsyncLock {
    private locked = false;
    private waiters: Array<() => void> = [];

    async inLock<T>(func: () => Promise<T> | T): Promise<T> {
        await this.acquire();
        try {
            return await func();
        } finally {
            this.release();
        }
    }

    isLocked(): boolean {
        return this.locked;
    }

    private async acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return;
        }
        await new Promise<void>((resolve) => {
            this.waiters.push(resolve);
        });
    }

    private release(): void {
        if (!this.locked) {
            throw new Error("Lock released without acquisition.");
        }
        const next = this.waiters.shift();
        if (next) {
            // Ownership passes straight to the next waiter.
            next();
            return;
        }
        this.locked = false;
    }
}
