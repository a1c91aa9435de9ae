// src/keyed_lock.ts
//
// In-process mutual exclusion per key. Tasks queued under the same key run one
// after another in arrival order; tasks under different keys never wait on
// each other. Idle keys are dropped, so the map only holds keys with work
// queued or running.

export class KeyedLock<K> {
    private readonly tails = new Map<K, Promise<void>>();

    async runExclusive<T>(key: K, task: () => T | Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await task();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    /** True while a task for `key` is running or queued. */
    isLocked(key: K): boolean {
        return this.tails.has(key);
    }

    get activeKeys(): number {
        return this.tails.size;
    }
}
