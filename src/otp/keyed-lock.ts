/**
 * Serialises async tasks that share a key; tasks on different keys run freely.
 */
export class KeyedLock {
    private tails = new Map<string, Promise<void>>();

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const current = previous.then(task);
        const tail = current.then(
            () => undefined,
            () => undefined,
        );
        this.tails.set(key, tail);

        try {
            return await current;
        } finally {
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    get size(): number {
        return this.tails.size;
    }
}
