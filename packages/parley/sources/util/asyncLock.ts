/**
 * Serializes async work: each call starts after the previous one settles.
 */
export class AsyncLock {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    async inLock<T>(func: () => Promise<T> | T): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => {};
        this.tail = new Promise<void>((resolve) => {
            release = resolve;
        });
        this.pending += 1;

        await previous;
        try {
            return await func();
        } finally {
            this.pending -= 1;
            release();
        }
    }

    isBusy(): boolean {
        return this.pending > 0;
    }
}
