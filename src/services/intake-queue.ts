/**
 * Unbounded FIFO shared by every producer (event sources, timers, workers)
 * and drained by exactly one consumer via `for await`.
 *
 * After `close()` further pushes are rejected, items already queued are
 * still delivered, and the iteration then ends.
 */
export class IntakeQueue<T> implements AsyncIterable<T> {
    readonly #items: { value: T }[] = [];
    #waiters: ((result: IteratorResult<T>) => void)[] = [];
    #closed = false;

    /** Returns `false` when the queue is closed and the item was dropped. */
    push(item: T): boolean {
        if (this.#closed) return false;

        const waiter = this.#waiters.shift();
        if (waiter) {
            waiter({ value: item, done: false });
        } else {
            this.#items.push({ value: item });
        }
        return true;
    }

    close(): void {
        if (this.#closed) return;
        this.#closed = true;
        for (const waiter of this.#waiters) {
            waiter({ value: undefined, done: true });
        }
        this.#waiters = [];
    }

    get closed(): boolean {
        return this.#closed;
    }

    get size(): number {
        return this.#items.length;
    }

    next(): Promise<IteratorResult<T>> {
        const queued = this.#items.shift();
        if (queued) {
            return Promise.resolve({ value: queued.value, done: false });
        }
        if (this.#closed) {
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
            this.#waiters.push(resolve);
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return { next: () => this.next() };
    }
}
