/**
 * Unbounded FIFO with a blocking read: `push` never waits, `next` resolves
 * with the oldest item as soon as there is one. Items reach readers in push
 * order.
 */
export class AsyncQueue<T> {
    readonly #items: T[] = [];
    readonly #waiting: ((item: T) => void)[] = [];

    push(item: T): void {
        const reader = this.#waiting.shift();
        if (reader) {
            reader(item);
            return;
        }
        this.#items.push(item);
    }

    next(): Promise<T> {
        if (this.#items.length > 0) {
            const [item] = this.#items.splice(0, 1);
            return Promise.resolve(item);
        }
        return new Promise((resolve) => {
            this.#waiting.push(resolve);
        });
    }

    get size(): number {
        return this.#items.length;
    }

    /** Number of readers blocked in `next()`. */
    get waiting(): number {
        return this.#waiting.length;
    }
}
