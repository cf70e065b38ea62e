/**
 * Ordered FIFO with a fixed capacity. `put` waits while the queue is full,
 * which is how a slow consumer pushes back on its producer.
 */
export class BoundedQueue<T> {
    private items: T[] = [];
    private takers: Array<(item: T) => void> = [];
    private putters: Array<() => void> = [];

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.items.length;
    }

    public async put(item: T): Promise<void> {
        while (this.items.length >= this.capacity && this.takers.length === 0) {
            await new Promise<void>(resolve => this.putters.push(resolve));
        }
        this.offer(item);
    }

    /** Non-blocking put; false when the queue is full. */
    public tryPut(item: T): boolean {
        if (this.items.length >= this.capacity && this.takers.length === 0) {
            return false;
        }
        this.offer(item);
        return true;
    }

    /**
     * Next item, or undefined when nothing arrived within `timeoutMs`.
     * Without a timeout it waits indefinitely.
     */
    public get(timeoutMs?: number): Promise<T | undefined> {
        if (this.items.length > 0) {
            return Promise.resolve(this.shift());
        }
        if (timeoutMs !== undefined && timeoutMs <= 0) {
            return Promise.resolve(undefined);
        }
        return new Promise((resolve) => {
            let timer: NodeJS.Timeout | undefined;
            const taker = (item: T) => {
                if (timer) clearTimeout(timer);
                resolve(item);
            };
            if (timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    this.takers = this.takers.filter(t => t !== taker);
                    resolve(undefined);
                }, timeoutMs);
            }
            this.takers.push(taker);
        });
    }

    /** Removes and returns everything currently queued. */
    public drain(): T[] {
        const items = this.items;
        this.items = [];
        const putters = this.putters;
        this.putters = [];
        putters.forEach(resume => resume());
        return items;
    }

    private offer(item: T): void {
        const taker = this.takers.shift();
        if (taker) {
            taker(item);
        } else {
            this.items.push(item);
        }
    }

    private shift(): T {
        const [item] = this.items.splice(0, 1);
        const resume = this.putters.shift();
        if (resume) resume();
        return item;
    }
}
