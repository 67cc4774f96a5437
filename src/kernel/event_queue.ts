/**
 * Bounded FIFO with one asynchronous consumer. `offer` never blocks: when
 * the buffer is full the item is dropped and `offer` returns false.
 */
export class EventQueue<T> {
    private items: T[] = [];
    private waiter: ((item: T | null) => void) | null = null;
    private closed = false;
    private dropped = 0;

    constructor(private readonly capacity: number) {}

    public offer(item: T): boolean {
        if (this.closed) return false;
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve(item);
            return true;
        }
        if (this.items.length >= this.capacity) {
            this.dropped++;
            return false;
        }
        this.items.push(item);
        return true;
    }

    /** Next item in arrival order; `null` once the queue is closed. */
    public take(): Promise<T | null> {
        const next = this.items.shift();
        if (next !== undefined) {
            return Promise.resolve(next);
        }
        if (this.closed) {
            return Promise.resolve(null);
        }
        return new Promise<T | null>(resolve => {
            this.waiter = resolve;
        });
    }

    /** Drop everything buffered and release the waiting consumer with `null`. */
    public close(): void {
        this.closed = true;
        this.items = [];
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve(null);
        }
    }

    public get size(): number {
        return this.items.length;
    }

    public get droppedCount(): number {
        return this.dropped;
    }

    public get isClosed(): boolean {
        return this.closed;
    }
}
