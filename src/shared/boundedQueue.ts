import { TransportError } from '../errors.js';

export interface EnqueueOptions {
    /** How long to wait for a free slot before failing with `Backpressure`. Waits indefinitely when omitted. */
    timeoutMs?: number;
    signal?: AbortSignal;
}

interface Waiter {
    admit: () => void;
    fail: (error: Error) => void;
}

/**
 * FIFO queue with a fixed number of slots, for outbound messages of one session.
 *
 * A slot is held from `enqueue()` until the consumer calls `release()` after
 * the item has been written, so items being written still count against the
 * capacity. A producer facing a full queue waits for a slot, then fails with
 * `Backpressure`; items are never dropped.
 */
export class BoundedQueue<T> {
    private _head = 0;
    private _tail = 0;
    private _items: { [key: number]: T } = {};
    private _taken = 0;
    private _reserved = 0;
    private _closed?: Error;
    private readonly _waiters: Waiter[] = [];
    private _consumer?: () => void;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    /**
     * Occupied slots: queued items, items taken but not yet released, and slots
     * promised to admitted producers.
     */
    get size(): number {
        return this._tail - this._head + this._taken + this._reserved;
    }

    /**
     * Items waiting to be taken.
     */
    get pending(): number {
        return this._tail - this._head;
    }

    get closed(): boolean {
        return this._closed !== undefined;
    }

    /**
     * Adds an item, waiting for a free slot when the queue is full.
     *
     * @throws TransportError `Backpressure` when no slot frees up within `timeoutMs`,
     * `TransportClosed` when the queue is or gets closed.
     */
    async enqueue(item: T, options: EnqueueOptions = {}): Promise<void> {
        if (this._closed) {
            throw this._closed;
        }
        if (this.size >= this.capacity || this._waiters.length > 0) {
            await this._waitForSlot(options);
            this._reserved--;
            if (this._closed) {
                throw this._closed;
            }
        }
        this._items[this._tail] = item;
        this._tail++;
        this._wakeConsumer();
    }

    /**
     * Removes and returns the next item without freeing its slot; call `release()`
     * once it has been written. Waits while the queue is empty. Resolves with
     * `undefined` once the queue is closed and drained.
     */
    async take(): Promise<T | undefined> {
        while (this._head === this._tail) {
            if (this._closed) {
                return undefined;
            }
            await new Promise<void>(resolve => {
                this._consumer = resolve;
            });
        }
        const item = this._items[this._head];
        delete this._items[this._head];
        this._head++;
        this._taken++;
        return item;
    }

    /**
     * Frees the slot of an item returned by `take()`.
     */
    release(): void {
        if (this._taken === 0) {
            return;
        }
        this._taken--;
        this._admitWaiters();
    }

    /**
     * Stops accepting items. Waiting producers fail with `reason` (default `TransportClosed`);
     * queued items remain available to `take()`.
     */
    close(reason: Error = TransportError.closed('Queue closed')): void {
        if (this._closed) {
            return;
        }
        this._closed = reason;
        for (const waiter of this._waiters.splice(0)) {
            waiter.fail(reason);
        }
        this._wakeConsumer();
    }

    /**
     * Drops queued items. Slots held by taken items stay held until released.
     */
    clear(): void {
        this._head = 0;
        this._tail = 0;
        this._items = {};
        this._admitWaiters();
    }

    private _waitForSlot({ timeoutMs, signal }: EnqueueOptions): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            let timer: ReturnType<typeof setTimeout> | undefined;
            const settle = (): void => {
                if (timer !== undefined) {
                    clearTimeout(timer);
                }
                signal?.removeEventListener('abort', onAbort);
                const index = this._waiters.indexOf(waiter);
                if (index !== -1) {
                    this._waiters.splice(index, 1);
                }
            };
            const waiter: Waiter = {
                admit: () => {
                    settle();
                    resolve();
                },
                fail: error => {
                    settle();
                    reject(error);
                }
            };
            const onAbort = (): void => waiter.fail(TransportError.closed('Send aborted'));

            if (signal?.aborted) {
                reject(TransportError.closed('Send aborted'));
                return;
            }
            this._waiters.push(waiter);
            signal?.addEventListener('abort', onAbort, { once: true });
            if (timeoutMs !== undefined) {
                timer = setTimeout(() => waiter.fail(TransportError.backpressure(timeoutMs)), timeoutMs);
            }
        });
    }

    private _admitWaiters(): void {
        while (this.size < this.capacity) {
            const waiter = this._waiters[0];
            if (!waiter) {
                return;
            }
            // Held until the admitted producer stores its item
            this._reserved++;
            waiter.admit();
        }
    }

    private _wakeConsumer(): void {
        const consumer = this._consumer;
        this._consumer = undefined;
        consumer?.();
    }
}
