/**
 * Event Emitter System
 *
 * A small, type-safe event emitter used for session and server observability.
 * `on()` returns an unsubscribe function.
 */

type ListenerMap<Events extends Record<string, unknown>> = {
    [K in keyof Events]?: Set<(data: Events[K]) => void>;
};

export interface TypedEventEmitterOptions {
    /**
     * Receives errors thrown by listeners. When absent, the first listener
     * error is rethrown from `emit()` after every listener has run.
     */
    onListenerError?: (error: unknown, event: string) => void;
}

/**
 * Type-safe event emitter.
 * `Events` maps event names to their payload types.
 */
export class TypedEventEmitter<Events extends Record<string, unknown>> {
    private _listeners: ListenerMap<Events> = {};

    constructor(private readonly _options: TypedEventEmitterOptions = {}) {}

    /**
     * Subscribe to an event.
     *
     * @returns An unsubscribe function
     *
     * @example
     * ```typescript
     * const unsubscribe = session.events.on('phase:changed', ({ from, to }) => {
     *   console.log(`${from} -> ${to}`);
     * });
     *
     * // Later, to unsubscribe:
     * unsubscribe();
     * ```
     */
    on<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): () => void {
        let listeners = this._listeners[event];
        if (!listeners) {
            listeners = new Set();
            this._listeners[event] = listeners;
        }
        listeners.add(listener);
        return () => this.off(event, listener);
    }

    /**
     * Subscribe to an event for a single occurrence.
     */
    once<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): () => void {
        const wrapper = (data: Events[K]): void => {
            this.off(event, wrapper);
            listener(data);
        };
        return this.on(event, wrapper);
    }

    off<K extends keyof Events & string>(event: K, listener: (data: Events[K]) => void): void {
        const listeners = this._listeners[event];
        if (listeners) {
            listeners.delete(listener);
            if (listeners.size === 0) {
                delete this._listeners[event];
            }
        }
    }

    /**
     * Invokes every listener for `event` synchronously, in subscription order.
     */
    emit<K extends keyof Events & string>(event: K, data: Events[K]): void {
        const listeners = this._listeners[event];
        if (!listeners) {
            return;
        }
        let firstError: { error: unknown } | undefined;
        // Copy so listeners may unsubscribe during iteration
        for (const listener of [...listeners]) {
            try {
                listener(data);
            } catch (error) {
                if (this._options.onListenerError) {
                    this._options.onListenerError(error, event);
                } else {
                    firstError ??= { error };
                }
            }
        }
        if (firstError) {
            throw firstError.error;
        }
    }

    listenerCount<K extends keyof Events & string>(event: K): number {
        return this._listeners[event]?.size ?? 0;
    }

    removeAllListeners<K extends keyof Events & string>(event?: K): void {
        if (event === undefined) {
            this._listeners = {};
        } else {
            delete this._listeners[event];
        }
    }
}
