import { CancelledError, ProtocolError, RequestTimeoutError } from '../errors.js';
import type { JSONRPCResponse, RequestId } from '../types.js';
import { isJSONRPCErrorResponse } from '../types.js';

export interface PendingRequestOptions {
    /** Rejects with `RequestTimeoutError` when no response arrives in time */
    timeoutMs?: number;
    /** Rejects with `CancelledError` when aborted */
    signal?: AbortSignal;
}

export interface PendingRequestInfo {
    id: RequestId;
    method: string;
    createdAt: number;
    deadline?: number;
}

interface PendingEntry extends PendingRequestInfo {
    resolve: (result: unknown) => void;
    reject: (error: unknown) => void;
    cleanup: () => void;
}

/**
 * Outbound calls awaiting a response, keyed by correlation id.
 *
 * Every entry is settled exactly once, by whichever comes first: a response,
 * its timeout, its abort signal, `fail()` or `rejectAll()`. Settling removes
 * the entry before anything else runs, so a late response finds nothing.
 */
export class PendingRequestTable {
    private _requestMessageId = 0;
    private readonly _entries = new Map<RequestId, PendingEntry>();

    /**
     * Next id for an outbound request. Ids start at 0 and are unique within this table.
     */
    nextId(): number {
        return this._requestMessageId++;
    }

    get size(): number {
        return this._entries.size;
    }

    has(id: RequestId): boolean {
        return this._entries.has(id);
    }

    list(): PendingRequestInfo[] {
        return [...this._entries.values()].map(({ id, method, createdAt, deadline }) => ({ id, method, createdAt, deadline }));
    }

    /**
     * Adds an entry and returns the promise that settles with the response result.
     */
    register(id: RequestId, method: string, options: PendingRequestOptions = {}): Promise<unknown> {
        if (this._entries.has(id)) {
            return Promise.reject(new Error(`Request id ${String(id)} is already pending`));
        }
        const { timeoutMs, signal } = options;
        if (signal?.aborted) {
            return Promise.reject(new CancelledError(signal.reason));
        }

        return new Promise<unknown>((resolve, reject) => {
            const createdAt = Date.now();
            let timer: ReturnType<typeof setTimeout> | undefined;
            const onAbort = (): void => {
                this.fail(id, new CancelledError(signal?.reason));
            };

            const entry: PendingEntry = {
                id,
                method,
                createdAt,
                deadline: timeoutMs === undefined ? undefined : createdAt + timeoutMs,
                resolve,
                reject,
                cleanup: () => {
                    if (timer !== undefined) {
                        clearTimeout(timer);
                    }
                    signal?.removeEventListener('abort', onAbort);
                }
            };
            this._entries.set(id, entry);

            if (timeoutMs !== undefined) {
                timer = setTimeout(() => this.fail(id, new RequestTimeoutError(method, timeoutMs)), timeoutMs);
            }
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    /**
     * Settles the entry matching the response id.
     *
     * @returns false when no entry matches (duplicate, stale or forged response).
     */
    settle(response: JSONRPCResponse): boolean {
        if (response.id === null) {
            return false;
        }
        const entry = this._take(response.id);
        if (!entry) {
            return false;
        }
        if (isJSONRPCErrorResponse(response)) {
            entry.reject(ProtocolError.fromError(response.error.code, response.error.message, response.error.data));
        } else {
            entry.resolve(response.result);
        }
        return true;
    }

    /**
     * Rejects one entry. Returns false when it was already settled.
     */
    fail(id: RequestId, error: unknown): boolean {
        const entry = this._take(id);
        if (!entry) {
            return false;
        }
        entry.reject(error);
        return true;
    }

    /**
     * Rejects every entry with the same error and leaves the table empty.
     *
     * @returns the number of entries rejected
     */
    rejectAll(error: unknown): number {
        const entries = [...this._entries.values()];
        this._entries.clear();
        for (const entry of entries) {
            entry.cleanup();
            entry.reject(error);
        }
        return entries.length;
    }

    private _take(id: RequestId): PendingEntry | undefined {
        const entry = this._entries.get(id);
        if (entry) {
            this._entries.delete(id);
            entry.cleanup();
        }
        return entry;
    }
}
