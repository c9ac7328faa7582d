import { TransportError } from '../errors.js';
import { EventStreamParser } from '../shared/eventStream.js';
import { decode, encode } from '../shared/message.js';
import type { Transport } from '../shared/transport.js';
import type { JSONRPCMessage, MessageExtraInfo } from '../types.js';
import type { FetchLike } from './http.js';
import type { ReconnectOptions, ReconnectPolicy } from './reconnect.js';
import { reconnectDelay, resolveReconnectPolicy, sleep } from './reconnect.js';

export interface SSEClientTransportOptions {
    /**
     * Customizes requests to the server, both the stream GET and the message POSTs.
     */
    requestInit?: RequestInit;

    /**
     * Custom fetch implementation used for all network requests.
     */
    fetch?: FetchLike;

    /**
     * Re-opens the event stream when it breaks after the endpoint was announced.
     * Off by default: a broken stream closes the transport.
     */
    reconnect?: ReconnectOptions;
}

/**
 * Client transport for SSE: this will connect to a server using Server-Sent Events for receiving
 * messages and make separate POST requests for sending messages.
 *
 * `start()` resolves once the server announced where to POST (the `endpoint` event).
 * With `reconnect` set, a stream that breaks later is re-opened; every new stream
 * announces a new endpoint, and `onreconnect` fires once it has.
 */
export class SSEClientTransport implements Transport {
    private _endpoint?: URL;
    private _abortController?: AbortController;
    private readonly _url: URL;
    private readonly _requestInit?: RequestInit;
    private readonly _fetch: FetchLike;
    private readonly _reconnect?: ReconnectPolicy;
    private _closed = false;
    private _reconnecting = false;
    private _reading?: Promise<void>;

    onclose?: () => void;
    onerror?: (error: Error) => void;
    onreconnect?: () => void;
    onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;

    constructor(url: URL, opts: SSEClientTransportOptions = {}) {
        this._url = url;
        this._requestInit = opts.requestInit;
        this._fetch = opts.fetch ?? fetch;
        this._reconnect = opts.reconnect ? resolveReconnectPolicy(opts.reconnect) : undefined;
    }

    /**
     * The session id, taken from the announced endpoint.
     */
    get sessionId(): string | undefined {
        return this._endpoint?.searchParams.get('sessionId') ?? undefined;
    }

    get reconnecting(): boolean {
        return this._reconnecting;
    }

    async start(): Promise<void> {
        if (this._abortController) {
            throw new Error('SSEClientTransport already started! If using Client class, note that connect() calls start() automatically.');
        }
        this._abortController = new AbortController();
        try {
            await this._connect();
        } catch (error) {
            this._finish();
            throw error;
        }
    }

    private async _openStream(signal: AbortSignal): Promise<ReadableStream<Uint8Array>> {
        const headers = new Headers(this._requestInit?.headers);
        headers.set('accept', 'text/event-stream');

        let response: Response;
        try {
            response = await this._fetch(this._url, { ...this._requestInit, method: 'GET', headers, signal });
        } catch (error) {
            throw TransportError.io(`SSE connection to ${this._url.href} failed: ${error instanceof Error ? error.message : String(error)}`, error);
        }
        if (!response.ok || !response.body) {
            throw TransportError.io(`SSE connection to ${this._url.href} failed (HTTP ${response.status})`);
        }
        return response.body;
    }

    /**
     * Opens one event stream and resolves once it announced its endpoint.
     * Whatever ends the stream after that hands over to `_recover()`.
     */
    private async _connect(): Promise<void> {
        const signal = this._abortController?.signal ?? AbortSignal.abort();
        const stream = await this._openStream(signal);

        await new Promise<void>((resolve, reject) => {
            let announced = false;
            this._reading = this._readStream(stream, () => {
                announced = true;
                resolve();
            })
                .then(() => {
                    if (!announced) {
                        throw TransportError.closed('Event stream ended before the endpoint was announced');
                    }
                })
                .catch((error: unknown) => {
                    const normalized = error instanceof Error ? error : new Error(String(error));
                    if (!announced) {
                        throw normalized;
                    }
                    // Don't emit error if the transport was intentionally closed
                    if (!this._closed) {
                        this.onerror?.(normalized);
                    }
                })
                .then(
                    () => this._recover(),
                    (error: unknown) => reject(error)
                );
        });
    }

    /**
     * Runs after an announced stream ended. Reconnects when allowed, otherwise closes.
     */
    private async _recover(): Promise<void> {
        const policy = this._reconnect;
        const signal = this._abortController?.signal;
        if (this._closed || !policy || !signal) {
            this._finish();
            return;
        }

        this._endpoint = undefined;
        this._reconnecting = true;
        for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
            await sleep(reconnectDelay(policy, attempt), signal);
            if (this._closed) {
                return;
            }
            try {
                await this._connect();
                this._reconnecting = false;
                this.onreconnect?.();
                return;
            } catch (error) {
                if (this._closed) {
                    return;
                }
                const message = error instanceof Error ? error.message : String(error);
                this.onerror?.(TransportError.io(`Reconnect attempt ${attempt} of ${policy.maxAttempts} failed: ${message}`, error));
            }
        }
        this._reconnecting = false;
        this._finish();
    }

    private async _readStream(stream: ReadableStream<Uint8Array>, onEndpoint: () => void): Promise<void> {
        const reader = stream.getReader();
        const decoder = new TextDecoder();
        const parser = new EventStreamParser();

        try {
            while (!this._closed) {
                const { done, value } = await reader.read();
                if (done) break;

                for (const event of parser.feed(decoder.decode(value, { stream: true }))) {
                    if (event.event === 'endpoint') {
                        this._setEndpoint(event.data);
                        onEndpoint();
                        continue;
                    }
                    if (event.event !== 'message') {
                        continue;
                    }
                    try {
                        this.onmessage?.(decode(event.data));
                    } catch (error) {
                        this.onerror?.(error instanceof Error ? error : new Error(String(error)));
                    }
                }
            }
        } finally {
            reader.releaseLock();
        }
    }

    private _setEndpoint(data: string): void {
        const endpoint = new URL(data, this._url);
        if (endpoint.origin !== this._url.origin) {
            throw TransportError.io(`Endpoint origin does not match connection origin: ${endpoint.origin}`);
        }
        this._endpoint = endpoint;
    }

    async send(message: JSONRPCMessage): Promise<void> {
        if (this._reconnecting) {
            throw TransportError.io('Event stream is reconnecting');
        }
        if (this._closed || !this._endpoint) {
            throw TransportError.closed('Not connected');
        }

        const headers = new Headers(this._requestInit?.headers);
        headers.set('content-type', 'application/json');

        let response: Response;
        try {
            response = await this._fetch(this._endpoint, {
                ...this._requestInit,
                method: 'POST',
                headers,
                body: encode(message),
                signal: this._abortController?.signal
            });
        } catch (error) {
            throw TransportError.io(`POST ${this._endpoint.href} failed: ${error instanceof Error ? error.message : String(error)}`, error);
        }
        if (!response.ok) {
            const text = await response.text().catch(() => null);
            throw TransportError.io(`Error POSTing to endpoint (HTTP ${response.status}): ${text}`);
        }
        // The body only acknowledges; responses arrive on the stream.
        await response.body?.cancel();
    }

    async close(): Promise<void> {
        this._abortController?.abort();
        this._finish();
        await this._reading;
    }

    private _finish(): void {
        if (this._closed) {
            return;
        }
        this._closed = true;
        this.onclose?.();
    }
}
