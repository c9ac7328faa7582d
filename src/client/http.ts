import { TransportError } from '../errors.js';
import { encode, parseMessage } from '../shared/message.js';
import type { Transport } from '../shared/transport.js';
import type { JSONRPCMessage, MessageExtraInfo } from '../types.js';
import { SESSION_ID_HEADER } from '../types.js';

export type FetchLike = (url: string | URL, init?: RequestInit) => Promise<Response>;

export interface HttpClientTransportOptions {
    /**
     * Customizes HTTP requests to the server.
     */
    requestInit?: RequestInit;

    /**
     * Custom fetch implementation used for all network requests.
     */
    fetch?: FetchLike;

    /**
     * Session ID for the connection. This is used to resume a session issued earlier.
     */
    sessionId?: string;
}

/**
 * Client transport for single-shot HTTP: every message is one POST, and the
 * messages in the reply are fed back to the session.
 *
 * The session id issued with the reply to `initialize` is sent on every later
 * POST. `close()` ends the session on the server with a DELETE.
 */
export class HttpClientTransport implements Transport {
    private _abortController?: AbortController;
    private readonly _url: URL;
    private readonly _requestInit?: RequestInit;
    private readonly _fetch: FetchLike;
    private _sessionId?: string;
    private _closed = false;

    onclose?: () => void;
    onerror?: (error: Error) => void;
    onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;

    constructor(url: URL, opts: HttpClientTransportOptions = {}) {
        this._url = url;
        this._requestInit = opts.requestInit;
        this._fetch = opts.fetch ?? fetch;
        this._sessionId = opts.sessionId;
    }

    get sessionId(): string | undefined {
        return this._sessionId;
    }

    async start(): Promise<void> {
        if (this._abortController) {
            throw new Error('HttpClientTransport already started! If using Client class, note that connect() calls start() automatically.');
        }
        this._abortController = new AbortController();
    }

    private _commonHeaders(): Headers {
        const headers = new Headers(this._requestInit?.headers);
        if (this._sessionId) {
            headers.set(SESSION_ID_HEADER, this._sessionId);
        }
        return headers;
    }

    async send(message: JSONRPCMessage): Promise<void> {
        if (this._closed || !this._abortController) {
            throw TransportError.closed('Not connected');
        }

        const headers = this._commonHeaders();
        headers.set('content-type', 'application/json');
        headers.set('accept', 'application/json');

        let response: Response;
        try {
            response = await this._fetch(this._url, {
                ...this._requestInit,
                method: 'POST',
                headers,
                body: encode(message),
                signal: this._abortController.signal
            });
        } catch (error) {
            throw TransportError.io(`POST ${this._url.href} failed: ${error instanceof Error ? error.message : String(error)}`, error);
        }

        const sessionId = response.headers.get(SESSION_ID_HEADER);
        if (sessionId) {
            this._sessionId = sessionId;
        }

        if (!response.ok) {
            const text = await response.text().catch(() => null);
            throw TransportError.io(`Error POSTing to endpoint (HTTP ${response.status}): ${text}`);
        }
        if (response.status === 202) {
            return;
        }

        const body: unknown = await response.json();
        for (const value of Array.isArray(body) ? body : [body]) {
            try {
                this.onmessage?.(parseMessage(value));
            } catch (error) {
                this.onerror?.(error instanceof Error ? error : new Error(String(error)));
            }
        }
    }

    /**
     * Ends the session on the server, then closes the transport.
     */
    async terminateSession(): Promise<void> {
        if (!this._sessionId) {
            return;
        }
        const response = await this._fetch(this._url, {
            ...this._requestInit,
            method: 'DELETE',
            headers: this._commonHeaders()
        });
        // 404 means the server already forgot the session
        if (!response.ok && response.status !== 404) {
            throw TransportError.io(`Failed to terminate session (HTTP ${response.status})`);
        }
        this._sessionId = undefined;
    }

    async close(): Promise<void> {
        if (this._closed) {
            return;
        }
        this._closed = true;
        try {
            await this.terminateSession();
        } catch (error) {
            this.onerror?.(error instanceof Error ? error : new Error(String(error)));
        }
        this._abortController?.abort();
        this.onclose?.();
    }
}
