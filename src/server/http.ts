import { MessageDecodeError, ProtocolError, TransportError } from '../errors.js';
import { createErrorResponse, parseMessage, toErrorResponse } from '../shared/message.js';
import type { Transport, TransportSendOptions } from '../shared/transport.js';
import type { JSONRPCMessage, MessageExtraInfo, RequestId } from '../types.js';
import { ErrorCode, isJSONRPCRequest, isJSONRPCResponse } from '../types.js';

/**
 * What to answer a single POST with. `body` is absent for `202 Accepted`.
 */
export type HttpReply = { status: 202 } | { status: 200 | 400; body: JSONRPCMessage | JSONRPCMessage[] };

interface PendingPost {
    related: JSONRPCMessage[];
    resolve: (reply: HttpReply) => void;
}

export interface HttpServerTransportOptions {
    sessionId: string;
}

/**
 * Server transport for single-shot HTTP: every POST carries one client message,
 * and a request's reply carries its response.
 *
 * Notifications the server sends with `relatedRequestId` while handling a request
 * travel in the same reply, ahead of the response. Anything else the server
 * sends has no pending POST to ride on and fails with `TransportIO`.
 *
 * The transport is framework-free; see `createServerApp` for the express wiring.
 */
export class HttpServerTransport implements Transport {
    private _started = false;
    private _closed = false;
    private readonly _pending = new Map<RequestId, PendingPost>();

    readonly sessionId: string;

    onclose?: () => void;
    onerror?: (error: Error) => void;
    onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;

    constructor(options: HttpServerTransportOptions) {
        this.sessionId = options.sessionId;
    }

    get closed(): boolean {
        return this._closed;
    }

    async start(): Promise<void> {
        if (this._started) {
            throw new Error('HttpServerTransport already started! If using Server class, note that connect() calls start() automatically.');
        }
        this._started = true;
    }

    /**
     * Handles the parsed body of one POST and resolves with the reply to write.
     */
    handlePost(body: unknown, extra?: MessageExtraInfo): Promise<HttpReply> {
        if (this._closed) {
            return Promise.resolve({
                status: 400,
                body: toErrorResponse(null, ProtocolError.invalidRequest('Session closed'))
            });
        }
        if (Array.isArray(body)) {
            return Promise.resolve({
                status: 400,
                body: toErrorResponse(null, ProtocolError.invalidRequest('Batch messages are not supported'))
            });
        }

        let message: JSONRPCMessage;
        try {
            message = parseMessage(body);
        } catch (error) {
            if (error instanceof MessageDecodeError && error.requestId !== undefined && !this._pending.has(error.requestId)) {
                // The session answers decode errors it can address; the answer settles this POST.
                const reply = this._await(error.requestId);
                this.onerror?.(error);
                return reply;
            }
            this.onerror?.(error instanceof Error ? error : new Error(String(error)));
            return Promise.resolve({ status: 400, body: toErrorResponse(null, error) });
        }

        if (!isJSONRPCRequest(message)) {
            this.onmessage?.(message, extra);
            return Promise.resolve({ status: 202 });
        }

        if (this._pending.has(message.id)) {
            return Promise.resolve({
                status: 400,
                body: toErrorResponse(message.id, ProtocolError.invalidRequest(`Request id ${JSON.stringify(message.id)} is already in flight`))
            });
        }
        const reply = this._await(message.id);
        this.onmessage?.(message, extra);
        return reply;
    }

    async send(message: JSONRPCMessage, options?: TransportSendOptions): Promise<void> {
        if (this._closed) {
            throw TransportError.closed();
        }

        if (isJSONRPCResponse(message) && message.id !== null) {
            const post = this._pending.get(message.id);
            if (post) {
                this._pending.delete(message.id);
                const messages = [...post.related, message];
                post.resolve({ status: 200, body: messages.length === 1 ? message : messages });
                return;
            }
        }

        const relatedId = options?.relatedRequestId;
        const post = relatedId === undefined ? undefined : this._pending.get(relatedId);
        if (!post) {
            throw TransportError.io('No pending HTTP request to carry the message');
        }
        post.related.push(message);
    }

    async close(): Promise<void> {
        if (this._closed) {
            return;
        }
        this._closed = true;
        for (const [id, post] of this._pending) {
            const closed = createErrorResponse(id, { code: ErrorCode.ConnectionClosed, message: 'Session closed' });
            post.resolve({ status: 200, body: post.related.length === 0 ? closed : [...post.related, closed] });
        }
        this._pending.clear();
        this.onclose?.();
    }

    private _await(id: RequestId): Promise<HttpReply> {
        return new Promise(resolve => {
            this._pending.set(id, { related: [], resolve });
        });
    }
}
