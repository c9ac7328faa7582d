import { randomUUID } from 'node:crypto';

import { MessageDecodeError, ProtocolError, TransportError } from '../errors.js';
import { BoundedQueue } from '../shared/boundedQueue.js';
import { formatEvent } from '../shared/eventStream.js';
import { encode, parseMessage, toErrorResponse } from '../shared/message.js';
import type { Transport } from '../shared/transport.js';
import type { JSONRPCErrorResponse, JSONRPCMessage, MessageExtraInfo } from '../types.js';

export const DEFAULT_QUEUE_CAPACITY = 64;
export const DEFAULT_SEND_TIMEOUT_MSEC = 5000;

/**
 * The writable half of an event stream. Node's `ServerResponse` (and so express' `Response`) satisfies it.
 */
export interface EventStreamSink {
    writeHead(statusCode: number, headers: Record<string, string>): unknown;
    write(chunk: string): boolean;
    end(): unknown;
    once(event: 'drain' | 'close', listener: () => void): unknown;
    off(event: 'drain' | 'close', listener: () => void): unknown;
}

export interface SSEServerTransportOptions {
    /** Defaults to a random UUID */
    sessionId?: string;
    /** Outbound messages buffered per session, counting the one being written. Defaults to 64. */
    queueCapacity?: number;
    /** How long `send()` waits for a free slot before failing with `Backpressure`. Defaults to 5000ms. */
    sendTimeoutMs?: number;
}

/**
 * Result of handling one POST to the messages endpoint.
 */
export type PostReply = { status: 202 } | { status: 400; body: JSONRPCErrorResponse };

/**
 * Server transport for SSE: this will send messages over an SSE connection and receive messages from HTTP POST requests.
 *
 * Outbound messages go through a bounded queue. A slot is freed once the event
 * has been handed to the socket, so a peer that stops reading makes `send()`
 * wait and then fail with `Backpressure`.
 */
export class SSEServerTransport implements Transport {
    private readonly _queue: BoundedQueue<string>;
    private readonly _sendTimeoutMs: number;
    private _started = false;
    private _closed = false;
    private _writer?: Promise<void>;
    private _abandonWrite?: () => void;

    readonly sessionId: string;

    onclose?: () => void;
    onerror?: (error: Error) => void;
    onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;

    /**
     * Creates a new SSE server transport, which will direct the client to POST messages to the relative or absolute URL identified by `_endpoint`.
     */
    constructor(
        private _endpoint: string,
        private _sink: EventStreamSink,
        options: SSEServerTransportOptions = {}
    ) {
        this.sessionId = options.sessionId ?? randomUUID();
        this._queue = new BoundedQueue(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
        this._sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MSEC;
    }

    /**
     * The URL announced in the `endpoint` event: `_endpoint` with the session id appended.
     */
    get endpointUrl(): string {
        const separator = this._endpoint.includes('?') ? '&' : '?';
        return `${this._endpoint}${separator}sessionId=${encodeURIComponent(this.sessionId)}`;
    }

    /**
     * Outbound messages queued or being written.
     */
    get queuedMessages(): number {
        return this._queue.size;
    }

    /**
     * Handles the initial SSE connection request.
     *
     * This should be called when a GET request is made to establish the SSE stream.
     */
    async start(): Promise<void> {
        if (this._started) {
            throw new Error('SSEServerTransport already started! If using Server class, note that connect() calls start() automatically.');
        }
        this._started = true;

        this._sink.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache, no-transform',
            Connection: 'keep-alive'
        });
        this._sink.once('close', this._onSinkClose);

        // The endpoint event goes through the queue so it is always first on the wire.
        await this._queue.enqueue(formatEvent({ event: 'endpoint', data: this.endpointUrl }));
        this._writer = this._drain().catch((error: unknown) => {
            this.onerror?.(TransportError.io('Event stream writer failed', error));
        });
    }

    /**
     * Handles the parsed body of a POST to the messages endpoint.
     *
     * Requests are answered on the event stream; the POST itself only acknowledges.
     */
    handlePostMessage(body: unknown, extra?: MessageExtraInfo): PostReply {
        if (this._closed) {
            return { status: 400, body: toErrorResponse(null, ProtocolError.invalidRequest('Session closed')) };
        }

        let message: JSONRPCMessage;
        try {
            message = parseMessage(body);
        } catch (error) {
            this.onerror?.(error instanceof Error ? error : new Error(String(error)));
            // Decode errors with an id are answered on the stream by the session.
            if (error instanceof MessageDecodeError && error.requestId !== undefined) {
                return { status: 202 };
            }
            return { status: 400, body: toErrorResponse(null, error) };
        }

        this.onmessage?.(message, extra);
        return { status: 202 };
    }

    async send(message: JSONRPCMessage): Promise<void> {
        if (this._closed) {
            throw TransportError.closed('Not connected');
        }
        await this._queue.enqueue(formatEvent({ event: 'message', data: encode(message) }), { timeoutMs: this._sendTimeoutMs });
    }

    async close(): Promise<void> {
        if (this._closed) {
            return;
        }
        this._closed = true;
        this._sink.off('close', this._onSinkClose);
        this._queue.close();
        this._queue.clear();
        this._abandonWrite?.();
        this._sink.end();
        await this._writer;
        this.onclose?.();
    }

    private _onSinkClose = (): void => {
        this.close().catch((error: unknown) => this.onerror?.(TransportError.io('Failed to close event stream', error)));
    };

    private async _drain(): Promise<void> {
        for (let frame = await this._queue.take(); frame !== undefined; frame = await this._queue.take()) {
            if (this._closed) {
                this._queue.release();
                return;
            }
            try {
                await this._write(frame);
            } finally {
                this._queue.release();
            }
        }
    }

    private _write(frame: string): Promise<void> {
        if (this._sink.write(frame)) {
            return Promise.resolve();
        }
        return new Promise(resolve => {
            const done = (): void => {
                this._abandonWrite = undefined;
                this._sink.off('drain', done);
                this._sink.off('close', done);
                resolve();
            };
            this._abandonWrite = done;
            this._sink.once('drain', done);
            this._sink.once('close', done);
        });
    }
}
