import type { JSONRPCMessage, MessageExtraInfo, RequestId } from '../types.js';

/**
 * Options for sending a JSON-RPC message.
 */
export type TransportSendOptions = {
    /**
     * If present, `relatedRequestId` is used to indicate to the transport which incoming request to associate this outgoing message with.
     */
    relatedRequestId?: RequestId;
};

/**
 * Describes the minimal contract for a transport that a session can communicate over.
 */
export interface Transport {
    /**
     * Starts processing messages on the transport, including any connection steps that might need to be taken.
     *
     * This method should only be called after callbacks are installed, or else messages may be lost.
     */
    start(): Promise<void>;

    /**
     * Sends a JSON-RPC message (request, notification or response).
     *
     * Rejects with a `TransportError` of kind `TransportClosed`, `TransportIO` or `Backpressure`.
     */
    send(message: JSONRPCMessage, options?: TransportSendOptions): Promise<void>;

    /**
     * Closes the connection.
     */
    close(): Promise<void>;

    /**
     * Callback for when the connection is closed for any reason.
     *
     * This should be invoked when close() is called as well.
     */
    onclose?: () => void;

    /**
     * Callback for when an error occurs.
     *
     * Errors here are not necessarily fatal; a `MessageDecodeError` reports one bad message.
     */
    onerror?: (error: Error) => void;

    /**
     * Callback for when the transport re-established a broken connection on its own.
     *
     * The peer may have lost its session state; the owner repeats its handshake.
     * Responses owed on the old connection never arrive.
     */
    onreconnect?: () => void;

    /**
     * Callback for when a message (request, notification or response) is received over the connection.
     */
    onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;

    /**
     * The session ID generated for this connection, on transports that have one.
     */
    sessionId?: string;
}

export interface ReceivedMessage {
    message: JSONRPCMessage;
    extra?: MessageExtraInfo;
}

/**
 * Adapts a transport's callbacks into a lazy sequence of messages.
 *
 * The sequence ends when the transport closes. While it is being consumed it
 * owns `onmessage` and `onclose`; the previous callbacks are restored once the
 * consumer stops.
 *
 * @example
 * ```typescript
 * await transport.start();
 * for await (const { message } of receive(transport)) {
 *     console.log(message);
 * }
 * ```
 */
export async function* receive(transport: Transport): AsyncGenerator<ReceivedMessage, void, undefined> {
    const queue: ReceivedMessage[] = [];
    let closed = false;
    let wake: (() => void) | undefined;
    const notify = (): void => {
        const resume = wake;
        wake = undefined;
        resume?.();
    };

    const previous = { onmessage: transport.onmessage, onclose: transport.onclose };
    transport.onmessage = (message, extra) => {
        queue.push({ message, extra });
        notify();
    };
    transport.onclose = () => {
        closed = true;
        notify();
        previous.onclose?.();
    };

    try {
        for (;;) {
            const next = queue.shift();
            if (next) {
                yield next;
                continue;
            }
            if (closed) {
                return;
            }
            await new Promise<void>(resolve => {
                wake = resolve;
            });
        }
    } finally {
        transport.onmessage = previous.onmessage;
        transport.onclose = previous.onclose;
    }
}
