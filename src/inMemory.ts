import { TransportError } from './errors.js';
import type { Transport, TransportSendOptions } from './shared/transport.js';
import type { JSONRPCMessage, MessageExtraInfo } from './types.js';

interface QueuedMessage {
    message: JSONRPCMessage;
    extra?: MessageExtraInfo;
}

/**
 * In-memory transport for creating clients and servers that talk to each other within the same process.
 */
export class InMemoryTransport implements Transport {
    private _otherTransport?: InMemoryTransport;
    private _messageQueue: QueuedMessage[] = [];
    private _started = false;
    private _closed = false;
    private _customContext?: Record<string, unknown>;

    onclose?: () => void;
    onerror?: (error: Error) => void;
    onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;
    sessionId?: string;

    /**
     * Creates a pair of linked in-memory transports that can communicate with each other. One should be passed to a Client and one to a Server.
     */
    static createLinkedPair(): [InMemoryTransport, InMemoryTransport] {
        const clientTransport = new InMemoryTransport();
        const serverTransport = new InMemoryTransport();
        clientTransport._otherTransport = serverTransport;
        serverTransport._otherTransport = clientTransport;
        return [clientTransport, serverTransport];
    }

    async start(): Promise<void> {
        this._started = true;
        // Deliver messages that arrived before start was called
        for (let queued = this._messageQueue.shift(); queued; queued = this._messageQueue.shift()) {
            this._deliver(queued);
        }
    }

    async close(): Promise<void> {
        if (this._closed) {
            return;
        }
        this._closed = true;
        const other = this._otherTransport;
        this._otherTransport = undefined;
        await other?.close();
        this.onclose?.();
    }

    async send(message: JSONRPCMessage, _options?: TransportSendOptions): Promise<void> {
        const other = this._otherTransport;
        if (!other) {
            throw TransportError.closed('Not connected');
        }
        other._receive({ message });
    }

    /**
     * Sets custom context data that will be passed to all message handlers.
     */
    setCustomContext(context: Record<string, unknown>): void {
        this._customContext = context;
    }

    private _receive(queued: QueuedMessage): void {
        if (this._started && this.onmessage) {
            this._deliver(queued);
        } else {
            this._messageQueue.push(queued);
        }
    }

    private _deliver({ message, extra }: QueuedMessage): void {
        this.onmessage?.(message, this._customContext ? { ...extra, customContext: this._customContext } : extra);
    }
}
