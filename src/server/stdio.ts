import process from 'node:process';
import type { Readable, Writable } from 'node:stream';

import { TransportError } from '../errors.js';
import { ReadBuffer, serializeMessage } from '../shared/stdio.js';
import type { Transport } from '../shared/transport.js';
import type { JSONRPCMessage, MessageExtraInfo } from '../types.js';

/**
 * Server transport for stdio: this communicates with a client by reading from the current process' `stdin` and writing to `stdout`.
 *
 * One message per line. Writes are serialized, so two concurrent sends never interleave.
 *
 * @example
 * ```typescript
 * const server = new Server({ name: 'my-server', version: '1.0.0' });
 * await server.connect(new StdioServerTransport());
 * ```
 */
export class StdioServerTransport implements Transport {
    private _readBuffer: ReadBuffer = new ReadBuffer();
    private _started = false;
    private _closed = false;
    private _writeChain: Promise<void> = Promise.resolve();

    constructor(
        private _stdin: Readable = process.stdin,
        private _stdout: Writable = process.stdout
    ) {}

    onclose?: () => void;
    onerror?: (error: Error) => void;
    onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;

    // Arrow functions to bind `this` properly, while maintaining function identity.
    _ondata = (chunk: Buffer) => {
        this._readBuffer.append(chunk);
        this.processReadBuffer();
    };
    _onerror = (error: Error) => {
        this.onerror?.(TransportError.io(`stdin failed: ${error.message}`, error));
    };
    _onend = () => {
        this.close().catch((error: unknown) => this.onerror?.(TransportError.io('Failed to close stdio transport', error)));
    };

    /**
     * Starts listening for messages on `stdin`.
     */
    async start(): Promise<void> {
        if (this._started) {
            throw new Error('StdioServerTransport already started! If using Server class, note that connect() calls start() automatically.');
        }

        this._started = true;
        this._stdin.on('data', this._ondata);
        this._stdin.on('error', this._onerror);
        this._stdin.on('end', this._onend);
    }

    private processReadBuffer() {
        for (;;) {
            try {
                const message = this._readBuffer.readMessage();
                if (message === null) {
                    break;
                }

                this.onmessage?.(message);
            } catch (error) {
                this.onerror?.(error instanceof Error ? error : new Error(String(error)));
            }
        }
    }

    async close(): Promise<void> {
        if (this._closed) {
            return;
        }
        this._closed = true;

        this._stdin.off('data', this._ondata);
        this._stdin.off('error', this._onerror);
        this._stdin.off('end', this._onend);

        // Only pause stdin if we were the only listener
        if (this._stdin.listenerCount('data') === 0) {
            this._stdin.pause();
        }

        this._readBuffer.clear();
        this.onclose?.();
    }

    send(message: JSONRPCMessage): Promise<void> {
        if (this._closed) {
            return Promise.reject(TransportError.closed());
        }
        const json = serializeMessage(message);
        const write = this._writeChain.then(() => this._write(json));
        // The chain itself never rejects; each caller sees its own failure.
        this._writeChain = write.catch(() => undefined);
        return write;
    }

    private _write(json: string): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this._closed) {
                reject(TransportError.closed());
                return;
            }
            const flushed = this._stdout.write(json, error => {
                if (error) {
                    reject(TransportError.io(`stdout write failed: ${error.message}`, error));
                } else if (flushed) {
                    resolve();
                }
            });
            if (!flushed) {
                this._stdout.once('drain', resolve);
            }
        });
    }
}
