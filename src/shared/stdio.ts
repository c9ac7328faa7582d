import type { JSONRPCMessage } from '../types.js';
import { decode, encode } from './message.js';

/**
 * Buffers a continuous stdio stream into discrete JSON-RPC messages, one per line.
 */
export class ReadBuffer {
    private _buffer?: Buffer;

    append(chunk: Buffer): void {
        this._buffer = this._buffer ? Buffer.concat([this._buffer, chunk]) : chunk;
    }

    /**
     * Returns the next complete message, or null when no full line is buffered.
     * Blank lines are skipped.
     *
     * @throws MessageDecodeError for a malformed line. The line is consumed, so
     * the next call continues with the following one.
     */
    readMessage(): JSONRPCMessage | null {
        for (;;) {
            if (!this._buffer) {
                return null;
            }
            const index = this._buffer.indexOf('\n');
            if (index === -1) {
                return null;
            }
            const line = this._buffer.toString('utf8', 0, index).replace(/\r$/, '');
            this._buffer = this._buffer.subarray(index + 1);
            if (line.trim() === '') {
                continue;
            }
            return decode(line);
        }
    }

    clear(): void {
        this._buffer = undefined;
    }
}

export function serializeMessage(message: JSONRPCMessage): string {
    return encode(message) + '\n';
}
