import { MessageDecodeError } from '../errors.js';
import type { JSONRPCMessage } from '../types.js';
import { ReadBuffer, serializeMessage } from './stdio.js';

const testMessage: JSONRPCMessage = {
    jsonrpc: '2.0',
    method: 'foobar'
};

test('should have no messages after initialization', () => {
    const readBuffer = new ReadBuffer();
    expect(readBuffer.readMessage()).toBeNull();
});

test('should only yield a message after a newline', () => {
    const readBuffer = new ReadBuffer();

    readBuffer.append(Buffer.from(JSON.stringify(testMessage)));
    expect(readBuffer.readMessage()).toBeNull();

    readBuffer.append(Buffer.from('\n'));
    expect(readBuffer.readMessage()).toEqual(testMessage);
    expect(readBuffer.readMessage()).toBeNull();
});

test('should join messages split across chunks, including inside a multi-byte character', () => {
    const readBuffer = new ReadBuffer();
    const bytes = Buffer.from(serializeMessage({ jsonrpc: '2.0', method: 'note', params: { text: 'héllo' } }));
    const split = bytes.indexOf(0xc3) + 1;

    readBuffer.append(bytes.subarray(0, split));
    expect(readBuffer.readMessage()).toBeNull();
    readBuffer.append(bytes.subarray(split));

    expect(readBuffer.readMessage()).toEqual({ jsonrpc: '2.0', method: 'note', params: { text: 'héllo' } });
});

test('should be reusable after clearing', () => {
    const readBuffer = new ReadBuffer();

    readBuffer.append(Buffer.from('foobar'));
    readBuffer.clear();
    expect(readBuffer.readMessage()).toBeNull();

    readBuffer.append(Buffer.from(serializeMessage(testMessage)));
    expect(readBuffer.readMessage()).toEqual(testMessage);
});

test('should report a malformed line and continue with the next one', () => {
    const readBuffer = new ReadBuffer();
    readBuffer.append(Buffer.from('{"jsonrpc":"2.0","id":4,"result":{},"error":{"code":1,"message":"x"}}\nnot json\n' + serializeMessage(testMessage)));

    let first: unknown;
    try {
        readBuffer.readMessage();
    } catch (error) {
        first = error;
    }
    expect(first).toBeInstanceOf(MessageDecodeError);
    expect(first).toMatchObject({ requestId: 4 });

    expect(() => readBuffer.readMessage()).toThrow(MessageDecodeError);
    expect(readBuffer.readMessage()).toEqual(testMessage);
});

test('should skip blank lines and strip carriage returns', () => {
    const readBuffer = new ReadBuffer();
    readBuffer.append(Buffer.from('\n\r\n' + JSON.stringify(testMessage) + '\r\n'));
    expect(readBuffer.readMessage()).toEqual(testMessage);
});

test('serializeMessage ends with exactly one newline', () => {
    expect(serializeMessage(testMessage)).toBe('{"jsonrpc":"2.0","method":"foobar"}\n');
});
