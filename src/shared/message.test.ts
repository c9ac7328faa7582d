import { ErrorKind, MessageDecodeError, ProtocolError, StateError } from '../errors.js';
import type { JSONRPCMessage } from '../types.js';
import { ErrorCode } from '../types.js';
import {
    createErrorResponse,
    createNotification,
    createRequest,
    createResultResponse,
    decode,
    encode,
    parseMessage,
    recoverRequestId,
    toErrorObject
} from './message.js';

function decodeError(raw: string): MessageDecodeError {
    try {
        decode(raw);
    } catch (error) {
        if (error instanceof MessageDecodeError) {
            return error;
        }
        throw error;
    }
    throw new Error(`expected ${raw} to fail decoding`);
}

describe('decode', () => {
    test('classifies a request', () => {
        expect(decode('{"jsonrpc":"2.0","id":1,"method":"ping"}')).toEqual({ jsonrpc: '2.0', id: 1, method: 'ping' });
    });

    test('classifies a notification', () => {
        expect(decode('{"jsonrpc":"2.0","method":"notifications/initialized"}')).toEqual({
            jsonrpc: '2.0',
            method: 'notifications/initialized'
        });
    });

    test('classifies result and error responses', () => {
        expect(decode('{"jsonrpc":"2.0","id":"a","result":{}}')).toEqual({ jsonrpc: '2.0', id: 'a', result: {} });
        expect(decode('{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}')).toEqual({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32700, message: 'Parse error' }
        });
    });

    test('accepts byte input', () => {
        const bytes = new TextEncoder().encode('{"jsonrpc":"2.0","id":7,"result":null}');
        expect(decode(bytes)).toEqual({ jsonrpc: '2.0', id: 7, result: null });
    });

    test('rejects invalid JSON with a parse error and no id', () => {
        const error = decodeError('{"jsonrpc":');
        expect(error.code).toBe(ErrorCode.ParseError);
        expect(error.kind).toBe(ErrorKind.ParseError);
        expect(error.requestId).toBeUndefined();
    });

    test('rejects a response carrying both result and error, keeping the id', () => {
        const error = decodeError('{"jsonrpc":"2.0","id":3,"result":{},"error":{"code":1,"message":"x"}}');
        expect(error.kind).toBe(ErrorKind.ParseError);
        expect(error.requestId).toBe(3);
    });

    test('rejects an id with neither method nor result/error', () => {
        expect(decodeError('{"jsonrpc":"2.0","id":4}').requestId).toBe(4);
    });

    test('rejects a method together with a result', () => {
        expect(decodeError('{"jsonrpc":"2.0","id":5,"method":"ping","result":{}}').requestId).toBe(5);
    });

    test('rejects the wrong protocol version', () => {
        expect(decodeError('{"jsonrpc":"1.0","id":6,"method":"ping"}').message).toBe('Unsupported jsonrpc version: "1.0"');
    });

    test('rejects non-object messages', () => {
        expect(decodeError('[1,2]').message).toBe('Message must be a JSON object');
        expect(decodeError('"ping"').message).toBe('Message must be a JSON object');
    });

    test('rejects a request whose method is not a string', () => {
        const error = decodeError('{"jsonrpc":"2.0","id":8,"method":42}');
        expect(error.requestId).toBe(8);
        expect(error.message.startsWith('Invalid request:')).toBe(true);
    });
});

describe('encode', () => {
    test('round-trips every message variant', () => {
        const messages: JSONRPCMessage[] = [
            createRequest(1, 'tools/call', { name: 'echo', arguments: { text: 'hi' } }),
            createRequest('req-1', 'ping'),
            createNotification('notifications/roots/list_changed'),
            createNotification('notifications/resources/updated', { uri: 'file:///a.txt' }),
            createResultResponse(2, { tools: [] }),
            createErrorResponse(3, { code: ErrorCode.MethodNotFound, message: 'Method not found: bogus', data: { hint: 1 } }),
            createErrorResponse(null, { code: ErrorCode.ParseError, message: 'Parse error' })
        ];

        for (const message of messages) {
            expect(decode(encode(message))).toEqual(message);
        }
    });

    test('keeps a null id distinct from an absent id', () => {
        const withNull = decode(encode(createErrorResponse(null, { code: -32700, message: 'Parse error' })));
        const notification = decode(encode(createNotification('ping')));

        expect('id' in withNull).toBe(true);
        expect(encode(withNull)).toBe('{"jsonrpc":"2.0","id":null,"error":{"code":-32700,"message":"Parse error"}}');
        expect('id' in notification).toBe(false);
    });

    test('omits params when none are given', () => {
        expect(encode(createRequest(9, 'ping'))).toBe('{"jsonrpc":"2.0","id":9,"method":"ping"}');
    });
});

describe('parseMessage', () => {
    test('keeps extension fields', () => {
        expect(parseMessage({ jsonrpc: '2.0', method: 'x', _meta: { trace: 'abc' } })).toEqual({
            jsonrpc: '2.0',
            method: 'x',
            _meta: { trace: 'abc' }
        });
    });
});

describe('recoverRequestId', () => {
    test('returns string and integer ids only', () => {
        expect(recoverRequestId({ id: 'x' })).toBe('x');
        expect(recoverRequestId({ id: 12 })).toBe(12);
        expect(recoverRequestId({ id: 1.5 })).toBeUndefined();
        expect(recoverRequestId({ id: { nested: true } })).toBeUndefined();
        expect(recoverRequestId(null)).toBeUndefined();
    });
});

describe('toErrorObject', () => {
    test('keeps protocol error codes and data', () => {
        expect(toErrorObject(ProtocolError.invalidParams('bad cursor', { cursor: 'x' }))).toEqual({
            code: ErrorCode.InvalidParams,
            message: 'bad cursor',
            data: { cursor: 'x' }
        });
    });

    test('maps other errors to internal errors', () => {
        expect(toErrorObject(new Error('boom'))).toEqual({ code: ErrorCode.InternalError, message: 'boom' });
        expect(toErrorObject(StateError.invalidState('wrong phase'))).toEqual({ code: ErrorCode.InternalError, message: 'wrong phase' });
        expect(toErrorObject('plain')).toEqual({ code: ErrorCode.InternalError, message: 'plain' });
    });
});
