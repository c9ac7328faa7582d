import { ErrorKind, ProtocolError, RequestTimeoutError, TransportError } from '../errors.js';
import { ErrorCode } from '../types.js';
import {
    loggingInterceptor,
    methodFilterInterceptor,
    rateLimitInterceptor,
    recoveryInterceptor,
    retryInterceptor,
    SlidingWindow,
    timeoutInterceptor
} from './interceptors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { CallContext } from './middleware.js';
import { MiddlewareChain } from './middleware.js';

function context(overrides: Partial<CallContext> = {}): CallContext {
    return {
        direction: 'inbound',
        kind: 'request',
        method: 'tools/call',
        requestId: 7,
        sessionId: 'session-a',
        signal: new AbortController().signal,
        ...overrides
    };
}

describe('loggingInterceptor', () => {
    test('logs entry, exit and failures', async () => {
        const info = vi.fn();
        const error = vi.fn();
        const logger: Logger = { ...silentLogger, info, error };
        const chain = new MiddlewareChain([loggingInterceptor(logger, { level: 'info' })]);

        await chain.execute(context(), { method: 'tools/call' }, async () => 'ok');
        await expect(
            chain.execute(context(), { method: 'tools/call' }, async () => {
                throw new Error('boom');
            })
        ).rejects.toThrow('boom');

        expect(info).toHaveBeenCalledTimes(3);
        expect(info.mock.calls[0]?.[0]).toBe('⇐ tools/call');
        expect(error).toHaveBeenCalledTimes(1);
    });
});

describe('recoveryInterceptor', () => {
    test('converts unexpected failures into an internal protocol error', async () => {
        const crit = vi.fn();
        const chain = new MiddlewareChain([recoveryInterceptor({ ...silentLogger, crit })]);

        const failure = chain.execute(context(), { method: 'tools/call' }, async () => {
            throw new TypeError('undefined is not a function');
        });

        await expect(failure).rejects.toBeInstanceOf(ProtocolError);
        await expect(failure).rejects.toMatchObject({ code: ErrorCode.InternalError, message: 'Internal error' });
        expect(crit).toHaveBeenCalledTimes(1);
    });

    test('keeps protocol errors as they are', async () => {
        const chain = new MiddlewareChain([recoveryInterceptor()]);
        await expect(
            chain.execute(context(), { method: 'tools/call' }, async () => {
                throw ProtocolError.invalidParams('missing name');
            })
        ).rejects.toMatchObject({ code: ErrorCode.InvalidParams, message: 'missing name' });
    });
});

describe('rateLimitInterceptor', () => {
    test('rejects calls above the limit within a window, per session', async () => {
        const chain = new MiddlewareChain([rateLimitInterceptor({ max: 2, windowMs: 60_000 })]);
        const handler = vi.fn(async () => 'ok');

        await chain.execute(context(), { method: 'x' }, handler);
        await chain.execute(context(), { method: 'x' }, handler);
        await expect(chain.execute(context(), { method: 'x' }, handler)).rejects.toMatchObject({
            code: ErrorCode.InvalidRequest,
            message: 'Rate limit exceeded'
        });
        await chain.execute(context({ sessionId: 'session-b' }), { method: 'x' }, handler);

        expect(handler).toHaveBeenCalledTimes(3);
    });

    test('frees capacity once the window passes', async () => {
        vi.useFakeTimers();
        try {
            const chain = new MiddlewareChain([rateLimitInterceptor({ max: 1, windowMs: 1_000 })]);
            await chain.execute(context(), { method: 'x' }, async () => 1);
            await expect(chain.execute(context(), { method: 'x' }, async () => 2)).rejects.toBeInstanceOf(ProtocolError);

            vi.advanceTimersByTime(1_000);

            await expect(chain.execute(context(), { method: 'x' }, async () => 3)).resolves.toBe(3);
        } finally {
            vi.useRealTimers();
        }
    });
});

describe('timeoutInterceptor', () => {
    test('fails slow calls with a timeout error', async () => {
        const chain = new MiddlewareChain([timeoutInterceptor(20)]);
        const slow = chain.execute(context(), { method: 'tools/call' }, () => new Promise(resolve => setTimeout(resolve, 200)));

        await expect(slow).rejects.toBeInstanceOf(RequestTimeoutError);
        await expect(slow).rejects.toMatchObject({ kind: ErrorKind.Timeout });
    });

    test('passes fast results through', async () => {
        const chain = new MiddlewareChain([timeoutInterceptor(200)]);
        await expect(chain.execute(context(), { method: 'x' }, async () => 'fast')).resolves.toBe('fast');
    });
});

describe('retryInterceptor', () => {
    test('retries recoverable failures until one succeeds', async () => {
        let attempts = 0;
        const chain = new MiddlewareChain([retryInterceptor({ maxRetries: 3, initialBackoffMs: 1 })]);

        const result = await chain.execute(context({ direction: 'outbound' }), { method: 'x' }, async () => {
            attempts++;
            if (attempts < 3) {
                throw TransportError.io('connection reset');
            }
            return attempts;
        });

        expect(result).toBe(3);
    });

    test('gives up after maxRetries', async () => {
        const handler = vi.fn(async () => {
            throw TransportError.io('down');
        });
        const chain = new MiddlewareChain([retryInterceptor({ maxRetries: 2, initialBackoffMs: 1 })]);

        await expect(chain.execute(context(), { method: 'x' }, handler)).rejects.toThrow('down');
        expect(handler).toHaveBeenCalledTimes(3);
    });

    test('does not retry protocol errors', async () => {
        const handler = vi.fn(async () => {
            throw ProtocolError.methodNotFound('x');
        });
        const chain = new MiddlewareChain([retryInterceptor({ initialBackoffMs: 1 })]);

        await expect(chain.execute(context(), { method: 'x' }, handler)).rejects.toBeInstanceOf(ProtocolError);
        expect(handler).toHaveBeenCalledTimes(1);
    });
});

describe('methodFilterInterceptor', () => {
    test('applies allow and deny lists', async () => {
        const chain = new MiddlewareChain([methodFilterInterceptor({ allow: ['tools/list', 'tools/call'], deny: ['tools/call'] })]);

        await expect(chain.execute(context(), { method: 'tools/list' }, async () => 'ok')).resolves.toBe('ok');
        await expect(chain.execute(context(), { method: 'tools/call' }, async () => 'ok')).rejects.toMatchObject({
            message: 'Method not allowed: tools/call'
        });
        await expect(chain.execute(context(), { method: 'prompts/list' }, async () => 'ok')).rejects.toMatchObject({
            code: ErrorCode.InvalidRequest
        });
    });
});

describe('SlidingWindow', () => {
    test('forgets keys whose hits expired', () => {
        const window = new SlidingWindow(2, 1_000);
        for (let session = 0; session < 50; session++) {
            expect(window.take(`session-${session}`, 0)).toBe(0);
        }
        expect(window.size).toBe(50);

        expect(window.take('latecomer', 1_000)).toBe(0);

        expect(window.size).toBe(1);
    });

    test('reports how long until a slot frees', () => {
        const window = new SlidingWindow(2, 1_000);
        window.take('a', 100);
        window.take('a', 300);

        expect(window.take('a', 400)).toBe(700);
        expect(window.take('a', 1_100)).toBe(0);
    });
});
