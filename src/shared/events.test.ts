import { TypedEventEmitter } from './events.js';

type TestEvents = {
    ping: { n: number };
    done: undefined;
};

describe('TypedEventEmitter', () => {
    test('delivers payloads to subscribers until they unsubscribe', () => {
        const emitter = new TypedEventEmitter<TestEvents>();
        const seen: number[] = [];
        const off = emitter.on('ping', ({ n }) => seen.push(n));

        emitter.emit('ping', { n: 1 });
        off();
        emitter.emit('ping', { n: 2 });

        expect(seen).toEqual([1]);
        expect(emitter.listenerCount('ping')).toBe(0);
    });

    test('once fires a single time', () => {
        const emitter = new TypedEventEmitter<TestEvents>();
        const listener = vi.fn();
        emitter.once('done', listener);

        emitter.emit('done', undefined);
        emitter.emit('done', undefined);

        expect(listener).toHaveBeenCalledTimes(1);
    });

    test('reports listener errors to the configured callback and keeps notifying', () => {
        const onListenerError = vi.fn();
        const emitter = new TypedEventEmitter<TestEvents>({ onListenerError });
        const second = vi.fn();
        emitter.on('ping', () => {
            throw new Error('listener failed');
        });
        emitter.on('ping', second);

        emitter.emit('ping', { n: 3 });

        expect(second).toHaveBeenCalledWith({ n: 3 });
        expect(onListenerError).toHaveBeenCalledWith(new Error('listener failed'), 'ping');
    });

    test('rethrows the first listener error without a callback', () => {
        const emitter = new TypedEventEmitter<TestEvents>();
        const second = vi.fn();
        emitter.on('ping', () => {
            throw new Error('first');
        });
        emitter.on('ping', second);

        expect(() => emitter.emit('ping', { n: 4 })).toThrow('first');
        expect(second).toHaveBeenCalledTimes(1);
    });

    test('removeAllListeners clears every event', () => {
        const emitter = new TypedEventEmitter<TestEvents>();
        emitter.on('ping', vi.fn());
        emitter.on('done', vi.fn());

        emitter.removeAllListeners();

        expect(emitter.listenerCount('ping')).toBe(0);
        expect(emitter.listenerCount('done')).toBe(0);
    });
});
