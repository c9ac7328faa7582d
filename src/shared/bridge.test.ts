import { z } from 'zod';

import { Client } from '../client/client.js';
import { ValidationError } from '../errors.js';
import { InMemoryTransport } from '../inMemory.js';
import { Server } from '../server/server.js';
import type { Root } from '../types.js';
import { Method } from '../types.js';
import type { BridgeRule, FollowUpRequester, FollowUpTask } from './bridge.js';
import { defineBridgeRule, NotificationBridge } from './bridge.js';
import { silentLogger } from './logger.js';

type Session = { name: string; results: unknown[] };

function deferred<T>() {
    let resolve: (value: T) => void = () => {};
    let reject: (error: unknown) => void = () => {};
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

const recordRule: BridgeRule<Session> = {
    notification: 'notifications/things/list_changed',
    request: 'things/list',
    onResult: (session, result) => session.results.push(result)
};

describe('NotificationBridge', () => {
    test('trigger returns before the follow-up completes', async () => {
        const session: Session = { name: 's', results: [] };
        const reply = deferred<unknown>();
        const calls: string[] = [];
        const requester: FollowUpRequester = method => {
            calls.push(method);
            return reply.promise;
        };
        const bridge = new NotificationBridge([recordRule], session, requester);

        const [task] = bridge.trigger('notifications/things/list_changed');

        expect(task?.state).toBe('running');
        expect(bridge.pending).toBe(1);
        // The request itself is issued on a later tick
        expect(calls).toEqual([]);

        reply.resolve({ things: [1] });
        await bridge.drain();

        expect(calls).toEqual(['things/list']);
        expect(task?.state).toBe('fulfilled');
        expect(session.results).toEqual([{ things: [1] }]);
        expect(bridge.pending).toBe(0);
    });

    test('ignores notifications without a rule and skips disabled rules', () => {
        const session: Session = { name: 's', results: [] };
        const requester = vi.fn<FollowUpRequester>(async () => ({}));
        const bridge = new NotificationBridge([{ ...recordRule, enabled: () => false }], session, requester);

        expect(bridge.handles('notifications/other')).toBe(false);
        expect(bridge.trigger('notifications/other')).toEqual([]);
        expect(bridge.trigger('notifications/things/list_changed')).toEqual([]);
        expect(requester).not.toHaveBeenCalled();
    });

    test('records failures and reports them', async () => {
        const session: Session = { name: 's', results: [] };
        const failures: Array<{ error: unknown; task: FollowUpTask }> = [];
        const bridge = new NotificationBridge(
            [recordRule],
            session,
            async () => {
                throw new Error('peer went away');
            },
            { onError: (error, task) => failures.push({ error, task }) }
        );

        const [task] = bridge.trigger('notifications/things/list_changed');
        await bridge.drain();

        expect(task?.state).toBe('rejected');
        expect(task?.error).toEqual(new Error('peer went away'));
        expect(failures).toHaveLength(1);
        expect(failures[0]?.task).toBe(task);
    });

    test('abortAll cancels the token handed to the requester', async () => {
        const session: Session = { name: 's', results: [] };
        let seen: AbortSignal | undefined;
        const bridge = new NotificationBridge([recordRule], session, (_method, _params, { signal }) => {
            seen = signal;
            return new Promise((_resolve, reject) => signal.addEventListener('abort', () => reject(signal.reason), { once: true }));
        });

        const [task] = bridge.trigger('notifications/things/list_changed');
        await vi.waitFor(() => expect(seen).toBeDefined());
        bridge.abortAll(new Error('session over'));
        await bridge.drain();

        expect(seen?.aborted).toBe(true);
        expect(task?.state).toBe('rejected');
        expect(task?.error).toEqual(new Error('session over'));
    });

    test('defineBridgeRule validates the result', async () => {
        const session: Session = { name: 's', results: [] };
        const rule = defineBridgeRule<Session, { count: number }>({
            notification: 'notifications/counter/changed',
            request: 'counter/get',
            resultSchema: z.object({ count: z.number() }),
            onResult: (s, result) => s.results.push(result.count)
        });
        const bridge = new NotificationBridge([rule], session, async () => ({ count: 'three' }));

        const [task] = bridge.trigger('notifications/counter/changed');
        await bridge.drain();

        expect(task?.error).toBeInstanceOf(ValidationError);
        expect(task?.error).toMatchObject({ message: 'Invalid counter/get result' });
        expect(session.results).toEqual([]);
    });
});

describe('default bridge rules', () => {
    async function connect(server: Server, client: Client) {
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        const [session] = await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
        return session;
    }

    test('roots/list_changed makes the server fetch roots/list', async () => {
        const server = new Server({ name: 'test', version: '1.0.0' }, { logger: silentLogger });
        const client = new Client(
            { name: 'test-client', version: '1.0.0' },
            { logger: silentLogger, capabilities: { roots: { listChanged: true } }, roots: [{ uri: 'file:///work/a' }] }
        );
        const session = await connect(server, client);
        const changes: Array<{ sessionId: string; roots: Root[] }> = [];
        server.events.on('roots:changed', event => changes.push(event));

        await client.setRoots([{ uri: 'file:///work/b', name: 'b' }]);
        await vi.waitFor(() => expect(changes).toHaveLength(1));

        expect(session.roots).toEqual([{ uri: 'file:///work/b', name: 'b' }]);
        expect(changes[0]).toEqual({ sessionId: session.sessionId, roots: [{ uri: 'file:///work/b', name: 'b' }] });
        expect(session.pendingFollowUps).toBe(0);
    });

    test('the server ignores roots/list_changed from a client without listChanged', async () => {
        const server = new Server({ name: 'test', version: '1.0.0' }, { logger: silentLogger });
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger, capabilities: { roots: {} } });
        const session = await connect(server, client);
        // Sent raw: the client itself refuses to announce what it did not declare
        await client.transport?.send({ jsonrpc: '2.0', method: Method.RootsListChanged });

        expect(session.pendingFollowUps).toBe(0);
        expect(session.roots).toEqual([]);
    });

    test('list_changed notifications refresh the client caches', async () => {
        const tools = {
            handle: () => ({ tools: [{ name: 'search', inputSchema: { type: 'object' } }] })
        };
        const server = new Server({ name: 'test', version: '1.0.0' }, { logger: silentLogger, managers: { tools } });
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });
        await connect(server, client);
        const changed = vi.fn();
        client.events.on('tools:changed', changed);

        await server.sendToolListChanged();
        await vi.waitFor(() => expect(changed).toHaveBeenCalledTimes(1));

        expect(client.tools.map(tool => tool.name)).toEqual(['search']);
    });
});
