import { CapabilityError, TransportError } from '../errors.js';
import { InMemoryTransport } from '../inMemory.js';
import { SessionPhase } from '../shared/lifecycle.js';
import { silentLogger } from '../shared/logger.js';
import type { Transport } from '../shared/transport.js';
import type { JSONRPCMessage } from '../types.js';
import { LATEST_PROTOCOL_VERSION } from '../types.js';
import type { ServerEvents, ServerSession, ToolsCall } from './server.js';
import { Server } from './server.js';

const tools = {
    handle(ctx: { session: ServerSession; requestId?: string | number }, call: ToolsCall) {
        if (call.method === 'tools/list') {
            return { tools: [{ name: 'whoami', inputSchema: { type: 'object' } }] };
        }
        const caller = ctx.session.clientVersion?.name ?? 'unknown';
        return { content: [{ type: 'text', text: `${caller} asked ${call.params.name} as request ${String(ctx.requestId)}` }] };
    }
};

let generated = 0;

function createServer() {
    return new Server(
        { name: 'server-test', version: '1.0.0' },
        { logger: silentLogger, managers: { tools }, sessionIdGenerator: () => `generated-${++generated}` }
    );
}

/**
 * Connects a bare transport to `server`, optionally walking it through the handshake.
 */
async function rawPeer(server: Server, handshake: boolean) {
    const [peer, serverTransport] = InMemoryTransport.createLinkedPair();
    const received: JSONRPCMessage[] = [];
    peer.onmessage = message => received.push(message);
    await peer.start();
    const session = await server.connect(serverTransport);

    if (handshake) {
        await peer.send({
            jsonrpc: '2.0',
            id: 0,
            method: 'initialize',
            params: { protocolVersion: LATEST_PROTOCOL_VERSION, capabilities: {}, clientInfo: { name: 'raw-peer', version: '1.0.0' } }
        });
        await peer.send({ jsonrpc: '2.0', method: 'notifications/initialized' });
        await vi.waitFor(() => expect(session.phase).toBe(SessionPhase.Ready));
    }
    return { peer, serverTransport, session, received };
}

function notifications(messages: JSONRPCMessage[]): string[] {
    return messages.flatMap(message => ('method' in message && !('id' in message) ? [message.method] : []));
}

beforeEach(() => {
    generated = 0;
});

describe('Server', () => {
    test('adds a capability for each manager', () => {
        const server = new Server(
            { name: 'caps', version: '1.0.0' },
            {
                logger: silentLogger,
                capabilities: { tools: { listChanged: false } },
                managers: { tools, prompts: { handle: () => ({ prompts: [] }) } }
            }
        );

        expect(server.capabilities).toEqual({ tools: { listChanged: false }, prompts: { listChanged: true } });
    });

    test('tracks sessions and reports their lifetime', async () => {
        const server = createServer();
        const opened: string[] = [];
        const closed: ServerEvents['session:closed'][] = [];
        server.events.on('session:opened', ({ sessionId }) => opened.push(sessionId));
        server.events.on('session:closed', event => closed.push(event));

        const { peer, session } = await rawPeer(server, true);

        expect(session.sessionId).toBe('generated-1');
        expect(opened).toEqual(['generated-1']);
        expect(server.getSession('generated-1')).toBe(session);

        await peer.close();

        expect(closed).toEqual([{ sessionId: 'generated-1', reason: 'Connection closed' }]);
        expect(server.sessions.size).toBe(0);
    });

    test('forgets a session whose transport fails to start', async () => {
        const server = createServer();
        const transport: Transport = {
            start: () => Promise.reject(new Error('cannot start')),
            send: async () => {},
            close: async () => {}
        };

        await expect(server.connect(transport)).rejects.toThrow('cannot start');
        expect(server.sessions.size).toBe(0);
    });

    test('passes the session and request id to managers', async () => {
        const server = createServer();
        const { peer, received } = await rawPeer(server, true);

        await peer.send({ jsonrpc: '2.0', id: 'call-1', method: 'tools/call', params: { name: 'whoami' } });

        await vi.waitFor(() =>
            expect(received).toContainEqual({
                jsonrpc: '2.0',
                id: 'call-1',
                result: { content: [{ type: 'text', text: 'raw-peer asked whoami as request call-1' }] }
            })
        );
    });

    test('broadcasts only to sessions that completed the handshake', async () => {
        const server = createServer();
        const ready = await rawPeer(server, true);
        const pending = await rawPeer(server, false);

        await server.sendToolListChanged();

        expect(notifications(ready.received)).toEqual(['notifications/tools/list_changed']);
        expect(notifications(pending.received)).toEqual([]);
    });

    test('reports a broadcast the server has no capability for', async () => {
        const server = createServer();
        const { session } = await rawPeer(server, true);
        const errors: ServerEvents['error'][] = [];
        server.events.on('error', event => errors.push(event));

        await server.sendPromptListChanged();

        expect(errors).toHaveLength(1);
        expect(errors[0]?.sessionId).toBe(session.sessionId);
        expect(errors[0]?.error).toBeInstanceOf(CapabilityError);
        expect(errors[0]?.context).toBe('broadcast notifications/prompts/list_changed');
    });

    test('a failed resource update is reported without stopping the others', async () => {
        const server = new Server(
            { name: 'server-test', version: '1.0.0' },
            { logger: silentLogger, capabilities: { resources: { subscribe: true } }, managers: { resources: { handle: () => ({}) } } }
        );
        const healthy = await rawPeer(server, true);
        const broken = await rawPeer(server, true);
        for (const peer of [healthy.peer, broken.peer]) {
            await peer.send({ jsonrpc: '2.0', id: 1, method: 'resources/subscribe', params: { uri: 'file:///a.txt' } });
        }
        await vi.waitFor(() => expect(broken.session.subscriptions.has('file:///a.txt')).toBe(true));
        await vi.waitFor(() => expect(healthy.session.subscriptions.has('file:///a.txt')).toBe(true));
        broken.serverTransport.send = async () => {
            throw TransportError.io('pipe broke');
        };
        const errors: ServerEvents['error'][] = [];
        server.events.on('error', event => errors.push(event));

        await server.sendResourceUpdated('file:///a.txt');

        expect(notifications(healthy.received)).toEqual(['notifications/resources/updated']);
        expect(errors).toHaveLength(1);
        expect(errors[0]?.sessionId).toBe(broken.session.sessionId);
        expect(errors[0]?.context).toBe('resource update file:///a.txt');
    });

    test('close ends every session', async () => {
        const server = createServer();
        const first = await rawPeer(server, true);
        const second = await rawPeer(server, false);

        await server.close();

        expect(first.session.phase).toBe(SessionPhase.Terminated);
        expect(second.session.phase).toBe(SessionPhase.Terminated);
        expect(server.sessions.size).toBe(0);
    });
});
