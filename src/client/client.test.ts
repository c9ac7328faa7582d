import { CapabilityError, ProtocolError, StateError } from '../errors.js';
import { InMemoryTransport } from '../inMemory.js';
import type { CompletionsCall, PromptsCall, ResourcesCall } from '../server/server.js';
import { Server } from '../server/server.js';
import { SessionPhase } from '../shared/lifecycle.js';
import { silentLogger } from '../shared/logger.js';
import type { Transport } from '../shared/transport.js';
import type { CreateMessageRequestParams, ListRootsResult } from '../types.js';
import { ErrorCode, isJSONRPCRequest, LATEST_PROTOCOL_VERSION } from '../types.js';
import { Client } from './client.js';

const resources = {
    handle(_ctx: unknown, call: ResourcesCall) {
        switch (call.method) {
            case 'resources/list':
                return { resources: [{ uri: 'file:///notes/today.md', name: 'today' }] };
            case 'resources/templates/list':
                return { resourceTemplates: [{ uriTemplate: 'file:///notes/{day}.md', name: 'day' }] };
            case 'resources/read':
                return { contents: [{ uri: call.params.uri, text: `contents of ${call.params.uri}` }] };
            default:
                return {};
        }
    }
};

const prompts = {
    handle(_ctx: unknown, call: PromptsCall) {
        if (call.method === 'prompts/list') {
            return { prompts: [{ name: 'greet' }] };
        }
        return {
            messages: [{ role: 'user', content: { type: 'text', text: `Hello ${call.params.arguments?.name ?? 'there'}` } }]
        };
    }
};

const completions = {
    handle(_ctx: unknown, call: CompletionsCall) {
        const candidates = ['alpha', 'alpine', 'beta'].filter(value => value.startsWith(call.params.argument.value));
        return { completion: { values: candidates, total: candidates.length, hasMore: false } };
    }
};

function createServer() {
    return new Server(
        { name: 'notes', version: '2.1.0' },
        {
            logger: silentLogger,
            instructions: 'Use read for full text.',
            capabilities: { resources: { subscribe: true, listChanged: true } },
            managers: { resources, prompts, completions }
        }
    );
}

async function connect(server: Server, client: Client) {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const [session] = await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    return session;
}

describe('Client', () => {
    test('records what the server reported during the handshake', async () => {
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });
        const session = await connect(createServer(), client);

        expect(client.phase).toBe(SessionPhase.Ready);
        expect(client.serverVersion).toEqual({ name: 'notes', version: '2.1.0' });
        expect(client.protocolVersion).toBe(LATEST_PROTOCOL_VERSION);
        expect(client.instructions).toBe('Use read for full text.');
        expect(client.serverCapabilities).toEqual({
            resources: { subscribe: true, listChanged: true },
            prompts: { listChanged: true },
            completions: {}
        });
        expect(session.clientVersion).toEqual({ name: 'test-client', version: '1.0.0' });
        expect(session.phase).toBe(SessionPhase.Ready);
    });

    test('closes the session when the server speaks an unsupported version', async () => {
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        serverTransport.onmessage = message => {
            if (isJSONRPCRequest(message)) {
                void serverTransport.send({
                    jsonrpc: '2.0',
                    id: message.id,
                    result: { protocolVersion: '1999-01-01', capabilities: {}, serverInfo: { name: 'old', version: '0.1.0' } }
                });
            }
        };
        await serverTransport.start();
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });

        await expect(client.connect(clientTransport)).rejects.toThrow("Server's protocol version is not supported: 1999-01-01");
        expect(client.phase).toBe(SessionPhase.Terminated);
    });

    test('repeats the handshake when its transport reconnects', async () => {
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        const methods: unknown[] = [];
        serverTransport.onmessage = message => {
            if (!('method' in message)) {
                return;
            }
            methods.push(message.method);
            if (isJSONRPCRequest(message) && message.method === 'initialize') {
                void serverTransport.send({
                    jsonrpc: '2.0',
                    id: message.id,
                    result: { protocolVersion: LATEST_PROTOCOL_VERSION, capabilities: { tools: {} }, serverInfo: { name: 'flaky', version: '1.0.0' } }
                });
            }
        };
        await serverTransport.start();
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });
        await client.connect(clientTransport);
        const reconnected = new Promise<void>(resolve => {
            client.events.on('transport:reconnected', () => resolve());
        });
        const unanswered = client.listTools();
        await vi.waitFor(() => expect(methods).toContain('tools/list'));

        const transport: Transport = clientTransport;
        transport.onreconnect?.();

        await expect(unanswered).rejects.toThrow('Connection lost before the response arrived');
        await reconnected;
        expect(methods).toEqual(['initialize', 'notifications/initialized', 'tools/list', 'initialize', 'notifications/initialized']);
        expect(client.phase).toBe(SessionPhase.Ready);
        expect(client.serverVersion).toEqual({ name: 'flaky', version: '1.0.0' });
    });

    test('reads resources and templates', async () => {
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });
        await connect(createServer(), client);

        const listed = await client.listResources();
        const templates = await client.listResourceTemplates();
        const read = await client.readResource({ uri: 'file:///notes/today.md' });

        expect(listed.resources).toEqual([{ uri: 'file:///notes/today.md', name: 'today' }]);
        expect(client.resources).toEqual(listed.resources);
        expect(templates.resourceTemplates).toEqual([{ uriTemplate: 'file:///notes/{day}.md', name: 'day' }]);
        expect(read.contents).toEqual([{ uri: 'file:///notes/today.md', text: 'contents of file:///notes/today.md' }]);
    });

    test('subscribed resources announce updates', async () => {
        const server = createServer();
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });
        const session = await connect(server, client);
        const updates: string[] = [];
        client.events.on('resource:updated', ({ uri }) => updates.push(uri));

        await client.subscribeResource({ uri: 'file:///notes/today.md' });
        expect(session.subscriptions.has('file:///notes/today.md')).toBe(true);

        await server.sendResourceUpdated('file:///notes/today.md');
        await server.sendResourceUpdated('file:///notes/other.md');
        await vi.waitFor(() => expect(updates).toEqual(['file:///notes/today.md']));

        await client.unsubscribeResource({ uri: 'file:///notes/today.md' });
        expect(session.subscriptions.size).toBe(0);
    });

    test('gets prompts and completions', async () => {
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });
        await connect(createServer(), client);

        const prompt = await client.getPrompt({ name: 'greet', arguments: { name: 'Ada' } });
        const completion = await client.complete({ ref: { type: 'ref/prompt', name: 'greet' }, argument: { name: 'name', value: 'al' } });

        expect(prompt.messages).toEqual([{ role: 'user', content: { type: 'text', text: 'Hello Ada' } }]);
        expect(completion.completion).toEqual({ values: ['alpha', 'alpine'], total: 2, hasMore: false });
    });

    test('serves its roots to the server', async () => {
        const server = createServer();
        const client = new Client(
            { name: 'test-client', version: '1.0.0' },
            { logger: silentLogger, capabilities: { roots: {} }, roots: [{ uri: 'file:///home/user/project', name: 'project' }] }
        );
        const session = await connect(server, client);

        const result = await session.listRoots();

        expect(result.roots).toEqual([{ uri: 'file:///home/user/project', name: 'project' }]);
        expect(session.roots).toEqual(result.roots);
    });

    test('answers server requests that arrive before its initialized notification is acknowledged', async () => {
        const server = createServer();
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        const deliver = clientTransport.send.bind(clientTransport);
        clientTransport.send = async (message, options) => {
            await deliver(message, options);
            await new Promise(resolve => setTimeout(resolve, 20));
        };
        const client = new Client(
            { name: 'test-client', version: '1.0.0' },
            { logger: silentLogger, capabilities: { roots: {} }, roots: [{ uri: 'file:///srv/data', name: 'data' }] }
        );
        const session = await server.connect(serverTransport);
        const listed = new Promise<ListRootsResult>((resolve, reject) => {
            session.events.on('phase:changed', ({ to }) => {
                if (to === SessionPhase.Ready) {
                    session.listRoots().then(resolve, reject);
                }
            });
        });

        await client.connect(clientTransport);

        await expect(listed).resolves.toEqual({ roots: [{ uri: 'file:///srv/data', name: 'data' }] });
    });

    test('the server cannot ask for roots the client did not declare', async () => {
        const server = createServer();
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });
        const session = await connect(server, client);

        await expect(session.listRoots()).rejects.toBeInstanceOf(CapabilityError);
    });

    test('answers sampling requests with its handler', async () => {
        const seen: CreateMessageRequestParams[] = [];
        const client = new Client(
            { name: 'test-client', version: '1.0.0' },
            {
                logger: silentLogger,
                sampling: params => {
                    seen.push(params);
                    return { model: 'test-model', role: 'assistant', content: { type: 'text', text: 'Sampled reply' } };
                }
            }
        );
        const session = await connect(createServer(), client);

        const result = await session.createMessage({
            messages: [{ role: 'user', content: { type: 'text', text: 'Summarize the notes' } }],
            maxTokens: 64
        });

        expect(client.capabilities).toEqual({ sampling: {} });
        expect(session.clientCapabilities).toEqual({ sampling: {} });
        expect(result).toEqual({ model: 'test-model', role: 'assistant', content: { type: 'text', text: 'Sampled reply' } });
        expect(seen).toEqual([{ messages: [{ role: 'user', content: { type: 'text', text: 'Summarize the notes' } }], maxTokens: 64 }]);
    });

    test('rejects sampling params that fail validation', async () => {
        const client = new Client(
            { name: 'test-client', version: '1.0.0' },
            { logger: silentLogger, sampling: () => ({ model: 'test-model', role: 'assistant', content: { type: 'text', text: '' } }) }
        );
        const session = await connect(createServer(), client);

        await expect(session.createMessage({ messages: [], maxTokens: 0 })).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    });

    test('the server cannot sample a client without the sampling capability', async () => {
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });
        const session = await connect(createServer(), client);

        await expect(session.createMessage({ messages: [], maxTokens: 16 })).rejects.toThrow(
            'Peer does not support sampling (required for sampling/createMessage)'
        );
    });

    test('a declared sampling capability without a handler answers method not found', async () => {
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger, capabilities: { sampling: {} } });
        const session = await connect(createServer(), client);

        const rejection = session.createMessage({ messages: [], maxTokens: 16 });

        await expect(rejection).rejects.toBeInstanceOf(ProtocolError);
        await expect(rejection).rejects.toMatchObject({ code: ErrorCode.MethodNotFound, message: 'Method not found: sampling/createMessage' });
    });

    test('refuses list-changed notifications it did not declare', async () => {
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger, capabilities: { roots: {} } });
        await connect(createServer(), client);

        await expect(client.sendRootsListChanged()).rejects.toThrow(
            'Peer does not support roots.listChanged (required for notifications/roots/list_changed)'
        );
    });

    test('refuses to call the server before connecting', async () => {
        const client = new Client({ name: 'test-client', version: '1.0.0' }, { logger: silentLogger });

        await expect(client.listResources()).rejects.toBeInstanceOf(StateError);
    });
});
