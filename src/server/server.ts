import { randomUUID } from 'node:crypto';

import { CapabilityError, ProtocolError, StateError } from '../errors.js';
import { defineBridgeRule } from '../shared/bridge.js';
import type { DispatchTable, HandlerContext } from '../shared/dispatch.js';
import { DispatchTableBuilder } from '../shared/dispatch.js';
import { TypedEventEmitter } from '../shared/events.js';
import type { PeerRecord } from '../shared/lifecycle.js';
import { negotiateProtocolVersion, SessionPhase } from '../shared/lifecycle.js';
import type { Logger } from '../shared/logger.js';
import { consoleLogger } from '../shared/logger.js';
import type { RequestOptions, SessionOptions } from '../shared/session.js';
import { Session } from '../shared/session.js';
import type { Transport } from '../shared/transport.js';
import type {
    CallToolRequestParams,
    ClientCapabilities,
    CompleteRequestParams,
    CreateMessageRequestParams,
    CreateMessageResult,
    GetPromptRequestParams,
    Implementation,
    InitializeRequestParams,
    InitializeResult,
    ListRootsResult,
    Root,
    ServerCapabilities
} from '../types.js';
import {
    CallToolRequestParamsSchema,
    CompleteRequestParamsSchema,
    CreateMessageResultSchema,
    GetPromptRequestParamsSchema,
    InitializeRequestParamsSchema,
    ListRootsResultSchema,
    Method,
    PaginatedRequestParamsSchema,
    ResourceRequestParamsSchema
} from '../types.js';

// ═══════════════════════════════════════════════════════════════════════════
// Domain managers
// ═══════════════════════════════════════════════════════════════════════════

type PaginatedParams = { cursor?: string } | undefined;

export type ToolsCall = { method: 'tools/list'; params: PaginatedParams } | { method: 'tools/call'; params: CallToolRequestParams };

export type ResourcesCall =
    | { method: 'resources/list'; params: PaginatedParams }
    | { method: 'resources/templates/list'; params: PaginatedParams }
    | { method: 'resources/read'; params: { uri: string } }
    | { method: 'resources/subscribe'; params: { uri: string } }
    | { method: 'resources/unsubscribe'; params: { uri: string } };

export type PromptsCall = { method: 'prompts/list'; params: PaginatedParams } | { method: 'prompts/get'; params: GetPromptRequestParams };

export type CompletionsCall = { method: 'completion/complete'; params: CompleteRequestParams };

/**
 * Business logic behind a group of methods. The session only calls it once the
 * lifecycle check and the inbound chain have passed, with decoded params.
 */
export interface DomainManager<TCall> {
    handle(context: HandlerContext<ServerSession>, call: TCall): unknown;
}

export interface ServerManagers {
    tools?: DomainManager<ToolsCall>;
    resources?: DomainManager<ResourcesCall>;
    prompts?: DomainManager<PromptsCall>;
    completions?: DomainManager<CompletionsCall>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Options & events
// ═══════════════════════════════════════════════════════════════════════════

export interface ServerOptions extends SessionOptions {
    /**
     * Capabilities to advertise. Each manager given in `managers` adds its own
     * capability (with `listChanged`) unless it is declared here already.
     */
    capabilities?: ServerCapabilities;
    managers?: ServerManagers;
    /**
     * Optional instructions describing how to use the server and its features.
     */
    instructions?: string;
    /** Generates ids for sessions whose transport has none */
    sessionIdGenerator?: () => string;
}

export type ServerEvents = {
    'session:opened': { sessionId: string };
    'session:closed': { sessionId: string; reason: string };
    'roots:changed': { sessionId: string; roots: Root[] };
    error: { sessionId: string; error: Error; context?: string };
};

function mergeCapabilities(declared: ServerCapabilities, managers: ServerManagers): ServerCapabilities {
    const capabilities: ServerCapabilities = { ...declared };
    if (managers.tools) {
        capabilities.tools ??= { listChanged: true };
    }
    if (managers.resources) {
        capabilities.resources ??= { listChanged: true };
    }
    if (managers.prompts) {
        capabilities.prompts ??= { listChanged: true };
    }
    if (managers.completions) {
        capabilities.completions ??= {};
    }
    return capabilities;
}

function buildDispatchTable(managers: ServerManagers, capabilities: ServerCapabilities): DispatchTable<ServerSession> {
    const builder = new DispatchTableBuilder<ServerSession>()
        .onRequest(Method.Initialize, InitializeRequestParamsSchema, (ctx, params) => ctx.session.handleInitialize(params))
        .onNotification(Method.Initialized, ctx => ctx.session.handleInitialized())
        .onRequest(Method.Ping, () => ({}));

    const { tools, resources, prompts, completions } = managers;
    if (tools) {
        builder
            .onRequest(Method.ToolsList, PaginatedRequestParamsSchema, (ctx, params) => tools.handle(ctx, { method: 'tools/list', params }))
            .onRequest(Method.ToolsCall, CallToolRequestParamsSchema, (ctx, params) => tools.handle(ctx, { method: 'tools/call', params }));
    }
    if (resources) {
        builder
            .onRequest(Method.ResourcesList, PaginatedRequestParamsSchema, (ctx, params) =>
                resources.handle(ctx, { method: 'resources/list', params })
            )
            .onRequest(Method.ResourcesTemplatesList, PaginatedRequestParamsSchema, (ctx, params) =>
                resources.handle(ctx, { method: 'resources/templates/list', params })
            )
            .onRequest(Method.ResourcesRead, ResourceRequestParamsSchema, (ctx, params) =>
                resources.handle(ctx, { method: 'resources/read', params })
            );
        if (capabilities.resources?.subscribe) {
            builder
                .onRequest(Method.ResourcesSubscribe, ResourceRequestParamsSchema, async (ctx, params) => {
                    await resources.handle(ctx, { method: 'resources/subscribe', params });
                    ctx.session.subscriptions.add(params.uri);
                    return {};
                })
                .onRequest(Method.ResourcesUnsubscribe, ResourceRequestParamsSchema, async (ctx, params) => {
                    await resources.handle(ctx, { method: 'resources/unsubscribe', params });
                    ctx.session.subscriptions.delete(params.uri);
                    return {};
                });
        }
    }
    if (prompts) {
        builder
            .onRequest(Method.PromptsList, PaginatedRequestParamsSchema, (ctx, params) => prompts.handle(ctx, { method: 'prompts/list', params }))
            .onRequest(Method.PromptsGet, GetPromptRequestParamsSchema, (ctx, params) => prompts.handle(ctx, { method: 'prompts/get', params }));
    }
    if (completions) {
        builder.onRequest(Method.CompletionComplete, CompleteRequestParamsSchema, (ctx, params) =>
            completions.handle(ctx, { method: 'completion/complete', params })
        );
    }
    return builder.build();
}

// ═══════════════════════════════════════════════════════════════════════════
// Server
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The server role. Holds what every session shares (dispatch table, chains,
 * capabilities) and creates one `ServerSession` per connected transport.
 *
 * @example
 * ```typescript
 * const server = new Server({ name: 'files', version: '1.0.0' }, { managers: { tools: myTools } });
 * await server.connect(new StdioServerTransport());
 * ```
 */
export class Server {
    private readonly _sessions = new Map<string, ServerSession>();
    private readonly _dispatch: DispatchTable<ServerSession>;
    private readonly _logger: Logger;

    readonly capabilities: ServerCapabilities;
    readonly events: TypedEventEmitter<ServerEvents>;

    constructor(
        readonly serverInfo: Implementation,
        private readonly _options: ServerOptions = {}
    ) {
        this._logger = _options.logger ?? consoleLogger;
        const managers = _options.managers ?? {};
        this.capabilities = Object.freeze(mergeCapabilities(_options.capabilities ?? {}, managers));
        this._dispatch = buildDispatchTable(managers, this.capabilities);
        this.events = new TypedEventEmitter<ServerEvents>({
            onListenerError: (error, event) => this._logger.error(`Listener for ${event} failed`, { error })
        });
    }

    get instructions(): string | undefined {
        return this._options.instructions;
    }

    get sessions(): ReadonlyMap<string, ServerSession> {
        return this._sessions;
    }

    getSession(sessionId: string): ServerSession | undefined {
        return this._sessions.get(sessionId);
    }

    /**
     * Creates a session bound to `transport` and starts it.
     */
    async connect(transport: Transport): Promise<ServerSession> {
        const session = new ServerSession(this, this._options);
        const sessionId = transport.sessionId ?? (this._options.sessionIdGenerator ?? randomUUID)();

        this._sessions.set(sessionId, session);
        session.events.on('session:closed', ({ reason }) => {
            this._sessions.delete(sessionId);
            this.events.emit('session:closed', { sessionId, reason });
        });
        session.events.on('roots:changed', ({ roots }) => this.events.emit('roots:changed', { sessionId, roots }));
        session.events.on('error', ({ error, context }) => this.events.emit('error', { sessionId, error, context }));

        try {
            await session.attach(transport, this._dispatch, sessionId);
        } catch (error) {
            this._sessions.delete(sessionId);
            throw error;
        }
        this._logger.info('Session opened', { sessionId });
        this.events.emit('session:opened', { sessionId });
        return session;
    }

    /**
     * Sends a notification to every session that completed the handshake.
     * Failures on one session are reported through its error channel.
     */
    async broadcast(method: string, params?: unknown): Promise<void> {
        const ready = [...this._sessions.values()].filter(session => session.phase === SessionPhase.Ready);
        await Promise.all(
            ready.map(session => session.notification(method, params).catch((error: unknown) => session.reportFailure(error, `broadcast ${method}`)))
        );
    }

    sendToolListChanged(): Promise<void> {
        return this.broadcast(Method.ToolsListChanged);
    }

    sendResourceListChanged(): Promise<void> {
        return this.broadcast(Method.ResourcesListChanged);
    }

    sendPromptListChanged(): Promise<void> {
        return this.broadcast(Method.PromptsListChanged);
    }

    /**
     * Notifies the sessions subscribed to `uri` that the resource changed.
     */
    async sendResourceUpdated(uri: string): Promise<void> {
        const subscribed = [...this._sessions.values()].filter(session => session.subscriptions.has(uri));
        await Promise.all(
            subscribed.map(session =>
                session.sendResourceUpdated(uri).catch((error: unknown) => session.reportFailure(error, `resource update ${uri}`))
            )
        );
    }

    /**
     * Closes every session.
     */
    async close(): Promise<void> {
        await Promise.all([...this._sessions.values()].map(session => session.close()));
    }
}

/**
 * The server side of one connection.
 */
export class ServerSession extends Session<ServerSession, ClientCapabilities, Implementation> {
    private _roots: Root[] = [];

    /** Resource URIs this client subscribed to */
    readonly subscriptions = new Set<string>();

    constructor(
        readonly server: Server,
        options: SessionOptions = {}
    ) {
        super(options);
    }

    protected _self(): ServerSession {
        return this;
    }

    /**
     * After initialization has completed, this will be populated with the client's reported capabilities.
     */
    get clientCapabilities(): ClientCapabilities | undefined {
        return this._peer?.capabilities;
    }

    /**
     * After initialization has completed, this will be populated with information about the client's name and version.
     */
    get clientVersion(): Implementation | undefined {
        return this._peer?.info;
    }

    get protocolVersion(): string | undefined {
        return this._peer?.protocolVersion;
    }

    /**
     * The last roots list received from the client.
     */
    get roots(): readonly Root[] {
        return this._roots;
    }

    async attach(transport: Transport, dispatch: DispatchTable<ServerSession>, sessionId: string): Promise<void> {
        await this._attach(
            transport,
            {
                dispatch,
                bridgeRules: [
                    defineBridgeRule<ServerSession, ListRootsResult>({
                        notification: Method.RootsListChanged,
                        request: Method.RootsList,
                        resultSchema: ListRootsResultSchema,
                        enabled: session => session.clientCapabilities?.roots?.listChanged === true,
                        onResult: (session, result) => session._setRoots(result.roots)
                    })
                ]
            },
            sessionId
        );
    }

    /**
     * Requests the client's roots and stores them.
     */
    async listRoots(options?: RequestOptions): Promise<ListRootsResult> {
        const result = await this.request(Method.RootsList, undefined, ListRootsResultSchema, options);
        this._setRoots(result.roots);
        return result;
    }

    /**
     * Asks the client to sample its language model. Requires the client's `sampling` capability.
     */
    createMessage(params: CreateMessageRequestParams, options?: RequestOptions): Promise<CreateMessageResult> {
        return this.request(Method.SamplingCreateMessage, params, CreateMessageResultSchema, options);
    }

    async sendResourceUpdated(uri: string): Promise<void> {
        await this.notification(Method.ResourceUpdated, { uri });
    }

    reportFailure(error: unknown, context: string): void {
        this._reportFailure(error, context);
    }

    handleInitialize(params: InitializeRequestParams): InitializeResult {
        if (this.phase !== SessionPhase.Unstarted) {
            throw ProtocolError.invalidRequest('Session already initialized');
        }
        const protocolVersion = negotiateProtocolVersion(params.protocolVersion);
        const peer: PeerRecord<ClientCapabilities, Implementation> = {
            capabilities: params.capabilities,
            info: params.clientInfo,
            protocolVersion
        };
        this._lifecycle.recordPeer(peer);
        this._lifecycle.transition(SessionPhase.Initializing);

        const result: InitializeResult = {
            protocolVersion,
            capabilities: this.server.capabilities,
            serverInfo: this.server.serverInfo
        };
        const instructions = this.server.instructions;
        return instructions === undefined ? result : { ...result, instructions };
    }

    handleInitialized(): void {
        if (this.phase !== SessionPhase.Initializing) {
            this._logger.warning(`Ignoring ${Method.Initialized} in phase ${this.phase}`, { sessionId: this.sessionId });
            return;
        }
        this._lifecycle.transition(SessionPhase.Ready);
    }

    protected assertCapabilityForMethod(method: string): void {
        switch (method) {
            case Method.RootsList:
                if (!this.clientCapabilities) {
                    throw StateError.invalidState(`Session not initialized (required for ${method})`);
                }
                if (!this.clientCapabilities.roots) {
                    throw new CapabilityError('roots', method);
                }
                break;

            case Method.SamplingCreateMessage:
                if (!this.clientCapabilities) {
                    throw StateError.invalidState(`Session not initialized (required for ${method})`);
                }
                if (!this.clientCapabilities.sampling) {
                    throw new CapabilityError('sampling', method);
                }
                break;

            case Method.Ping:
                // No specific capability required for ping
                break;
        }
    }

    protected assertNotificationCapability(method: string): void {
        const capabilities = this.server.capabilities;
        switch (method) {
            case Method.ToolsListChanged:
                if (!capabilities.tools?.listChanged) {
                    throw new CapabilityError('tools.listChanged', method);
                }
                break;

            case Method.ResourcesListChanged:
                if (!capabilities.resources?.listChanged) {
                    throw new CapabilityError('resources.listChanged', method);
                }
                break;

            case Method.ResourceUpdated:
                if (!capabilities.resources?.subscribe) {
                    throw new CapabilityError('resources.subscribe', method);
                }
                break;

            case Method.PromptsListChanged:
                if (!capabilities.prompts?.listChanged) {
                    throw new CapabilityError('prompts.listChanged', method);
                }
                break;
        }
    }

    private _setRoots(roots: Root[]): void {
        this._roots = roots;
        this.events.emit('roots:changed', { roots });
    }
}
