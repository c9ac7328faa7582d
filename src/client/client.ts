import { CapabilityError, ProtocolError, StateError } from '../errors.js';
import type { BridgeRule } from '../shared/bridge.js';
import { defineBridgeRule } from '../shared/bridge.js';
import type { HandlerContext } from '../shared/dispatch.js';
import { DispatchTableBuilder } from '../shared/dispatch.js';
import { SessionPhase } from '../shared/lifecycle.js';
import type { RequestOptions, SessionOptions } from '../shared/session.js';
import { Session } from '../shared/session.js';
import type { Transport } from '../shared/transport.js';
import type {
    CallToolRequestParams,
    CallToolResult,
    ClientCapabilities,
    CompleteRequestParams,
    CompleteResult,
    CreateMessageRequestParams,
    CreateMessageResult,
    GetPromptRequestParams,
    GetPromptResult,
    Implementation,
    InitializeResult,
    ListPromptsResult,
    ListResourcesResult,
    ListResourceTemplatesResult,
    ListRootsResult,
    ListToolsResult,
    Prompt,
    ReadResourceResult,
    Resource,
    Root,
    ServerCapabilities,
    Tool
} from '../types.js';
import {
    CallToolResultSchema,
    CompleteResultSchema,
    CreateMessageRequestParamsSchema,
    CreateMessageResultSchema,
    EmptyResultSchema,
    GetPromptResultSchema,
    InitializeResultSchema,
    LATEST_PROTOCOL_VERSION,
    ListPromptsResultSchema,
    ListResourcesResultSchema,
    ListResourceTemplatesResultSchema,
    ListToolsResultSchema,
    Method,
    ReadResourceResultSchema,
    ResourceRequestParamsSchema,
    SUPPORTED_PROTOCOL_VERSIONS
} from '../types.js';

/**
 * Answers a server's `sampling/createMessage` request, usually by calling a language model.
 */
export type SamplingHandler = (
    params: CreateMessageRequestParams,
    ctx: HandlerContext<Client>
) => CreateMessageResult | Promise<CreateMessageResult>;

export interface ClientOptions extends SessionOptions {
    /**
     * Capabilities to advertise as being supported by this client.
     */
    capabilities?: ClientCapabilities;
    /**
     * Roots served to the server through `roots/list`. Requires the `roots` capability.
     */
    roots?: Root[];
    /**
     * Handler for the server's sampling requests. Supplying one advertises the `sampling` capability.
     */
    sampling?: SamplingHandler;
}

type Cursor = { cursor?: string };

const CLIENT_DISPATCH = new DispatchTableBuilder<Client>()
    .onRequest(Method.Ping, () => ({}))
    .onRequest(Method.RootsList, ctx => ctx.session.handleListRoots())
    .onRequest(Method.SamplingCreateMessage, CreateMessageRequestParamsSchema, (ctx, params) => ctx.session.handleCreateMessage(params, ctx))
    .onNotification(Method.ResourceUpdated, ResourceRequestParamsSchema, (ctx, params) => {
        ctx.session.events.emit('resource:updated', { uri: params.uri });
    })
    .build();

const CLIENT_BRIDGE_RULES: readonly BridgeRule<Client>[] = [
    defineBridgeRule<Client, ListToolsResult>({
        notification: Method.ToolsListChanged,
        request: Method.ToolsList,
        resultSchema: ListToolsResultSchema,
        enabled: client => client.serverCapabilities?.tools !== undefined,
        onResult: (client, result) => client.updateCache('tools', result.tools)
    }),
    defineBridgeRule<Client, ListResourcesResult>({
        notification: Method.ResourcesListChanged,
        request: Method.ResourcesList,
        resultSchema: ListResourcesResultSchema,
        enabled: client => client.serverCapabilities?.resources !== undefined,
        onResult: (client, result) => client.updateCache('resources', result.resources)
    }),
    defineBridgeRule<Client, ListPromptsResult>({
        notification: Method.PromptsListChanged,
        request: Method.PromptsList,
        resultSchema: ListPromptsResultSchema,
        enabled: client => client.serverCapabilities?.prompts !== undefined,
        onResult: (client, result) => client.updateCache('prompts', result.prompts)
    })
];

interface ListCaches {
    tools: Tool[];
    resources: Resource[];
    prompts: Prompt[];
}

/**
 * The client role. One instance is one session with one server.
 *
 * The client will automatically begin the initialization flow with the server when connect() is called.
 *
 * @example
 * ```typescript
 * const client = new Client({ name: 'inspector', version: '1.0.0' });
 * await client.connect(new StdioClientTransport({ command: 'my-server' }));
 * const { tools } = await client.listTools();
 * ```
 */
export class Client extends Session<Client, ServerCapabilities, Implementation> {
    private readonly _capabilities: ClientCapabilities;
    private _roots: Root[];
    private readonly _sampling?: SamplingHandler;
    private _instructions?: string;
    private readonly _caches: ListCaches = { tools: [], resources: [], prompts: [] };

    /**
     * Initializes this client with the given name and version information.
     */
    constructor(
        private readonly _clientInfo: Implementation,
        options: ClientOptions = {}
    ) {
        super(options);
        this._sampling = options.sampling;
        const capabilities: ClientCapabilities = { ...options.capabilities };
        if (this._sampling) {
            capabilities.sampling ??= {};
        }
        this._capabilities = Object.freeze(capabilities);
        this._roots = options.roots ?? [];
    }

    protected _self(): Client {
        return this;
    }

    get capabilities(): ClientCapabilities {
        return this._capabilities;
    }

    /**
     * After initialization has completed, this will be populated with the server's reported capabilities.
     */
    get serverCapabilities(): ServerCapabilities | undefined {
        return this._peer?.capabilities;
    }

    /**
     * After initialization has completed, this will be populated with information about the server's name and version.
     */
    get serverVersion(): Implementation | undefined {
        return this._peer?.info;
    }

    get protocolVersion(): string | undefined {
        return this._peer?.protocolVersion;
    }

    /**
     * After initialization has completed, this may be populated with information about the server's instructions.
     */
    get instructions(): string | undefined {
        return this._instructions;
    }

    /** Last tool list fetched, by `listTools()` or after a list-changed notification */
    get tools(): readonly Tool[] {
        return this._caches.tools;
    }

    get resources(): readonly Resource[] {
        return this._caches.resources;
    }

    get prompts(): readonly Prompt[] {
        return this._caches.prompts;
    }

    get roots(): readonly Root[] {
        return this._roots;
    }

    /**
     * Connects to a server via the given transport and performs the handshake.
     * A failed handshake closes the session.
     */
    async connect(transport: Transport, options?: RequestOptions): Promise<void> {
        await this._attach(transport, { dispatch: CLIENT_DISPATCH, bridgeRules: CLIENT_BRIDGE_RULES });
        this._lifecycle.transition(SessionPhase.Initializing);
        try {
            const result = await this._initialize(options);

            this._lifecycle.recordPeer({ capabilities: result.capabilities, info: result.serverInfo, protocolVersion: result.protocolVersion });
            this._instructions = result.instructions;

            // Ready before `initialized` goes out: the server may call back before the send is acknowledged.
            this._lifecycle.transition(SessionPhase.Ready);
            await this.notification(Method.Initialized);
        } catch (error) {
            // Disconnect if initialization fails.
            await this.close();
            throw error;
        }
    }

    /**
     * Repeats the handshake on a reconnected transport. The server first met is kept as the peer.
     */
    protected async _reestablish(): Promise<void> {
        const result = await this._initialize();
        if (result.protocolVersion !== this.protocolVersion) {
            this._logger.warning(`Server switched protocol version to ${result.protocolVersion} on reconnect`, { sessionId: this.sessionId });
        }
        await this.notification(Method.Initialized);
    }

    private async _initialize(options?: RequestOptions): Promise<InitializeResult> {
        const result = await this.request(
            Method.Initialize,
            { protocolVersion: LATEST_PROTOCOL_VERSION, capabilities: this._capabilities, clientInfo: this._clientInfo },
            InitializeResultSchema,
            options
        );

        if (!SUPPORTED_PROTOCOL_VERSIONS.includes(result.protocolVersion)) {
            throw StateError.invalidState(`Server's protocol version is not supported: ${result.protocolVersion}`);
        }
        return result;
    }

    async listTools(params?: Cursor, options?: RequestOptions): Promise<ListToolsResult> {
        const result = await this.request(Method.ToolsList, params, ListToolsResultSchema, options);
        this.updateCache('tools', result.tools);
        return result;
    }

    callTool(params: CallToolRequestParams, options?: RequestOptions): Promise<CallToolResult> {
        return this.request(Method.ToolsCall, params, CallToolResultSchema, options);
    }

    async listResources(params?: Cursor, options?: RequestOptions): Promise<ListResourcesResult> {
        const result = await this.request(Method.ResourcesList, params, ListResourcesResultSchema, options);
        this.updateCache('resources', result.resources);
        return result;
    }

    listResourceTemplates(params?: Cursor, options?: RequestOptions): Promise<ListResourceTemplatesResult> {
        return this.request(Method.ResourcesTemplatesList, params, ListResourceTemplatesResultSchema, options);
    }

    readResource(params: { uri: string }, options?: RequestOptions): Promise<ReadResourceResult> {
        return this.request(Method.ResourcesRead, params, ReadResourceResultSchema, options);
    }

    async subscribeResource(params: { uri: string }, options?: RequestOptions): Promise<void> {
        await this.request(Method.ResourcesSubscribe, params, EmptyResultSchema, options);
    }

    async unsubscribeResource(params: { uri: string }, options?: RequestOptions): Promise<void> {
        await this.request(Method.ResourcesUnsubscribe, params, EmptyResultSchema, options);
    }

    async listPrompts(params?: Cursor, options?: RequestOptions): Promise<ListPromptsResult> {
        const result = await this.request(Method.PromptsList, params, ListPromptsResultSchema, options);
        this.updateCache('prompts', result.prompts);
        return result;
    }

    getPrompt(params: GetPromptRequestParams, options?: RequestOptions): Promise<GetPromptResult> {
        return this.request(Method.PromptsGet, params, GetPromptResultSchema, options);
    }

    complete(params: CompleteRequestParams, options?: RequestOptions): Promise<CompleteResult> {
        return this.request(Method.CompletionComplete, params, CompleteResultSchema, options);
    }

    /**
     * Replaces the roots and, once the session is ready, tells the server they changed.
     */
    async setRoots(roots: Root[]): Promise<void> {
        this._roots = roots;
        if (this.phase === SessionPhase.Ready && this._capabilities.roots?.listChanged) {
            await this.sendRootsListChanged();
        }
    }

    async sendRootsListChanged(): Promise<void> {
        await this.notification(Method.RootsListChanged);
    }

    handleListRoots(): ListRootsResult {
        if (!this._capabilities.roots) {
            throw ProtocolError.methodNotFound(Method.RootsList);
        }
        return { roots: [...this._roots] };
    }

    async handleCreateMessage(params: CreateMessageRequestParams, ctx: HandlerContext<Client>): Promise<CreateMessageResult> {
        if (!this._sampling || !this._capabilities.sampling) {
            throw ProtocolError.methodNotFound(Method.SamplingCreateMessage);
        }
        const result = CreateMessageResultSchema.safeParse(await this._sampling(params, ctx));
        if (!result.success) {
            throw ProtocolError.internalError('Invalid sampling result', { issues: result.error.issues });
        }
        return result.data;
    }

    updateCache<K extends keyof ListCaches>(kind: K, items: ListCaches[K]): void {
        this._caches[kind] = items;
        switch (kind) {
            case 'tools':
                this.events.emit('tools:changed', { tools: this._caches.tools });
                break;
            case 'resources':
                this.events.emit('resources:changed', { resources: this._caches.resources });
                break;
            case 'prompts':
                this.events.emit('prompts:changed', { prompts: this._caches.prompts });
                break;
        }
    }

    protected assertCapabilityForMethod(method: string): void {
        if (method === Method.Initialize || method === Method.Ping) {
            // No specific capability required
            return;
        }
        const capabilities = this.serverCapabilities;
        if (!capabilities) {
            throw StateError.invalidState(`Session not initialized (required for ${method})`);
        }
        switch (method) {
            case Method.PromptsGet:
            case Method.PromptsList:
                if (!capabilities.prompts) {
                    throw new CapabilityError('prompts', method);
                }
                break;

            case Method.ResourcesList:
            case Method.ResourcesTemplatesList:
            case Method.ResourcesRead:
            case Method.ResourcesSubscribe:
            case Method.ResourcesUnsubscribe:
                if (!capabilities.resources) {
                    throw new CapabilityError('resources', method);
                }
                if (method === Method.ResourcesSubscribe && !capabilities.resources.subscribe) {
                    throw new CapabilityError('resources.subscribe', method);
                }
                break;

            case Method.ToolsCall:
            case Method.ToolsList:
                if (!capabilities.tools) {
                    throw new CapabilityError('tools', method);
                }
                break;

            case Method.CompletionComplete:
                if (!capabilities.completions) {
                    throw new CapabilityError('completions', method);
                }
                break;
        }
    }

    protected assertNotificationCapability(method: string): void {
        switch (method) {
            case Method.RootsListChanged:
                if (!this._capabilities.roots?.listChanged) {
                    throw new CapabilityError('roots.listChanged', method);
                }
                break;
        }
    }
}
