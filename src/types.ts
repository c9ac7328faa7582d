import { z } from 'zod';

export const LATEST_PROTOCOL_VERSION = '2025-03-26';
export const SUPPORTED_PROTOCOL_VERSIONS = [LATEST_PROTOCOL_VERSION, '2024-11-05'];

/* JSON-RPC types */
export const JSONRPC_VERSION = '2.0' as const;

/**
 * Name of the HTTP header that carries the session identifier on the HTTP transports.
 */
export const SESSION_ID_HEADER = 'mcp-session-id';

/**
 * A uniquely identifying ID for a request in JSON-RPC.
 */
export const RequestIdSchema = z.union([z.string(), z.number().int()]);

/**
 * A request that expects a response.
 */
export const JSONRPCRequestSchema = z.looseObject({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RequestIdSchema,
    method: z.string(),
    params: z.unknown().optional()
});

/**
 * A notification which does not expect a response.
 */
export const JSONRPCNotificationSchema = z.looseObject({
    jsonrpc: z.literal(JSONRPC_VERSION),
    method: z.string(),
    params: z.unknown().optional()
});

/**
 * A successful (non-error) response to a request.
 */
export const JSONRPCResultResponseSchema = z.looseObject({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RequestIdSchema,
    result: z.unknown()
});

export const ErrorObjectSchema = z.looseObject({
    /**
     * The error type that occurred.
     */
    code: z.number().int(),
    /**
     * A short description of the error. The message SHOULD be limited to a concise single sentence.
     */
    message: z.string(),
    /**
     * Additional information about the error. The value of this member is defined by the sender (e.g. detailed error information, nested errors etc.).
     */
    data: z.unknown().optional()
});

/**
 * A response to a request that indicates an error occurred.
 *
 * The id is null only when the id of the offending message could not be recovered.
 */
export const JSONRPCErrorResponseSchema = z.looseObject({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: z.union([RequestIdSchema, z.null()]),
    error: ErrorObjectSchema
});

export const JSONRPCResponseSchema = z.union([JSONRPCResultResponseSchema, JSONRPCErrorResponseSchema]);

export const JSONRPCMessageSchema = z.union([
    JSONRPCRequestSchema,
    JSONRPCNotificationSchema,
    JSONRPCResultResponseSchema,
    JSONRPCErrorResponseSchema
]);

export type RequestId = z.infer<typeof RequestIdSchema>;
export type JSONRPCRequest = z.infer<typeof JSONRPCRequestSchema>;
export type JSONRPCNotification = z.infer<typeof JSONRPCNotificationSchema>;
export type JSONRPCResultResponse = z.infer<typeof JSONRPCResultResponseSchema>;
export type JSONRPCErrorResponse = z.infer<typeof JSONRPCErrorResponseSchema>;
export type JSONRPCResponse = z.infer<typeof JSONRPCResponseSchema>;
export type JSONRPCMessage = z.infer<typeof JSONRPCMessageSchema>;
export type ErrorObject = z.infer<typeof ErrorObjectSchema>;

export const isJSONRPCRequest = (value: unknown): value is JSONRPCRequest => JSONRPCRequestSchema.safeParse(value).success;
export const isJSONRPCNotification = (value: unknown): value is JSONRPCNotification =>
    JSONRPCNotificationSchema.safeParse(value).success && !(typeof value === 'object' && value !== null && 'id' in value);
export const isJSONRPCResultResponse = (value: unknown): value is JSONRPCResultResponse =>
    JSONRPCResultResponseSchema.safeParse(value).success && typeof value === 'object' && value !== null && 'result' in value;
export const isJSONRPCErrorResponse = (value: unknown): value is JSONRPCErrorResponse => JSONRPCErrorResponseSchema.safeParse(value).success;
export const isJSONRPCResponse = (value: unknown): value is JSONRPCResponse => isJSONRPCResultResponse(value) || isJSONRPCErrorResponse(value);

/**
 * Error codes defined by the JSON-RPC specification.
 */
export enum ErrorCode {
    // Implementation-defined server error codes
    ConnectionClosed = -32000,
    RequestTimeout = -32001,

    // Standard JSON-RPC error codes
    ParseError = -32700,
    InvalidRequest = -32600,
    MethodNotFound = -32601,
    InvalidParams = -32602,
    InternalError = -32603
}

/**
 * Method names used by the session engine and its ecosystem methods.
 */
export const Method = {
    Initialize: 'initialize',
    Initialized: 'notifications/initialized',
    Ping: 'ping',

    ToolsList: 'tools/list',
    ToolsCall: 'tools/call',
    ResourcesList: 'resources/list',
    ResourcesRead: 'resources/read',
    ResourcesTemplatesList: 'resources/templates/list',
    ResourcesSubscribe: 'resources/subscribe',
    ResourcesUnsubscribe: 'resources/unsubscribe',
    PromptsList: 'prompts/list',
    PromptsGet: 'prompts/get',
    CompletionComplete: 'completion/complete',
    RootsList: 'roots/list',
    SamplingCreateMessage: 'sampling/createMessage',

    ToolsListChanged: 'notifications/tools/list_changed',
    ResourcesListChanged: 'notifications/resources/list_changed',
    ResourceUpdated: 'notifications/resources/updated',
    PromptsListChanged: 'notifications/prompts/list_changed',
    RootsListChanged: 'notifications/roots/list_changed'
} as const;

export type MethodName = (typeof Method)[keyof typeof Method];

/* Base metadata */
/**
 * Describes the name and version of an implementation.
 */
export const ImplementationSchema = z.looseObject({
    name: z.string(),
    version: z.string(),
    title: z.string().optional()
});

const ListChangedCapabilitySchema = z.looseObject({
    /**
     * Whether this side will emit notifications when the list changes.
     */
    listChanged: z.boolean().optional()
});

/* Initialization */
/**
 * Capabilities a client may support. Known capabilities are defined here, but this is not a closed set.
 */
export const ClientCapabilitiesSchema = z.looseObject({
    experimental: z.record(z.string(), z.unknown()).optional(),
    /**
     * Present if the client supports listing roots.
     */
    roots: ListChangedCapabilitySchema.optional(),
    /**
     * Present if the client supports sampling from an LLM.
     */
    sampling: z.looseObject({}).optional()
});

/**
 * Capabilities that a server may support. Known capabilities are defined here, but this is not a closed set.
 */
export const ServerCapabilitiesSchema = z.looseObject({
    experimental: z.record(z.string(), z.unknown()).optional(),
    logging: z.looseObject({}).optional(),
    completions: z.looseObject({}).optional(),
    prompts: ListChangedCapabilitySchema.optional(),
    resources: z
        .looseObject({
            /**
             * Whether this server supports subscribing to resource updates.
             */
            subscribe: z.boolean().optional(),
            listChanged: z.boolean().optional()
        })
        .optional(),
    tools: ListChangedCapabilitySchema.optional()
});

export const InitializeRequestParamsSchema = z.looseObject({
    /**
     * The latest version of the protocol that the client supports. The client MAY decide to support older versions as well.
     */
    protocolVersion: z.string(),
    capabilities: ClientCapabilitiesSchema,
    clientInfo: ImplementationSchema
});

/**
 * After receiving an initialize request from the client, the server sends this response.
 */
export const InitializeResultSchema = z.looseObject({
    protocolVersion: z.string(),
    capabilities: ServerCapabilitiesSchema,
    serverInfo: ImplementationSchema,
    /**
     * Instructions describing how to use the server and its features.
     */
    instructions: z.string().optional()
});

export const EmptyResultSchema = z.looseObject({});

/* Pagination */
export const PaginatedRequestParamsSchema = z
    .looseObject({
        /**
         * An opaque token representing the current pagination position.
         */
        cursor: z.string().optional()
    })
    .optional();

/* Roots */
/**
 * Represents a root directory or file that the server can operate on.
 */
export const RootSchema = z.looseObject({
    /**
     * The URI identifying the root. This *must* start with file:// for now.
     */
    uri: z.string().startsWith('file://'),
    name: z.string().optional()
});

export const ListRootsResultSchema = z.looseObject({
    roots: z.array(RootSchema)
});

/* Tools */
export const ToolSchema = z.looseObject({
    name: z.string(),
    title: z.string().optional(),
    description: z.string().optional(),
    inputSchema: z.looseObject({
        type: z.literal('object'),
        properties: z.record(z.string(), z.unknown()).optional()
    })
});

export const ListToolsResultSchema = z.looseObject({
    tools: z.array(ToolSchema),
    nextCursor: z.string().optional()
});

export const CallToolRequestParamsSchema = z.looseObject({
    name: z.string(),
    arguments: z.record(z.string(), z.unknown()).optional()
});

export const ContentBlockSchema = z.looseObject({
    type: z.string()
});

export const CallToolResultSchema = z.looseObject({
    content: z.array(ContentBlockSchema),
    structuredContent: z.record(z.string(), z.unknown()).optional(),
    isError: z.boolean().optional()
});

/* Resources */
export const ResourceSchema = z.looseObject({
    uri: z.string(),
    name: z.string(),
    description: z.string().optional(),
    mimeType: z.string().optional()
});

export const ResourceTemplateSchema = z.looseObject({
    uriTemplate: z.string(),
    name: z.string(),
    description: z.string().optional(),
    mimeType: z.string().optional()
});

export const ListResourcesResultSchema = z.looseObject({
    resources: z.array(ResourceSchema),
    nextCursor: z.string().optional()
});

export const ListResourceTemplatesResultSchema = z.looseObject({
    resourceTemplates: z.array(ResourceTemplateSchema),
    nextCursor: z.string().optional()
});

export const ResourceRequestParamsSchema = z.looseObject({
    uri: z.string()
});

export const ResourceContentsSchema = z.looseObject({
    uri: z.string(),
    mimeType: z.string().optional()
});

export const ReadResourceResultSchema = z.looseObject({
    contents: z.array(ResourceContentsSchema)
});

/* Prompts */
export const PromptSchema = z.looseObject({
    name: z.string(),
    description: z.string().optional(),
    arguments: z
        .array(
            z.looseObject({
                name: z.string(),
                description: z.string().optional(),
                required: z.boolean().optional()
            })
        )
        .optional()
});

export const ListPromptsResultSchema = z.looseObject({
    prompts: z.array(PromptSchema),
    nextCursor: z.string().optional()
});

export const GetPromptRequestParamsSchema = z.looseObject({
    name: z.string(),
    arguments: z.record(z.string(), z.string()).optional()
});

export const PromptMessageSchema = z.looseObject({
    role: z.enum(['user', 'assistant']),
    content: ContentBlockSchema
});

export const GetPromptResultSchema = z.looseObject({
    description: z.string().optional(),
    messages: z.array(PromptMessageSchema)
});

/* Completion */
export const CompleteRequestParamsSchema = z.looseObject({
    ref: z.looseObject({ type: z.string() }),
    argument: z.looseObject({
        name: z.string(),
        value: z.string()
    })
});

export const CompleteResultSchema = z.looseObject({
    completion: z.looseObject({
        values: z.array(z.string()).max(100),
        total: z.number().int().optional(),
        hasMore: z.boolean().optional()
    })
});

/* Sampling */
export const SamplingMessageSchema = z.looseObject({
    role: z.enum(['user', 'assistant']),
    content: ContentBlockSchema
});

/**
 * The server's preferences for model selection. Priorities range from 0 to 1.
 */
export const ModelPreferencesSchema = z.looseObject({
    hints: z.array(z.looseObject({ name: z.string().optional() })).optional(),
    costPriority: z.number().min(0).max(1).optional(),
    speedPriority: z.number().min(0).max(1).optional(),
    intelligencePriority: z.number().min(0).max(1).optional()
});

export const CreateMessageRequestParamsSchema = z.looseObject({
    messages: z.array(SamplingMessageSchema),
    modelPreferences: ModelPreferencesSchema.optional(),
    systemPrompt: z.string().optional(),
    /**
     * Which servers' context the client should attach to the prompt.
     */
    includeContext: z.enum(['none', 'thisServer', 'allServers']).optional(),
    temperature: z.number().optional(),
    maxTokens: z.number().int().positive(),
    stopSequences: z.array(z.string()).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
});

export const CreateMessageResultSchema = z.looseObject({
    /**
     * The name of the model that generated the message.
     */
    model: z.string(),
    stopReason: z.string().optional(),
    role: z.enum(['user', 'assistant']),
    content: ContentBlockSchema
});

export type Implementation = z.infer<typeof ImplementationSchema>;
export type ClientCapabilities = z.infer<typeof ClientCapabilitiesSchema>;
export type ServerCapabilities = z.infer<typeof ServerCapabilitiesSchema>;
export type Capabilities = ClientCapabilities | ServerCapabilities;
export type InitializeRequestParams = z.infer<typeof InitializeRequestParamsSchema>;
export type InitializeResult = z.infer<typeof InitializeResultSchema>;
export type Root = z.infer<typeof RootSchema>;
export type ListRootsResult = z.infer<typeof ListRootsResultSchema>;
export type Tool = z.infer<typeof ToolSchema>;
export type ListToolsResult = z.infer<typeof ListToolsResultSchema>;
export type CallToolRequestParams = z.infer<typeof CallToolRequestParamsSchema>;
export type CallToolResult = z.infer<typeof CallToolResultSchema>;
export type Resource = z.infer<typeof ResourceSchema>;
export type ResourceTemplate = z.infer<typeof ResourceTemplateSchema>;
export type ListResourcesResult = z.infer<typeof ListResourcesResultSchema>;
export type ListResourceTemplatesResult = z.infer<typeof ListResourceTemplatesResultSchema>;
export type ReadResourceResult = z.infer<typeof ReadResourceResultSchema>;
export type Prompt = z.infer<typeof PromptSchema>;
export type ListPromptsResult = z.infer<typeof ListPromptsResultSchema>;
export type GetPromptRequestParams = z.infer<typeof GetPromptRequestParamsSchema>;
export type GetPromptResult = z.infer<typeof GetPromptResultSchema>;
export type CompleteRequestParams = z.infer<typeof CompleteRequestParamsSchema>;
export type CompleteResult = z.infer<typeof CompleteResultSchema>;
export type SamplingMessage = z.infer<typeof SamplingMessageSchema>;
export type ModelPreferences = z.infer<typeof ModelPreferencesSchema>;
export type CreateMessageRequestParams = z.infer<typeof CreateMessageRequestParamsSchema>;
export type CreateMessageResult = z.infer<typeof CreateMessageResultSchema>;

/**
 * Extra information about a message, supplied by the transport that received it.
 */
export interface MessageExtraInfo {
    /**
     * Headers of the HTTP request that carried the message, when there was one.
     */
    requestInfo?: { headers: Record<string, string | string[] | undefined> };

    /**
     * Arbitrary data attached by the hosting application (e.g. validated auth info).
     */
    customContext?: Record<string, unknown>;
}
