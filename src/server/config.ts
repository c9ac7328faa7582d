import { z } from 'zod';

import { ValidationError } from '../errors.js';

const DEFAULT_MAX_BODY_BYTES = 100 * 1024; // Express default (100kb), made explicit.

const PathSchema = z.string().startsWith('/');

/**
 * Settings of the HTTP endpoints built by `createServerApp`.
 */
export const HttpServerConfigSchema = z.object({
    /** Single-shot endpoint: POST carries one message, DELETE ends the session */
    mcpPath: PathSchema.default('/mcp'),
    /** GET opens an event stream */
    ssePath: PathSchema.default('/sse'),
    /** POST target announced in the `endpoint` event */
    messagesPath: PathSchema.default('/messages'),
    maxBodyBytes: z.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
    /** Outbound messages buffered per event stream */
    queueCapacity: z.number().int().positive().default(64),
    /** How long a send waits for a free queue slot before failing with `Backpressure` */
    sendTimeoutMs: z.number().int().positive().default(5000),
    /** CORS origins. `*` allows any. */
    allowedOrigins: z.array(z.string()).default(['*'])
});

export type HttpServerConfig = z.infer<typeof HttpServerConfigSchema>;
export type HttpServerConfigInput = z.input<typeof HttpServerConfigSchema>;

export function parseHttpServerConfig(input: HttpServerConfigInput = {}): HttpServerConfig {
    const parsed = HttpServerConfigSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid HTTP server configuration', parsed.error.issues);
    }
    return parsed.data;
}

const integer = z.coerce.number().int().positive();

const EnvSchema = z.object({
    RPC_MCP_PATH: PathSchema.optional(),
    RPC_SSE_PATH: PathSchema.optional(),
    RPC_MESSAGES_PATH: PathSchema.optional(),
    RPC_MAX_BODY_BYTES: integer.optional(),
    RPC_QUEUE_CAPACITY: integer.optional(),
    RPC_SEND_TIMEOUT_MS: integer.optional(),
    RPC_ALLOWED_ORIGINS: z
        .string()
        .transform(value =>
            value
                .split(',')
                .map(origin => origin.trim())
                .filter(origin => origin !== '')
        )
        .optional()
});

/**
 * Reads the configuration from `RPC_*` environment variables. Unset variables keep their defaults.
 *
 * `RPC_ALLOWED_ORIGINS` is a comma-separated list.
 */
export function loadHttpServerConfig(env: Record<string, string | undefined> = process.env): HttpServerConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ValidationError('Invalid HTTP server environment', parsed.error.issues);
    }
    const vars = parsed.data;
    return parseHttpServerConfig({
        mcpPath: vars.RPC_MCP_PATH,
        ssePath: vars.RPC_SSE_PATH,
        messagesPath: vars.RPC_MESSAGES_PATH,
        maxBodyBytes: vars.RPC_MAX_BODY_BYTES,
        queueCapacity: vars.RPC_QUEUE_CAPACITY,
        sendTimeoutMs: vars.RPC_SEND_TIMEOUT_MS,
        allowedOrigins: vars.RPC_ALLOWED_ORIGINS
    });
}
