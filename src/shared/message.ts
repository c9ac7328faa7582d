import type { ZodError } from 'zod';

import { MessageDecodeError, ProtocolError } from '../errors.js';
import type {
    ErrorObject,
    JSONRPCErrorResponse,
    JSONRPCMessage,
    JSONRPCNotification,
    JSONRPCRequest,
    JSONRPCResultResponse,
    RequestId
} from '../types.js';
import {
    ErrorCode,
    JSONRPC_VERSION,
    JSONRPCErrorResponseSchema,
    JSONRPCNotificationSchema,
    JSONRPCRequestSchema,
    JSONRPCResultResponseSchema,
    RequestIdSchema
} from '../types.js';

const textDecoder = new TextDecoder();

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

/**
 * Returns the id of a (possibly malformed) message object, if it carries a usable one.
 */
export function recoverRequestId(value: unknown): RequestId | undefined {
    if (!isPlainObject(value) || !('id' in value)) {
        return undefined;
    }
    const parsed = RequestIdSchema.safeParse(value.id);
    return parsed.success ? parsed.data : undefined;
}

/**
 * Classifies an already-parsed JSON value by its structural shape.
 *
 * - `id` and `method` → request
 * - `method` without `id` → notification
 * - `id` and exactly one of `result` / `error` → response
 *
 * @throws MessageDecodeError for every other shape.
 */
export function parseMessage(value: unknown): JSONRPCMessage {
    if (!isPlainObject(value)) {
        throw new MessageDecodeError('Message must be a JSON object');
    }

    const id = recoverRequestId(value);
    if (value.jsonrpc !== JSONRPC_VERSION) {
        throw new MessageDecodeError(`Unsupported jsonrpc version: ${JSON.stringify(value.jsonrpc)}`, id);
    }

    const hasId = 'id' in value;
    const hasMethod = 'method' in value;
    const hasResult = 'result' in value;
    const hasError = 'error' in value;

    if (hasMethod) {
        if (hasResult || hasError) {
            throw new MessageDecodeError('Message cannot carry both a method and a result or error', id);
        }
        if (hasId) {
            const parsed = JSONRPCRequestSchema.safeParse(value);
            if (!parsed.success) {
                throw new MessageDecodeError(`Invalid request: ${describeIssues(parsed.error)}`, id);
            }
            return parsed.data;
        }
        const parsed = JSONRPCNotificationSchema.safeParse(value);
        if (!parsed.success) {
            throw new MessageDecodeError(`Invalid notification: ${describeIssues(parsed.error)}`);
        }
        return parsed.data;
    }

    if (!hasId) {
        throw new MessageDecodeError('Message has neither a method nor an id');
    }
    if (hasResult && hasError) {
        throw new MessageDecodeError('Response cannot carry both result and error', id);
    }
    if (hasResult) {
        const parsed = JSONRPCResultResponseSchema.safeParse(value);
        if (!parsed.success) {
            throw new MessageDecodeError(`Invalid response: ${describeIssues(parsed.error)}`, id);
        }
        return parsed.data;
    }
    if (hasError) {
        const parsed = JSONRPCErrorResponseSchema.safeParse(value);
        if (!parsed.success) {
            throw new MessageDecodeError(`Invalid error response: ${describeIssues(parsed.error)}`, id);
        }
        return parsed.data;
    }
    throw new MessageDecodeError('Message with an id must carry a method, a result or an error', id);
}

/**
 * Decodes raw bytes (or text) holding exactly one JSON-RPC message.
 *
 * @throws MessageDecodeError when the input is not valid JSON or not a valid message.
 */
export function decode(raw: string | Uint8Array): JSONRPCMessage {
    const text = typeof raw === 'string' ? raw : textDecoder.decode(raw);
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (error) {
        throw new MessageDecodeError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return parseMessage(value);
}

/**
 * Encodes a message as JSON text. Inverse of `decode`.
 */
export function encode(message: JSONRPCMessage): string {
    return JSON.stringify(message);
}

export function createRequest(id: RequestId, method: string, params?: unknown): JSONRPCRequest {
    return params === undefined ? { jsonrpc: JSONRPC_VERSION, id, method } : { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function createNotification(method: string, params?: unknown): JSONRPCNotification {
    return params === undefined ? { jsonrpc: JSONRPC_VERSION, method } : { jsonrpc: JSONRPC_VERSION, method, params };
}

export function createResultResponse(id: RequestId, result: unknown): JSONRPCResultResponse {
    return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function createErrorResponse(id: RequestId | null, error: ErrorObject): JSONRPCErrorResponse {
    return { jsonrpc: JSONRPC_VERSION, id, error };
}

/**
 * Converts a thrown value into the error object of a JSON-RPC error response.
 * Protocol errors keep their code; everything else is reported as an internal error.
 */
export function toErrorObject(error: unknown): ErrorObject {
    if (error instanceof ProtocolError) {
        return error.data === undefined
            ? { code: error.code, message: error.message }
            : { code: error.code, message: error.message, data: error.data };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { code: ErrorCode.InternalError, message: message || 'Internal error' };
}

export function toErrorResponse(id: RequestId | null, error: unknown): JSONRPCErrorResponse {
    return createErrorResponse(id, toErrorObject(error));
}
