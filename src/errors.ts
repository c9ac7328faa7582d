/**
 * Error hierarchy
 *
 * 1. Protocol errors cross the wire as JSON-RPC error objects (`ProtocolError`).
 *    Their numeric code is locked; handlers throw them for intentional error replies.
 *
 * 2. Local errors (`SdkError` subclasses) never cross the wire. They reject
 *    pending calls and transport operations on the side where they happen.
 *
 * Every error exposes an `ErrorKind` so callers can branch without caring
 * which branch of the hierarchy produced it.
 */

import type { RequestId } from './types.js';
import { ErrorCode } from './types.js';

/**
 * Classification shared by protocol and local errors.
 */
export enum ErrorKind {
    ParseError = 'ParseError',
    InvalidRequest = 'InvalidRequest',
    MethodNotFound = 'MethodNotFound',
    InvalidParams = 'InvalidParams',
    InternalError = 'InternalError',
    Backpressure = 'Backpressure',
    TransportClosed = 'TransportClosed',
    TransportIO = 'TransportIO',
    SessionTerminated = 'SessionTerminated',
    Timeout = 'Timeout',
    Cancelled = 'Cancelled',
    CapabilityNotSupported = 'CapabilityNotSupported',
    InvalidState = 'InvalidState',
    InvalidResponse = 'InvalidResponse'
}

const KIND_BY_CODE: ReadonlyMap<number, ErrorKind> = new Map([
    [ErrorCode.ParseError, ErrorKind.ParseError],
    [ErrorCode.InvalidRequest, ErrorKind.InvalidRequest],
    [ErrorCode.MethodNotFound, ErrorKind.MethodNotFound],
    [ErrorCode.InvalidParams, ErrorKind.InvalidParams],
    [ErrorCode.InternalError, ErrorKind.InternalError],
    [ErrorCode.ConnectionClosed, ErrorKind.SessionTerminated],
    [ErrorCode.RequestTimeout, ErrorKind.Timeout]
]);

// ═══════════════════════════════════════════════════════════════════════════
// Protocol Errors (cross the wire as JSON-RPC errors)
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Protocol-level errors that cross the wire as JSON-RPC errors.
 *
 * The engine uses this for the fixed error replies (parse error, method not found, ...).
 * Handlers may throw it to answer with a specific code; any other thrown value
 * becomes an `InternalError` reply.
 */
export class ProtocolError extends Error {
    readonly isProtocolLevel = true as const;

    constructor(
        public readonly code: number,
        message: string,
        public readonly data?: unknown
    ) {
        super(message);
        this.name = 'ProtocolError';
    }

    get kind(): ErrorKind {
        return KIND_BY_CODE.get(this.code) ?? ErrorKind.InternalError;
    }

    /**
     * Creates a parse error (-32700)
     */
    static parseError(message: string = 'Parse error', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.ParseError, message, data);
    }

    /**
     * Creates an invalid request error (-32600)
     */
    static invalidRequest(message: string = 'Invalid request', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.InvalidRequest, message, data);
    }

    /**
     * Creates a method not found error (-32601)
     */
    static methodNotFound(method: string, data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.MethodNotFound, `Method not found: ${method}`, data);
    }

    /**
     * Creates an invalid params error (-32602)
     */
    static invalidParams(message: string = 'Invalid params', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.InvalidParams, message, data);
    }

    /**
     * Creates an internal error (-32603)
     */
    static internalError(message: string = 'Internal error', data?: unknown): ProtocolError {
        return new ProtocolError(ErrorCode.InternalError, message, data);
    }

    /**
     * Rebuilds an error received in a JSON-RPC error response.
     */
    static fromError(code: number, message: string, data?: unknown): ProtocolError {
        return new ProtocolError(code, message, data);
    }
}

/**
 * Raised when raw input cannot be decoded into a JSON-RPC message.
 *
 * `requestId` is set when the malformed object still carried a usable id,
 * so the receiver can answer with an error response instead of only logging.
 */
export class MessageDecodeError extends ProtocolError {
    constructor(
        message: string,
        public readonly requestId?: RequestId,
        data?: unknown
    ) {
        super(ErrorCode.ParseError, message, data);
        this.name = 'MessageDecodeError';
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// Local errors (don't cross the wire)
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for local errors that don't cross the wire.
 */
export abstract class SdkError extends Error {
    abstract readonly kind: ErrorKind;

    /**
     * Whether retrying the same operation may succeed.
     */
    readonly recoverable: boolean = false;

    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * The session is in the wrong phase for the operation.
 */
export class StateError extends SdkError {
    constructor(
        readonly kind: ErrorKind.SessionTerminated | ErrorKind.InvalidState,
        message: string
    ) {
        super(message);
    }

    static sessionTerminated(reason: string = 'Session terminated'): StateError {
        return new StateError(ErrorKind.SessionTerminated, reason);
    }

    static invalidState(message: string): StateError {
        return new StateError(ErrorKind.InvalidState, message);
    }
}

/**
 * The peer did not declare the capability a method needs.
 */
export class CapabilityError extends SdkError {
    readonly kind = ErrorKind.CapabilityNotSupported;

    constructor(
        public readonly capability: string,
        method: string
    ) {
        super(`Peer does not support ${capability} (required for ${method})`);
    }
}

/**
 * Network, stream or queue failures.
 */
export class TransportError extends SdkError {
    override readonly recoverable: boolean;

    constructor(
        readonly kind: ErrorKind.TransportClosed | ErrorKind.TransportIO | ErrorKind.Backpressure,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message);
        this.recoverable = kind !== ErrorKind.TransportClosed;
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }

    static closed(message: string = 'Transport closed'): TransportError {
        return new TransportError(ErrorKind.TransportClosed, message);
    }

    static io(message: string, cause?: unknown): TransportError {
        return new TransportError(ErrorKind.TransportIO, message, { cause });
    }

    static backpressure(timeoutMs: number): TransportError {
        return new TransportError(ErrorKind.Backpressure, `Outbound queue full for ${timeoutMs}ms`);
    }
}

/**
 * No response arrived before the deadline.
 */
export class RequestTimeoutError extends SdkError {
    readonly kind = ErrorKind.Timeout;
    override readonly recoverable = true;

    constructor(
        public readonly method: string,
        public readonly timeoutMs: number
    ) {
        super(`Request ${method} timed out after ${timeoutMs}ms`);
    }
}

/**
 * The caller gave up on a pending call.
 */
export class CancelledError extends SdkError {
    readonly kind = ErrorKind.Cancelled;

    constructor(reason?: unknown) {
        super(reason === undefined ? 'Request cancelled' : `Request cancelled: ${String(reason)}`);
    }
}

/**
 * A response result, or configuration read from outside code, does not have the expected shape.
 */
export class ValidationError extends SdkError {
    readonly kind = ErrorKind.InvalidResponse;

    constructor(
        message: string,
        public readonly issues?: unknown
    ) {
        super(message);
    }
}

/**
 * Maps any thrown value to its `ErrorKind`.
 */
export function errorKind(error: unknown): ErrorKind {
    if (error instanceof ProtocolError || error instanceof SdkError) {
        return error.kind;
    }
    return ErrorKind.InternalError;
}
