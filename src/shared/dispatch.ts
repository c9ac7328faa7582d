import type { z } from 'zod';

import { ProtocolError } from '../errors.js';
import type { MessageExtraInfo, RequestId } from '../types.js';

/**
 * What a handler learns about the call it serves. It never sees the transport.
 */
export interface HandlerContext<TSession> {
    session: TSession;
    method: string;
    /** Absent for notifications */
    requestId?: RequestId;
    sessionId?: string;
    /** Aborted when the session terminates */
    signal: AbortSignal;
    extra?: MessageExtraInfo;
}

export type RequestHandler<TSession, TParams = unknown, TResult = unknown> = (
    ctx: HandlerContext<TSession>,
    params: TParams
) => TResult | Promise<TResult>;

export type NotificationHandler<TSession, TParams = unknown> = (ctx: HandlerContext<TSession>, params: TParams) => void | Promise<void>;

type ErasedHandler<TSession> = (ctx: HandlerContext<TSession>, params: unknown) => Promise<unknown>;

export interface RequestEntry<TSession> {
    readonly kind: 'request';
    readonly method: string;
    readonly handler: ErasedHandler<TSession>;
}

export interface NotificationEntry<TSession> {
    readonly kind: 'notification';
    readonly method: string;
    readonly handler: ErasedHandler<TSession>;
}

export type DispatchEntry<TSession> = RequestEntry<TSession> | NotificationEntry<TSession>;

function passthrough<TSession>(handler: (ctx: HandlerContext<TSession>, params: unknown) => unknown): ErasedHandler<TSession> {
    return async (ctx, params) => handler(ctx, params);
}

function validated<TSession, TParams>(
    method: string,
    schema: z.ZodType<TParams>,
    handler: (ctx: HandlerContext<TSession>, params: TParams) => unknown
): ErasedHandler<TSession> {
    return async (ctx, params) => {
        const parsed = schema.safeParse(params);
        if (!parsed.success) {
            const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
            throw ProtocolError.invalidParams(`Invalid params for ${method}: ${detail}`, { issues: parsed.error.issues });
        }
        return handler(ctx, parsed.data);
    };
}

function erase<TSession, TParams>(
    method: string,
    schemaOrHandler: z.ZodType<TParams> | ((ctx: HandlerContext<TSession>, params: unknown) => unknown),
    maybeHandler: ((ctx: HandlerContext<TSession>, params: TParams) => unknown) | undefined
): ErasedHandler<TSession> {
    if (typeof schemaOrHandler === 'function') {
        return passthrough(schemaOrHandler);
    }
    if (!maybeHandler) {
        throw new Error(`No handler given for ${method}`);
    }
    return validated(method, schemaOrHandler, maybeHandler);
}

/**
 * Immutable mapping from method name to handler. Built once per role and
 * shared by every session of that role.
 */
export class DispatchTable<TSession> {
    private readonly _entries: ReadonlyMap<string, DispatchEntry<TSession>>;

    constructor(entries: Iterable<DispatchEntry<TSession>>) {
        const map = new Map<string, DispatchEntry<TSession>>();
        for (const entry of entries) {
            map.set(entry.method, Object.freeze({ ...entry }));
        }
        this._entries = map;
        Object.freeze(this);
    }

    lookup(method: string): DispatchEntry<TSession> | undefined {
        return this._entries.get(method);
    }

    request(method: string): RequestEntry<TSession> | undefined {
        const entry = this._entries.get(method);
        return entry?.kind === 'request' ? entry : undefined;
    }

    notification(method: string): NotificationEntry<TSession> | undefined {
        const entry = this._entries.get(method);
        return entry?.kind === 'notification' ? entry : undefined;
    }

    get methods(): string[] {
        return [...this._entries.keys()];
    }
}

/**
 * Collects handlers, then freezes them into a `DispatchTable`.
 *
 * @example
 * ```typescript
 * const table = new DispatchTableBuilder<ServerSession>()
 *     .onRequest('ping', () => ({}))
 *     .onRequest('tools/call', CallToolRequestParamsSchema, (ctx, params) => tools.call(params.name))
 *     .build();
 * ```
 */
export class DispatchTableBuilder<TSession> {
    private readonly _entries = new Map<string, DispatchEntry<TSession>>();

    onRequest(method: string, handler: RequestHandler<TSession>): this;
    onRequest<TParams>(method: string, paramsSchema: z.ZodType<TParams>, handler: RequestHandler<TSession, TParams>): this;
    onRequest<TParams>(
        method: string,
        schemaOrHandler: z.ZodType<TParams> | RequestHandler<TSession>,
        maybeHandler?: RequestHandler<TSession, TParams>
    ): this {
        return this._add({ kind: 'request', method, handler: erase(method, schemaOrHandler, maybeHandler) });
    }

    onNotification(method: string, handler: NotificationHandler<TSession>): this;
    onNotification<TParams>(method: string, paramsSchema: z.ZodType<TParams>, handler: NotificationHandler<TSession, TParams>): this;
    onNotification<TParams>(
        method: string,
        schemaOrHandler: z.ZodType<TParams> | NotificationHandler<TSession>,
        maybeHandler?: NotificationHandler<TSession, TParams>
    ): this {
        return this._add({ kind: 'notification', method, handler: erase(method, schemaOrHandler, maybeHandler) });
    }

    has(method: string): boolean {
        return this._entries.has(method);
    }

    build(): DispatchTable<TSession> {
        return new DispatchTable(this._entries.values());
    }

    private _add(entry: DispatchEntry<TSession>): this {
        if (this._entries.has(entry.method)) {
            throw new Error(`A handler for ${entry.method} already exists`);
        }
        this._entries.set(entry.method, entry);
        return this;
    }
}
