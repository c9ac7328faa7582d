/**
 * Middleware System
 *
 * Interceptors wrap every inbound dispatch and every outbound call of a session,
 * following the Express/Koa `next()` pattern. The same chain type serves both
 * directions; `CallContext.direction` tells them apart.
 */

import type { RequestId } from '../types.js';

// ═══════════════════════════════════════════════════════════════════════════
// Context
// ═══════════════════════════════════════════════════════════════════════════

export type CallDirection = 'inbound' | 'outbound';

export interface CallContext {
    direction: CallDirection;
    /** Whether a reply is expected */
    kind: 'request' | 'notification';
    method: string;
    /** Set for inbound requests, and for outbound requests once an id is assigned */
    requestId?: RequestId;
    sessionId?: string;
    /** Aborted when the call is cancelled or the session terminates */
    signal: AbortSignal;
    /** Free-form values set by transports or outer interceptors (auth info, headers) */
    extra?: Record<string, unknown>;
}

/**
 * The value that travels through the chain.
 */
export interface RpcCall {
    method: string;
    params?: unknown;
}

// ═══════════════════════════════════════════════════════════════════════════
// Interceptor types
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Runs the rest of the chain. Omitting the argument forwards the current input.
 * May be called more than once (retry).
 */
export type NextFn<TInput, TResult> = (input?: TInput) => Promise<TResult>;

/**
 * An interceptor can:
 * - Abort with error: throw
 * - Short-circuit: return a result without calling next()
 * - Modify input: call next(modified)
 * - Modify output: transform what next() resolves or rejects with
 * - Pass through: return next()
 */
export type Interceptor<TCtx, TInput, TResult> = (ctx: TCtx, input: TInput, next: NextFn<TInput, TResult>) => Promise<TResult>;

export type Terminal<TCtx, TInput, TResult> = (ctx: TCtx, input: TInput) => Promise<TResult>;

export type RpcInterceptor = Interceptor<CallContext, RpcCall, unknown>;

// ═══════════════════════════════════════════════════════════════════════════
// Composition
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Composes interceptors around a terminal handler into a single function.
 *
 * Pre-logic runs in registration order, post-logic in reverse order.
 *
 * @example
 * ```typescript
 * const run = composeMiddleware([logging, auth], (ctx, call) => handler(call.params));
 * const result = await run(ctx, { method: 'tools/list' });
 * ```
 */
export function composeMiddleware<TCtx, TInput, TResult>(
    interceptors: readonly Interceptor<TCtx, TInput, TResult>[],
    terminal: Terminal<TCtx, TInput, TResult>
): Terminal<TCtx, TInput, TResult> {
    return interceptors.reduceRight<Terminal<TCtx, TInput, TResult>>(
        (inner, interceptor) => async (ctx, input) => interceptor(ctx, input, async modified => inner(ctx, modified ?? input)),
        terminal
    );
}

/**
 * An immutable, ordered list of interceptors.
 * Built once per role and shared by every session of that role.
 */
export class MiddlewareChain<TCtx = CallContext, TInput = RpcCall, TResult = unknown> {
    private readonly _interceptors: readonly Interceptor<TCtx, TInput, TResult>[];

    constructor(interceptors: readonly Interceptor<TCtx, TInput, TResult>[] = []) {
        this._interceptors = Object.freeze([...interceptors]);
    }

    get length(): number {
        return this._interceptors.length;
    }

    /**
     * Returns a new chain with `more` appended (inside the existing interceptors).
     */
    with(...more: Interceptor<TCtx, TInput, TResult>[]): MiddlewareChain<TCtx, TInput, TResult> {
        return new MiddlewareChain([...this._interceptors, ...more]);
    }

    execute(ctx: TCtx, input: TInput, terminal: Terminal<TCtx, TInput, TResult>): Promise<TResult> {
        if (this._interceptors.length === 0) {
            return terminal(ctx, input);
        }
        return composeMiddleware(this._interceptors, terminal)(ctx, input);
    }
}
