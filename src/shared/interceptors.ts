import { ProtocolError, RequestTimeoutError, SdkError } from '../errors.js';
import type { Logger, LogLevel } from './logger.js';
import type { CallContext, RpcInterceptor } from './middleware.js';

// ═══════════════════════════════════════════════════════════════════════════
// Logging
// ═══════════════════════════════════════════════════════════════════════════

export interface LoggingInterceptorOptions {
    /** Level for the enter/leave lines. Failures are always logged at `error`. */
    level?: LogLevel;
}

function arrow(ctx: CallContext): string {
    return ctx.direction === 'inbound' ? '⇐' : '⇒';
}

/**
 * Logs every call with its duration.
 *
 * @example
 * ```typescript
 * const server = new Server(info, { inbound: [loggingInterceptor(consoleLogger, { level: 'info' })] });
 * ```
 */
export function loggingInterceptor(logger: Logger, options: LoggingInterceptorOptions = {}): RpcInterceptor {
    const { level = 'debug' } = options;

    return async (ctx, call, next) => {
        const fields = { direction: ctx.direction, kind: ctx.kind, requestId: ctx.requestId, sessionId: ctx.sessionId };
        logger[level](`${arrow(ctx)} ${call.method}`, fields);
        const start = Date.now();
        try {
            const result = await next();
            logger[level](`${arrow(ctx)} ${call.method} ok (${Date.now() - start}ms)`, fields);
            return result;
        } catch (error) {
            logger.error(`${arrow(ctx)} ${call.method} failed (${Date.now() - start}ms)`, { ...fields, error });
            throw error;
        }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// Recovery
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Turns unexpected failures (anything that is neither a `ProtocolError` nor an
 * `SdkError`) into a plain `InternalError`, logging the original.
 * Register it first so it wraps everything else.
 */
export function recoveryInterceptor(logger?: Logger): RpcInterceptor {
    return async (_ctx, call, next) => {
        try {
            return await next();
        } catch (error) {
            if (error instanceof ProtocolError || error instanceof SdkError) {
                throw error;
            }
            logger?.crit(`Recovered from failure in ${call.method}`, {
                error,
                stack: error instanceof Error ? error.stack : undefined
            });
            throw ProtocolError.internalError();
        }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// Rate limiting
// ═══════════════════════════════════════════════════════════════════════════

export interface RateLimitInterceptorOptions {
    /** Maximum calls per window */
    max: number;
    /** Window length in milliseconds (default 60 000) */
    windowMs?: number;
    /** Bucket key; defaults to the session id */
    keyFor?: (ctx: CallContext) => string;
    /** Error message when rate limited */
    message?: string;
}

/**
 * Per-key hit log over a sliding window. Keys whose hits have all expired are
 * dropped on the next call, so sessions that went away leave nothing behind.
 */
export class SlidingWindow {
    private readonly _hits = new Map<string, number[]>();

    constructor(
        readonly max: number,
        readonly windowMs: number
    ) {}

    /** Number of keys with hits inside the window */
    get size(): number {
        return this._hits.size;
    }

    /**
     * Records a hit for `key` unless the window is full.
     * Returns 0 when the hit was recorded, otherwise the milliseconds until a slot frees.
     */
    take(key: string, now: number = Date.now()): number {
        this._prune(now);
        const recent = this._hits.get(key) ?? [];
        if (recent.length >= this.max) {
            const oldest = recent[0] ?? now;
            return Math.max(1, this.windowMs - (now - oldest));
        }
        recent.push(now);
        this._hits.set(key, recent);
        return 0;
    }

    private _prune(now: number): void {
        for (const [key, hits] of this._hits) {
            const recent = hits.filter(at => now - at < this.windowMs);
            if (recent.length === 0) {
                this._hits.delete(key);
            } else if (recent.length !== hits.length) {
                this._hits.set(key, recent);
            }
        }
    }
}

/**
 * Sliding-window rate limit. Rejected calls never reach the handler.
 */
export function rateLimitInterceptor(options: RateLimitInterceptorOptions): RpcInterceptor {
    const { max, windowMs = 60_000, message = 'Rate limit exceeded' } = options;
    const keyFor = options.keyFor ?? ((ctx: CallContext) => ctx.sessionId ?? 'default');
    const window = new SlidingWindow(max, windowMs);

    return async (ctx, _call, next) => {
        const retryAfterMs = window.take(keyFor(ctx));
        if (retryAfterMs > 0) {
            throw ProtocolError.invalidRequest(message, { retryAfterMs });
        }
        return next();
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// Timeout
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Fails the call with `Timeout` if the rest of the chain takes longer than `timeoutMs`.
 */
export function timeoutInterceptor(timeoutMs: number): RpcInterceptor {
    return (_ctx, call, next) =>
        new Promise<unknown>((resolve, reject) => {
            const timer = setTimeout(() => reject(new RequestTimeoutError(call.method, timeoutMs)), timeoutMs);
            next().then(
                result => {
                    clearTimeout(timer);
                    resolve(result);
                },
                (error: unknown) => {
                    clearTimeout(timer);
                    reject(error);
                }
            );
        });
}

// ═══════════════════════════════════════════════════════════════════════════
// Retry
// ═══════════════════════════════════════════════════════════════════════════

export interface RetryInterceptorOptions {
    /** Retries after the first attempt (default 2) */
    maxRetries?: number;
    /** Delay before the first retry (default 100ms) */
    initialBackoffMs?: number;
    /** Multiplier applied to the delay after each retry (default 2) */
    backoffFactor?: number;
    /** Upper bound for a single delay (default 5 000ms) */
    maxBackoffMs?: number;
    /** Defaults to local errors flagged `recoverable` (timeouts, I/O, backpressure) */
    shouldRetry?: (error: unknown, attempt: number) => boolean;
}

const isRecoverable = (error: unknown): boolean => error instanceof SdkError && error.recoverable;

function delay(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        const timer = setTimeout(done, ms);
        signal.addEventListener('abort', done, { once: true });
        function done(): void {
            clearTimeout(timer);
            signal.removeEventListener('abort', done);
            resolve();
        }
    });
}

/**
 * Re-runs the rest of the chain with exponential backoff.
 * Stops early when the call's signal is aborted.
 */
export function retryInterceptor(options: RetryInterceptorOptions = {}): RpcInterceptor {
    const { maxRetries = 2, initialBackoffMs = 100, backoffFactor = 2, maxBackoffMs = 5_000, shouldRetry = isRecoverable } = options;

    return async (ctx, _call, next) => {
        let backoff = initialBackoffMs;
        for (let attempt = 0; ; attempt++) {
            try {
                return await next();
            } catch (error) {
                if (attempt >= maxRetries || ctx.signal.aborted || !shouldRetry(error, attempt)) {
                    throw error;
                }
            }
            await delay(Math.min(backoff, maxBackoffMs), ctx.signal);
            backoff *= backoffFactor;
        }
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// Method filter
// ═══════════════════════════════════════════════════════════════════════════

export interface MethodFilterOptions {
    /** When set, only these methods pass */
    allow?: readonly string[];
    /** These methods never pass */
    deny?: readonly string[];
}

/**
 * Rejects calls whose method is not allowed, before they reach the handler.
 */
export function methodFilterInterceptor(options: MethodFilterOptions): RpcInterceptor {
    const allow = options.allow ? new Set(options.allow) : undefined;
    const deny = new Set(options.deny ?? []);

    return async (_ctx, call, next) => {
        if (deny.has(call.method) || (allow !== undefined && !allow.has(call.method))) {
            throw ProtocolError.invalidRequest(`Method not allowed: ${call.method}`);
        }
        return next();
    };
}
