/**
 * How a client transport re-opens a broken event stream.
 *
 * Reconnecting is not retrying: a retry repeats one failed call, a reconnect
 * re-establishes the connection itself and starts a fresh session on it.
 */
export interface ReconnectOptions {
    /** Attempts after the stream breaks (default 2, 0 to 5) */
    maxAttempts?: number;
    /** Wait before the second attempt; the first one is immediate (default 1s, 100ms to 30s) */
    initialDelayMs?: number;
    /** Multiplier applied to the wait after each attempt (default 1.5, 1 to 3) */
    backoffFactor?: number;
    /** Upper bound of any wait (default 30s, at most 5min, never below `initialDelayMs`) */
    maxDelayMs?: number;
}

export type ReconnectPolicy = Required<ReconnectOptions>;

const ATTEMPTS = { min: 0, max: 5, default: 2 };
const INITIAL_DELAY_MS = { min: 100, max: 30_000, default: 1_000 };
const BACKOFF_FACTOR = { min: 1, max: 3, default: 1.5 };
const MAX_DELAY_MS = { max: 300_000, default: 30_000 };

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

/**
 * Fills in defaults and pulls every setting into its allowed range.
 */
export function resolveReconnectPolicy(options: ReconnectOptions = {}): ReconnectPolicy {
    const maxAttempts = Math.floor(clamp(options.maxAttempts ?? ATTEMPTS.default, ATTEMPTS.min, ATTEMPTS.max));
    const initialDelayMs = clamp(options.initialDelayMs ?? INITIAL_DELAY_MS.default, INITIAL_DELAY_MS.min, INITIAL_DELAY_MS.max);
    const backoffFactor = clamp(options.backoffFactor ?? BACKOFF_FACTOR.default, BACKOFF_FACTOR.min, BACKOFF_FACTOR.max);
    const maxDelayMs = Math.max(Math.min(options.maxDelayMs ?? MAX_DELAY_MS.default, MAX_DELAY_MS.max), initialDelayMs);
    return { maxAttempts, initialDelayMs, backoffFactor, maxDelayMs };
}

/**
 * Wait before the given attempt, counted from 1.
 */
export function reconnectDelay(policy: ReconnectPolicy, attempt: number): number {
    if (attempt <= 1) {
        return 0;
    }
    return Math.min(policy.initialDelayMs * policy.backoffFactor ** (attempt - 2), policy.maxDelayMs);
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const timer = setTimeout(done, ms);
        signal.addEventListener('abort', done, { once: true });
        function done(): void {
            clearTimeout(timer);
            signal.removeEventListener('abort', done);
            resolve();
        }
    });
}
