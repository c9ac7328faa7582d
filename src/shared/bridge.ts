import type { z } from 'zod';

import { ValidationError } from '../errors.js';

/**
 * Issues the follow-up request for a bridge rule. Sessions pass their own
 * `request` here, so follow-ups use the outstanding table and the outbound chain.
 */
export type FollowUpRequester = (method: string, params: unknown, options: { signal: AbortSignal }) => Promise<unknown>;

/**
 * "When `notification` arrives, fetch `request` and hand the result to `onResult`."
 */
export interface BridgeRule<TSession> {
    readonly notification: string;
    readonly request: string;
    readonly params?: unknown;
    /** Skip the rule for sessions where it does not apply (e.g. the peer lacks the capability) */
    readonly enabled?: (session: TSession) => boolean;
    readonly onResult: (session: TSession, result: unknown) => void;
}

/**
 * Builds a rule whose result is checked against `resultSchema` before `onResult` sees it.
 */
export function defineBridgeRule<TSession, TResult>(rule: {
    notification: string;
    request: string;
    params?: unknown;
    resultSchema: z.ZodType<TResult>;
    enabled?: (session: TSession) => boolean;
    onResult: (session: TSession, result: TResult) => void;
}): BridgeRule<TSession> {
    const { resultSchema, onResult, ...rest } = rule;
    return {
        ...rest,
        onResult: (session, result) => {
            const parsed = resultSchema.safeParse(result);
            if (!parsed.success) {
                throw new ValidationError(`Invalid ${rule.request} result`, parsed.error.issues);
            }
            onResult(session, parsed.data);
        }
    };
}

export type FollowUpState = 'running' | 'fulfilled' | 'rejected';

/**
 * One follow-up request, running on its own, with a cancellation token tied
 * to the session's lifetime.
 */
export class FollowUpTask {
    private _state: FollowUpState = 'running';
    private _error?: unknown;
    private readonly _controller = new AbortController();

    /** Resolves when the task has finished, whatever the outcome. Never rejects. */
    readonly done: Promise<void>;

    constructor(
        readonly notification: string,
        readonly method: string,
        run: (signal: AbortSignal) => Promise<void>
    ) {
        this.done = run(this._controller.signal).then(
            () => {
                this._state = 'fulfilled';
            },
            (error: unknown) => {
                this._state = 'rejected';
                this._error = error;
            }
        );
    }

    get state(): FollowUpState {
        return this._state;
    }

    get error(): unknown {
        return this._error;
    }

    get signal(): AbortSignal {
        return this._controller.signal;
    }

    abort(reason?: unknown): void {
        this._controller.abort(reason);
    }
}

export interface NotificationBridgeOptions {
    /** Called for every failed follow-up */
    onError?: (error: unknown, task: FollowUpTask) => void;
}

/**
 * Turns inbound notifications into asynchronous follow-up requests on the same session.
 */
export class NotificationBridge<TSession> {
    private readonly _rules: ReadonlyMap<string, readonly BridgeRule<TSession>[]>;
    private readonly _tasks = new Set<FollowUpTask>();

    constructor(
        rules: readonly BridgeRule<TSession>[],
        private readonly _session: TSession,
        private readonly _requester: FollowUpRequester,
        private readonly _options: NotificationBridgeOptions = {}
    ) {
        const byNotification = new Map<string, BridgeRule<TSession>[]>();
        for (const rule of rules) {
            byNotification.set(rule.notification, [...(byNotification.get(rule.notification) ?? []), rule]);
        }
        this._rules = byNotification;
    }

    handles(notification: string): boolean {
        return this._rules.has(notification);
    }

    /**
     * Starts a follow-up for every enabled rule matching `notification` and returns at once.
     */
    trigger(notification: string): FollowUpTask[] {
        const started: FollowUpTask[] = [];
        for (const rule of this._rules.get(notification) ?? []) {
            if (rule.enabled && !rule.enabled(this._session)) {
                continue;
            }
            started.push(this._start(rule));
        }
        return started;
    }

    /**
     * Follow-ups still running.
     */
    get pending(): number {
        return this._tasks.size;
    }

    /**
     * Cancels every running follow-up.
     */
    abortAll(reason?: unknown): void {
        for (const task of this._tasks) {
            task.abort(reason);
        }
    }

    /**
     * Waits until every running follow-up has finished.
     */
    async drain(): Promise<void> {
        while (this._tasks.size > 0) {
            await Promise.all([...this._tasks].map(task => task.done));
        }
    }

    private _start(rule: BridgeRule<TSession>): FollowUpTask {
        const task = new FollowUpTask(rule.notification, rule.request, async signal => {
            // Detach from the notification handler's call stack
            await Promise.resolve();
            const result = await this._requester(rule.request, rule.params, { signal });
            rule.onResult(this._session, result);
        });
        this._tasks.add(task);
        void task.done.then(() => {
            this._tasks.delete(task);
            if (task.state === 'rejected') {
                this._options.onError?.(task.error, task);
            }
        });
        return task;
    }
}
