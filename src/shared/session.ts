import type { z } from 'zod';

import { MessageDecodeError, ProtocolError, StateError, TransportError, ValidationError } from '../errors.js';
import type {
    JSONRPCMessage,
    JSONRPCNotification,
    JSONRPCRequest,
    JSONRPCResponse,
    MessageExtraInfo,
    RequestId,
    Root,
    Tool,
    Resource,
    Prompt
} from '../types.js';
import { EmptyResultSchema, isJSONRPCNotification, isJSONRPCRequest, isJSONRPCResponse, Method } from '../types.js';
import type { BridgeRule } from './bridge.js';
import { NotificationBridge } from './bridge.js';
import type { DispatchTable, HandlerContext } from './dispatch.js';
import { TypedEventEmitter } from './events.js';
import type { PeerRecord } from './lifecycle.js';
import { LifecycleManager, SessionPhase } from './lifecycle.js';
import type { Logger } from './logger.js';
import { consoleLogger } from './logger.js';
import { createNotification, createRequest, createResultResponse, toErrorResponse } from './message.js';
import type { CallContext, RpcCall, RpcInterceptor } from './middleware.js';
import { MiddlewareChain } from './middleware.js';
import { PendingRequestTable } from './pendingRequests.js';
import type { Transport, TransportSendOptions } from './transport.js';

/**
 * The default request timeout, in milliseconds.
 */
export const DEFAULT_REQUEST_TIMEOUT_MSEC = 60_000;

export type ChainInput = MiddlewareChain | readonly RpcInterceptor[];

function toChain(input: ChainInput | undefined): MiddlewareChain {
    if (input instanceof MiddlewareChain) {
        return input;
    }
    return new MiddlewareChain(input ?? []);
}

/**
 * Additional initialization options.
 */
export interface SessionOptions {
    /** Defaults to `consoleLogger` */
    logger?: Logger;
    /** Wraps every inbound request and notification before it reaches its handler */
    inbound?: ChainInput;
    /** Wraps every outbound request and notification before it reaches the transport */
    outbound?: ChainInput;
    /** Default timeout for outbound requests. Defaults to 60 000ms. */
    requestTimeoutMs?: number;
    /** Closes the session after this long without inbound traffic. Off by default. */
    idleTimeoutMs?: number;
    /**
     * Whether to restrict outgoing requests to only those that the remote side has indicated that they can handle, through their advertised capabilities.
     *
     * Defaults to true.
     */
    enforceStrictCapabilities?: boolean;
}

/**
 * Options that can be given per request.
 */
export interface RequestOptions {
    /** A timeout (in milliseconds) for this request. Overrides the session default. */
    timeout?: number;
    /** Can be used to cancel an in-flight request. Nothing is sent to the peer. */
    signal?: AbortSignal;
    /** Associates the request with an inbound request (used by single-shot HTTP). */
    relatedRequestId?: RequestId;
}

export interface NotificationOptions {
    relatedRequestId?: RequestId;
}

/**
 * Events emitted by a session. Role-specific events are only emitted by the role that owns them.
 */
export type SessionEvents = {
    'phase:changed': { from: SessionPhase; to: SessionPhase };
    'message:dropped': { message: JSONRPCMessage; reason: 'unknown-response-id' | 'not-initialized' | 'terminated' };
    error: { error: Error; context?: string };
    'session:closed': { sessionId?: string; reason: string };
    'transport:reconnected': { sessionId?: string };
    'roots:changed': { roots: Root[] };
    'tools:changed': { tools: Tool[] };
    'resources:changed': { resources: Resource[] };
    'prompts:changed': { prompts: Prompt[] };
    'resource:updated': { uri: string };
};

export interface SessionSetup<TSelf> {
    dispatch: DispatchTable<TSelf>;
    bridgeRules?: readonly BridgeRule<TSelf>[];
}

/**
 * One logical connection between two peers, bound to exactly one transport.
 *
 * Routes responses to the outstanding-request table, and requests and
 * notifications through the lifecycle check and the inbound chain to the
 * dispatch table. Subclasses implement the role (server or client).
 */
export abstract class Session<TSelf, TPeerCapabilities, TPeerInfo> {
    private _transport?: Transport;
    private _sessionId?: string;
    private _idleTimer?: ReturnType<typeof setTimeout>;
    private readonly _pending = new PendingRequestTable();
    private readonly _inflight = new Map<RequestId, AbortController>();
    private readonly _lifetime = new AbortController();
    private readonly _inbound: MiddlewareChain;
    private readonly _outbound: MiddlewareChain;
    private readonly _requestTimeoutMs: number;
    private readonly _idleTimeoutMs?: number;
    private _dispatch?: DispatchTable<TSelf>;
    private _bridge?: NotificationBridge<TSelf>;

    protected readonly _logger: Logger;
    protected readonly _enforceStrictCapabilities: boolean;
    protected readonly _lifecycle: LifecycleManager<TPeerCapabilities, TPeerInfo>;

    readonly events: TypedEventEmitter<SessionEvents>;

    /**
     * Callback for when the session is closed for any reason.
     */
    onclose?: () => void;

    /**
     * Callback for when an error occurs. Such errors are not necessarily fatal.
     */
    onerror?: (error: Error) => void;

    constructor(options: SessionOptions = {}) {
        this._logger = options.logger ?? consoleLogger;
        this._inbound = toChain(options.inbound);
        this._outbound = toChain(options.outbound);
        this._requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MSEC;
        this._idleTimeoutMs = options.idleTimeoutMs;
        this._enforceStrictCapabilities = options.enforceStrictCapabilities ?? true;
        this.events = new TypedEventEmitter<SessionEvents>({
            onListenerError: (error, event) => this._logger.error(`Listener for ${event} failed`, { error })
        });
        this._lifecycle = new LifecycleManager((from, to) => {
            this._logger.debug(`Session phase ${from} -> ${to}`, { sessionId: this.sessionId });
            this.events.emit('phase:changed', { from, to });
        });
    }

    /**
     * The session itself, typed as the concrete role. Handlers receive it as `ctx.session`.
     */
    protected abstract _self(): TSelf;

    /**
     * A method to check if the peer supports a given method, before we send a request for it.
     *
     * @throws CapabilityError or StateError when the request may not be sent.
     */
    protected abstract assertCapabilityForMethod(method: string): void;

    /**
     * A method to check if this side declared what an outgoing notification announces.
     */
    protected abstract assertNotificationCapability(method: string): void;

    get phase(): SessionPhase {
        return this._lifecycle.phase;
    }

    get transport(): Transport | undefined {
        return this._transport;
    }

    get sessionId(): string | undefined {
        return this._transport?.sessionId ?? this._sessionId;
    }

    /**
     * Number of outbound requests awaiting a response.
     */
    get pendingRequests(): number {
        return this._pending.size;
    }

    /**
     * Follow-up requests started by notifications and still running.
     */
    get pendingFollowUps(): number {
        return this._bridge?.pending ?? 0;
    }

    /**
     * Waits for every running follow-up request to finish.
     */
    async drainFollowUps(): Promise<void> {
        await this._bridge?.drain();
    }

    /**
     * Attaches to the given transport, starts it, and starts listening for messages.
     *
     * The session assumes ownership of the transport, replacing any callbacks that have already been set, and expects that it is the only user of the transport instance going forward.
     */
    protected async _attach(transport: Transport, setup: SessionSetup<TSelf>, sessionId?: string): Promise<void> {
        if (this._transport || this._lifecycle.isTerminated) {
            throw StateError.invalidState('Session is already bound to a transport');
        }
        this._dispatch = setup.dispatch;
        this._bridge = new NotificationBridge(
            setup.bridgeRules ?? [],
            this._self(),
            (method, params, options) => this.request(method, params, undefined, options),
            { onError: (error, task) => this._reportFailure(error, `follow-up ${task.method} for ${task.notification}`) }
        );
        this._transport = transport;
        this._sessionId = transport.sessionId ?? sessionId;

        const _onclose = transport.onclose;
        transport.onclose = () => {
            _onclose?.();
            this._onclose();
        };

        const _onerror = transport.onerror;
        transport.onerror = (error: Error) => {
            _onerror?.(error);
            this._ontransporterror(error);
        };

        const _onreconnect = transport.onreconnect;
        transport.onreconnect = () => {
            _onreconnect?.();
            this._onreconnect();
        };

        const _onmessage = transport.onmessage;
        transport.onmessage = (message, extra) => {
            _onmessage?.(message, extra);
            this._onmessage(message, extra);
        };

        this._touch();
        await transport.start();
    }

    /**
     * Closes the session and its transport. Pending calls fail with `SessionTerminated`.
     */
    async close(): Promise<void> {
        const transport = this._transport;
        this._terminate('Session closed');
        await transport?.close();
    }

    /**
     * Sends a request and waits for a response.
     *
     * Do not use this method to emit notifications! Use notification() instead.
     */
    request<T>(method: string, params: unknown, resultSchema: z.ZodType<T>, options?: RequestOptions): Promise<T>;
    request(method: string, params?: unknown, resultSchema?: undefined, options?: RequestOptions): Promise<unknown>;
    async request<T>(method: string, params?: unknown, resultSchema?: z.ZodType<T>, options: RequestOptions = {}): Promise<unknown> {
        this._assertCanSend();
        if (this._enforceStrictCapabilities) {
            this.assertCapabilityForMethod(method);
        }

        const ctx: CallContext = {
            direction: 'outbound',
            kind: 'request',
            method,
            sessionId: this.sessionId,
            signal: options.signal ?? this._lifetime.signal
        };
        const result = await this._outbound.execute(ctx, { method, params }, (callCtx, call) => this._sendRequest(callCtx, call, options));

        if (!resultSchema) {
            return result;
        }
        const parsed = resultSchema.safeParse(result);
        if (!parsed.success) {
            throw new ValidationError(`Invalid result for ${method}`, parsed.error.issues);
        }
        return parsed.data;
    }

    /**
     * Emits a notification, which is a one-way message that does not expect a response.
     */
    async notification(method: string, params?: unknown, options: NotificationOptions = {}): Promise<void> {
        this._assertCanSend();
        this.assertNotificationCapability(method);

        const ctx: CallContext = {
            direction: 'outbound',
            kind: 'notification',
            method,
            sessionId: this.sessionId,
            signal: this._lifetime.signal
        };
        await this._outbound.execute(ctx, { method, params }, async (_callCtx, call) => {
            await this._send(createNotification(call.method, call.params), { relatedRequestId: options.relatedRequestId });
            return undefined;
        });
    }

    async ping(options?: RequestOptions): Promise<void> {
        await this.request(Method.Ping, undefined, EmptyResultSchema, options);
    }

    protected get _peer(): Readonly<PeerRecord<TPeerCapabilities, TPeerInfo>> | undefined {
        return this._lifecycle.peer;
    }

    /**
     * Restores peer state after the transport reconnected. Roles that hold a handshake override it.
     */
    protected async _reestablish(): Promise<void> {}

    protected _reportFailure(error: unknown, context: string): void {
        const normalized = error instanceof Error ? error : new Error(String(error));
        this._logger.error(`Session error (${context}): ${normalized.message}`, { sessionId: this.sessionId, error: normalized });
        this.onerror?.(normalized);
        this.events.emit('error', { error: normalized, context });
    }

    private _assertCanSend(): void {
        if (this._lifecycle.isTerminated) {
            throw StateError.sessionTerminated();
        }
        if (!this._transport) {
            throw StateError.invalidState('Not connected');
        }
    }

    private _sendRequest(ctx: CallContext, call: RpcCall, options: RequestOptions): Promise<unknown> {
        const transport = this._transport;
        if (this._lifecycle.isTerminated || !transport) {
            return Promise.reject(StateError.sessionTerminated());
        }

        const id = this._pending.nextId();
        ctx.requestId = id;
        const response = this._pending.register(id, call.method, {
            timeoutMs: options.timeout ?? this._requestTimeoutMs,
            signal: options.signal
        });
        transport
            .send(createRequest(id, call.method, call.params), { relatedRequestId: options.relatedRequestId })
            .catch((error: unknown) => this._pending.fail(id, error));
        return response;
    }

    private async _send(message: JSONRPCMessage, options?: TransportSendOptions): Promise<void> {
        const transport = this._transport;
        if (!transport) {
            throw StateError.sessionTerminated();
        }
        await transport.send(message, options);
    }

    private _touch(): void {
        if (this._idleTimeoutMs === undefined) {
            return;
        }
        if (this._idleTimer !== undefined) {
            clearTimeout(this._idleTimer);
        }
        const idleTimeoutMs = this._idleTimeoutMs;
        this._idleTimer = setTimeout(() => {
            this._logger.info(`Closing session after ${idleTimeoutMs}ms without traffic`, { sessionId: this.sessionId });
            this.close().catch((error: unknown) => this._reportFailure(error, 'idle-close'));
        }, idleTimeoutMs);
        this._idleTimer.unref?.();
    }

    private _onmessage(message: JSONRPCMessage, extra?: MessageExtraInfo): void {
        if (this._lifecycle.isTerminated) {
            this.events.emit('message:dropped', { message, reason: 'terminated' });
            return;
        }
        this._touch();
        if (isJSONRPCResponse(message)) {
            this._onresponse(message);
        } else if (isJSONRPCRequest(message)) {
            this._onrequest(message, extra);
        } else if (isJSONRPCNotification(message)) {
            this._onnotification(message, extra);
        } else {
            this._reportFailure(new Error(`Unknown message type: ${JSON.stringify(message)}`), 'message-routing');
        }
    }

    private _onresponse(response: JSONRPCResponse): void {
        if (this._pending.settle(response)) {
            return;
        }
        this._logger.warning(`Dropping response for unknown request id ${JSON.stringify(response.id)}`, { sessionId: this.sessionId });
        this.events.emit('message:dropped', { message: response, reason: 'unknown-response-id' });
    }

    private _handlerContext(method: string, signal: AbortSignal, requestId?: RequestId, extra?: MessageExtraInfo): HandlerContext<TSelf> {
        return { session: this._self(), method, requestId, sessionId: this.sessionId, signal, extra };
    }

    private _onrequest(request: JSONRPCRequest, extra?: MessageExtraInfo): void {
        const controller = new AbortController();
        this._inflight.set(request.id, controller);
        const ctx: CallContext = {
            direction: 'inbound',
            kind: 'request',
            method: request.method,
            requestId: request.id,
            sessionId: this.sessionId,
            signal: controller.signal,
            extra: { ...extra }
        };

        // Starting with Promise.resolve() puts any synchronous errors into the monad as well.
        Promise.resolve()
            .then(async () => {
                this._lifecycle.assertInboundRequestAllowed(request.method);
                const entry = this._dispatch?.request(request.method);
                if (!entry) {
                    throw ProtocolError.methodNotFound(request.method);
                }
                return this._inbound.execute(ctx, { method: request.method, params: request.params }, (_ctx, call) =>
                    entry.handler(this._handlerContext(request.method, controller.signal, request.id, extra), call.params)
                );
            })
            .then(
                result => createResultResponse(request.id, result === undefined ? {} : result),
                (error: unknown) => {
                    this._logger.debug(`Request ${request.method} failed`, { requestId: request.id, error });
                    return toErrorResponse(request.id, error);
                }
            )
            .then(async response => {
                if (this._lifecycle.isTerminated) {
                    return;
                }
                await this._send(response, { relatedRequestId: request.id });
            })
            .catch((error: unknown) => this._reportFailure(error, 'send-response'))
            .finally(() => {
                this._inflight.delete(request.id);
            });
    }

    private _onnotification(notification: JSONRPCNotification, extra?: MessageExtraInfo): void {
        const entry = this._dispatch?.notification(notification.method);
        const bridged = this._bridge?.handles(notification.method) ?? false;

        // Ignore notifications nobody subscribed to.
        if (!entry && !bridged) {
            return;
        }
        if (!this._lifecycle.acceptsNotification(notification.method)) {
            this._logger.warning(`Dropping ${notification.method} received before initialization`, { sessionId: this.sessionId });
            this.events.emit('message:dropped', { message: notification, reason: 'not-initialized' });
            return;
        }

        const ctx: CallContext = {
            direction: 'inbound',
            kind: 'notification',
            method: notification.method,
            sessionId: this.sessionId,
            signal: this._lifetime.signal,
            extra: { ...extra }
        };

        Promise.resolve()
            .then(() =>
                this._inbound.execute(ctx, { method: notification.method, params: notification.params }, async (_ctx, call) => {
                    await entry?.handler(this._handlerContext(notification.method, this._lifetime.signal, undefined, extra), call.params);
                    this._bridge?.trigger(notification.method);
                    return undefined;
                })
            )
            .catch((error: unknown) => this._reportFailure(error, `notification-handler ${notification.method}`));
    }

    private _ontransporterror(error: Error): void {
        if (error instanceof MessageDecodeError && error.requestId !== undefined) {
            // The peer is waiting on this id: answer it instead of leaving it hanging
            this._send(toErrorResponse(error.requestId, error)).catch((sendError: unknown) =>
                this._reportFailure(sendError, 'send-decode-error')
            );
        }
        this._reportFailure(error, error instanceof MessageDecodeError ? 'decode' : 'transport');
    }

    private _onreconnect(): void {
        if (this._lifecycle.isTerminated) {
            return;
        }
        const rejected = this._pending.rejectAll(TransportError.io('Connection lost before the response arrived'));
        this._logger.info('Transport reconnected', { sessionId: this.sessionId, rejectedRequests: rejected });
        this._reestablish()
            .then(() => this.events.emit('transport:reconnected', { sessionId: this.sessionId }))
            .catch(async (error: unknown) => {
                this._reportFailure(error, 'reconnect');
                await this.close();
            })
            .catch((error: unknown) => this._reportFailure(error, 'reconnect-close'));
    }

    private _onclose(): void {
        this._terminate('Connection closed');
    }

    /**
     * Moves to `Terminated` and settles everything that is still waiting.
     */
    private _terminate(reason: string): void {
        if (this._lifecycle.isTerminated) {
            return;
        }
        const sessionId = this.sessionId;
        this._sessionId = sessionId;
        this._lifecycle.transition(SessionPhase.Terminated);
        if (this._idleTimer !== undefined) {
            clearTimeout(this._idleTimer);
            this._idleTimer = undefined;
        }

        const error = StateError.sessionTerminated(reason);
        const rejected = this._pending.rejectAll(error);
        this._bridge?.abortAll(error);
        this._lifetime.abort(error);
        for (const controller of this._inflight.values()) {
            controller.abort(error);
        }
        this._inflight.clear();
        this._transport = undefined;

        this._logger.info(`Session terminated: ${reason}`, { sessionId, rejectedRequests: rejected });
        this.onclose?.();
        this.events.emit('session:closed', { sessionId, reason });
    }
}
