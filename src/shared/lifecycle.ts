import { ProtocolError, StateError } from '../errors.js';
import { Method, SUPPORTED_PROTOCOL_VERSIONS } from '../types.js';

export enum SessionPhase {
    Unstarted = 'unstarted',
    Initializing = 'initializing',
    Ready = 'ready',
    Terminated = 'terminated'
}

const ORDER: readonly SessionPhase[] = [SessionPhase.Unstarted, SessionPhase.Initializing, SessionPhase.Ready, SessionPhase.Terminated];

/** Requests a responder accepts before the handshake completes */
const PRE_READY_METHODS: ReadonlySet<string> = new Set([Method.Initialize, Method.Ping]);

export interface PeerRecord<TCapabilities, TInfo> {
    capabilities: TCapabilities;
    info: TInfo;
    protocolVersion: string;
}

/**
 * Tracks the phase of one session and what the peer declared during the handshake.
 *
 * Phases only move forward, one step at a time, except that any phase may
 * jump to `Terminated`.
 */
export class LifecycleManager<TCapabilities, TInfo> {
    private _phase = SessionPhase.Unstarted;
    private _peer?: Readonly<PeerRecord<TCapabilities, TInfo>>;

    constructor(private readonly _onTransition?: (from: SessionPhase, to: SessionPhase) => void) {}

    get phase(): SessionPhase {
        return this._phase;
    }

    get isReady(): boolean {
        return this._phase === SessionPhase.Ready;
    }

    get isTerminated(): boolean {
        return this._phase === SessionPhase.Terminated;
    }

    get peer(): Readonly<PeerRecord<TCapabilities, TInfo>> | undefined {
        return this._peer;
    }

    /**
     * Moves to `to`.
     *
     * @throws StateError when the move would skip or reverse a phase.
     */
    transition(to: SessionPhase): void {
        const from = this._phase;
        if (from === to && to === SessionPhase.Terminated) {
            return;
        }
        const allowed = to === SessionPhase.Terminated || ORDER.indexOf(to) === ORDER.indexOf(from) + 1;
        if (!allowed) {
            throw StateError.invalidState(`Cannot move session from ${from} to ${to}`);
        }
        this._phase = to;
        this._onTransition?.(from, to);
    }

    /**
     * @throws ProtocolError (`InvalidRequest`) when `method` may not be served in the current phase.
     */
    assertInboundRequestAllowed(method: string): void {
        if (this._phase === SessionPhase.Ready || PRE_READY_METHODS.has(method)) {
            return;
        }
        throw ProtocolError.invalidRequest('Session not initialized', { method, phase: this._phase });
    }

    /**
     * Whether a notification other than `notifications/initialized` may be handled now.
     */
    acceptsNotification(method: string): boolean {
        return this._phase === SessionPhase.Ready || method === Method.Initialized;
    }

    /**
     * Stores what the peer declared. The record is frozen and can be set only once.
     */
    recordPeer(record: PeerRecord<TCapabilities, TInfo>): void {
        if (this._peer) {
            throw StateError.invalidState('Peer capabilities were already negotiated');
        }
        this._peer = Object.freeze({ ...record });
    }
}

/**
 * Picks the protocol version to speak: the requested one when supported, otherwise the latest.
 */
export function negotiateProtocolVersion(requested: string, supported: readonly string[] = SUPPORTED_PROTOCOL_VERSIONS): string {
    if (supported.includes(requested)) {
        return requested;
    }
    const latest = supported[0];
    if (latest === undefined) {
        throw StateError.invalidState('No supported protocol versions');
    }
    return latest;
}
