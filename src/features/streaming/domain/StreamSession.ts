import type { TerminalEvent } from '../../chat/domain/StreamEvent.js';
import type { CancelHandle } from '../../chat/ports/IProviderStreamAdapter.js';
import { InvalidStateTransitionError } from '../../chat/domain/errors.js';
import type { Connection } from './Connection.js';

export type StreamState = 'STREAMING' | 'CANCELLING' | 'COMPLETED' | 'CANCELLED' | 'FAILED';

export const TERMINAL_STATES: ReadonlySet<StreamState> = new Set<StreamState>(['COMPLETED', 'CANCELLED', 'FAILED']);

const TRANSITIONS: Readonly<Record<StreamState, readonly StreamState[]>> = {
    STREAMING: ['CANCELLING', 'COMPLETED', 'FAILED'],
    CANCELLING: ['CANCELLED'],
    COMPLETED: [],
    CANCELLED: [],
    FAILED: [],
};

export interface StreamSessionInit {
    sessionKey: string;
    streamId: string;
    model: string;
    now: () => number;
}

/**
 * One in-flight generation for a chat session.
 *
 * Mutated only through StreamRegistry, ConnectionBroadcaster and
 * CancellationController. Every mutation is synchronous, so each runs as a
 * critical section on the event loop.
 */
export class StreamSession {
    readonly sessionKey: string;
    readonly streamId: string;
    readonly model: string;
    readonly startedAt: number;
    readonly connections = new Set<Connection>();

    private currentState: StreamState = 'STREAMING';
    private readonly chunks: string[] = [];
    private accumulated = '';
    private lastActivity: number;
    private cancelHandle: CancelHandle | null = null;
    private cancelRequested = false;
    private terminal: TerminalEvent | null = null;
    private readonly now: () => number;

    constructor(init: StreamSessionInit) {
        this.sessionKey = init.sessionKey;
        this.streamId = init.streamId;
        this.model = init.model;
        this.now = init.now;
        this.startedAt = init.now();
        this.lastActivity = this.startedAt;
    }

    get state(): StreamState {
        return this.currentState;
    }

    get isStreaming(): boolean {
        return this.currentState === 'STREAMING';
    }

    get isTerminal(): boolean {
        return TERMINAL_STATES.has(this.currentState);
    }

    /** Chunks in publish order */
    get buffer(): readonly string[] {
        return this.chunks;
    }

    get text(): string {
        return this.accumulated;
    }

    get lastActivityAt(): number {
        return this.lastActivity;
    }

    get terminalEvent(): TerminalEvent | null {
        return this.terminal;
    }

    /**
     * Compare-and-set. Returns false when the current state is not `from`
     * (another actor got there first); throws on a pair the state machine
     * does not allow.
     */
    tryTransition(from: StreamState, to: StreamState): boolean {
        if (!TRANSITIONS[from].includes(to)) {
            throw new InvalidStateTransitionError(from, to);
        }
        if (this.currentState !== from) return false;
        this.currentState = to;
        return true;
    }

    /** Appends only while STREAMING; the buffer is frozen afterwards */
    append(chunk: string): boolean {
        if (!this.isStreaming) return false;
        this.chunks.push(chunk);
        this.accumulated += chunk;
        this.touch();
        return true;
    }

    touch(): void {
        this.lastActivity = this.now();
    }

    /** A cancel requested before the upstream opened is applied on bind */
    bindCancelHandle(handle: CancelHandle): void {
        this.cancelHandle = handle;
        if (this.cancelRequested) {
            handle.cancel();
        }
    }

    requestCancel(): void {
        this.cancelRequested = true;
        this.cancelHandle?.cancel();
    }

    /** Records the terminal event once; later calls lose */
    markTerminal(event: TerminalEvent): boolean {
        if (this.terminal) return false;
        this.terminal = event;
        return true;
    }
}
