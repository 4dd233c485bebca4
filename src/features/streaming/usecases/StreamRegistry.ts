import { nanoid } from 'nanoid';
import { logger } from '../../../platform/logger.js';
import { AlreadyStreamingError } from '../../chat/domain/errors.js';
import { StreamSession } from '../domain/StreamSession.js';

const COMPONENT = 'StreamRegistry';

export interface StreamRegistryOptions {
    now?: () => number;
    generateStreamId?: () => string;
}

/**
 * Process-wide table: chat session id -> the one active StreamSession.
 *
 * `tryBegin` is the single-writer gate. Its check-and-set runs without an
 * await in between, so concurrent callers for the same key cannot both win.
 * `end` is a compare-and-remove on `streamId`: a stale finisher can never
 * remove a newer stream that reused the key.
 */
export class StreamRegistry {
    private readonly sessions = new Map<string, StreamSession>();
    private readonly now: () => number;
    private readonly generateStreamId: () => string;

    constructor(options: StreamRegistryOptions = {}) {
        this.now = options.now ?? Date.now;
        this.generateStreamId = options.generateStreamId ?? (() => nanoid());
    }

    tryBegin(sessionKey: string, init: { model: string }): StreamSession {
        const existing = this.sessions.get(sessionKey);
        if (existing) {
            logger.warn({
                kind: 'biz',
                component: COMPONENT,
                message: 'Rejected second stream for busy session',
                meta: { sessionKey, activeStreamId: existing.streamId, state: existing.state },
            });
            throw new AlreadyStreamingError(sessionKey, existing.streamId);
        }

        const session = new StreamSession({
            sessionKey,
            streamId: this.generateStreamId(),
            model: init.model,
            now: this.now,
        });
        this.sessions.set(sessionKey, session);

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Stream registered',
            meta: { sessionKey, streamId: session.streamId, model: init.model, active: this.sessions.size },
        });
        return session;
    }

    get(sessionKey: string): StreamSession | undefined {
        return this.sessions.get(sessionKey);
    }

    end(sessionKey: string, streamId: string): boolean {
        const current = this.sessions.get(sessionKey);
        if (!current || current.streamId !== streamId) {
            logger.debug({
                kind: 'biz',
                component: COMPONENT,
                message: 'Ignored stale end',
                meta: { sessionKey, streamId, currentStreamId: current?.streamId ?? null },
            });
            return false;
        }

        this.sessions.delete(sessionKey);
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Stream retired',
            meta: { sessionKey, streamId, state: current.state, active: this.sessions.size },
        });
        return true;
    }

    /** Snapshot; safe to iterate while sessions are being retired */
    list(): StreamSession[] {
        return [...this.sessions.values()];
    }

    get size(): number {
        return this.sessions.size;
    }
}
