import { logger } from '../../../platform/logger.js';
import type { CancelReason } from '../../chat/domain/StreamEvent.js';
import type { StreamSession } from '../domain/StreamSession.js';
import type { ConnectionBroadcaster } from './ConnectionBroadcaster.js';
import type { StreamRegistry } from './StreamRegistry.js';

const COMPONENT = 'CancellationController';

export type CancelOutcome =
    | { status: 'cancelled'; streamId: string; reason: CancelReason }
    | { status: 'nothing_to_cancel' };

/**
 * STREAMING -> CANCELLING -> CANCELLED.
 *
 * The upstream abort is best effort; the registry side is authoritative.
 * The session is retired and the terminal event sent without waiting for the
 * provider to acknowledge, so the chat session can take a new message at once.
 */
export class CancellationController {
    constructor(
        private readonly registry: StreamRegistry,
        private readonly broadcaster: ConnectionBroadcaster
    ) {}

    cancel(sessionKey: string, reason: CancelReason = 'user_cancelled'): CancelOutcome {
        const session = this.registry.get(sessionKey);
        if (!session) {
            logger.info({ kind: 'biz', component: COMPONENT, message: 'Nothing to cancel', meta: { sessionKey, reason } });
            return { status: 'nothing_to_cancel' };
        }
        return this.cancelSession(session, reason);
    }

    cancelSession(session: StreamSession, reason: CancelReason): CancelOutcome {
        // Losing this compare-and-set means completion, failure or another cancel won
        if (!session.tryTransition('STREAMING', 'CANCELLING')) {
            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Nothing to cancel: stream already finishing',
                meta: { sessionKey: session.sessionKey, streamId: session.streamId, state: session.state, reason },
            });
            return { status: 'nothing_to_cancel' };
        }

        try {
            session.requestCancel();
        } catch (error) {
            logger.warn({
                kind: 'sys',
                component: COMPONENT,
                message: 'Upstream cancel handle threw; forcing cancellation',
                error,
                meta: { streamId: session.streamId },
            });
        }

        session.tryTransition('CANCELLING', 'CANCELLED');
        this.registry.end(session.sessionKey, session.streamId);
        this.broadcaster.broadcastTerminal(session, { type: 'cancelled', reason });

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Stream cancelled',
            meta: {
                sessionKey: session.sessionKey,
                streamId: session.streamId,
                reason,
                discardedChars: session.text.length,
            },
        });
        return { status: 'cancelled', streamId: session.streamId, reason };
    }
}
