import { logger } from '../../../platform/logger.js';
import { TooManyConnectionsError } from '../../chat/domain/errors.js';
import type { StreamEvent, TerminalEvent, UserMessageSavedEvent } from '../../chat/domain/StreamEvent.js';
import { Connection } from '../domain/Connection.js';
import type { StreamSession } from '../domain/StreamSession.js';

const COMPONENT = 'ConnectionBroadcaster';

export interface ConnectionBroadcasterOptions {
    /** Per-connection queue bound; a connection that falls this far behind is dropped */
    queueCapacity: number;
    maxConnectionsPerStream: number;
}

/**
 * Fan-out of one stream to its attached connections.
 *
 * Sends are non-blocking: a connection that is closed or whose queue is full
 * is detached on the spot, and publication to the others carries on.
 */
export class ConnectionBroadcaster {
    private readonly owners = new WeakMap<Connection, StreamSession>();

    constructor(private readonly options: ConnectionBroadcasterOptions) {}

    /**
     * Replays the buffer and registers the connection in one synchronous step,
     * so the seam between backlog and live chunks has no gap or duplicate.
     */
    attach(session: StreamSession): Connection {
        if (session.connections.size >= this.options.maxConnectionsPerStream) {
            throw new TooManyConnectionsError(session.streamId, this.options.maxConnectionsPerStream);
        }

        const connection = new Connection(session.streamId, this.options.queueCapacity);
        for (const chunk of session.buffer) {
            connection.force({ type: 'content', data: chunk });
        }

        const terminal = session.terminalEvent;
        if (terminal) {
            connection.force(terminal);
            connection.close('terminal');
            return connection;
        }

        session.connections.add(connection);
        this.owners.set(connection, session);
        session.touch();

        logger.debug({
            kind: 'sys',
            component: COMPONENT,
            message: 'Connection attached',
            meta: {
                streamId: session.streamId,
                connectionId: connection.connectionId,
                replayed: session.buffer.length,
                connections: session.connections.size,
            },
        });
        return connection;
    }

    detach(connection: Connection): void {
        const session = this.owners.get(connection);
        connection.close('detached');
        if (!session) return;

        this.owners.delete(connection);
        if (session.connections.delete(connection)) {
            logger.debug({
                kind: 'sys',
                component: COMPONENT,
                message: 'Connection detached',
                meta: { streamId: session.streamId, connectionId: connection.connectionId, connections: session.connections.size },
            });
        }
    }

    /** Appends to the buffer and pushes to every connection; false once the buffer is frozen */
    publish(session: StreamSession, chunk: string): boolean {
        if (!session.append(chunk)) return false;
        this.sendToAll(session, { type: 'content', data: chunk });
        return true;
    }

    /** Live-only event, not part of the replayed backlog */
    notify(session: StreamSession, event: UserMessageSavedEvent): void {
        this.sendToAll(session, event);
    }

    /**
     * Delivers the terminal event (ignoring queue bounds) and closes every
     * connection. Runs at most once per session.
     */
    broadcastTerminal(session: StreamSession, event: TerminalEvent): boolean {
        if (!session.markTerminal(event)) return false;

        const delivered = session.connections.size;
        for (const connection of session.connections) {
            connection.force(event);
            connection.close('terminal');
            this.owners.delete(connection);
        }
        session.connections.clear();

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Terminal event broadcast',
            meta: { streamId: session.streamId, type: event.type, connections: delivered },
        });
        return true;
    }

    /** Client keep-alive; counts as stream activity */
    heartbeat(connection: Connection): void {
        const session = this.owners.get(connection);
        if (session && !connection.closed) {
            session.touch();
        }
    }

    private sendToAll(session: StreamSession, event: StreamEvent): void {
        for (const connection of [...session.connections]) {
            if (connection.offer(event)) continue;

            const reason = connection.closed ? 'closed' : 'overflow';
            const pending = connection.pending;
            connection.close('overflow');
            session.connections.delete(connection);
            this.owners.delete(connection);

            logger.warn({
                kind: 'sys',
                component: COMPONENT,
                message: 'Dropped connection that could not accept output',
                meta: { streamId: session.streamId, connectionId: connection.connectionId, reason, pending },
            });
        }
    }
}
