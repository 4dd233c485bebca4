import { describe, expect, it } from 'vitest';
import { TooManyConnectionsError } from '../../../chat/domain/errors.js';
import type { StreamEvent } from '../../../chat/domain/StreamEvent.js';
import type { Connection } from '../../domain/Connection.js';
import { StreamSession } from '../../domain/StreamSession.js';
import { ConnectionBroadcaster } from '../ConnectionBroadcaster.js';

const makeSession = (clock = { now: 0 }) =>
    new StreamSession({ sessionKey: 'chat-1', streamId: 'stream-1', model: 'm', now: () => clock.now });

const drain = async (connection: Connection): Promise<StreamEvent[]> => {
    const events: StreamEvent[] = [];
    for await (const event of connection) events.push(event);
    return events;
};

describe('ConnectionBroadcaster', () => {
    it('replays the backlog to a late joiner, then delivers live chunks in order', async () => {
        const broadcaster = new ConnectionBroadcaster({ queueCapacity: 16, maxConnectionsPerStream: 5 });
        const session = makeSession();

        const early = broadcaster.attach(session);
        broadcaster.publish(session, 'one ');
        broadcaster.publish(session, 'two ');

        const late = broadcaster.attach(session);
        broadcaster.publish(session, 'three');
        broadcaster.broadcastTerminal(session, { type: 'done', ai_message_id: '9' });

        const expected: StreamEvent[] = [
            { type: 'content', data: 'one ' },
            { type: 'content', data: 'two ' },
            { type: 'content', data: 'three' },
            { type: 'done', ai_message_id: '9' },
        ];
        expect(await drain(early)).toEqual(expected);
        expect(await drain(late)).toEqual(expected);
    });

    it('does not replay user_message_saved to a late joiner', async () => {
        const broadcaster = new ConnectionBroadcaster({ queueCapacity: 16, maxConnectionsPerStream: 5 });
        const session = makeSession();

        const first = broadcaster.attach(session);
        broadcaster.notify(session, { type: 'user_message_saved', user_message_id: '3' });
        broadcaster.publish(session, 'hi');
        const second = broadcaster.attach(session);
        broadcaster.broadcastTerminal(session, { type: 'done' });

        expect(await drain(first)).toEqual([
            { type: 'user_message_saved', user_message_id: '3' },
            { type: 'content', data: 'hi' },
            { type: 'done' },
        ]);
        expect(await drain(second)).toEqual([{ type: 'content', data: 'hi' }, { type: 'done' }]);
    });

    it('drops a connection whose queue is full without stalling the others', async () => {
        const broadcaster = new ConnectionBroadcaster({ queueCapacity: 2, maxConnectionsPerStream: 5 });
        const session = makeSession();

        const slow = broadcaster.attach(session);
        const fast = broadcaster.attach(session);
        const fastEvents: StreamEvent[] = [];
        const consuming = (async () => {
            for await (const event of fast) fastEvents.push(event);
        })();

        for (const chunk of ['a', 'b', 'c', 'd']) {
            broadcaster.publish(session, chunk);
            // let the fast consumer catch up
            await new Promise<void>((resolve) => setImmediate(resolve));
        }
        broadcaster.broadcastTerminal(session, { type: 'done' });
        await consuming;

        expect(slow.closedBecause).toBe('overflow');
        expect(session.connections.has(slow)).toBe(false);
        expect(fastEvents).toEqual([
            { type: 'content', data: 'a' },
            { type: 'content', data: 'b' },
            { type: 'content', data: 'c' },
            { type: 'content', data: 'd' },
            { type: 'done' },
        ]);
        expect(session.text).toBe('abcd');
    });

    it('detaching one connection leaves the stream and the others untouched', async () => {
        const broadcaster = new ConnectionBroadcaster({ queueCapacity: 8, maxConnectionsPerStream: 5 });
        const session = makeSession();
        const leaving = broadcaster.attach(session);
        const staying = broadcaster.attach(session);

        broadcaster.detach(leaving);
        broadcaster.publish(session, 'x');
        broadcaster.broadcastTerminal(session, { type: 'done' });

        expect(session.state).toBe('STREAMING');
        expect(leaving.closedBecause).toBe('detached');
        expect(await drain(leaving)).toEqual([]);
        expect(await drain(staying)).toEqual([{ type: 'content', data: 'x' }, { type: 'done' }]);
    });

    it('sends the terminal event once and it is always last', async () => {
        const broadcaster = new ConnectionBroadcaster({ queueCapacity: 8, maxConnectionsPerStream: 5 });
        const session = makeSession();
        const connection = broadcaster.attach(session);

        broadcaster.publish(session, 'x');
        expect(broadcaster.broadcastTerminal(session, { type: 'cancelled', reason: 'user_cancelled' })).toBe(true);
        expect(broadcaster.broadcastTerminal(session, { type: 'done' })).toBe(false);

        expect(await drain(connection)).toEqual([
            { type: 'content', data: 'x' },
            { type: 'cancelled', reason: 'user_cancelled' },
        ]);
        expect(session.connections.size).toBe(0);
    });

    it('replays backlog and terminal event when attaching after the stream ended', async () => {
        const broadcaster = new ConnectionBroadcaster({ queueCapacity: 8, maxConnectionsPerStream: 5 });
        const session = makeSession();
        broadcaster.publish(session, 'partial');
        session.tryTransition('STREAMING', 'FAILED');
        broadcaster.broadcastTerminal(session, { type: 'error', error: 'boom' });

        const connection = broadcaster.attach(session);
        expect(connection.closedBecause).toBe('terminal');
        expect(await drain(connection)).toEqual([
            { type: 'content', data: 'partial' },
            { type: 'error', error: 'boom' },
        ]);
        expect(session.connections.size).toBe(0);
    });

    it('refuses connections beyond the per-stream limit', () => {
        const broadcaster = new ConnectionBroadcaster({ queueCapacity: 8, maxConnectionsPerStream: 2 });
        const session = makeSession();
        broadcaster.attach(session);
        broadcaster.attach(session);
        expect(() => broadcaster.attach(session)).toThrow(TooManyConnectionsError);
    });

    it('counts attach and heartbeat as activity', () => {
        const clock = { now: 100 };
        const broadcaster = new ConnectionBroadcaster({ queueCapacity: 8, maxConnectionsPerStream: 5 });
        const session = makeSession(clock);

        clock.now = 200;
        const connection = broadcaster.attach(session);
        expect(session.lastActivityAt).toBe(200);

        clock.now = 900;
        broadcaster.heartbeat(connection);
        expect(session.lastActivityAt).toBe(900);

        broadcaster.detach(connection);
        clock.now = 1_500;
        broadcaster.heartbeat(connection);
        expect(session.lastActivityAt).toBe(900);
    });
});
