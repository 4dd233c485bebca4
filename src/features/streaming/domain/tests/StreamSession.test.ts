import assert from 'node:assert/strict';
import { describe, it } from 'vitest';
import { InvalidStateTransitionError } from '../../../chat/domain/errors.js';
import { StreamSession, type StreamState } from '../StreamSession.js';

const makeSession = (clock = { now: 1_000 }) =>
    new StreamSession({ sessionKey: 'chat-1', streamId: 'stream-1', model: 'test/model', now: () => clock.now });

describe('StreamSession state machine', () => {
    it('starts STREAMING with an empty buffer', () => {
        const session = makeSession();
        assert.equal(session.state, 'STREAMING');
        assert.equal(session.isTerminal, false);
        assert.deepEqual(session.buffer, []);
        assert.equal(session.text, '');
        assert.equal(session.startedAt, 1_000);
    });

    it('follows STREAMING -> CANCELLING -> CANCELLED', () => {
        const session = makeSession();
        assert.equal(session.tryTransition('STREAMING', 'CANCELLING'), true);
        assert.equal(session.isStreaming, false);
        assert.equal(session.isTerminal, false);
        assert.equal(session.tryTransition('CANCELLING', 'CANCELLED'), true);
        assert.equal(session.isTerminal, true);
    });

    it('lets only the first actor leave STREAMING', () => {
        const session = makeSession();
        assert.equal(session.tryTransition('STREAMING', 'COMPLETED'), true);
        assert.equal(session.tryTransition('STREAMING', 'CANCELLING'), false);
        assert.equal(session.tryTransition('STREAMING', 'FAILED'), false);
        assert.equal(session.state, 'COMPLETED');
    });

    it('rejects transitions the machine does not define', () => {
        const session = makeSession();
        const illegal: Array<[StreamState, StreamState]> = [
            ['STREAMING', 'CANCELLED'],
            ['COMPLETED', 'STREAMING'],
            ['CANCELLED', 'STREAMING'],
            ['FAILED', 'COMPLETED'],
            ['CANCELLING', 'COMPLETED'],
        ];
        for (const [from, to] of illegal) {
            assert.throws(() => session.tryTransition(from, to), InvalidStateTransitionError);
        }
        assert.equal(session.state, 'STREAMING');
    });

    it('freezes the buffer once it leaves STREAMING', () => {
        const clock = { now: 1_000 };
        const session = makeSession(clock);
        clock.now = 1_500;
        assert.equal(session.append('Hel'), true);
        assert.equal(session.append('lo'), true);
        assert.equal(session.lastActivityAt, 1_500);

        session.tryTransition('STREAMING', 'FAILED');
        clock.now = 2_000;
        assert.equal(session.append('!'), false);
        assert.deepEqual(session.buffer, ['Hel', 'lo']);
        assert.equal(session.text, 'Hello');
        assert.equal(session.lastActivityAt, 1_500);
    });

    it('applies a cancel requested before the handle is bound', () => {
        const session = makeSession();
        let cancels = 0;
        session.requestCancel();
        session.bindCancelHandle({ cancel: () => { cancels += 1; } });
        assert.equal(cancels, 1);
    });

    it('forwards a cancel to a bound handle', () => {
        const session = makeSession();
        let cancels = 0;
        session.bindCancelHandle({ cancel: () => { cancels += 1; } });
        assert.equal(cancels, 0);
        session.requestCancel();
        assert.equal(cancels, 1);
    });

    it('records only the first terminal event', () => {
        const session = makeSession();
        assert.equal(session.markTerminal({ type: 'cancelled', reason: 'user_cancelled' }), true);
        assert.equal(session.markTerminal({ type: 'done' }), false);
        assert.deepEqual(session.terminalEvent, { type: 'cancelled', reason: 'user_cancelled' });
    });
});
