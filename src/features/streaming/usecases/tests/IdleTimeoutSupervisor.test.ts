import { afterEach, describe, expect, it, vi } from 'vitest';
import { CancellationController } from '../CancellationController.js';
import { ConnectionBroadcaster } from '../ConnectionBroadcaster.js';
import { IdleTimeoutSupervisor } from '../IdleTimeoutSupervisor.js';
import { StreamRegistry } from '../StreamRegistry.js';

const IDLE_MS = 300_000;

const setup = () => {
    const clock = { now: 0 };
    let ids = 0;
    const registry = new StreamRegistry({ now: () => clock.now, generateStreamId: () => `stream-${++ids}` });
    const broadcaster = new ConnectionBroadcaster({ queueCapacity: 8, maxConnectionsPerStream: 5 });
    const cancellation = new CancellationController(registry, broadcaster);
    const supervisor = new IdleTimeoutSupervisor(registry, cancellation, {
        idleTimeoutMs: IDLE_MS,
        sweepIntervalMs: 30_000,
        now: () => clock.now,
    });
    return { clock, registry, broadcaster, supervisor };
};

describe('IdleTimeoutSupervisor', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('cancels a stream with no viewer and no activity past the threshold', () => {
        const { clock, registry, supervisor } = setup();
        const session = registry.tryBegin('chat-1', { model: 'm' });

        clock.now = IDLE_MS;
        expect(supervisor.sweep()).toEqual([]);

        clock.now = IDLE_MS + 1;
        expect(supervisor.sweep()).toEqual(['stream-1']);
        expect(session.state).toBe('CANCELLED');
        expect(session.terminalEvent).toEqual({ type: 'cancelled', reason: 'timeout' });
        expect(registry.size).toBe(0);
    });

    it('leaves a stream alone while a connection is attached', () => {
        const { clock, registry, broadcaster, supervisor } = setup();
        const session = registry.tryBegin('chat-1', { model: 'm' });
        const connection = broadcaster.attach(session);

        clock.now = IDLE_MS * 3;
        expect(supervisor.sweep()).toEqual([]);
        expect(session.state).toBe('STREAMING');

        broadcaster.detach(connection);
        expect(supervisor.sweep()).toEqual(['stream-1']);
    });

    it('treats chunks and heartbeats as activity', () => {
        const { clock, registry, broadcaster, supervisor } = setup();
        const session = registry.tryBegin('chat-1', { model: 'm' });
        const connection = broadcaster.attach(session);
        broadcaster.detach(connection);

        clock.now = IDLE_MS - 10;
        broadcaster.publish(session, 'still going');
        clock.now = IDLE_MS + 100;
        expect(supervisor.isIdle(session)).toBe(false);

        const viewer = broadcaster.attach(session);
        clock.now = IDLE_MS * 2;
        broadcaster.heartbeat(viewer);
        broadcaster.detach(viewer);
        clock.now = IDLE_MS * 3 - 1;
        expect(supervisor.sweep()).toEqual([]);

        clock.now = IDLE_MS * 3 + 1;
        expect(supervisor.sweep()).toEqual(['stream-1']);
    });

    it('sweeps on its interval once started and stops cleanly', () => {
        vi.useFakeTimers();
        const { clock, registry, supervisor } = setup();
        registry.tryBegin('chat-1', { model: 'm' });
        clock.now = IDLE_MS + 1;

        supervisor.start();
        expect(supervisor.running).toBe(true);
        vi.advanceTimersByTime(29_999);
        expect(registry.size).toBe(1);

        vi.advanceTimersByTime(1);
        expect(registry.size).toBe(0);

        supervisor.stop();
        expect(supervisor.running).toBe(false);
    });
});
