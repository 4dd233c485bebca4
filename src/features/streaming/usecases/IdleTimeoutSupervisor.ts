import { logger } from '../../../platform/logger.js';
import { generateTraceId, runWithTraceIdSync } from '../../../platform/tracing.js';
import type { StreamSession } from '../domain/StreamSession.js';
import type { CancellationController } from './CancellationController.js';
import type { StreamRegistry } from './StreamRegistry.js';

const COMPONENT = 'IdleTimeoutSupervisor';

export interface IdleTimeoutSupervisorOptions {
    idleTimeoutMs: number;
    sweepIntervalMs: number;
    now?: () => number;
}

/**
 * Single periodic sweep over the active streams. A stream with no viewer and
 * no activity for longer than the threshold is cancelled with reason
 * `timeout`, releasing the session's single-writer lock.
 */
export class IdleTimeoutSupervisor {
    private timer: NodeJS.Timeout | null = null;
    private readonly now: () => number;

    constructor(
        private readonly registry: StreamRegistry,
        private readonly cancellation: CancellationController,
        private readonly options: IdleTimeoutSupervisorOptions
    ) {
        this.now = options.now ?? Date.now;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            runWithTraceIdSync(generateTraceId(), () => this.sweep());
        }, this.options.sweepIntervalMs);
        // Must not keep the process alive on its own
        this.timer.unref();

        logger.info({
            kind: 'sys',
            component: COMPONENT,
            message: 'Idle supervisor started',
            meta: { idleTimeoutMs: this.options.idleTimeoutMs, sweepIntervalMs: this.options.sweepIntervalMs },
        });
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Idle supervisor stopped' });
    }

    get running(): boolean {
        return this.timer !== null;
    }

    isIdle(session: StreamSession, now: number = this.now()): boolean {
        return session.isStreaming
            && session.connections.size === 0
            && now - session.lastActivityAt > this.options.idleTimeoutMs;
    }

    /** @returns stream ids cancelled by this sweep */
    sweep(): string[] {
        const now = this.now();
        const cancelled: string[] = [];

        for (const session of this.registry.list()) {
            if (!this.isIdle(session, now)) continue;

            logger.warn({
                kind: 'biz',
                component: COMPONENT,
                message: 'Cancelling idle stream',
                meta: {
                    sessionKey: session.sessionKey,
                    streamId: session.streamId,
                    idleMs: now - session.lastActivityAt,
                },
            });

            const outcome = this.cancellation.cancelSession(session, 'timeout');
            if (outcome.status === 'cancelled') {
                cancelled.push(outcome.streamId);
            }
        }

        return cancelled;
    }
}
