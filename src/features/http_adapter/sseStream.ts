import { logger } from '../../platform/logger.js';
import { isTerminalEvent, type StreamEvent } from '../chat/domain/StreamEvent.js';
import type { Connection } from '../streaming/domain/Connection.js';

const COMPONENT = 'SseStream';

export const SSE_HEADERS: Record<string, string> = {
    'Content-Type': 'text/event-stream; charset=utf-8',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
    // Disable nginx buffering so chunks render as they arrive
    'X-Accel-Buffering': 'no',
};

export const HEARTBEAT_FRAME = ': ping\n\n';

export const formatEvent = (event: StreamEvent): string => `data: ${JSON.stringify(event)}\n\n`;

export interface SseStreamOptions {
    heartbeatIntervalMs: number;
    /** Called for every heartbeat frame written; skipped frames do not count */
    onHeartbeat: () => void;
    /** Called once when the client goes away before the terminal event */
    onDisconnect: () => void;
}

/**
 * Body of one SSE response, pulled from a connection's queue.
 * Ends after the terminal event; a client disconnect detaches the connection.
 */
export function createEventStream(connection: Connection, options: SseStreamOptions): ReadableStream<Uint8Array> {
    const encoder = new TextEncoder();
    let finished = false;
    let heartbeat: NodeJS.Timeout | null = null;

    const stopHeartbeat = () => {
        if (heartbeat) {
            clearInterval(heartbeat);
            heartbeat = null;
        }
    };

    return new ReadableStream<Uint8Array>({
        start(controller) {
            heartbeat = setInterval(() => {
                if (finished) return;
                // Client not reading; a queued frame is already waiting
                const desired = controller.desiredSize;
                if (desired === null || desired <= 0) return;
                controller.enqueue(encoder.encode(HEARTBEAT_FRAME));
                options.onHeartbeat();
            }, options.heartbeatIntervalMs);
            heartbeat.unref();
        },

        async pull(controller) {
            if (finished) return;
            const result = await connection.next();
            if (finished) return;

            if (result.done) {
                finished = true;
                stopHeartbeat();
                controller.close();
                return;
            }

            controller.enqueue(encoder.encode(formatEvent(result.value)));
            if (isTerminalEvent(result.value)) {
                finished = true;
                stopHeartbeat();
                controller.close();
            }
        },

        cancel() {
            if (finished) return;
            finished = true;
            stopHeartbeat();
            logger.info({
                kind: 'sys',
                component: COMPONENT,
                message: 'Client disconnected from stream',
                meta: { streamId: connection.streamId, connectionId: connection.connectionId },
            });
            options.onDisconnect();
        },
    });
}
