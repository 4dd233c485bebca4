import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { logger } from '../../platform/logger.js';
import { generateTraceId, runWithTraceId, setSessionId } from '../../platform/tracing.js';
import { ChatCoreError } from '../chat/domain/errors.js';
import type { ChatStreamService } from '../chat/usecases/ChatStreamService.js';
import type { Connection } from '../streaming/domain/Connection.js';
import { errorBody, mapError } from './httpErrors.js';
import { createEventStream, SSE_HEADERS } from './sseStream.js';

const COMPONENT = 'ChatHttpAdapter';

export const API_PREFIX = '/api/v1/messages';

export interface ChatHttpAdapterOptions {
    heartbeatIntervalMs: number;
}

export const sendMessageSchema = z.object({
    content: z.string({
        required_error: 'Message content is required',
        invalid_type_error: 'Message content must be a string',
    }),
});

/**
 * HTTP surface of the streaming core.
 *
 * send-message and stream answer with SSE; everything else is JSON in the
 * `{ success, data | error }` envelope.
 */
export function createChatApp(service: ChatStreamService, options: ChatHttpAdapterOptions): Hono {
    const app = new Hono();

    const streamResponse = (connection: Connection): ReadableStream<Uint8Array> =>
        createEventStream(connection, {
            heartbeatIntervalMs: options.heartbeatIntervalMs,
            onHeartbeat: () => service.heartbeat(connection),
            onDisconnect: () => service.detach(connection),
        });

    // One trace id per request; background generation inherits it
    app.use('*', async (c, next) => {
        const traceId = c.req.header('x-trace-id') || generateTraceId();
        await runWithTraceId(traceId, async () => {
            c.header('X-Trace-Id', traceId);
            const startedAt = Date.now();
            await next();
            logger.debug({
                kind: 'sys',
                component: COMPONENT,
                message: 'Request handled',
                meta: { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - startedAt },
            });
        });
    });

    app.get('/health', (c) => c.json({ status: 'ok', active_streams: service.activeStreams }));

    app.post(
        `${API_PREFIX}/chat-sessions/:chatSessionId/send-message`,
        zValidator('json', sendMessageSchema, (result, c) => {
            if (!result.success) {
                const message = result.error.issues[0]?.message ?? 'Invalid request body';
                return c.json(errorBody('VALIDATION_ERROR', message, { issues: result.error.issues }), 400);
            }
        }),
        async (c) => {
            const chatSessionId = c.req.param('chatSessionId');
            setSessionId(chatSessionId);
            const { content } = c.req.valid('json');

            const { connection } = await service.sendMessage(chatSessionId, content);
            return c.body(streamResponse(connection), 200, SSE_HEADERS);
        }
    );

    app.post(`${API_PREFIX}/chat-sessions/:chatSessionId/cancel-message`, (c) => {
        const chatSessionId = c.req.param('chatSessionId');
        setSessionId(chatSessionId);

        const outcome = service.cancelMessage(chatSessionId);
        if (outcome.status === 'cancelled') {
            return c.json({ success: true, data: { status: outcome.status, stream_id: outcome.streamId } });
        }
        return c.json({ success: true, data: { status: outcome.status } });
    });

    app.get(`${API_PREFIX}/chat-sessions/:chatSessionId/stream`, (c) => {
        const chatSessionId = c.req.param('chatSessionId');
        setSessionId(chatSessionId);

        const { connection } = service.attachToStream(chatSessionId);
        return c.body(streamResponse(connection), 200, SSE_HEADERS);
    });

    app.get(`${API_PREFIX}/chat-sessions/:chatSessionId/stream-status`, (c) => {
        const chatSessionId = c.req.param('chatSessionId');
        return c.json({ success: true, data: service.getStreamStatus(chatSessionId) });
    });

    app.notFound((c) => c.json(errorBody('RESOURCE_NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`), 404));

    app.onError((error, c) => {
        const { status, body } = mapError(error);
        if (error instanceof ChatCoreError && status < 500) {
            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: `Request rejected: ${error.code}`,
                meta: { path: c.req.path, status },
            });
        } else {
            logger.error({ kind: 'sys', component: COMPONENT, message: 'Request failed', error, meta: { path: c.req.path, status } });
        }
        return c.json(body, status);
    });

    return app;
}
