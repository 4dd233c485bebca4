import { serve } from '@hono/node-server';
import config from './platform/config.js';
import { logger } from './platform/logger.js';
import { ChatStreamService } from './features/chat/usecases/ChatStreamService.js';
import { createChatApp } from './features/http_adapter/ChatHttpAdapter.js';
import { CancellationController } from './features/streaming/usecases/CancellationController.js';
import { ConnectionBroadcaster } from './features/streaming/usecases/ConnectionBroadcaster.js';
import { IdleTimeoutSupervisor } from './features/streaming/usecases/IdleTimeoutSupervisor.js';
import { StreamRegistry } from './features/streaming/usecases/StreamRegistry.js';
import { OpenRouterStreamAdapter } from './infrastructure/ai/OpenRouterStreamAdapter.js';
import { createChatStore } from './infrastructure/repositories/createChatStore.js';
import { getSupabaseClient } from './infrastructure/supabase/SupabaseClient.js';

const COMPONENT = 'Server';

function main(): void {
    const provider = new OpenRouterStreamAdapter(config.openrouter);
    if (!provider.isConfigured) {
        logger.warn({ kind: 'sys', component: COMPONENT, message: 'OPENROUTER_API_KEY is not set; send-message will answer 503' });
    }

    const registry = new StreamRegistry();
    const broadcaster = new ConnectionBroadcaster({
        queueCapacity: config.streaming.connectionQueueSize,
        maxConnectionsPerStream: config.streaming.maxConnectionsPerSession,
    });
    const cancellation = new CancellationController(registry, broadcaster);
    const supervisor = new IdleTimeoutSupervisor(registry, cancellation, {
        idleTimeoutMs: config.streaming.idleTimeoutMs,
        sweepIntervalMs: config.streaming.sweepIntervalMs,
    });

    const service = new ChatStreamService({
        store: createChatStore(getSupabaseClient(), config.mockData.chatSessionsPath),
        provider,
        registry,
        broadcaster,
        cancellation,
        isProviderConfigured: () => provider.isConfigured,
        supervisor,
    });

    const app = createChatApp(service, { heartbeatIntervalMs: config.streaming.heartbeatIntervalMs });
    supervisor.start();

    const server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
        logger.info({ kind: 'sys', component: COMPONENT, message: 'HTTP server listening', meta: { host: info.address, port: info.port } });
    });

    let stopping = false;
    const stop = (signal: string) => {
        if (stopping) return;
        stopping = true;
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Shutting down', meta: { signal, activeStreams: service.activeStreams } });

        service.shutdown()
            .catch((error) => {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Stream shutdown failed', error });
            })
            .finally(() => {
                server.close((error) => {
                    if (error) {
                        logger.error({ kind: 'sys', component: COMPONENT, message: 'HTTP server close failed', error });
                        process.exit(1);
                    }
                    process.exit(0);
                });
            });
    };

    process.on('SIGINT', () => stop('SIGINT'));
    process.on('SIGTERM', () => stop('SIGTERM'));
}

main();
