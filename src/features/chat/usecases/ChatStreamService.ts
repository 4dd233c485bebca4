import { logger } from '../../../platform/logger.js';
import type { ChatStore } from '../../../core/ports/ChatStore.js';
import { snapshotConfig, type ChatSessionConfig } from '../domain/ChatSessionConfig.js';
import { NoActiveStreamError, ServiceUnavailableError, ValidationError } from '../domain/errors.js';
import type { TerminalEvent } from '../domain/StreamEvent.js';
import type { IProviderStreamAdapter } from '../ports/IProviderStreamAdapter.js';
import { assemblePrompt } from '../rules/promptAssembly.js';
import type { Connection } from '../../streaming/domain/Connection.js';
import type { StreamSession, StreamState } from '../../streaming/domain/StreamSession.js';
import type { CancellationController, CancelOutcome } from '../../streaming/usecases/CancellationController.js';
import type { ConnectionBroadcaster } from '../../streaming/usecases/ConnectionBroadcaster.js';
import type { StreamRegistry } from '../../streaming/usecases/StreamRegistry.js';

const COMPONENT = 'ChatStreamService';

export const MAX_MESSAGE_LENGTH = 65535;

export interface ChatStreamServiceDeps {
    store: ChatStore;
    provider: IProviderStreamAdapter;
    registry: StreamRegistry;
    broadcaster: ConnectionBroadcaster;
    cancellation: CancellationController;
    /** False when the provider has no credentials; sends are refused with 503 */
    isProviderConfigured?: () => boolean;
    /** Stopped on shutdown */
    supervisor?: { stop(): void };
}

export interface StreamAttachment {
    session: StreamSession;
    connection: Connection;
}

export type StreamStatus =
    | { active: false }
    | {
        active: true;
        streamId: string;
        state: StreamState;
        model: string;
        startedAt: string;
        lastActivityAt: string;
        connections: number;
        length: number;
    };

/**
 * Usecase: one user message -> one streamed assistant turn.
 *
 * 1. Resolve the session configuration (fails before anything is claimed)
 * 2. Claim the session in the registry and attach the caller
 * 3. In the background: history, user turn, prompt, provider stream, fan-out
 * 4. Finish exactly once: COMPLETED (persist), FAILED or CANCELLED (discard)
 */
export class ChatStreamService {
    private readonly store: ChatStore;
    private readonly provider: IProviderStreamAdapter;
    private readonly registry: StreamRegistry;
    private readonly broadcaster: ConnectionBroadcaster;
    private readonly cancellation: CancellationController;
    private readonly isProviderConfigured: () => boolean;
    private readonly supervisor?: { stop(): void };
    private readonly inFlight = new Set<Promise<void>>();

    constructor(deps: ChatStreamServiceDeps) {
        this.store = deps.store;
        this.provider = deps.provider;
        this.registry = deps.registry;
        this.broadcaster = deps.broadcaster;
        this.cancellation = deps.cancellation;
        this.isProviderConfigured = deps.isProviderConfigured ?? (() => true);
        this.supervisor = deps.supervisor;
    }

    async sendMessage(chatSessionId: string, content: string): Promise<StreamAttachment> {
        this.validateContent(content);

        const config = await this.resolveConfig(chatSessionId);

        // Single-writer gate: throws AlreadyStreamingError for a busy session
        const session = this.registry.tryBegin(chatSessionId, { model: config.model });
        const connection = this.broadcaster.attach(session);

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Stream admitted',
            meta: { chatSessionId, streamId: session.streamId, model: config.model, contentLength: content.length },
        });

        const generation = this.runGeneration(session, config, content)
            .catch((error) => {
                logger.error({ kind: 'biz', component: COMPONENT, message: 'Generation task crashed', error, meta: { streamId: session.streamId } });
            })
            .finally(() => {
                this.inFlight.delete(generation);
            });
        this.inFlight.add(generation);

        return { session, connection };
    }

    cancelMessage(chatSessionId: string): CancelOutcome {
        return this.cancellation.cancel(chatSessionId, 'user_cancelled');
    }

    /** Reconnect to a running stream: backlog replay, then live events */
    attachToStream(chatSessionId: string): StreamAttachment {
        const session = this.registry.get(chatSessionId);
        if (!session) {
            throw new NoActiveStreamError(chatSessionId);
        }
        const connection = this.broadcaster.attach(session);
        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Client reattached to stream',
            meta: { chatSessionId, streamId: session.streamId, replayed: session.buffer.length },
        });
        return { session, connection };
    }

    detach(connection: Connection): void {
        this.broadcaster.detach(connection);
    }

    heartbeat(connection: Connection): void {
        this.broadcaster.heartbeat(connection);
    }

    getStreamStatus(chatSessionId: string): StreamStatus {
        const session = this.registry.get(chatSessionId);
        if (!session) return { active: false };
        return {
            active: true,
            streamId: session.streamId,
            state: session.state,
            model: session.model,
            startedAt: new Date(session.startedAt).toISOString(),
            lastActivityAt: new Date(session.lastActivityAt).toISOString(),
            connections: session.connections.size,
            length: session.text.length,
        };
    }

    get activeStreams(): number {
        return this.registry.size;
    }

    /** Resolves once every background generation started so far has settled */
    async drain(): Promise<void> {
        await Promise.all([...this.inFlight]);
    }

    async shutdown(): Promise<void> {
        this.supervisor?.stop();
        for (const session of this.registry.list()) {
            this.cancellation.cancelSession(session, 'shutdown');
        }
        await this.drain();
    }

    private validateContent(content: string): void {
        if (!content || !content.trim()) {
            throw new ValidationError('Message content is required', { content: 'Content must not be empty' });
        }
        if (content.length > MAX_MESSAGE_LENGTH) {
            throw new ValidationError('Message content is too long', {
                content: `Content must be at most ${MAX_MESSAGE_LENGTH} characters`,
            });
        }
    }

    private async resolveConfig(chatSessionId: string): Promise<Readonly<ChatSessionConfig>> {
        const config = await this.store.load(chatSessionId);
        if (!config.model) {
            throw new ServiceUnavailableError('AI model not configured for chat session');
        }
        if (!this.isProviderConfigured()) {
            throw new ServiceUnavailableError('OpenRouter API key not configured');
        }
        return snapshotConfig(config);
    }

    private async runGeneration(
        session: StreamSession,
        config: Readonly<ChatSessionConfig>,
        content: string
    ): Promise<void> {
        const chatSessionId = session.sessionKey;
        try {
            const history = await this.store.listTurns(chatSessionId);
            if (!session.isStreaming) return;

            const userTurn = await this.store.appendTurn(chatSessionId, 'user', content);
            this.broadcaster.notify(session, { type: 'user_message_saved', user_message_id: userTurn.id });
            if (!session.isStreaming) return;

            const messages = assemblePrompt(config, history, content);
            logger.debug({
                kind: 'biz',
                component: COMPONENT,
                message: 'Prompt assembled',
                meta: { streamId: session.streamId, messageCount: messages.length, historyLength: history.length },
            });

            const upstream = this.provider.open({ model: config.model, messages });
            session.bindCancelHandle(upstream.cancelHandle);

            for await (const chunk of upstream.chunks) {
                if (!this.broadcaster.publish(session, chunk)) break;
            }
            if (!session.isStreaming) return;

            await this.complete(session);
        } catch (error) {
            this.fail(session, error);
        }
    }

    private async complete(session: StreamSession): Promise<void> {
        if (!session.tryTransition('STREAMING', 'COMPLETED')) return;

        const text = session.text;
        let terminal: TerminalEvent = { type: 'done' };

        if (text) {
            try {
                const saved = await this.store.appendTurn(session.sessionKey, 'assistant', text);
                terminal = { type: 'done', ai_message_id: saved.id };
            } catch (error) {
                logger.error({
                    kind: 'biz',
                    component: COMPONENT,
                    message: 'Assistant turn persistence failed',
                    error,
                    meta: { streamId: session.streamId, replyLength: text.length },
                });
                terminal = { type: 'error', error: 'Failed to save assistant response' };
            }
        } else {
            logger.warn({ kind: 'biz', component: COMPONENT, message: 'Stream completed with empty reply', meta: { streamId: session.streamId } });
        }

        this.registry.end(session.sessionKey, session.streamId);
        this.broadcaster.broadcastTerminal(session, terminal);

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Streaming chat completed',
            meta: {
                streamId: session.streamId,
                replyLength: text.length,
                chunks: session.buffer.length,
                latencyMs: Date.now() - session.startedAt,
            },
        });
    }

    private fail(session: StreamSession, error: unknown): void {
        if (!session.tryTransition('STREAMING', 'FAILED')) {
            // Cancelled while the upstream was still tearing down
            logger.debug({
                kind: 'biz',
                component: COMPONENT,
                message: 'Ignored error after stream left STREAMING',
                error,
                meta: { streamId: session.streamId, state: session.state },
            });
            return;
        }

        session.requestCancel();
        const message = error instanceof Error ? error.message : String(error);

        logger.error({
            kind: 'biz',
            component: COMPONENT,
            message: 'Streaming generation failed',
            error,
            meta: { streamId: session.streamId, publishedChunks: session.buffer.length },
        });

        this.registry.end(session.sessionKey, session.streamId);
        this.broadcaster.broadcastTerminal(session, { type: 'error', error: message });
    }
}
