import type { SupabaseClient } from '@supabase/supabase-js';
import { ZodError } from 'zod';
import type { ChatSessionConfigLoader } from '../../core/ports/ChatStore.js';
import type { ChatSessionConfig } from '../../features/chat/domain/ChatSessionConfig.js';
import { NotFoundError, PersistenceError } from '../../features/chat/domain/errors.js';
import { logger } from '../../platform/logger.js';
import { CHAT_SESSION_SELECT, mapChatSessionRow } from '../supabase/rowMappers.js';

const COMPONENT = 'SupabaseChatSessionRepository';

/** Chat session ids are integer primary keys */
const isRowId = (id: string): boolean => /^\d+$/.test(id);

/**
 * Adapter - resolves a chat session and its model / prompt / character /
 * profile records in one PostgREST query.
 */
export class SupabaseChatSessionRepository implements ChatSessionConfigLoader {
    constructor(private readonly client: SupabaseClient) {}

    async load(chatSessionId: string): Promise<ChatSessionConfig> {
        if (!isRowId(chatSessionId)) {
            throw new NotFoundError(`Chat session ${chatSessionId} not found`);
        }

        const { data, error } = await this.client
            .from('chat_sessions')
            .select(CHAT_SESSION_SELECT)
            .eq('id', chatSessionId)
            .maybeSingle();

        if (error) {
            logger.error({
                kind: 'sys',
                component: COMPONENT,
                message: `Failed to load chat session: ${error.message} (code: ${error.code})`,
                meta: { chatSessionId, hint: error.hint, details: error.details },
            });
            throw new PersistenceError('Failed to load chat session', error);
        }
        if (!data) {
            throw new NotFoundError(`Chat session ${chatSessionId} not found`);
        }

        try {
            return mapChatSessionRow(data);
        } catch (err) {
            if (err instanceof ZodError) {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Chat session row has unexpected shape', error: err, meta: { chatSessionId } });
                throw new PersistenceError('Chat session record is malformed', err);
            }
            throw err;
        }
    }

    /** Bumps `updated_at` so session lists order by last activity */
    async touch(chatSessionId: string): Promise<void> {
        const { error } = await this.client
            .from('chat_sessions')
            .update({ updated_at: new Date().toISOString() })
            .eq('id', chatSessionId);

        if (error) {
            logger.warn({
                kind: 'sys',
                component: COMPONENT,
                message: `Failed to bump chat session updated_at: ${error.message}`,
                meta: { chatSessionId, code: error.code },
            });
        }
    }
}
