import type { SupabaseClient } from '@supabase/supabase-js';
import type { HistoryReader, MessagePersister } from '../../core/ports/ChatStore.js';
import type { ConversationTurn, TurnRole } from '../../features/chat/domain/ConversationTurn.js';
import { PersistenceError } from '../../features/chat/domain/errors.js';
import { logger } from '../../platform/logger.js';
import { MESSAGE_SELECT, mapMessageRow } from '../supabase/rowMappers.js';

const COMPONENT = 'SupabaseMessageRepository';

export interface SessionToucher {
    touch(chatSessionId: string): Promise<void>;
}

/**
 * Adapter - message history on Supabase.
 * One insert per turn; no transaction spans a stream.
 */
export class SupabaseMessageRepository implements HistoryReader, MessagePersister {
    constructor(
        private readonly client: SupabaseClient,
        private readonly sessions?: SessionToucher
    ) {}

    async listTurns(chatSessionId: string): Promise<ConversationTurn[]> {
        const { data, error } = await this.client
            .from('messages')
            .select(MESSAGE_SELECT)
            .eq('chat_session_id', chatSessionId)
            .order('timestamp', { ascending: true })
            .order('id', { ascending: true });

        if (error) {
            logger.error({
                kind: 'sys',
                component: COMPONENT,
                message: `Failed to read history: ${error.message} (code: ${error.code})`,
                meta: { chatSessionId },
            });
            throw new PersistenceError('Failed to read chat history', error);
        }

        try {
            return (data ?? []).map((row) => mapMessageRow(row));
        } catch (err) {
            throw new PersistenceError('Message record is malformed', err);
        }
    }

    async appendTurn(chatSessionId: string, role: TurnRole, content: string): Promise<{ id: string }> {
        const { data, error } = await this.client
            .from('messages')
            .insert({ chat_session_id: chatSessionId, role, content })
            .select(MESSAGE_SELECT)
            .single();

        if (error) {
            logger.error({
                kind: 'sys',
                component: COMPONENT,
                message: `Failed to insert message: ${error.message} (code: ${error.code})`,
                meta: { chatSessionId, role, hint: error.hint, details: error.details },
            });
            throw new PersistenceError(`Failed to save ${role} message`, error);
        }

        let turn: ConversationTurn;
        try {
            turn = mapMessageRow(data);
        } catch (err) {
            throw new PersistenceError('Inserted message record is malformed', err);
        }

        logger.debug({ kind: 'sys', component: COMPONENT, message: 'Message persisted', meta: { chatSessionId, role, id: turn.id } });

        if (this.sessions) {
            await this.sessions.touch(chatSessionId);
        }
        return { id: turn.id };
    }
}
