import type { SupabaseClient } from '@supabase/supabase-js';
import type { ChatStore } from '../../core/ports/ChatStore.js';
import { logger } from '../../platform/logger.js';
import { InMemoryChatStore } from '../memory/InMemoryChatStore.js';
import { SupabaseChatSessionRepository } from './SupabaseChatSessionRepository.js';
import { SupabaseMessageRepository } from './SupabaseMessageRepository.js';

const COMPONENT = 'ChatStoreFactory';

export const createSupabaseChatStore = (client: SupabaseClient): ChatStore => {
    const sessions = new SupabaseChatSessionRepository(client);
    const messages = new SupabaseMessageRepository(client, sessions);
    return {
        load: (chatSessionId) => sessions.load(chatSessionId),
        listTurns: (chatSessionId) => messages.listTurns(chatSessionId),
        appendTurn: (chatSessionId, role, content) => messages.appendTurn(chatSessionId, role, content),
    };
};

/** Supabase > Mock */
export const createChatStore = (client: SupabaseClient | null, mockDataPath: string): ChatStore => {
    if (client) {
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Using Supabase chat store' });
        return createSupabaseChatStore(client);
    }
    logger.warn({ kind: 'sys', component: COMPONENT, message: 'Using in-memory chat store', meta: { mockDataPath } });
    return InMemoryChatStore.fromFile(mockDataPath);
};
