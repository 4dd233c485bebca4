import type { ChatSessionConfig } from '../../features/chat/domain/ChatSessionConfig.js';
import type { ConversationTurn, TurnRole } from '../../features/chat/domain/ConversationTurn.js';

/** Resolves a chat session id to its configuration; throws NotFoundError for unknown ids */
export interface ChatSessionConfigLoader {
    load(chatSessionId: string): Promise<ChatSessionConfig>;
}

export interface HistoryReader {
    /** Turns of the session, oldest first */
    listTurns(chatSessionId: string): Promise<ConversationTurn[]>;
}

export interface MessagePersister {
    appendTurn(chatSessionId: string, role: TurnRole, content: string): Promise<{ id: string }>;
}

export type ChatStore = ChatSessionConfigLoader & HistoryReader & MessagePersister;
