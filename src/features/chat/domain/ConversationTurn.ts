export type TurnRole = 'user' | 'assistant';

/** One persisted message of a chat session; ordering is append-only */
export interface ConversationTurn {
    id: string;
    role: TurnRole;
    content: string;
    createdAt: string;
}

export type ProviderRole = 'system' | 'user' | 'assistant';

/** Role-tagged message in the provider request */
export interface ProviderMessage {
    role: ProviderRole;
    content: string;
}
