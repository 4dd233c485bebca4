/**
 * Resolved configuration of one chat session, as the streaming core sees it.
 * Loaded from the session / model / prompt / character / profile records.
 */
export interface ChatSessionConfig {
    chatSessionId: string;
    /** Provider model identifier, e.g. "openai/gpt-4o" */
    model: string;
    systemPrompt: string;
    prePrompt: string | null;
    prePromptEnabled: boolean;
    postPrompt: string | null;
    postPromptEnabled: boolean;
    characterDescription: string | null;
    userProfileDescription: string | null;
}

/**
 * Deep, frozen copy taken when a stream starts, so edits to the underlying
 * records during generation cannot leak into it.
 */
export const snapshotConfig = (config: ChatSessionConfig): Readonly<ChatSessionConfig> =>
    Object.freeze({ ...config });
