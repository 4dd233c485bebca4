import type { ChatSessionConfig } from '../domain/ChatSessionConfig.js';
import type { ConversationTurn, ProviderMessage } from '../domain/ConversationTurn.js';

export const SECTION_SEPARATOR = '\n---\n';
export const NO_PRE_PROMPT_PLACEHOLDER = 'No pre-prompt provided';
export const NO_SYSTEM_PROMPT_PLACEHOLDER = 'No system prompt provided';
export const NO_CHARACTER_PLACEHOLDER = 'No character description provided';
export const NO_USER_PLACEHOLDER = 'No user description provided';
export const NO_POST_PROMPT_PLACEHOLDER = 'No post-prompt provided';

export type PromptConfig = Pick<
    ChatSessionConfig,
    | 'systemPrompt'
    | 'prePrompt'
    | 'prePromptEnabled'
    | 'postPrompt'
    | 'postPromptEnabled'
    | 'characterDescription'
    | 'userProfileDescription'
>;

const clean = (text: string | null | undefined): string => (text ?? '').trim();

/**
 * Leading system message: [pre-prompt] / system prompt / character / user profile.
 * A blank section is rendered as its placeholder so section boundaries never move.
 */
export const buildSystemPrompt = (config: PromptConfig): string => {
    const sections: string[] = [];

    if (config.prePromptEnabled) {
        sections.push(clean(config.prePrompt) || NO_PRE_PROMPT_PLACEHOLDER);
    }

    sections.push(clean(config.systemPrompt) || NO_SYSTEM_PROMPT_PLACEHOLDER);
    sections.push(clean(config.characterDescription) || NO_CHARACTER_PLACEHOLDER);
    sections.push(clean(config.userProfileDescription) || NO_USER_PLACEHOLDER);

    return sections.join(SECTION_SEPARATOR);
};

/**
 * Provider request messages. Order is a contract:
 * system, history (oldest first), optional post-prompt, new user message.
 */
export const assemblePrompt = (
    config: PromptConfig,
    history: readonly Pick<ConversationTurn, 'role' | 'content'>[],
    newMessage: string
): ProviderMessage[] => {
    const messages: ProviderMessage[] = [{ role: 'system', content: buildSystemPrompt(config) }];

    for (const turn of history) {
        messages.push({ role: turn.role, content: turn.content });
    }

    if (config.postPromptEnabled) {
        messages.push({ role: 'system', content: clean(config.postPrompt) || NO_POST_PROMPT_PLACEHOLDER });
    }

    messages.push({ role: 'user', content: newMessage });
    return messages;
};
