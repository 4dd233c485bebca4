import { z } from 'zod';
import type { ChatSessionConfig } from '../../features/chat/domain/ChatSessionConfig.js';
import type { ConversationTurn } from '../../features/chat/domain/ConversationTurn.js';

// Integer primary keys come back as numbers; the core keys everything by string
const idSchema = z.union([z.number().int(), z.string().min(1)]).transform((value) => String(value));

/**
 * A many-to-one embed is an object, but PostgREST returns an array when the
 * relationship cannot be inferred. Accept both and keep the first row.
 */
const embedded = <T extends z.ZodTypeAny>(schema: T) =>
    z.preprocess((value) => (Array.isArray(value) ? value[0] ?? null : value), schema.nullish());

export const CHAT_SESSION_SELECT =
    'id, pre_prompt, pre_prompt_enabled, post_prompt, post_prompt_enabled, ' +
    'ai_models(label), system_prompts(content), characters(description), user_profiles(description)';

export const chatSessionRowSchema = z.object({
    id: idSchema,
    pre_prompt: z.string().nullish(),
    pre_prompt_enabled: z.boolean().nullish(),
    post_prompt: z.string().nullish(),
    post_prompt_enabled: z.boolean().nullish(),
    ai_models: embedded(z.object({ label: z.string().nullish() })),
    system_prompts: embedded(z.object({ content: z.string().nullish() })),
    characters: embedded(z.object({ description: z.string().nullish() })),
    user_profiles: embedded(z.object({ description: z.string().nullish() })),
});

export type ChatSessionRow = z.input<typeof chatSessionRowSchema>;

/** DB row (with its embeds) -> the configuration the streaming core reads */
export function mapChatSessionRow(raw: unknown): ChatSessionConfig {
    const row = chatSessionRowSchema.parse(raw);
    return {
        chatSessionId: row.id,
        model: row.ai_models?.label ?? '',
        systemPrompt: row.system_prompts?.content ?? '',
        prePrompt: row.pre_prompt ?? null,
        prePromptEnabled: row.pre_prompt_enabled ?? false,
        postPrompt: row.post_prompt ?? null,
        postPromptEnabled: row.post_prompt_enabled ?? false,
        characterDescription: row.characters?.description ?? null,
        userProfileDescription: row.user_profiles?.description ?? null,
    };
}

export const MESSAGE_SELECT = 'id, role, content, timestamp';

export const messageRowSchema = z.object({
    id: idSchema,
    role: z.enum(['user', 'assistant']),
    content: z.string(),
    timestamp: z.string(),
});

export type MessageRow = z.input<typeof messageRowSchema>;

export function mapMessageRow(raw: unknown): ConversationTurn {
    const row = messageRowSchema.parse(raw);
    return {
        id: row.id,
        role: row.role,
        content: row.content,
        createdAt: row.timestamp,
    };
}
