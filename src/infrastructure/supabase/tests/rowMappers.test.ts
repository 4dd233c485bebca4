import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { mapChatSessionRow, mapMessageRow, type ChatSessionRow } from '../rowMappers.js';

const ROW: ChatSessionRow = {
    id: 12,
    pre_prompt: 'Fiction only.',
    pre_prompt_enabled: true,
    post_prompt: 'Stay in character.',
    post_prompt_enabled: false,
    ai_models: { label: 'openai/gpt-4o-mini' },
    system_prompts: { content: 'You are a roleplay partner.' },
    characters: { description: 'A retired lighthouse keeper' },
    user_profiles: { description: 'A travelling cartographer' },
};

describe('mapChatSessionRow', () => {
    it('flattens the session and its embedded records', () => {
        expect(mapChatSessionRow(ROW)).toEqual({
            chatSessionId: '12',
            model: 'openai/gpt-4o-mini',
            systemPrompt: 'You are a roleplay partner.',
            prePrompt: 'Fiction only.',
            prePromptEnabled: true,
            postPrompt: 'Stay in character.',
            postPromptEnabled: false,
            characterDescription: 'A retired lighthouse keeper',
            userProfileDescription: 'A travelling cartographer',
        });
    });

    it('accepts embeds returned as single-element arrays', () => {
        const config = mapChatSessionRow({
            ...ROW,
            ai_models: [{ label: 'anthropic/claude-3.5-haiku' }],
            characters: [],
        });
        expect(config.model).toBe('anthropic/claude-3.5-haiku');
        expect(config.characterDescription).toBeNull();
    });

    it('defaults missing relations and flags', () => {
        expect(mapChatSessionRow({ id: '7', ai_models: null, system_prompts: null, characters: null, user_profiles: null })).toEqual({
            chatSessionId: '7',
            model: '',
            systemPrompt: '',
            prePrompt: null,
            prePromptEnabled: false,
            postPrompt: null,
            postPromptEnabled: false,
            characterDescription: null,
            userProfileDescription: null,
        });
    });

    it('rejects a row without an id', () => {
        expect(() => mapChatSessionRow({ pre_prompt: 'x' })).toThrow(ZodError);
    });
});

describe('mapMessageRow', () => {
    it('maps a message row to a conversation turn', () => {
        expect(mapMessageRow({ id: 31, role: 'assistant', content: 'Every night.', timestamp: '2024-05-01T10:00:00Z' })).toEqual({
            id: '31',
            role: 'assistant',
            content: 'Every night.',
            createdAt: '2024-05-01T10:00:00Z',
        });
    });

    it('rejects roles other than user and assistant', () => {
        expect(() => mapMessageRow({ id: 1, role: 'system', content: 'x', timestamp: '2024-05-01T10:00:00Z' })).toThrow(ZodError);
    });
});
