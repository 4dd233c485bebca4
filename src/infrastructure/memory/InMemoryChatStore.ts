import fs from 'fs';
import { z } from 'zod';
import type { ChatStore } from '../../core/ports/ChatStore.js';
import type { ChatSessionConfig } from '../../features/chat/domain/ChatSessionConfig.js';
import type { ConversationTurn, TurnRole } from '../../features/chat/domain/ConversationTurn.js';
import { NotFoundError } from '../../features/chat/domain/errors.js';
import { logger } from '../../platform/logger.js';

const COMPONENT = 'InMemoryChatStore';

const seedTurnSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
});

const seedSessionSchema = z.object({
    id: z.union([z.string(), z.number()]).transform((value) => String(value)),
    model: z.string().default(''),
    systemPrompt: z.string().default(''),
    prePrompt: z.string().nullable().default(null),
    prePromptEnabled: z.boolean().default(false),
    postPrompt: z.string().nullable().default(null),
    postPromptEnabled: z.boolean().default(false),
    characterDescription: z.string().nullable().default(null),
    userProfileDescription: z.string().nullable().default(null),
    messages: z.array(seedTurnSchema).default([]),
});

export const chatSessionSeedSchema = z.object({
    chatSessions: z.array(seedSessionSchema),
});

export type ChatSessionSeed = z.input<typeof seedSessionSchema>;

/**
 * Development / test store. Same contract as the Supabase repositories:
 * unknown sessions raise NotFoundError, turns are returned oldest first.
 */
export class InMemoryChatStore implements ChatStore {
    private readonly configs = new Map<string, ChatSessionConfig>();
    private readonly turns = new Map<string, ConversationTurn[]>();
    private nextId = 1;

    constructor(seed: ChatSessionSeed[] = [], private readonly now: () => Date = () => new Date()) {
        for (const raw of seed) {
            const { messages, id, ...rest } = seedSessionSchema.parse(raw);
            this.configs.set(id, { chatSessionId: id, ...rest });
            this.turns.set(id, []);
            for (const message of messages) {
                this.push(id, message.role, message.content);
            }
        }
    }

    static fromFile(filePath: string): InMemoryChatStore {
        if (!fs.existsSync(filePath)) {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Mock chat session file not found', meta: { filePath } });
            return new InMemoryChatStore();
        }
        const parsed = chatSessionSeedSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Loaded mock chat sessions', meta: { filePath, count: parsed.chatSessions.length } });
        return new InMemoryChatStore(parsed.chatSessions);
    }

    async load(chatSessionId: string): Promise<ChatSessionConfig> {
        const config = this.configs.get(chatSessionId);
        if (!config) {
            throw new NotFoundError(`Chat session ${chatSessionId} not found`);
        }
        return { ...config };
    }

    async listTurns(chatSessionId: string): Promise<ConversationTurn[]> {
        return (this.turns.get(chatSessionId) ?? []).map((turn) => ({ ...turn }));
    }

    async appendTurn(chatSessionId: string, role: TurnRole, content: string): Promise<{ id: string }> {
        if (!this.configs.has(chatSessionId)) {
            throw new NotFoundError(`Chat session ${chatSessionId} not found`);
        }
        return { id: this.push(chatSessionId, role, content).id };
    }

    /** Mutates the stored record; an active stream keeps its snapshot */
    updateConfig(chatSessionId: string, patch: Partial<Omit<ChatSessionConfig, 'chatSessionId'>>): void {
        const current = this.configs.get(chatSessionId);
        if (!current) {
            throw new NotFoundError(`Chat session ${chatSessionId} not found`);
        }
        this.configs.set(chatSessionId, { ...current, ...patch });
    }

    private push(chatSessionId: string, role: TurnRole, content: string): ConversationTurn {
        const turn: ConversationTurn = {
            id: String(this.nextId++),
            role,
            content,
            createdAt: this.now().toISOString(),
        };
        const list = this.turns.get(chatSessionId) ?? [];
        list.push(turn);
        this.turns.set(chatSessionId, list);
        return turn;
    }
}
