import { logger } from '../../platform/logger.js';
import { ProviderError } from '../../features/chat/domain/errors.js';

const COMPONENT = 'OpenAIStreamParser';

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** `choices[0].delta.content`, when it is a non-empty string */
export const extractDelta = (payload: unknown): string | null => {
    if (!isRecord(payload) || !Array.isArray(payload.choices)) return null;
    const first: unknown = payload.choices[0];
    if (!isRecord(first) || !isRecord(first.delta)) return null;
    const content = first.delta.content;
    return typeof content === 'string' && content.length > 0 ? content : null;
};

/** OpenRouter reports mid-stream failures as `{ error: { message, code } }` */
export const extractError = (payload: unknown): string | null => {
    if (!isRecord(payload) || payload.error === undefined || payload.error === null) return null;
    const error = payload.error;
    if (typeof error === 'string') return error;
    if (isRecord(error) && typeof error.message === 'string') return error.message;
    return 'Provider reported an error';
};

type LineResult = { kind: 'skip' } | { kind: 'done' } | { kind: 'delta'; text: string } | { kind: 'empty' };

const parseLine = (rawLine: string): LineResult => {
    const line = rawLine.trim();
    // Blank separators and `: OPENROUTER PROCESSING` style comments
    if (!line.startsWith('data:')) return { kind: 'skip' };

    const data = line.slice(5).trim();
    if (!data || data.startsWith(':')) return { kind: 'skip' };
    if (data === '[DONE]') return { kind: 'done' };

    let payload: unknown;
    try {
        payload = JSON.parse(data);
    } catch (error) {
        logger.warn({ kind: 'sys', component: COMPONENT, message: 'Failed to parse stream chunk', error, meta: { line: data.slice(0, 200) } });
        return { kind: 'skip' };
    }

    const upstreamError = extractError(payload);
    if (upstreamError !== null) {
        throw new ProviderError(`Provider stream error: ${upstreamError}`);
    }

    const delta = extractDelta(payload);
    return delta === null ? { kind: 'empty' } : { kind: 'delta', text: delta };
};

/**
 * Turns an OpenAI-compatible SSE body into text fragments.
 *
 * Lines may be split across network chunks; the trailing partial line is
 * carried over. Ends at `[DONE]` or at the end of the body.
 */
export async function* parseOpenAIStream(body: AsyncIterable<Uint8Array | string>): AsyncGenerator<string, void, undefined> {
    const decoder = new TextDecoder('utf-8');
    let buffer = '';
    let sawFrame = false;
    let sawBytes = false;

    const handle = function* (line: string): Generator<string, boolean, undefined> {
        const result = parseLine(line);
        if (result.kind === 'skip') return false;
        sawFrame = true;
        if (result.kind === 'done') return true;
        if (result.kind === 'delta') yield result.text;
        return false;
    };

    for await (const chunk of body) {
        const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
        if (text.length > 0) sawBytes = true;
        buffer += text;

        const lines = buffer.split(/\r?\n/);
        buffer = lines.pop() ?? '';

        for (const line of lines) {
            if (yield* handle(line)) return;
        }
    }

    buffer += decoder.decode();
    if (buffer.trim().length > 0) {
        if (yield* handle(buffer)) return;
    }

    if (sawBytes && !sawFrame) {
        throw new ProviderError('Provider stream contained no data frames');
    }
}
