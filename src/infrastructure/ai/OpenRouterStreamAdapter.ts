import nodeFetch from 'node-fetch';
import { ProxyAgent } from 'proxy-agent';
import { logger } from '../../platform/logger.js';
import { ProviderError } from '../../features/chat/domain/errors.js';
import type {
    CancelHandle,
    IProviderStreamAdapter,
    ProviderStream,
    ProviderStreamRequest,
} from '../../features/chat/ports/IProviderStreamAdapter.js';
import { parseOpenAIStream } from './openAIStreamParser.js';

const COMPONENT = 'OpenRouterStreamAdapter';

export interface ProviderHttpRequest {
    method: 'POST';
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
}

/** The slice of a fetch Response the adapter reads */
export interface ProviderHttpResponse {
    ok: boolean;
    status: number;
    statusText: string;
    text(): Promise<string>;
    body: AsyncIterable<Uint8Array | string> | null;
}

export type ProviderFetch = (url: string, init: ProviderHttpRequest) => Promise<ProviderHttpResponse>;

export interface OpenRouterOptions {
    apiKey: string;
    apiUrl: string;
    referer?: string;
    title?: string;
    /** Limit on waiting for the response headers, and again on every wait for body data */
    requestTimeoutMs: number;
    fetch?: ProviderFetch;
}

// Real request goes through the proxy agent (HTTP(S)_PROXY aware)
const proxiedFetch: ProviderFetch = (url, init) => nodeFetch(url, { ...init, agent: new ProxyAgent() });

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class OpenRouterStreamAdapter implements IProviderStreamAdapter {
    private readonly fetchImpl: ProviderFetch;

    constructor(private readonly options: OpenRouterOptions) {
        this.fetchImpl = options.fetch ?? proxiedFetch;
    }

    get isConfigured(): boolean {
        return this.options.apiKey.trim().length > 0;
    }

    open(request: ProviderStreamRequest): ProviderStream {
        const controller = new AbortController();
        let cancelled = false;

        const cancelHandle: CancelHandle = {
            cancel: () => {
                if (cancelled) return;
                cancelled = true;
                controller.abort();
                logger.debug({ kind: 'sys', component: COMPONENT, message: 'Upstream request aborted', meta: { model: request.model } });
            },
        };

        return {
            chunks: this.stream(request, controller, () => cancelled),
            cancelHandle,
        };
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            Accept: 'text/event-stream',
            Authorization: `Bearer ${this.options.apiKey}`,
        };
        if (this.options.referer) headers['HTTP-Referer'] = this.options.referer;
        if (this.options.title) headers['X-Title'] = this.options.title;
        return headers;
    }

    private async *stream(
        request: ProviderStreamRequest,
        controller: AbortController,
        isCancelled: () => boolean
    ): AsyncGenerator<string, void, undefined> {
        if (isCancelled()) return;

        const url = `${this.options.apiUrl.replace(/\/+$/, '')}/chat/completions`;
        const startedAt = Date.now();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.options.requestTimeoutMs);

        logger.info({
            kind: 'sys',
            component: COMPONENT,
            message: 'Opening provider stream',
            meta: { model: request.model, messageCount: request.messages.length },
        });

        let response: ProviderHttpResponse;
        try {
            response = await this.fetchImpl(url, {
                method: 'POST',
                headers: this.buildHeaders(),
                body: JSON.stringify({ model: request.model, messages: request.messages, stream: true }),
                signal: controller.signal,
            });
        } catch (error) {
            if (isCancelled()) return;
            if (timedOut) {
                throw new ProviderError(`Provider request timed out after ${this.options.requestTimeoutMs}ms`, { cause: error });
            }
            throw new ProviderError(`Provider request failed: ${describe(error)}`, { cause: error });
        } finally {
            clearTimeout(timer);
        }

        if (!response.ok) {
            const errText = await response.text().catch((error: unknown) => describe(error));
            logger.error({
                kind: 'sys',
                component: COMPONENT,
                message: 'LLM API error',
                error: new Error(errText),
                meta: { status: response.status, statusText: response.statusText },
            });
            throw new ProviderError(`Provider returned ${response.status} ${response.statusText}`.trim(), {
                upstreamStatus: response.status,
            });
        }

        if (!response.body) {
            throw new ProviderError('Provider returned an empty body', { upstreamStatus: response.status });
        }

        let chunks = 0;
        let stalled = false;
        const body = this.watchInactivity(response.body, controller, () => {
            stalled = true;
        });
        try {
            for await (const delta of parseOpenAIStream(body)) {
                if (isCancelled()) return;
                chunks += 1;
                yield delta;
            }
        } catch (error) {
            if (stalled) {
                throw new ProviderError(`Provider stream timed out after ${this.options.requestTimeoutMs}ms`, { cause: error });
            }
            if (isCancelled()) return;
            if (error instanceof ProviderError) throw error;
            throw new ProviderError(`Provider stream interrupted: ${describe(error)}`, { cause: error });
        }

        logger.info({
            kind: 'sys',
            component: COMPONENT,
            message: 'Provider stream finished',
            meta: { model: request.model, chunks, durationMs: Date.now() - startedAt },
        });
    }

    /**
     * Aborts the request when no body data arrives within requestTimeoutMs.
     * The timer only runs while a read is pending.
     */
    private async *watchInactivity<T>(
        source: AsyncIterable<T>,
        controller: AbortController,
        onStall: () => void
    ): AsyncGenerator<T, void, undefined> {
        let timer: NodeJS.Timeout | null = null;
        const arm = () => {
            timer = setTimeout(() => {
                logger.warn({
                    kind: 'sys',
                    component: COMPONENT,
                    message: 'Provider stream stalled, aborting',
                    meta: { timeoutMs: this.options.requestTimeoutMs },
                });
                onStall();
                controller.abort();
            }, this.options.requestTimeoutMs);
        };
        const disarm = () => {
            if (timer) {
                clearTimeout(timer);
                timer = null;
            }
        };

        arm();
        try {
            for await (const chunk of source) {
                disarm();
                yield chunk;
                arm();
            }
        } finally {
            disarm();
        }
    }
}
