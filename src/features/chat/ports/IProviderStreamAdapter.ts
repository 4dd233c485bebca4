import type { ProviderMessage } from '../domain/ConversationTurn.js';

export interface ProviderStreamRequest {
    model: string;
    messages: ProviderMessage[];
}

/** Aborts the upstream call. Safe to call at any time, any number of times. */
export interface CancelHandle {
    cancel(): void;
}

export interface ProviderStream {
    /**
     * Lazy, single-pass text fragments. Iterating performs the network I/O;
     * every failure surfaces as a ProviderError.
     */
    chunks: AsyncIterable<string>;
    cancelHandle: CancelHandle;
}

/**
 * Port - the remote completion API.
 * The only place that knows the provider's wire format; everything above
 * deals in text chunks.
 */
export interface IProviderStreamAdapter {
    open(request: ProviderStreamRequest): ProviderStream;
}
