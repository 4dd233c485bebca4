/**
 * Tracing Module - AsyncLocalStorage wrapper
 *
 * Carries request-scoped context (trace id, chat session id) through the
 * async call chain so every log line of one HTTP request can be correlated.
 * Background generation started by a request keeps the context it was
 * started in.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { nanoid } from 'nanoid';

export interface TraceContext {
    /** Correlates every log line of one request */
    traceId: string;
    /** Chat session the request targets */
    sessionId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/** 12 characters are enough to tell concurrent requests apart */
export function generateTraceId(): string {
    return nanoid(12);
}

/**
 * Run an async function inside a trace context.
 *
 * @example
 * await runWithTraceId(generateTraceId(), async () => {
 *     logger.info({ kind: 'biz', component: 'X', message: 'Hello' }); // carries traceId
 * });
 */
export async function runWithTraceId<T>(traceId: string, fn: () => Promise<T>): Promise<T> {
    const context: TraceContext = { traceId };
    return asyncLocalStorage.run(context, fn);
}

export function runWithTraceIdSync<T>(traceId: string, fn: () => T): T {
    const context: TraceContext = { traceId };
    return asyncLocalStorage.run(context, fn);
}

export function getTraceId(): string | undefined {
    return asyncLocalStorage.getStore()?.traceId;
}

export function getSessionId(): string | undefined {
    return asyncLocalStorage.getStore()?.sessionId;
}

/**
 * Tag the current context with a chat session id.
 * No-op outside runWithTraceId.
 */
export function setSessionId(sessionId: string): void {
    const store = asyncLocalStorage.getStore();
    if (store) {
        store.sessionId = sessionId;
    }
}
