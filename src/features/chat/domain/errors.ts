/**
 * Error taxonomy of the streaming core.
 *
 * Every error carries a stable `code` (surfaced in HTTP error bodies) and the
 * HTTP status the adapter answers with. "Nothing to cancel" is an outcome,
 * not an error, and has no class here.
 */

export type ChatCoreErrorCode =
    | 'VALIDATION_ERROR'
    | 'RESOURCE_NOT_FOUND'
    | 'ALREADY_STREAMING'
    | 'NO_ACTIVE_STREAM'
    | 'TOO_MANY_CONNECTIONS'
    | 'SERVICE_UNAVAILABLE'
    | 'PROVIDER_ERROR'
    | 'PERSISTENCE_ERROR'
    | 'INVALID_STATE_TRANSITION';

export class ChatCoreError extends Error {
    public readonly code: ChatCoreErrorCode;
    public readonly status: number;
    public readonly details?: Record<string, unknown>;

    constructor(
        code: ChatCoreErrorCode,
        status: number,
        message: string,
        options?: { details?: Record<string, unknown>; cause?: unknown }
    ) {
        super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'ChatCoreError';
        this.code = code;
        this.status = status;
        this.details = options?.details;
    }

    toObject(): { code: ChatCoreErrorCode; message: string; details?: Record<string, unknown> } {
        return {
            code: this.code,
            message: this.message,
            ...(this.details ? { details: this.details } : {}),
        };
    }
}

export class ValidationError extends ChatCoreError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('VALIDATION_ERROR', 400, message, { details });
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends ChatCoreError {
    constructor(message: string) {
        super('RESOURCE_NOT_FOUND', 404, message);
        this.name = 'NotFoundError';
    }
}

/** A chat session accepts one outstanding message until its stream retires */
export class AlreadyStreamingError extends ChatCoreError {
    constructor(public readonly sessionKey: string, public readonly activeStreamId: string) {
        super('ALREADY_STREAMING', 409, `Stream already active for session ${sessionKey}`, {
            details: { stream_id: activeStreamId },
        });
        this.name = 'AlreadyStreamingError';
    }
}

export class NoActiveStreamError extends ChatCoreError {
    constructor(sessionKey: string) {
        super('NO_ACTIVE_STREAM', 404, `No active stream for session ${sessionKey}`);
        this.name = 'NoActiveStreamError';
    }
}

export class TooManyConnectionsError extends ChatCoreError {
    constructor(streamId: string, limit: number) {
        super('TOO_MANY_CONNECTIONS', 429, `Stream ${streamId} already has ${limit} connections`, {
            details: { limit },
        });
        this.name = 'TooManyConnectionsError';
    }
}

export class ServiceUnavailableError extends ChatCoreError {
    constructor(message: string) {
        super('SERVICE_UNAVAILABLE', 503, message);
        this.name = 'ServiceUnavailableError';
    }
}

/** Any upstream failure: refused, timed out, non-2xx, bad framing, disconnect */
export class ProviderError extends ChatCoreError {
    public readonly upstreamStatus?: number;

    constructor(message: string, options?: { upstreamStatus?: number; cause?: unknown }) {
        super('PROVIDER_ERROR', 502, message, { cause: options?.cause });
        this.name = 'ProviderError';
        this.upstreamStatus = options?.upstreamStatus;
    }
}

export class PersistenceError extends ChatCoreError {
    constructor(message: string, cause?: unknown) {
        super('PERSISTENCE_ERROR', 500, message, { cause });
        this.name = 'PersistenceError';
    }
}

export class InvalidStateTransitionError extends ChatCoreError {
    constructor(from: string, to: string) {
        super('INVALID_STATE_TRANSITION', 500, `Illegal stream state transition ${from} -> ${to}`);
        this.name = 'InvalidStateTransitionError';
    }
}
