import { ChatCoreError } from '../chat/domain/errors.js';

export type ErrorStatus = 400 | 404 | 409 | 429 | 500 | 502 | 503;

export interface ErrorBody {
    success: false;
    error: {
        code: string;
        message: string;
        details?: Record<string, unknown>;
    };
}

const KNOWN_STATUSES: readonly ErrorStatus[] = [400, 404, 409, 429, 500, 502, 503];

export const toErrorStatus = (status: number): ErrorStatus =>
    KNOWN_STATUSES.find((known) => known === status) ?? 500;

export const errorBody = (code: string, message: string, details?: Record<string, unknown>): ErrorBody => ({
    success: false,
    error: { code, message, ...(details ? { details } : {}) },
});

/** Core errors keep their code; anything else is an opaque 500 */
export function mapError(error: unknown): { status: ErrorStatus; body: ErrorBody } {
    if (error instanceof ChatCoreError) {
        const { code, message, details } = error.toObject();
        return { status: toErrorStatus(error.status), body: errorBody(code, message, details) };
    }
    return { status: 500, body: errorBody('INTERNAL_ERROR', 'An unexpected error occurred') };
}
