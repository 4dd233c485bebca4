/** `shutdown`: the server is stopping */
export type CancelReason = 'user_cancelled' | 'timeout' | 'shutdown';

export type ContentEvent = { type: 'content'; data: string };
export type UserMessageSavedEvent = { type: 'user_message_saved'; user_message_id: string };
export type DoneEvent = { type: 'done'; ai_message_id?: string };
export type ErrorEvent = { type: 'error'; error: string };
export type CancelledEvent = { type: 'cancelled'; reason: CancelReason };

export type TerminalEvent = DoneEvent | ErrorEvent | CancelledEvent;

/** Everything a connection can observe for one stream */
export type StreamEvent = ContentEvent | UserMessageSavedEvent | TerminalEvent;

export const isTerminalEvent = (event: StreamEvent): event is TerminalEvent =>
    event.type === 'done' || event.type === 'error' || event.type === 'cancelled';
