import { nanoid } from 'nanoid';
import type { StreamEvent } from '../../chat/domain/StreamEvent.js';

export type ConnectionCloseReason = 'terminal' | 'detached' | 'overflow';

type Waiter = (result: IteratorResult<StreamEvent, undefined>) => void;

/**
 * One client's output channel on a stream (one browser tab).
 *
 * A bounded queue with a single async consumer. Producers never wait:
 * `offer` either enqueues or reports the channel as unable to accept,
 * and the broadcaster drops it. Closing lets the consumer drain what is
 * already queued before its iteration ends.
 */
export class Connection implements AsyncIterable<StreamEvent> {
    readonly connectionId: string;
    readonly streamId: string;
    private readonly capacity: number;
    private readonly queue: StreamEvent[] = [];
    /** Forced events still queued; they do not count against the bound */
    private exempt = 0;
    private waiter: Waiter | null = null;
    private closeReason: ConnectionCloseReason | null = null;

    constructor(streamId: string, capacity: number, connectionId: string = nanoid(10)) {
        this.streamId = streamId;
        this.capacity = Math.max(1, capacity);
        this.connectionId = connectionId;
    }

    get closed(): boolean {
        return this.closeReason !== null;
    }

    get closedBecause(): ConnectionCloseReason | null {
        return this.closeReason;
    }

    /** Events queued and not yet read by the consumer */
    get pending(): number {
        return this.queue.length;
    }

    /** Non-blocking send; false when closed or the queue is full */
    offer(event: StreamEvent): boolean {
        if (this.closed) return false;
        if (!this.waiter && this.queue.length - this.exempt >= this.capacity) return false;
        this.deliver(event);
        return true;
    }

    /** Send ignoring the bound (backlog replay, terminal events); false only when closed */
    force(event: StreamEvent): boolean {
        if (this.closed) return false;
        if (!this.deliver(event)) {
            this.exempt += 1;
        }
        return true;
    }

    close(reason: ConnectionCloseReason): void {
        if (this.closed) return;
        this.closeReason = reason;
        if (reason === 'overflow') {
            this.queue.length = 0;
            this.exempt = 0;
        }
        if (this.waiter && this.queue.length === 0) {
            const waiter = this.waiter;
            this.waiter = null;
            waiter({ done: true, value: undefined });
        }
    }

    next(): Promise<IteratorResult<StreamEvent, undefined>> {
        const event = this.queue.shift();
        if (event !== undefined) {
            if (this.exempt > 0) this.exempt -= 1;
            return Promise.resolve({ done: false, value: event });
        }
        if (this.closed) {
            return Promise.resolve({ done: true, value: undefined });
        }
        if (this.waiter) {
            return Promise.reject(new Error(`Connection ${this.connectionId} already has a pending reader`));
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<StreamEvent, undefined> {
        return {
            next: () => this.next(),
            return: async () => {
                this.close('detached');
                return { done: true, value: undefined };
            },
        };
    }

    /** True when handed straight to a waiting reader, false when queued */
    private deliver(event: StreamEvent): boolean {
        if (this.waiter) {
            const waiter = this.waiter;
            this.waiter = null;
            waiter({ done: false, value: event });
            return true;
        }
        this.queue.push(event);
        return false;
    }
}
