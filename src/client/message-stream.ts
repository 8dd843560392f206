import type { RequestId } from '@modelcontextprotocol/sdk/types.js';

import { StreamClosedError } from '../engine/errors.js';
import type { Message } from '../schema/message.js';
import type { SessionEndReason } from '../schema/rpc.js';

type StreamState = 'opening' | 'open' | 'ended';

interface Waiter<T> {
    resolve: (value: T) => void;
    reject: (error: Error) => void;
}

/**
 * Client side of one `pubsub/subscribe` call.
 *
 * Messages that arrive before anyone iterates are buffered. Iteration ends
 * after the buffer drains once the stream is finished; it throws if the
 * stream failed (error response or lost connection).
 */
export class MessageStream implements AsyncIterable<Message> {
    private state: StreamState = 'opening';
    private failure: Error | null = null;
    private readonly buffer: Message[] = [];
    private readonly readers: Array<Waiter<IteratorResult<Message>>> = [];
    private readonly readyWaiters: Array<Waiter<void>> = [];
    private reason: SessionEndReason | null = null;

    constructor(
        readonly id: RequestId,
        private readonly onCancel: (reason?: string) => Promise<void>
    ) {}

    get isOpen(): boolean {
        return this.state === 'open';
    }

    get ended(): boolean {
        return this.state === 'ended';
    }

    /** Reason the broker gave when it ended the stream, if it did */
    get endReason(): SessionEndReason | null {
        return this.reason;
    }

    /**
     * Resolves once the broker has registered the subscription.
     */
    waitReady(): Promise<void> {
        if (this.state === 'open') return Promise.resolve();
        if (this.state === 'ended') return Promise.reject(this.failure ?? new StreamClosedError(String(this.id)));
        return new Promise((resolve, reject) => {
            this.readyWaiters.push({ resolve, reject });
        });
    }

    /** Stop receiving and tell the broker */
    cancel(reason?: string): Promise<void> {
        return this.onCancel(reason);
    }

    // ───────────────────────────────────────────────────────────────────────
    // Driven by RpcClient
    // ───────────────────────────────────────────────────────────────────────

    markReady(): void {
        if (this.state !== 'opening') return;
        this.state = 'open';
        for (const waiter of this.readyWaiters.splice(0)) {
            waiter.resolve();
        }
    }

    push(message: Message): void {
        if (this.state === 'ended') return;
        const reader = this.readers.shift();
        if (reader) {
            reader.resolve({ done: false, value: message });
        } else {
            this.buffer.push(message);
        }
    }

    finish(reason?: SessionEndReason): void {
        if (this.state === 'ended') return;
        this.reason = reason ?? null;
        this.end(null);
    }

    fail(error: Error): void {
        if (this.state === 'ended') return;
        this.end(error);
    }

    private end(error: Error | null): void {
        this.state = 'ended';
        this.failure = error;

        const notReady = error ?? new StreamClosedError(String(this.id));
        for (const waiter of this.readyWaiters.splice(0)) {
            waiter.reject(notReady);
        }
        // Readers are only queued while the buffer is empty
        for (const reader of this.readers.splice(0)) {
            if (error) reader.reject(error);
            else reader.resolve({ done: true, value: undefined });
        }
    }

    private next(): Promise<IteratorResult<Message>> {
        const buffered = this.buffer.shift();
        if (buffered) {
            return Promise.resolve({ done: false, value: buffered });
        }
        if (this.state === 'ended') {
            return this.failure
                ? Promise.reject(this.failure)
                : Promise.resolve({ done: true, value: undefined });
        }
        return new Promise((resolve, reject) => {
            this.readers.push({ resolve, reject });
        });
    }

    [Symbol.asyncIterator](): AsyncIterator<Message> {
        return {
            next: () => this.next(),
            return: async () => {
                await this.cancel('iteration stopped');
                return { done: true, value: undefined };
            }
        };
    }
}
