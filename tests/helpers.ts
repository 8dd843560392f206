import { BaseSubscriberStream } from '../src/engine/stream.js';
import { payloadText, toPayload, type Message } from '../src/schema/message.js';

/**
 * In-process subscriber stream that records what it is given. Writes can be
 * held open with hold() or made to fail with failWith.
 */
export class RecordingStream extends BaseSubscriberStream {
    readonly received: Message[] = [];
    failWith: Error | null = null;
    private gate: Promise<void> | null = null;

    /** Block subsequent writes until the returned function is called */
    hold(): () => void {
        let release: () => void = () => {};
        this.gate = new Promise<void>((resolve) => {
            release = resolve;
        });
        return () => {
            this.gate = null;
            release();
        };
    }

    texts(): string[] {
        return this.received.map(payloadText);
    }

    protected async deliver(message: Message): Promise<void> {
        if (this.gate) await this.gate;
        if (this.failWith) throw this.failWith;
        this.received.push(message);
    }
}

export function message(topic: string, text: string): Message {
    return { topic, payload: toPayload(text) };
}

/** Let pending promise callbacks and timers run */
export function flush(ms = 0): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
