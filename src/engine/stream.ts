import type { Message } from '../schema/message.js';
import type { SessionEndReason } from '../schema/rpc.js';
import { StreamClosedError } from './errors.js';

/**
 * The broker's outbound handle to one subscriber.
 *
 * `closed` settles once, with the reason the stream stopped being active:
 * the transport resolves it on disconnect or client cancel, the broker on
 * supersede or shutdown.
 */
export interface SubscriberStream {
    readonly id: string;
    readonly active: boolean;
    readonly closed: Promise<SessionEndReason>;
    write(message: Message): Promise<void>;
    end(reason: SessionEndReason): void;
}

/**
 * Liveness bookkeeping shared by every stream implementation. Subclasses
 * supply the actual write and may react to the end through onEnd().
 */
export abstract class BaseSubscriberStream implements SubscriberStream {
    readonly closed: Promise<SessionEndReason>;
    private resolveClosed: (reason: SessionEndReason) => void = () => {};
    private endReason: SessionEndReason | null = null;

    constructor(readonly id: string) {
        this.closed = new Promise((resolve) => {
            this.resolveClosed = resolve;
        });
    }

    get active(): boolean {
        return this.endReason === null;
    }

    get reason(): SessionEndReason | null {
        return this.endReason;
    }

    async write(message: Message): Promise<void> {
        if (!this.active) {
            throw new StreamClosedError(this.id);
        }
        await this.deliver(message);
    }

    end(reason: SessionEndReason): void {
        if (this.endReason !== null) return;
        this.endReason = reason;
        this.onEnd(reason);
        this.resolveClosed(reason);
    }

    protected abstract deliver(message: Message): Promise<void>;

    protected onEnd(_reason: SessionEndReason): void {}
}
