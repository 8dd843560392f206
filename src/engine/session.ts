import type { SubscriberId } from '../schema/message.js';
import type { SessionEndReason } from '../schema/rpc.js';
import type { SubscriberStream } from './stream.js';

/**
 * Broker-side handle for one registered subscriber stream.
 *
 * The session does not evict itself when its stream ends; the entry stays in
 * the registry until a publish fails on it, an unsubscribe or a superseding
 * subscribe removes it, or the broker stops.
 */
export class SubscriberSession {
    constructor(
        readonly topic: string,
        readonly subscriberId: SubscriberId,
        readonly stream: SubscriberStream,
        /** Registration replaced an earlier stream under the same key */
        readonly replacedPrevious: boolean
    ) {}

    get active(): boolean {
        return this.stream.active;
    }

    /** Settles when the stream ends, with the reason */
    get closed(): Promise<SessionEndReason> {
        return this.stream.closed;
    }
}
