import { v4 as uuidv4 } from 'uuid';

import { Mutex } from '../engine/mutex.js';
import type { Message, SubscriberId } from '../schema/message.js';
import { RpcMethod, UnsubscribeResponseSchema } from '../schema/rpc.js';
import { createLogger, getErrorMessage, logError, type Logger } from '../utils/logger.js';
import type { MessageStream } from './message-stream.js';
import type { RpcClient } from './rpc-client.js';

export interface ConsumerOptions {
    /** Defaults to a random UUID */
    subscriberId?: SubscriberId;
    logger?: Logger;
}

interface ActiveSubscription {
    stream: MessageStream;
    receiving: Promise<void>;
}

/**
 * Subscribes one subscriber id to any number of topics and collects what
 * arrives, in arrival order, in `messages`.
 */
export class Consumer {
    readonly id: SubscriberId;
    /** Called for each message as it arrives */
    onmessage?: (message: Message) => void;

    private readonly inbox: Message[] = [];
    private readonly active = new Map<string, ActiveSubscription>();
    // subscribe/unsubscribe run one at a time
    private readonly lock = new Mutex();
    private readonly log: Logger;

    constructor(
        private readonly client: RpcClient,
        options: ConsumerOptions = {}
    ) {
        this.id = options.subscriberId ?? uuidv4();
        this.log = options.logger ?? createLogger(`Consumer:${String(this.id)}`);
    }

    get messages(): readonly Message[] {
        return this.inbox;
    }

    /** Topics currently subscribed to */
    subscriptions(): string[] {
        return [...this.active.keys()];
    }

    isSubscribed(topic: string): boolean {
        return this.active.has(topic);
    }

    /**
     * Resolves once the broker has registered the subscription. Subscribing
     * to a topic this consumer already follows does nothing.
     */
    subscribe(topic: string): Promise<void> {
        return this.lock.runExclusive(async () => {
            if (this.active.has(topic)) return;

            const stream = this.client.openStream({ topic, subscriberId: this.id });
            await stream.waitReady();
            this.active.set(topic, { stream, receiving: this.receive(topic, stream) });
            this.log.debug(`Subscribed to '${topic}'`);
        });
    }

    /**
     * Cancel the local stream and deregister with the broker. Returns false
     * without contacting the broker when not subscribed to `topic`.
     */
    unsubscribe(topic: string): Promise<boolean> {
        return this.lock.runExclusive(async () => {
            const subscription = this.active.get(topic);
            if (!subscription) return false;
            this.active.delete(topic);

            await subscription.stream.cancel('unsubscribe');
            await subscription.receiving;

            const { success } = await this.client.request(
                { method: RpcMethod.UNSUBSCRIBE, params: { topic, subscriberId: this.id } },
                UnsubscribeResponseSchema
            );
            this.log.debug(`Unsubscribed from '${topic}': ${success}`);
            return success;
        });
    }

    /**
     * Unsubscribe from everything, then close the connection.
     */
    async close(): Promise<void> {
        try {
            for (const topic of this.subscriptions()) {
                await this.unsubscribe(topic);
            }
        } finally {
            await this.client.close();
        }
    }

    // A throwing callback must not end the receive loop
    private notify(topic: string, message: Message): void {
        try {
            this.onmessage?.(message);
        } catch (error) {
            logError(this.log, `onmessage handler failed for '${topic}'`, error);
        }
    }

    private async receive(topic: string, stream: MessageStream): Promise<void> {
        try {
            for await (const message of stream) {
                this.inbox.push(message);
                this.notify(topic, message);
            }
            this.log.debug(`Stream for '${topic}' ended (${stream.endReason ?? 'cancelled'})`);
        } catch (error) {
            this.log.debug(`Stream for '${topic}' failed: ${getErrorMessage(error)}`);
        }
        // Broker-side end: forget the topic so a later subscribe opens a new stream
        if (this.active.get(topic)?.stream === stream) {
            this.active.delete(topic);
        }
    }
}
