/**
 * Broker - topic publish/subscribe over subscriber streams
 *
 * One Broker owns one SubscriptionRegistry and one FanOutEngine for its whole
 * lifetime; the RPC layer holds a reference to it rather than reaching for a
 * module-level instance.
 */

import type {
    PublishRequest,
    PublishResponse,
    SessionEndReason,
    SubscribeRequest,
    UnsubscribeRequest,
    UnsubscribeResponse
} from '../schema/rpc.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { BrokerError } from './errors.js';
import { FanOutEngine, type DeliveryMode, type PublishOutcome } from './fanout.js';
import { SubscriptionRegistry } from './registry.js';
import { SubscriberSession } from './session.js';
import type { SubscriberStream } from './stream.js';

export interface BrokerOptions {
    delivery?: DeliveryMode;
    /** Injected registry; a fresh one is created when omitted */
    registry?: SubscriptionRegistry;
    logger?: Logger;
}

export class Broker {
    readonly registry: SubscriptionRegistry;
    private readonly fanOut: FanOutEngine;
    private readonly log: Logger;
    private stopped = false;

    constructor(options: BrokerOptions = {}) {
        this.log = options.logger ?? createLogger('Broker');
        this.registry = options.registry ?? new SubscriptionRegistry({ logger: this.log.child('Registry') });
        this.fanOut = new FanOutEngine(this.registry, {
            delivery: options.delivery,
            logger: this.log.child('FanOut')
        });
    }

    get delivery(): DeliveryMode {
        return this.fanOut.delivery;
    }

    get isStopped(): boolean {
        return this.stopped;
    }

    /**
     * Register `stream` for the request's (topic, subscriberId) and return
     * the session without waiting for it to end.
     */
    async openSession(request: SubscribeRequest, stream: SubscriberStream): Promise<SubscriberSession> {
        this.assertRunning();
        const { replaced } = await this.registry.register(request.topic, request.subscriberId, stream);
        this.log.info(`Subscriber ${String(request.subscriberId)} joined '${request.topic}'`);
        return new SubscriberSession(request.topic, request.subscriberId, stream, replaced);
    }

    /**
     * Register and wait until the stream ends. Resolves with the end reason.
     */
    async subscribe(request: SubscribeRequest, stream: SubscriberStream): Promise<SessionEndReason> {
        const session = await this.openSession(request, stream);
        const reason = await session.closed;
        this.log.debug(`Session ${String(request.subscriberId)} on '${request.topic}' ended: ${reason}`);
        return reason;
    }

    async unsubscribe(request: UnsubscribeRequest): Promise<UnsubscribeResponse> {
        const success = await this.registry.deregister(request.topic, request.subscriberId);
        if (!success) {
            this.log.debug(`Unsubscribe of unknown ${String(request.subscriberId)} on '${request.topic}'`);
        }
        return { success };
    }

    async publish(request: PublishRequest): Promise<PublishResponse> {
        const { success } = await this.publishDetailed(request);
        return { success };
    }

    /**
     * Same as publish(), with delivered/failed counts for local callers.
     */
    publishDetailed(request: PublishRequest): Promise<PublishOutcome> {
        return this.fanOut.publish({ topic: request.topic, payload: request.payload });
    }

    /**
     * End every session with 'shutdown' and empty the registry. Later
     * subscribes are refused.
     */
    async stop(): Promise<void> {
        if (this.stopped) return;
        this.stopped = true;
        const ended = await this.registry.drain('shutdown');
        this.log.info(`Broker stopped, ${ended} session(s) ended`);
    }

    private assertRunning(): void {
        if (this.stopped) {
            throw new BrokerError('Broker is stopped', 'BROKER_STOPPED');
        }
    }
}
