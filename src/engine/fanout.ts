import type { Message } from '../schema/message.js';
import { createLogger, createTimer, getErrorMessage, type Logger } from '../utils/logger.js';
import type { SubscriptionEntry, SubscriptionRegistry } from './registry.js';

/**
 * sequential: one write at a time, in snapshot order.
 * concurrent: all writes of a pass at once, joined before the coarse lock
 * is released.
 */
export const DELIVERY_MODES = ['sequential', 'concurrent'] as const;
export type DeliveryMode = typeof DELIVERY_MODES[number];

export interface PublishOutcome {
    /** false when at least one delivery failed */
    success: boolean;
    delivered: number;
    failed: number;
}

export interface FanOutOptions {
    delivery?: DeliveryMode;
    logger?: Logger;
}

/**
 * Publish Fan-Out Engine
 *
 * Holds the registry's coarse lock for the whole pass: snapshot, deliver
 * under each entry's delivery lock, evict what failed. Publishes therefore
 * never interleave, and a slow subscriber holds up every publish behind it.
 */
export class FanOutEngine {
    readonly delivery: DeliveryMode;
    private readonly log: Logger;

    constructor(
        private readonly registry: SubscriptionRegistry,
        options: FanOutOptions = {}
    ) {
        this.delivery = options.delivery ?? 'sequential';
        this.log = options.logger ?? createLogger('FanOut');
    }

    publish(message: Message): Promise<PublishOutcome> {
        return this.registry.exclusive(async (tx) => {
            const timer = createTimer(this.log);
            const entries = tx.snapshot(message.topic);
            if (entries.length === 0) {
                return { success: true, delivered: 0, failed: 0 };
            }

            const broken = this.delivery === 'concurrent'
                ? await this.deliverConcurrently(entries, message)
                : await this.deliverSequentially(entries, message);

            if (broken.length > 0) {
                tx.evictBroken(broken);
            }

            timer.done(`Fan-out of '${message.topic}' to ${entries.length} subscriber(s)`);
            return {
                success: broken.length === 0,
                delivered: entries.length - broken.length,
                failed: broken.length
            };
        });
    }

    private async deliverSequentially(
        entries: readonly SubscriptionEntry[],
        message: Message
    ): Promise<SubscriptionEntry[]> {
        const broken: SubscriptionEntry[] = [];
        for (const entry of entries) {
            if (!(await this.deliver(entry, message))) {
                broken.push(entry);
            }
        }
        return broken;
    }

    private async deliverConcurrently(
        entries: readonly SubscriptionEntry[],
        message: Message
    ): Promise<SubscriptionEntry[]> {
        const results = await Promise.all(entries.map((entry) => this.deliver(entry, message)));
        return entries.filter((_, index) => !results[index]);
    }

    /**
     * Write to one subscriber under its delivery lock. Never throws; a
     * failed write is reported as false.
     */
    private async deliver(entry: SubscriptionEntry, message: Message): Promise<boolean> {
        try {
            await entry.deliveryLock.runExclusive(() => entry.stream.write(message));
            return true;
        } catch (error) {
            this.log.warn(
                `Delivery to ${String(entry.subscriberId)} on '${entry.topic}' failed: ${getErrorMessage(error)}`
            );
            return false;
        }
    }
}
