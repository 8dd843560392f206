import type { SubscriberId } from '../schema/message.js';
import type { SessionEndReason } from '../schema/rpc.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { BrokerError } from './errors.js';
import { Mutex } from './mutex.js';
import type { SubscriberStream } from './stream.js';

export interface SubscriptionKey {
    topic: string;
    subscriberId: SubscriberId;
}

/**
 * Point-in-time view of one registered subscriber, as handed to fan-out.
 */
export interface SubscriptionEntry extends SubscriptionKey {
    stream: SubscriberStream;
    deliveryLock: Mutex;
}

export interface Registration {
    /** An earlier stream under the same key was ended and replaced */
    replaced: boolean;
}

/**
 * Operations available while the coarse lock is already held.
 * Only valid inside the callback passed to SubscriptionRegistry.exclusive().
 */
export interface RegistryTransaction {
    snapshot(topic: string): SubscriptionEntry[];
    evictBroken(entries: readonly SubscriptionEntry[]): number;
}

export interface SubscriptionRegistryOptions {
    logger?: Logger;
}

/**
 * Subscription Registry
 *
 * topic → subscriber id → stream, with a parallel table of per-entry
 * delivery locks. Both tables change only under the coarse lock and always
 * together, so a delivery lock exists exactly when its entry does.
 *
 * Lock order is coarse, then entry. Entry locks are never taken outside a
 * coarse-lock critical section.
 */
export class SubscriptionRegistry {
    private readonly streams = new Map<string, Map<SubscriberId, SubscriberStream>>();
    private readonly deliveryLocks = new Map<string, Map<SubscriberId, Mutex>>();
    private readonly lock = new Mutex();
    private readonly log: Logger;
    private draining = false;

    constructor(options: SubscriptionRegistryOptions = {}) {
        this.log = options.logger ?? createLogger('Registry');
    }

    /**
     * Insert (topic, subscriberId) → stream with a fresh delivery lock.
     *
     * An existing entry under the same key is drained first: its delivery
     * lock is acquired, its stream ended as superseded, and only then is the
     * entry replaced. Re-registering the very same stream is a no-op.
     * Rejects with BROKER_STOPPED once the registry has been drained.
     */
    register(topic: string, subscriberId: SubscriberId, stream: SubscriberStream): Promise<Registration> {
        return this.lock.runExclusive(async () => {
            if (this.draining) {
                throw new BrokerError('Registry has been drained', 'BROKER_STOPPED');
            }
            const previous = this.entry(topic, subscriberId);
            if (previous?.stream === stream) {
                return { replaced: false };
            }

            if (previous) {
                await previous.deliveryLock.runExclusive(() => {
                    previous.stream.end('superseded');
                    this.remove(topic, subscriberId);
                });
                this.log.info(`Subscriber ${String(subscriberId)} on '${topic}' superseded by stream ${stream.id}`);
            }

            this.insert(topic, subscriberId, stream);
            this.log.debug(`Registered ${String(subscriberId)} on '${topic}' (stream ${stream.id})`);
            return { replaced: previous !== undefined };
        });
    }

    /**
     * Remove the entry and its delivery lock. Returns false, with no side
     * effects, when the pair is not registered.
     */
    deregister(topic: string, subscriberId: SubscriberId): Promise<boolean> {
        return this.lock.runExclusive(() => {
            const removed = this.remove(topic, subscriberId);
            if (removed) {
                this.log.debug(`Deregistered ${String(subscriberId)} from '${topic}'`);
            }
            return removed;
        });
    }

    /**
     * Evict entries whose delivery failed. Entries already gone, or since
     * replaced by a different stream, are skipped.
     */
    evictBroken(entries: readonly SubscriptionEntry[]): Promise<number> {
        return this.lock.runExclusive(() => this.evictLocked(entries));
    }

    /**
     * Run `fn` while holding the coarse lock. Fan-out takes its snapshot,
     * delivers, and evicts inside one such section.
     */
    exclusive<T>(fn: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
        return this.lock.runExclusive(() =>
            fn({
                snapshot: (topic) => this.snapshotLocked(topic),
                evictBroken: (entries) => this.evictLocked(entries)
            })
        );
    }

    /**
     * End every registered stream with `reason`, empty the registry and
     * refuse further registrations.
     */
    drain(reason: SessionEndReason): Promise<number> {
        return this.lock.runExclusive(async () => {
            this.draining = true;
            let count = 0;
            for (const [topic, byId] of this.streams) {
                for (const [subscriberId, stream] of byId) {
                    const deliveryLock = this.deliveryLocks.get(topic)?.get(subscriberId);
                    if (deliveryLock) {
                        await deliveryLock.runExclusive(() => stream.end(reason));
                    } else {
                        stream.end(reason);
                    }
                    count++;
                }
            }
            this.streams.clear();
            this.deliveryLocks.clear();
            return count;
        });
    }

    get drained(): boolean {
        return this.draining;
    }

    // ───────────────────────────────────────────────────────────────────────
    // Introspection
    // ───────────────────────────────────────────────────────────────────────

    has(topic: string, subscriberId: SubscriberId): boolean {
        return this.streams.get(topic)?.has(subscriberId) ?? false;
    }

    get size(): number {
        let total = 0;
        for (const byId of this.streams.values()) {
            total += byId.size;
        }
        return total;
    }

    topics(): string[] {
        return Array.from(this.streams.keys());
    }

    subscribers(topic: string): SubscriberId[] {
        return Array.from(this.streams.get(topic)?.keys() ?? []);
    }

    /** Keys of all registered entries */
    entryKeys(): SubscriptionKey[] {
        return flattenKeys(this.streams);
    }

    /** Keys of all delivery locks; always equal to entryKeys() */
    lockKeys(): SubscriptionKey[] {
        return flattenKeys(this.deliveryLocks);
    }

    // ───────────────────────────────────────────────────────────────────────
    // Unlocked helpers; callers hold the coarse lock
    // ───────────────────────────────────────────────────────────────────────

    private entry(topic: string, subscriberId: SubscriberId): SubscriptionEntry | undefined {
        const stream = this.streams.get(topic)?.get(subscriberId);
        const deliveryLock = this.deliveryLocks.get(topic)?.get(subscriberId);
        if (!stream || !deliveryLock) return undefined;
        return { topic, subscriberId, stream, deliveryLock };
    }

    private insert(topic: string, subscriberId: SubscriberId, stream: SubscriberStream): void {
        let byId = this.streams.get(topic);
        let locks = this.deliveryLocks.get(topic);
        if (!byId || !locks) {
            byId = new Map();
            locks = new Map();
            this.streams.set(topic, byId);
            this.deliveryLocks.set(topic, locks);
        }
        byId.set(subscriberId, stream);
        locks.set(subscriberId, new Mutex());
    }

    private remove(topic: string, subscriberId: SubscriberId): boolean {
        const byId = this.streams.get(topic);
        const locks = this.deliveryLocks.get(topic);
        if (!byId?.has(subscriberId)) return false;

        byId.delete(subscriberId);
        locks?.delete(subscriberId);
        if (byId.size === 0) {
            this.streams.delete(topic);
            this.deliveryLocks.delete(topic);
        }
        return true;
    }

    private snapshotLocked(topic: string): SubscriptionEntry[] {
        const entries: SubscriptionEntry[] = [];
        for (const subscriberId of this.streams.get(topic)?.keys() ?? []) {
            const entry = this.entry(topic, subscriberId);
            if (entry) entries.push(entry);
        }
        return entries;
    }

    private evictLocked(entries: readonly SubscriptionEntry[]): number {
        let evicted = 0;
        for (const { topic, subscriberId, stream } of entries) {
            if (this.streams.get(topic)?.get(subscriberId) !== stream) continue;
            this.remove(topic, subscriberId);
            evicted++;
            this.log.info(`Evicted broken subscriber ${String(subscriberId)} from '${topic}'`);
        }
        return evicted;
    }
}

function flattenKeys<V>(table: Map<string, Map<SubscriberId, V>>): SubscriptionKey[] {
    const keys: SubscriptionKey[] = [];
    for (const [topic, byId] of table) {
        for (const subscriberId of byId.keys()) {
            keys.push({ topic, subscriberId });
        }
    }
    return keys;
}
