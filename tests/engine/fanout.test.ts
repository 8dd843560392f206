import { StreamClosedError } from '../../src/engine/errors.js';
import { FanOutEngine } from '../../src/engine/fanout.js';
import { SubscriptionRegistry } from '../../src/engine/registry.js';
import { RecordingStream, flush, message } from '../helpers.js';

describe('FanOutEngine', () => {
    let registry: SubscriptionRegistry;
    let fanOut: FanOutEngine;

    beforeEach(() => {
        registry = new SubscriptionRegistry();
        fanOut = new FanOutEngine(registry);
    });

    it('should default to sequential delivery', () => {
        expect(fanOut.delivery).toBe('sequential');
    });

    it('should succeed trivially with no subscribers', async () => {
        const outcome = await fanOut.publish(message('news', 'hi'));

        expect(outcome).toEqual({ success: true, delivered: 0, failed: 0 });
        expect(registry.size).toBe(0);
        expect(registry.topics()).toEqual([]);
    });

    it('should deliver one message to a single subscriber', async () => {
        const stream = new RecordingStream('s1');
        await registry.register('news', 'alice', stream);

        const outcome = await fanOut.publish(message('news', 'hi'));

        expect(outcome).toEqual({ success: true, delivered: 1, failed: 0 });
        expect(stream.received).toHaveLength(1);
        expect(stream.received[0].topic).toBe('news');
        expect(stream.texts()).toEqual(['hi']);
    });

    it('should deliver to every subscriber of the topic', async () => {
        const streams = ['a', 'b', 'c'].map((id) => new RecordingStream(id));
        for (const stream of streams) {
            await registry.register('news', stream.id, stream);
        }

        await fanOut.publish(message('news', 'x'));

        for (const stream of streams) {
            expect(stream.texts()).toEqual(['x']);
        }
    });

    it('should not leak messages across topics', async () => {
        const news = new RecordingStream('news');
        const sport = new RecordingStream('sport');
        await registry.register('news', 'alice', news);
        await registry.register('sport', 'alice', sport);

        await fanOut.publish(message('news', 'headline'));

        expect(news.texts()).toEqual(['headline']);
        expect(sport.received).toEqual([]);
    });

    it('should isolate a failing subscriber and evict it', async () => {
        const healthy = new RecordingStream('healthy');
        const broken = new RecordingStream('broken');
        broken.failWith = new Error('peer gone');
        await registry.register('t', 1, broken);
        await registry.register('t', 2, healthy);

        const outcome = await fanOut.publish(message('t', 'x'));

        expect(outcome).toEqual({ success: false, delivered: 1, failed: 1 });
        expect(healthy.texts()).toEqual(['x']);
        expect(registry.subscribers('t')).toEqual([2]);
        expect(registry.lockKeys()).toEqual(registry.entryKeys());

        await expect(registry.deregister('t', 1)).resolves.toBe(false);
    });

    it('should evict a subscriber whose stream has ended on the next publish only', async () => {
        const stream = new RecordingStream('s1');
        await registry.register('news', 'alice', stream);
        stream.end('disconnected');

        expect(registry.has('news', 'alice')).toBe(true);

        const outcome = await fanOut.publish(message('news', 'hi'));

        expect(outcome.success).toBe(false);
        expect(registry.has('news', 'alice')).toBe(false);
        await expect(stream.write(message('news', 'late'))).rejects.toBeInstanceOf(StreamClosedError);
    });

    it('should succeed again once the broken subscriber is gone', async () => {
        const broken = new RecordingStream('broken');
        broken.failWith = new Error('reset');
        await registry.register('t', 1, broken);
        await registry.register('t', 2, new RecordingStream('ok'));

        await fanOut.publish(message('t', 'first'));
        const outcome = await fanOut.publish(message('t', 'second'));

        expect(outcome).toEqual({ success: true, delivered: 1, failed: 0 });
    });

    it('should not interleave concurrent publishes', async () => {
        const slow = new RecordingStream('slow');
        const fast = new RecordingStream('fast');
        await registry.register('t', 'slow', slow);
        await registry.register('t', 'fast', fast);

        const release = slow.hold();
        const first = fanOut.publish(message('t', 'one'));
        const second = fanOut.publish(message('t', 'two'));
        await flush();

        // The first pass holds the coarse lock, so nothing has reached fast yet
        expect(fast.received).toEqual([]);

        release();
        await Promise.all([first, second]);

        expect(slow.texts()).toEqual(['one', 'two']);
        expect(fast.texts()).toEqual(['one', 'two']);
    });

    it('should make register wait for a running fan-out pass', async () => {
        const slow = new RecordingStream('slow');
        await registry.register('t', 'slow', slow);
        const release = slow.hold();

        const publishing = fanOut.publish(message('t', 'x'));
        const late = new RecordingStream('late');
        const registering = registry.register('t', 'late', late);
        await flush();
        expect(registry.has('t', 'late')).toBe(false);

        release();
        await Promise.all([publishing, registering]);

        expect(late.received).toEqual([]);
        expect(registry.has('t', 'late')).toBe(true);
    });

    describe('concurrent delivery', () => {
        beforeEach(() => {
            fanOut = new FanOutEngine(registry, { delivery: 'concurrent' });
        });

        it('should write to other subscribers while one is slow', async () => {
            const slow = new RecordingStream('slow');
            const fast = new RecordingStream('fast');
            await registry.register('t', 'slow', slow);
            await registry.register('t', 'fast', fast);

            const release = slow.hold();
            const publishing = fanOut.publish(message('t', 'x'));
            await vi.waitFor(() => expect(fast.texts()).toEqual(['x']));
            expect(slow.received).toEqual([]);

            release();
            await expect(publishing).resolves.toEqual({ success: true, delivered: 2, failed: 0 });
        });

        it('should aggregate failures and evict like sequential mode', async () => {
            const broken = new RecordingStream('broken');
            broken.failWith = new Error('peer gone');
            const healthy = new RecordingStream('healthy');
            await registry.register('t', 1, broken);
            await registry.register('t', 2, healthy);

            const outcome = await fanOut.publish(message('t', 'x'));

            expect(outcome).toEqual({ success: false, delivered: 1, failed: 1 });
            expect(healthy.texts()).toEqual(['x']);
            expect(registry.subscribers('t')).toEqual([2]);
            expect(registry.lockKeys()).toEqual(registry.entryKeys());
        });
    });
});
