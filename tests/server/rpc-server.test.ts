import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ErrorCode, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';

import { Broker } from '../../src/engine/broker.js';
import { RpcErrorCode } from '../../src/schema/rpc.js';
import { BrokerRpcServer } from '../../src/server/rpc-server.js';

interface RawClient {
    transport: InMemoryTransport;
    frames: JSONRPCMessage[];
    send(frame: JSONRPCMessage): Promise<void>;
}

// 'hi' in base64
const HI = 'aGk=';

describe('BrokerRpcServer', () => {
    let broker: Broker;
    let server: BrokerRpcServer;

    async function connect(): Promise<RawClient> {
        const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
        await server.attach(serverSide);
        const frames: JSONRPCMessage[] = [];
        clientSide.onmessage = (frame: JSONRPCMessage) => {
            frames.push(frame);
        };
        await clientSide.start();
        return { transport: clientSide, frames, send: (frame) => clientSide.send(frame) };
    }

    async function subscribe(client: RawClient, id: number, topic: string, subscriberId: string | number): Promise<void> {
        await client.send({ jsonrpc: '2.0', id, method: 'pubsub/subscribe', params: { topic, subscriberId } });
        await vi.waitFor(() => expect(client.frames).toContainEqual({
            jsonrpc: '2.0',
            method: 'pubsub/subscribed',
            params: { streamId: id }
        }));
    }

    async function publish(client: RawClient, id: number, topic: string, payload = HI): Promise<JSONRPCMessage> {
        await client.send({ jsonrpc: '2.0', id, method: 'pubsub/publish', params: { topic, payload } });
        return vi.waitFor(() => {
            const response = client.frames.find((frame) => 'id' in frame && frame.id === id && !('method' in frame));
            if (!response) throw new Error(`No response to request ${id}`);
            return response;
        });
    }

    beforeEach(() => {
        broker = new Broker();
        server = new BrokerRpcServer(broker);
    });

    afterEach(async () => {
        await server.close();
    });

    it('should answer a publish with no subscribers with success', async () => {
        const client = await connect();

        await expect(publish(client, 1, 'empty')).resolves.toEqual({ jsonrpc: '2.0', id: 1, result: { success: true } });
    });

    it('should stream published messages to a subscriber', async () => {
        const subscriber = await connect();
        const publisher = await connect();
        await subscribe(subscriber, 7, 'news', 'reader');

        const response = await publish(publisher, 1, 'news');

        expect(response).toEqual({ jsonrpc: '2.0', id: 1, result: { success: true } });
        expect(subscriber.frames).toContainEqual({
            jsonrpc: '2.0',
            method: 'pubsub/message',
            params: { streamId: 7, topic: 'news', payload: HI }
        });
    });

    it('should keep the subscribe request pending while the stream is open', async () => {
        const subscriber = await connect();
        await subscribe(subscriber, 7, 'news', 'reader');

        expect(subscriber.frames.some((frame) => 'id' in frame && frame.id === 7)).toBe(false);
    });

    it('should answer unsubscribe with true, then false', async () => {
        const client = await connect();
        await subscribe(client, 1, 'news', 'reader');

        await client.send({ jsonrpc: '2.0', id: 2, method: 'pubsub/unsubscribe', params: { topic: 'news', subscriberId: 'reader' } });
        await client.send({ jsonrpc: '2.0', id: 3, method: 'pubsub/unsubscribe', params: { topic: 'news', subscriberId: 'reader' } });

        await vi.waitFor(() => {
            expect(client.frames).toContainEqual({ jsonrpc: '2.0', id: 2, result: { success: true } });
            expect(client.frames).toContainEqual({ jsonrpc: '2.0', id: 3, result: { success: false } });
        });
    });

    it('should end a cancelled stream without answering it and evict it lazily', async () => {
        const subscriber = await connect();
        const publisher = await connect();
        await subscribe(subscriber, 1, 'news', 'reader');

        await subscriber.send({ jsonrpc: '2.0', method: 'notifications/cancelled', params: { requestId: 1 } });
        expect(broker.registry.has('news', 'reader')).toBe(true);

        const response = await publish(publisher, 1, 'news');

        expect(response).toEqual({ jsonrpc: '2.0', id: 1, result: { success: false } });
        expect(broker.registry.has('news', 'reader')).toBe(false);
        expect(subscriber.frames.some((frame) => 'method' in frame && frame.method === 'pubsub/message')).toBe(false);
        expect(subscriber.frames.some((frame) => 'id' in frame && frame.id === 1)).toBe(false);
    });

    it('should end the streams of a closed connection', async () => {
        const subscriber = await connect();
        const publisher = await connect();
        await subscribe(subscriber, 1, 'news', 'reader');

        await subscriber.transport.close();
        const response = await publish(publisher, 1, 'news');

        expect(response).toEqual({ jsonrpc: '2.0', id: 1, result: { success: false } });
        await vi.waitFor(() => expect(server.connectionCount).toBe(1));
    });

    it('should tell a superseded subscriber why its stream ended', async () => {
        const first = await connect();
        const second = await connect();
        await subscribe(first, 1, 'news', 'reader');

        await subscribe(second, 1, 'news', 'reader');

        await vi.waitFor(() => expect(first.frames).toContainEqual({
            jsonrpc: '2.0',
            id: 1,
            result: { reason: 'superseded' }
        }));
    });

    it('should tell open streams about a broker shutdown', async () => {
        const subscriber = await connect();
        await subscribe(subscriber, 1, 'news', 'reader');

        await broker.stop();

        await vi.waitFor(() => expect(subscriber.frames).toContainEqual({
            jsonrpc: '2.0',
            id: 1,
            result: { reason: 'shutdown' }
        }));
    });

    it('should refuse subscribes once the broker is stopped', async () => {
        const client = await connect();
        await broker.stop();

        await client.send({ jsonrpc: '2.0', id: 1, method: 'pubsub/subscribe', params: { topic: 'news', subscriberId: 'reader' } });

        await vi.waitFor(() => expect(client.frames).toContainEqual({
            jsonrpc: '2.0',
            id: 1,
            error: { code: RpcErrorCode.BROKER_UNAVAILABLE, message: 'Broker is stopped' }
        }));
    });

    it('should reject a second subscribe under an open stream id', async () => {
        const client = await connect();
        await subscribe(client, 1, 'news', 'reader');

        await client.send({ jsonrpc: '2.0', id: 1, method: 'pubsub/subscribe', params: { topic: 'sport', subscriberId: 'reader' } });

        await vi.waitFor(() => expect(client.frames).toContainEqual({
            jsonrpc: '2.0',
            id: 1,
            error: { code: ErrorCode.InvalidRequest, message: 'Stream 1 is already open' }
        }));
        expect(broker.registry.has('sport', 'reader')).toBe(false);
    });

    it('should answer an unknown method with MethodNotFound', async () => {
        const client = await connect();

        await client.send({ jsonrpc: '2.0', id: 1, method: 'pubsub/replay', params: {} });

        await vi.waitFor(() => expect(client.frames).toContainEqual({
            jsonrpc: '2.0',
            id: 1,
            error: { code: ErrorCode.MethodNotFound, message: 'Method not found: pubsub/replay' }
        }));
    });

    it('should answer invalid params with the validation issues', async () => {
        const client = await connect();

        const response = await publish(client, 1, 'news', 'not base64!');

        expect(response).toMatchObject({
            jsonrpc: '2.0',
            id: 1,
            error: {
                code: ErrorCode.InvalidParams,
                message: 'Invalid params',
                data: [expect.objectContaining({ path: ['payload'] })]
            }
        });
    });

    it('should refuse a subscriber id too large to keep distinct', async () => {
        const client = await connect();

        await client.send({
            jsonrpc: '2.0',
            id: 1,
            method: 'pubsub/subscribe',
            params: { topic: 'news', subscriberId: 2 ** 53 }
        });

        await vi.waitFor(() => expect(client.frames).toContainEqual(expect.objectContaining({
            id: 1,
            error: expect.objectContaining({ code: ErrorCode.InvalidParams })
        })));
        expect(broker.registry.size).toBe(0);
    });

    it('should end open streams with shutdown when closed', async () => {
        const subscriber = await connect();
        await subscribe(subscriber, 1, 'news', 'reader');

        await server.close();

        expect(subscriber.frames).toContainEqual({ jsonrpc: '2.0', id: 1, result: { reason: 'shutdown' } });
        expect(server.connectionCount).toBe(0);
    });
});
