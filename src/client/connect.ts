import { openTransport } from '../transport/address.js';
import type { Logger } from '../utils/logger.js';
import { Consumer, type ConsumerOptions } from './consumer.js';
import { Publisher } from './publisher.js';
import { RpcClient } from './rpc-client.js';

/**
 * Open a connected RpcClient for `address`
 * (`tcp://host:port`, `host:port`, `unix:///path` or `ws://host:port`).
 */
export async function connectClient(address: string, logger?: Logger): Promise<RpcClient> {
    const transport = await openTransport(address);
    const client = new RpcClient(transport, { logger });
    await client.connect();
    return client;
}

export async function connectConsumer(address: string, options: ConsumerOptions = {}): Promise<Consumer> {
    const client = await connectClient(address, options.logger?.child('RPC'));
    return new Consumer(client, options);
}

export async function connectPublisher(address: string, logger?: Logger): Promise<Publisher> {
    return new Publisher(await connectClient(address, logger));
}
