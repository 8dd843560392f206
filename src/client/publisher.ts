import { toPayload, encodePayload } from '../schema/message.js';
import { PublishResponseSchema, RpcMethod } from '../schema/rpc.js';
import type { RpcClient } from './rpc-client.js';

export class Publisher {
    constructor(private readonly client: RpcClient) {}

    /**
     * Resolves with the broker's verdict: true when every subscriber took the
     * message (or there were none).
     */
    async publish(topic: string, payload: Uint8Array | string): Promise<boolean> {
        const { success } = await this.client.request(
            { method: RpcMethod.PUBLISH, params: { topic, payload: encodePayload(toPayload(payload)) } },
            PublishResponseSchema
        );
        return success;
    }

    close(): Promise<void> {
        return this.client.close();
    }
}
