import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { RequestId } from '@modelcontextprotocol/sdk/types.js';

import { BaseSubscriberStream } from '../engine/stream.js';
import { encodePayload, type Message } from '../schema/message.js';
import { RpcNotification } from '../schema/rpc.js';

/**
 * Server side of one `pubsub/subscribe` call: each delivered message becomes
 * a `pubsub/message` notification tagged with the subscribe request's id.
 */
export class RpcSubscriberStream extends BaseSubscriberStream {
    constructor(
        id: string,
        readonly streamId: RequestId,
        private readonly transport: Transport
    ) {
        super(id);
    }

    protected async deliver(message: Message): Promise<void> {
        await this.transport.send({
            jsonrpc: '2.0',
            method: RpcNotification.MESSAGE,
            params: {
                streamId: this.streamId,
                topic: message.topic,
                payload: encodePayload(message.payload)
            }
        });
    }
}
