/**
 * JSON-RPC client over an SDK Transport: request/response correlation plus
 * the client half of subscribe streams.
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    isJSONRPCNotification,
    isJSONRPCRequest,
    type JSONRPCMessage,
    type JSONRPCNotification,
    type RequestId
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { NotConnectedError, RpcError } from '../engine/errors.js';
import { fromWireMessage } from '../schema/message.js';
import {
    MessageNotificationSchema,
    RpcMethod,
    RpcNotification,
    StreamIdSchema,
    SubscribeResultSchema,
    SubscribedNotificationSchema,
    type PublishParams,
    type SubscribeRequest,
    type UnsubscribeRequest
} from '../schema/rpc.js';
import { toError } from '../transport/types.js';
import { createLogger, getErrorMessage, type Logger } from '../utils/logger.js';
import { MessageStream } from './message-stream.js';

const ResponseFrameSchema = z.union([
    z.object({
        id: StreamIdSchema,
        result: z.record(z.unknown())
    }),
    z.object({
        id: StreamIdSchema,
        error: z.object({
            code: z.number(),
            message: z.string(),
            data: z.unknown().optional()
        })
    })
]);

type RequestCall =
    | { method: typeof RpcMethod.UNSUBSCRIBE; params: UnsubscribeRequest }
    | { method: typeof RpcMethod.PUBLISH; params: PublishParams };

interface PendingRequest {
    method: string;
    resolve: (result: unknown) => void;
    reject: (error: Error) => void;
}

export interface RpcClientOptions {
    logger?: Logger;
}

export class RpcClient {
    private nextId = 1;
    private readonly pending = new Map<RequestId, PendingRequest>();
    private readonly streams = new Map<RequestId, MessageStream>();
    private state: 'idle' | 'open' | 'closed' = 'idle';
    private readonly log: Logger;

    constructor(
        private readonly transport: Transport,
        options: RpcClientOptions = {}
    ) {
        this.log = options.logger ?? createLogger('Client');
    }

    get isOpen(): boolean {
        return this.state === 'open';
    }

    async connect(): Promise<void> {
        if (this.state !== 'idle') {
            throw new Error(`RpcClient cannot connect from state '${this.state}'`);
        }
        this.transport.onmessage = (message: JSONRPCMessage) => this.handleMessage(message);
        this.transport.onerror = (error: Error) => this.log.warn(`Transport error: ${error.message}`);
        this.transport.onclose = () => this.handleClose();
        await this.transport.start();
        this.state = 'open';
    }

    /**
     * Send a request and validate its result with `schema`.
     * Rejects with RpcError on an error response.
     */
    async request<T>(call: RequestCall, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        this.assertOpen();
        const id = this.nextId++;
        const result = new Promise<unknown>((resolve, reject) => {
            this.pending.set(id, { method: call.method, resolve, reject });
        });

        const sent = this.transport
            .send({ jsonrpc: '2.0', id, method: call.method, params: call.params })
            .catch((error: unknown) => {
                this.pending.delete(id);
                throw toError(error);
            });
        const [, raw] = await Promise.all([sent, result]);
        return schema.parse(raw);
    }

    /**
     * Start a subscribe stream. Await stream.waitReady() to know the broker
     * has registered it.
     */
    openStream(request: SubscribeRequest): MessageStream {
        this.assertOpen();
        const id = this.nextId++;
        const stream = new MessageStream(id, (reason) => this.cancelStream(id, reason));
        this.streams.set(id, stream);

        this.transport
            .send({ jsonrpc: '2.0', id, method: RpcMethod.SUBSCRIBE, params: request })
            .catch((error: unknown) => {
                this.streams.delete(id);
                stream.fail(toError(error));
            });
        return stream;
    }

    async close(): Promise<void> {
        if (this.state === 'closed') return;
        await this.transport.close();
        this.handleClose();
    }

    private async cancelStream(id: RequestId, reason?: string): Promise<void> {
        const stream = this.streams.get(id);
        if (!stream) return;
        this.streams.delete(id);
        stream.finish('cancelled');

        if (this.state !== 'open') return;
        try {
            await this.transport.send({
                jsonrpc: '2.0',
                method: RpcNotification.CANCELLED,
                params: reason === undefined ? { requestId: id } : { requestId: id, reason }
            });
        } catch (error) {
            this.log.debug(`Cancel of stream ${String(id)} not sent: ${getErrorMessage(error)}`);
        }
    }

    private handleMessage(message: JSONRPCMessage): void {
        if (isJSONRPCNotification(message)) {
            this.handleNotification(message);
            return;
        }
        if (isJSONRPCRequest(message)) {
            this.log.debug(`Ignoring server request ${message.method}`);
            return;
        }

        const parsed = ResponseFrameSchema.safeParse(message);
        if (!parsed.success) {
            this.log.warn('Malformed response frame');
            return;
        }
        const frame = parsed.data;

        const pending = this.pending.get(frame.id);
        if (pending) {
            this.pending.delete(frame.id);
            if ('error' in frame) {
                pending.reject(new RpcError(frame.error.message, frame.error.code, frame.error.data));
            } else {
                pending.resolve(frame.result);
            }
            return;
        }

        // A response to a subscribe request closes that stream
        const stream = this.streams.get(frame.id);
        if (stream) {
            this.streams.delete(frame.id);
            if ('error' in frame) {
                stream.fail(new RpcError(frame.error.message, frame.error.code, frame.error.data));
            } else {
                const result = SubscribeResultSchema.safeParse(frame.result);
                stream.finish(result.success ? result.data.reason : undefined);
            }
            return;
        }

        this.log.debug(`Response for unknown request ${String(frame.id)}`);
    }

    private handleNotification(notification: JSONRPCNotification): void {
        switch (notification.method) {
            case RpcNotification.MESSAGE: {
                const parsed = MessageNotificationSchema.safeParse(notification.params);
                if (!parsed.success) {
                    this.log.warn('Malformed message notification');
                    return;
                }
                const { streamId, ...wire } = parsed.data;
                this.streams.get(streamId)?.push(fromWireMessage(wire));
                return;
            }
            case RpcNotification.SUBSCRIBED: {
                const parsed = SubscribedNotificationSchema.safeParse(notification.params);
                if (parsed.success) {
                    this.streams.get(parsed.data.streamId)?.markReady();
                }
                return;
            }
            default:
                this.log.debug(`Ignoring notification ${notification.method}`);
        }
    }

    private handleClose(): void {
        if (this.state === 'closed') return;
        this.state = 'closed';

        for (const [id, pending] of this.pending) {
            pending.reject(new NotConnectedError(`Request ${String(id)} (${pending.method})`));
        }
        this.pending.clear();

        for (const stream of this.streams.values()) {
            stream.fail(new NotConnectedError(`Stream ${String(stream.id)}`));
        }
        this.streams.clear();
    }

    private assertOpen(): void {
        if (this.state !== 'open') {
            throw new NotConnectedError('RpcClient');
        }
    }
}
