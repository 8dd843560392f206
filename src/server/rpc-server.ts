/**
 * JSON-RPC front end for a Broker.
 *
 * Each attached Transport is one client connection. Requests are validated
 * with the zod schemas from ../schema and dispatched to the Broker:
 *
 *   pubsub/subscribe    stays pending while the stream lives; messages flow
 *                       as pubsub/message notifications
 *   pubsub/unsubscribe  → { success }
 *   pubsub/publish      → { success }
 *
 * A client ends a stream with notifications/cancelled; closing the
 * connection ends all of its streams.
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    ErrorCode,
    isJSONRPCNotification,
    isJSONRPCRequest,
    type JSONRPCMessage,
    type JSONRPCNotification,
    type JSONRPCRequest,
    type RequestId
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { Broker } from '../engine/broker.js';
import { BrokerError } from '../engine/errors.js';
import { decodePayload } from '../schema/message.js';
import {
    CancelledNotificationSchema,
    PublishParamsSchema,
    RpcErrorCode,
    RpcMethod,
    RpcNotification,
    SubscribeRequestSchema,
    UnsubscribeRequestSchema,
    type SessionEndReason
} from '../schema/rpc.js';
import { createLogger, getErrorMessage, logError, type Logger } from '../utils/logger.js';
import { RpcSubscriberStream } from './rpc-stream.js';

export interface BrokerRpcServerOptions {
    logger?: Logger;
}

// End reasons the client did not cause itself; only these get a response
const BROKER_INITIATED: ReadonlySet<SessionEndReason> = new Set(['superseded', 'shutdown']);

export class BrokerRpcServer {
    private readonly connections = new Set<BrokerConnection>();
    private readonly log: Logger;
    private nextConnectionId = 1;

    constructor(
        private readonly broker: Broker,
        options: BrokerRpcServerOptions = {}
    ) {
        this.log = options.logger ?? createLogger('RPC');
    }

    get connectionCount(): number {
        return this.connections.size;
    }

    /**
     * Serve `transport` until it closes.
     */
    async attach(transport: Transport): Promise<void> {
        const connection = new BrokerConnection(
            `c${this.nextConnectionId++}`,
            transport,
            this.broker,
            this.log,
            (closed) => this.connections.delete(closed)
        );
        this.connections.add(connection);
        await connection.start();
    }

    /**
     * End every open stream, let in-flight requests answer, then close all
     * connections.
     */
    async close(): Promise<void> {
        await Promise.all(Array.from(this.connections, (connection) => connection.close()));
        this.connections.clear();
    }
}

class BrokerConnection {
    private readonly streams = new Map<RequestId, RpcSubscriberStream>();
    private readonly inFlight = new Set<Promise<void>>();
    private readonly log: Logger;
    private closed = false;

    constructor(
        readonly id: string,
        private readonly transport: Transport,
        private readonly broker: Broker,
        parentLog: Logger,
        private readonly onClosed: (connection: BrokerConnection) => void
    ) {
        this.log = parentLog.child(id);
    }

    async start(): Promise<void> {
        this.transport.onmessage = (message: JSONRPCMessage) => this.handleMessage(message);
        this.transport.onerror = (error: Error) => logError(this.log, 'Transport error', error);
        this.transport.onclose = () => this.handleClose();
        await this.transport.start();
        this.log.debug('Connection opened');
    }

    async close(): Promise<void> {
        for (const stream of this.streams.values()) {
            stream.end('shutdown');
        }
        await Promise.allSettled(Array.from(this.inFlight));
        await this.transport.close();
        this.handleClose();
    }

    private handleMessage(message: JSONRPCMessage): void {
        if (isJSONRPCRequest(message)) {
            this.track(this.handleRequest(message));
        } else if (isJSONRPCNotification(message)) {
            this.handleNotification(message);
        } else {
            this.log.debug('Ignoring response frame from client');
        }
    }

    private handleNotification(notification: JSONRPCNotification): void {
        if (notification.method !== RpcNotification.CANCELLED) {
            this.log.debug(`Ignoring notification ${notification.method}`);
            return;
        }
        const parsed = CancelledNotificationSchema.safeParse(notification.params);
        if (!parsed.success) {
            this.log.warn('Malformed cancellation notification');
            return;
        }
        const stream = this.streams.get(parsed.data.requestId);
        if (stream) {
            this.log.debug(`Stream ${stream.id} cancelled${parsed.data.reason ? `: ${parsed.data.reason}` : ''}`);
            stream.end('cancelled');
        }
    }

    private handleClose(): void {
        if (this.closed) return;
        this.closed = true;
        for (const stream of this.streams.values()) {
            stream.end('disconnected');
        }
        this.onClosed(this);
        this.log.debug('Connection closed');
    }

    private track(work: Promise<void>): void {
        const tracked: Promise<void> = work.finally(() => {
            this.inFlight.delete(tracked);
        });
        this.inFlight.add(tracked);
    }

    /**
     * Never rejects: every failure is turned into a JSON-RPC error response.
     */
    private async handleRequest(request: JSONRPCRequest): Promise<void> {
        try {
            switch (request.method) {
                case RpcMethod.SUBSCRIBE:
                    await this.handleSubscribe(request.id, request.params);
                    return;
                case RpcMethod.UNSUBSCRIBE: {
                    const params = UnsubscribeRequestSchema.parse(request.params);
                    const { success } = await this.broker.unsubscribe(params);
                    await this.sendFrame({ jsonrpc: '2.0', id: request.id, result: { success } });
                    return;
                }
                case RpcMethod.PUBLISH: {
                    const params = PublishParamsSchema.parse(request.params);
                    const { success } = await this.broker.publish({
                        topic: params.topic,
                        payload: decodePayload(params.payload)
                    });
                    await this.sendFrame({ jsonrpc: '2.0', id: request.id, result: { success } });
                    return;
                }
                default:
                    await this.respondError(request.id, ErrorCode.MethodNotFound, `Method not found: ${request.method}`);
            }
        } catch (error) {
            if (error instanceof z.ZodError) {
                await this.respondError(request.id, ErrorCode.InvalidParams, 'Invalid params', error.issues);
            } else if (error instanceof BrokerError && error.code === 'BROKER_STOPPED') {
                await this.respondError(request.id, RpcErrorCode.BROKER_UNAVAILABLE, error.message);
            } else {
                logError(this.log, `Request ${request.method} failed`, error);
                await this.respondError(request.id, ErrorCode.InternalError, getErrorMessage(error));
            }
        }
    }

    private async handleSubscribe(requestId: RequestId, rawParams: unknown): Promise<void> {
        const params = SubscribeRequestSchema.parse(rawParams);
        if (this.streams.has(requestId)) {
            await this.respondError(requestId, ErrorCode.InvalidRequest, `Stream ${String(requestId)} is already open`);
            return;
        }

        const stream = new RpcSubscriberStream(`${this.id}/${String(requestId)}`, requestId, this.transport);
        this.streams.set(requestId, stream);
        try {
            const session = await this.broker.openSession(params, stream);
            if (session.active) {
                await this.sendFrame({
                    jsonrpc: '2.0',
                    method: RpcNotification.SUBSCRIBED,
                    params: { streamId: requestId }
                });
            }
            const reason = await session.closed;
            this.log.debug(`Stream ${stream.id} ended: ${reason}`);
            if (BROKER_INITIATED.has(reason)) {
                await this.sendFrame({ jsonrpc: '2.0', id: requestId, result: { reason } });
            }
        } finally {
            this.streams.delete(requestId);
        }
    }

    // ───────────────────────────────────────────────────────────────────────
    // Outbound frames; dropped once the connection is gone
    // ───────────────────────────────────────────────────────────────────────

    private async respondError(id: RequestId, code: number, message: string, data?: unknown): Promise<void> {
        await this.sendFrame({
            jsonrpc: '2.0',
            id,
            error: data === undefined ? { code, message } : { code, message, data }
        });
    }

    private async sendFrame(frame: JSONRPCMessage): Promise<void> {
        if (this.closed) return;
        try {
            await this.transport.send(frame);
        } catch (error) {
            this.log.debug(`Dropped outbound frame: ${getErrorMessage(error)}`);
        }
    }
}
