import { z } from 'zod';
import { SubscriberIdSchema, TopicSchema, WirePayloadSchema } from './message.js';

// ───────────────────────────────────────────────────────────────────────────
// Method and notification names
// ───────────────────────────────────────────────────────────────────────────

export const RpcMethod = {
    SUBSCRIBE: 'pubsub/subscribe',
    UNSUBSCRIBE: 'pubsub/unsubscribe',
    PUBLISH: 'pubsub/publish'
} as const;

export const RpcNotification = {
    SUBSCRIBED: 'pubsub/subscribed',
    MESSAGE: 'pubsub/message',
    CANCELLED: 'notifications/cancelled'
} as const;

// Application error codes, outside the JSON-RPC reserved range
export const RpcErrorCode = {
    BROKER_UNAVAILABLE: -32001
} as const;

// JSON-RPC request ids; a subscribe request's id doubles as its stream id
export const StreamIdSchema = z.union([z.string(), z.number().int()]);
export type StreamId = z.infer<typeof StreamIdSchema>;

// ───────────────────────────────────────────────────────────────────────────
// Requests and responses
// ───────────────────────────────────────────────────────────────────────────

export const SubscribeRequestSchema = z.object({
    topic: TopicSchema,
    subscriberId: SubscriberIdSchema
});
export type SubscribeRequest = z.infer<typeof SubscribeRequestSchema>;

export const UnsubscribeRequestSchema = z.object({
    topic: TopicSchema,
    subscriberId: SubscriberIdSchema
});
export type UnsubscribeRequest = z.infer<typeof UnsubscribeRequestSchema>;

export const UnsubscribeResponseSchema = z.object({
    success: z.boolean()
});
export type UnsubscribeResponse = z.infer<typeof UnsubscribeResponseSchema>;

// Wire form of a publish; the engine works on PublishRequest with raw bytes
export const PublishParamsSchema = z.object({
    topic: TopicSchema,
    payload: WirePayloadSchema
});
export type PublishParams = z.infer<typeof PublishParamsSchema>;

export interface PublishRequest {
    topic: string;
    payload: Uint8Array;
}

export const PublishResponseSchema = z.object({
    success: z.boolean()
});
export type PublishResponse = z.infer<typeof PublishResponseSchema>;

// Why a subscriber stream ended
export const SessionEndReasonSchema = z.enum(['cancelled', 'disconnected', 'superseded', 'shutdown']);
export type SessionEndReason = z.infer<typeof SessionEndReasonSchema>;

// Sent as the subscribe response when the broker, not the client, ends the stream
export const SubscribeResultSchema = z.object({
    reason: SessionEndReasonSchema
});

// ───────────────────────────────────────────────────────────────────────────
// Notifications
// ───────────────────────────────────────────────────────────────────────────

export const SubscribedNotificationSchema = z.object({
    streamId: StreamIdSchema
});

export const MessageNotificationSchema = z.object({
    streamId: StreamIdSchema,
    topic: TopicSchema,
    payload: WirePayloadSchema
});

export const CancelledNotificationSchema = z.object({
    requestId: StreamIdSchema,
    reason: z.string().optional()
});
