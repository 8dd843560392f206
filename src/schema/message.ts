import { z } from 'zod';

// Topics are opaque: any string, no hierarchy
export const TopicSchema = z.string();
export type Topic = z.infer<typeof TopicSchema>;

// Client-chosen subscriber identity; 1 and "1" are distinct ids. Integers past
// 2^53 would collide once parsed, so they are refused.
export const SubscriberIdSchema = z.union([z.string(), z.number().int().safe()]);
export type SubscriberId = z.infer<typeof SubscriberIdSchema>;

// Payload bytes travel as base64 text inside JSON frames
export const WirePayloadSchema = z.string().base64();

/**
 * A published message as the broker and clients hold it in memory.
 */
export interface Message {
    topic: Topic;
    payload: Uint8Array;
}

export const WireMessageSchema = z.object({
    topic: TopicSchema,
    payload: WirePayloadSchema
});

export type WireMessage = z.infer<typeof WireMessageSchema>;

export function encodePayload(payload: Uint8Array): string {
    return Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString('base64');
}

export function decodePayload(encoded: string): Uint8Array {
    return new Uint8Array(Buffer.from(encoded, 'base64'));
}

/**
 * Accepts text for convenience; text is encoded as UTF-8.
 */
export function toPayload(value: Uint8Array | string): Uint8Array {
    return typeof value === 'string' ? new TextEncoder().encode(value) : value;
}

export function payloadText(message: Message): string {
    return new TextDecoder().decode(message.payload);
}

export function toWireMessage(message: Message): WireMessage {
    return { topic: message.topic, payload: encodePayload(message.payload) };
}

export function fromWireMessage(wire: WireMessage): Message {
    return { topic: wire.topic, payload: decodePayload(wire.payload) };
}
