import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

/**
 * A server-side endpoint that accepts many connections, each exposed as an
 * SDK Transport carrying JSON-RPC messages.
 */
export interface ConnectionListener {
    /** Set before start(); called once per accepted connection */
    onconnection?: (connection: Transport) => void;
    onerror?: (error: Error) => void;

    start(): Promise<void>;

    /** Close every open connection, then stop listening */
    close(): Promise<void>;

    /** Human-readable bound address, valid after start() */
    readonly address: string;
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
