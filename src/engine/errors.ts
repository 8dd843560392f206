/**
 * Error classes shared by the broker engine, the RPC layer and the clients.
 */

export type BrokerErrorCode =
    | 'STREAM_CLOSED'
    | 'RPC_ERROR'
    | 'CONFIG_INVALID'
    | 'NOT_CONNECTED'
    | 'BROKER_STOPPED';

export class BrokerError extends Error {
    constructor(
        message: string,
        public readonly code: BrokerErrorCode
    ) {
        super(message);
        this.name = 'BrokerError';
    }
}

/**
 * Raised by a subscriber stream written to after it became inactive.
 */
export class StreamClosedError extends BrokerError {
    constructor(public readonly streamId: string) {
        super(`Stream ${streamId} is closed`, 'STREAM_CLOSED');
        this.name = 'StreamClosedError';
    }
}

/**
 * A JSON-RPC error response, surfaced on the client side.
 */
export class RpcError extends BrokerError {
    constructor(
        message: string,
        public readonly rpcCode: number,
        public readonly data?: unknown
    ) {
        super(message, 'RPC_ERROR');
        this.name = 'RpcError';
    }

    toString(): string {
        return `${this.name} ${this.rpcCode}: ${this.message}`;
    }
}

export class ConfigError extends BrokerError {
    constructor(message: string) {
        super(message, 'CONFIG_INVALID');
        this.name = 'ConfigError';
    }
}

export class NotConnectedError extends BrokerError {
    constructor(what: string) {
        super(`${what} is not connected`, 'NOT_CONNECTED');
        this.name = 'NotConnectedError';
    }
}
