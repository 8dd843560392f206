import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { ConfigError } from '../engine/errors.js';
import { connectSocket, type SocketEndpoint } from './socket.js';
import { connectWebSocket } from './websocket.js';

export type BrokerAddress =
    | SocketEndpoint
    | { kind: 'websocket'; url: string };

/**
 * Parse a broker address.
 *
 * @example
 * parseAddress('localhost:50051')        // { kind: 'tcp', host: 'localhost', port: 50051 }
 * parseAddress('unix:///tmp/broker.sock') // { kind: 'unix', path: '/tmp/broker.sock' }
 * parseAddress('ws://localhost:50052')   // { kind: 'websocket', url: 'ws://localhost:50052' }
 */
export function parseAddress(address: string): BrokerAddress {
    const trimmed = address.trim();

    if (trimmed.startsWith('ws://') || trimmed.startsWith('wss://')) {
        return { kind: 'websocket', url: trimmed };
    }
    if (trimmed.startsWith('unix://')) {
        const path = trimmed.slice('unix://'.length);
        if (!path) throw new ConfigError(`Missing socket path in '${address}'`);
        return { kind: 'unix', path };
    }
    if (trimmed.startsWith('/')) {
        return { kind: 'unix', path: trimmed };
    }

    const hostPort = trimmed.startsWith('tcp://') ? trimmed.slice('tcp://'.length) : trimmed;
    let url: URL;
    try {
        url = new URL(`tcp://${hostPort}`);
    } catch {
        throw new ConfigError(`Invalid broker address '${address}'`);
    }

    const port = Number(url.port);
    if (!url.hostname || !Number.isInteger(port) || port <= 0) {
        throw new ConfigError(`Broker address '${address}' needs a host and a port`);
    }
    return { kind: 'tcp', host: url.hostname.replace(/^\[(.*)\]$/, '$1'), port };
}

/**
 * Connect to a broker address; the returned transport is not started yet.
 */
export async function openTransport(address: string | BrokerAddress): Promise<Transport> {
    const target = typeof address === 'string' ? parseAddress(address) : address;
    if (target.kind === 'websocket') {
        return connectWebSocket(target.url);
    }
    return connectSocket(target);
}
