import fs from 'fs';
import net from 'net';

import { ReadBuffer, serializeMessage } from '@modelcontextprotocol/sdk/shared/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';

import { NotConnectedError } from '../engine/errors.js';
import { createLogger } from '../utils/logger.js';
import { toError, type ConnectionListener } from './types.js';

const log = createLogger('Socket');

/**
 * Newline-delimited JSON-RPC over a TCP or Unix socket.
 * Used for both accepted server connections and client connections.
 */
export class SocketTransport implements Transport {
    private readonly readBuffer = new ReadBuffer();
    private started = false;

    public onclose?: () => void;
    public onerror?: (error: Error) => void;
    public onmessage?: (message: JSONRPCMessage) => void;

    constructor(private readonly socket: net.Socket) {}

    get remoteAddress(): string {
        return this.socket.remoteAddress
            ? `${this.socket.remoteAddress}:${this.socket.remotePort ?? 0}`
            : 'local';
    }

    async start(): Promise<void> {
        if (this.started) {
            throw new Error('SocketTransport already started');
        }
        this.started = true;

        this.socket.on('data', (chunk: Buffer) => {
            this.readBuffer.append(chunk);
            this.processReadBuffer();
        });

        this.socket.on('error', (error) => {
            this.onerror?.(error);
        });

        this.socket.on('close', () => {
            this.readBuffer.clear();
            this.onclose?.();
        });
    }

    send(message: JSONRPCMessage): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.socket.destroyed || !this.socket.writable) {
                reject(new NotConnectedError(`Socket ${this.remoteAddress}`));
                return;
            }
            this.socket.write(serializeMessage(message), (error) => {
                if (error) reject(error);
                else resolve();
            });
        });
    }

    close(): Promise<void> {
        return new Promise((resolve) => {
            if (this.socket.destroyed) {
                resolve();
                return;
            }
            this.socket.once('close', () => resolve());
            this.socket.end(() => this.socket.destroy());
        });
    }

    private processReadBuffer(): void {
        for (;;) {
            try {
                const message = this.readBuffer.readMessage();
                if (message === null) break;
                this.onmessage?.(message);
            } catch (error) {
                this.onerror?.(toError(error));
            }
        }
    }
}

export type SocketEndpoint =
    | { kind: 'tcp'; host: string; port: number }
    | { kind: 'unix'; path: string };

export function describeEndpoint(endpoint: SocketEndpoint): string {
    return endpoint.kind === 'tcp' ? `tcp://${endpoint.host}:${endpoint.port}` : `unix://${endpoint.path}`;
}

/**
 * Accepts TCP or Unix socket connections.
 */
export class SocketListener implements ConnectionListener {
    private readonly server: net.Server;
    private readonly connections = new Set<SocketTransport>();
    private boundAddress: string;

    public onconnection?: (connection: Transport) => void;
    public onerror?: (error: Error) => void;

    constructor(private readonly endpoint: SocketEndpoint) {
        this.boundAddress = describeEndpoint(endpoint);
        this.server = net.createServer((socket) => {
            const connection = new SocketTransport(socket);
            this.connections.add(connection);
            socket.once('close', () => {
                this.connections.delete(connection);
                log.debug(`Client ${connection.remoteAddress} disconnected (total: ${this.connections.size})`);
            });
            log.debug(`Client ${connection.remoteAddress} connected (total: ${this.connections.size})`);
            this.onconnection?.(connection);
        });

        this.server.on('error', (error) => {
            this.onerror?.(error);
        });
    }

    get address(): string {
        return this.boundAddress;
    }

    /** Bound TCP port; differs from the configured one when that was 0 */
    get port(): number | undefined {
        const info = this.server.address();
        return info !== null && typeof info === 'object' ? info.port : undefined;
    }

    async start(): Promise<void> {
        // Stale socket file left by a previous run
        if (this.endpoint.kind === 'unix' && process.platform !== 'win32' && fs.existsSync(this.endpoint.path)) {
            fs.unlinkSync(this.endpoint.path);
        }

        await new Promise<void>((resolve, reject) => {
            const onError = (error: Error) => reject(error);
            this.server.once('error', onError);
            const onListening = () => {
                this.server.off('error', onError);
                resolve();
            };
            if (this.endpoint.kind === 'tcp') {
                this.server.listen(this.endpoint.port, this.endpoint.host, onListening);
            } else {
                this.server.listen(this.endpoint.path, onListening);
            }
        });

        if (this.endpoint.kind === 'tcp') {
            this.boundAddress = describeEndpoint({ ...this.endpoint, port: this.port ?? this.endpoint.port });
        }
        log.info(`Listening on ${this.boundAddress}`);
    }

    async close(): Promise<void> {
        await Promise.all(Array.from(this.connections, (connection) => connection.close()));
        this.connections.clear();

        await new Promise<void>((resolve, reject) => {
            this.server.close((error) => {
                if (error) reject(error);
                else resolve();
            });
        });
    }
}

/**
 * Open a client connection; resolves once the socket is connected.
 */
export function connectSocket(endpoint: SocketEndpoint): Promise<SocketTransport> {
    return new Promise((resolve, reject) => {
        const socket = endpoint.kind === 'tcp'
            ? net.createConnection({ host: endpoint.host, port: endpoint.port })
            : net.createConnection({ path: endpoint.path });

        const onError = (error: Error) => reject(error);
        socket.once('error', onError);
        socket.once('connect', () => {
            socket.off('error', onError);
            resolve(new SocketTransport(socket));
        });
    });
}
