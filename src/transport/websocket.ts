import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { deserializeMessage } from '@modelcontextprotocol/sdk/shared/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';

import { NotConnectedError } from '../engine/errors.js';
import { createLogger } from '../utils/logger.js';
import { toError, type ConnectionListener } from './types.js';

const log = createLogger('WebSocket');

function rawDataToString(data: RawData): string {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    if (data instanceof ArrayBuffer) {
        return Buffer.from(data).toString('utf8');
    }
    return data.toString('utf8');
}

/**
 * One JSON-RPC message per WebSocket text frame.
 */
export class WebSocketTransport implements Transport {
    private started = false;

    public onclose?: () => void;
    public onerror?: (error: Error) => void;
    public onmessage?: (message: JSONRPCMessage) => void;

    constructor(private readonly ws: WebSocket) {}

    async start(): Promise<void> {
        if (this.started) {
            throw new Error('WebSocketTransport already started');
        }
        this.started = true;

        this.ws.on('message', (data) => {
            try {
                this.onmessage?.(deserializeMessage(rawDataToString(data)));
            } catch (error) {
                this.onerror?.(toError(error));
            }
        });

        this.ws.on('error', (error) => {
            this.onerror?.(error);
        });

        this.ws.on('close', () => {
            this.onclose?.();
        });

        if (this.ws.readyState === WebSocket.CLOSED) {
            this.onclose?.();
        }
    }

    send(message: JSONRPCMessage): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.ws.readyState !== WebSocket.OPEN) {
                reject(new NotConnectedError('WebSocket'));
                return;
            }
            this.ws.send(JSON.stringify(message), (error) => {
                if (error) reject(error);
                else resolve();
            });
        });
    }

    close(): Promise<void> {
        return new Promise((resolve) => {
            if (this.ws.readyState === WebSocket.CLOSED) {
                resolve();
                return;
            }
            this.ws.once('close', () => resolve());
            this.ws.close();
        });
    }
}

export interface WebSocketEndpoint {
    host: string;
    port: number;
}

/**
 * Accepts WebSocket connections on host:port.
 */
export class WebSocketListener implements ConnectionListener {
    private wss: WebSocketServer | null = null;
    private readonly connections = new Set<WebSocketTransport>();
    private boundPort: number;

    public onconnection?: (connection: Transport) => void;
    public onerror?: (error: Error) => void;

    constructor(private readonly endpoint: WebSocketEndpoint) {
        this.boundPort = endpoint.port;
    }

    get address(): string {
        return `ws://${this.endpoint.host}:${this.boundPort}`;
    }

    get port(): number {
        return this.boundPort;
    }

    async start(): Promise<void> {
        const wss = new WebSocketServer({ host: this.endpoint.host, port: this.endpoint.port });
        this.wss = wss;

        wss.on('connection', (ws) => {
            const connection = new WebSocketTransport(ws);
            this.connections.add(connection);
            ws.once('close', () => {
                this.connections.delete(connection);
                log.debug(`Client disconnected (total: ${this.connections.size})`);
            });
            log.debug(`Client connected (total: ${this.connections.size})`);
            this.onconnection?.(connection);
        });

        await new Promise<void>((resolve, reject) => {
            const onError = (error: Error) => reject(error);
            wss.once('error', onError);
            wss.once('listening', () => {
                wss.off('error', onError);
                resolve();
            });
        });

        wss.on('error', (error) => {
            this.onerror?.(error);
        });

        const info = wss.address();
        if (typeof info === 'object' && info !== null) {
            this.boundPort = info.port;
        }
        log.info(`Listening on ${this.address}`);
    }

    async close(): Promise<void> {
        await Promise.all(Array.from(this.connections, (connection) => connection.close()));
        this.connections.clear();

        const wss = this.wss;
        this.wss = null;
        if (!wss) return;

        await new Promise<void>((resolve, reject) => {
            wss.close((error) => {
                if (error) reject(error);
                else resolve();
            });
        });
    }
}

/**
 * Open a client WebSocket; resolves once the handshake completes.
 */
export function connectWebSocket(url: string): Promise<WebSocketTransport> {
    return new Promise((resolve, reject) => {
        const ws = new WebSocket(url);
        const onError = (error: Error) => reject(error);
        ws.once('error', onError);
        ws.once('open', () => {
            ws.off('error', onError);
            resolve(new WebSocketTransport(ws));
        });
    });
}
