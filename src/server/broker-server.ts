import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { Broker } from '../engine/broker.js';
import type { DeliveryMode } from '../engine/fanout.js';
import { SocketListener } from '../transport/socket.js';
import type { ConnectionListener } from '../transport/types.js';
import { WebSocketListener } from '../transport/websocket.js';
import type { BrokerConfig } from '../utils/config.js';
import { createLogger, logError, type Logger } from '../utils/logger.js';
import { BrokerRpcServer } from './rpc-server.js';

export interface BrokerServerOptions {
    listener: ConnectionListener;
    /** Injected broker; one is built from `delivery` when omitted */
    broker?: Broker;
    delivery?: DeliveryMode;
    logger?: Logger;
}

/**
 * Ties one Broker to one listener. The broker's registry lives exactly as
 * long as start() → stop().
 */
export class BrokerServer {
    readonly broker: Broker;
    readonly listener: ConnectionListener;
    private readonly rpc: BrokerRpcServer;
    private readonly log: Logger;
    private running = false;

    constructor(options: BrokerServerOptions) {
        this.log = options.logger ?? createLogger('Server');
        this.broker = options.broker ?? new Broker({ delivery: options.delivery, logger: this.log.child('Broker') });
        this.listener = options.listener;
        this.rpc = new BrokerRpcServer(this.broker, { logger: this.log.child('RPC') });
    }

    get isRunning(): boolean {
        return this.running;
    }

    get address(): string {
        return this.listener.address;
    }

    async start(): Promise<void> {
        if (this.running) return;
        this.listener.onconnection = (connection: Transport) => {
            this.rpc.attach(connection).catch((error: unknown) => {
                logError(this.log, 'Failed to attach connection', error);
            });
        };
        this.listener.onerror = (error: Error) => logError(this.log, 'Listener error', error);
        await this.listener.start();
        this.running = true;
        this.log.info(`Broker listening on ${this.listener.address} (delivery: ${this.broker.delivery})`);
    }

    /**
     * End every session with 'shutdown', answer in-flight requests, then
     * close connections and the listener.
     */
    async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;
        await this.broker.stop();
        await this.rpc.close();
        await this.listener.close();
        this.log.info('Broker server stopped');
    }
}

export function createListener(config: BrokerConfig): ConnectionListener {
    switch (config.transport) {
        case 'websocket':
            return new WebSocketListener({ host: config.host, port: config.port });
        case 'unix':
            return new SocketListener({ kind: 'unix', path: config.socketPath });
        case 'tcp':
            return new SocketListener({ kind: 'tcp', host: config.host, port: config.port });
    }
}

export function createBrokerServer(config: BrokerConfig): BrokerServer {
    return new BrokerServer({ listener: createListener(config), delivery: config.delivery });
}
