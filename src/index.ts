/**
 * topic-broker - in-memory topic publish/subscribe over JSON-RPC
 *
 * Server side: Broker (engine), BrokerServer (listener + RPC front end).
 * Client side: connectConsumer() / connectPublisher().
 */

// Engine
export { Broker, type BrokerOptions } from './engine/broker.js';
export {
    BrokerError,
    ConfigError,
    NotConnectedError,
    RpcError,
    StreamClosedError,
    type BrokerErrorCode
} from './engine/errors.js';
export { DELIVERY_MODES, FanOutEngine, type DeliveryMode, type PublishOutcome } from './engine/fanout.js';
export { Mutex } from './engine/mutex.js';
export {
    SubscriptionRegistry,
    type Registration,
    type SubscriptionEntry,
    type SubscriptionKey
} from './engine/registry.js';
export { SubscriberSession } from './engine/session.js';
export { BaseSubscriberStream, type SubscriberStream } from './engine/stream.js';

// Wire schemas
export * from './schema/index.js';

// Transports
export { openTransport, parseAddress, type BrokerAddress } from './transport/address.js';
export { SocketListener, SocketTransport, connectSocket, type SocketEndpoint } from './transport/socket.js';
export type { ConnectionListener } from './transport/types.js';
export { WebSocketListener, WebSocketTransport, connectWebSocket } from './transport/websocket.js';

// Server
export { BrokerServer, createBrokerServer, createListener, type BrokerServerOptions } from './server/broker-server.js';
export { BrokerRpcServer } from './server/rpc-server.js';

// Client
export { connectClient, connectConsumer, connectPublisher } from './client/connect.js';
export { Consumer, type ConsumerOptions } from './client/consumer.js';
export { MessageStream } from './client/message-stream.js';
export { Publisher } from './client/publisher.js';
export { RpcClient, type RpcClientOptions } from './client/rpc-client.js';

// Ambient
export { loadConfig, type BrokerConfig } from './utils/config.js';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './utils/logger.js';
