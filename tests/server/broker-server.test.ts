import { BrokerServer, createBrokerServer, createListener } from '../../src/server/broker-server.js';
import { SocketListener } from '../../src/transport/socket.js';
import { WebSocketListener } from '../../src/transport/websocket.js';
import { loadConfig } from '../../src/utils/config.js';

describe('createListener', () => {
    it('should pick the listener for the configured transport', () => {
        expect(createListener(loadConfig(['--tcp'], {}))).toBeInstanceOf(SocketListener);
        expect(createListener(loadConfig(['--unix', '/tmp/test.sock'], {}))).toBeInstanceOf(SocketListener);
        expect(createListener(loadConfig(['--ws'], {}))).toBeInstanceOf(WebSocketListener);
    });

    it('should describe the address before start', () => {
        expect(createListener(loadConfig(['--host', '127.0.0.1', '--port', '7000'], {})).address)
            .toBe('tcp://127.0.0.1:7000');
        expect(createListener(loadConfig(['--unix', '/tmp/test.sock'], {})).address)
            .toBe('unix:///tmp/test.sock');
    });
});

describe('BrokerServer', () => {
    it('should build its broker with the configured delivery mode', () => {
        const server = createBrokerServer(loadConfig(['--delivery', 'concurrent'], {}));

        expect(server.broker.delivery).toBe('concurrent');
        expect(server.isRunning).toBe(false);
    });

    it('should start and stop once each', async () => {
        const server = new BrokerServer({ listener: new SocketListener({ kind: 'tcp', host: '127.0.0.1', port: 0 }) });

        await server.start();
        await server.start();
        expect(server.isRunning).toBe(true);

        await server.stop();
        await server.stop();
        expect(server.isRunning).toBe(false);
        expect(server.broker.isStopped).toBe(true);
    });
});
