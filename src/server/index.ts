#!/usr/bin/env node
/**
 * topic-broker - CLI entry point
 *
 *   topic-broker [--tcp | --unix [path] | --ws] [--host h] [--port p]
 *                [--delivery sequential|concurrent] [--log-level level]
 *
 * See ../utils/config.ts for the matching environment variables.
 */

import { getErrorMessage, createLogger, setLogLevel } from '../utils/logger.js';
import { loadConfig } from '../utils/config.js';
import { createBrokerServer, type BrokerServer } from './broker-server.js';

const log = createLogger('Main');

/**
 * Stop the server once on the first signal or fatal error, then exit.
 */
function setupShutdownHandlers(server: BrokerServer): void {
    let isShuttingDown = false;

    const shutdown = (signal: string, exitCode: number) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        log.info(`Received ${signal}, shutting down gracefully...`);
        server.stop().then(
            () => {
                log.info('Shutdown complete');
                process.exit(exitCode);
            },
            (error: unknown) => {
                log.error(`Error during shutdown: ${getErrorMessage(error)}`);
                process.exit(1);
            }
        );
    };

    process.on('SIGINT', () => shutdown('SIGINT', 0));
    process.on('SIGTERM', () => shutdown('SIGTERM', 0));
    process.on('SIGHUP', () => shutdown('SIGHUP', 0));

    if (process.platform === 'win32') {
        process.on('SIGBREAK', () => shutdown('SIGBREAK', 0));
    }

    process.on('uncaughtException', (error) => {
        log.error('Uncaught exception:', error);
        shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
        log.error('Unhandled rejection:', reason);
        shutdown('unhandledRejection', 1);
    });
}

async function main(): Promise<void> {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const server = createBrokerServer(config);
    setupShutdownHandlers(server);
    await server.start();
}

main().catch((error: unknown) => {
    log.error(`Fatal: ${getErrorMessage(error)}`);
    process.exit(1);
});
