/**
 * Broker configuration from command-line flags and environment.
 *
 * Flags win over environment variables, which win over defaults:
 *
 *   --tcp | --unix [path] | --ws     BROKER_TRANSPORT=tcp|unix|websocket
 *   --host <host>                    BROKER_HOST      (default 0.0.0.0)
 *   --port <port>                    BROKER_PORT      (default 50051 tcp, 50052 ws)
 *   --socket <path>                  BROKER_SOCKET    (default /tmp/topic-broker.sock)
 *   --delivery sequential|concurrent BROKER_DELIVERY  (default sequential)
 *   --log-level <level>              BROKER_LOG_LEVEL (default info)
 */

import { z } from 'zod';

import { ConfigError } from '../engine/errors.js';
import { DELIVERY_MODES } from '../engine/fanout.js';
import { LOG_LEVELS } from './logger.js';

export const TransportKindSchema = z.enum(['tcp', 'unix', 'websocket']);
export type TransportKind = z.infer<typeof TransportKindSchema>;

export const DEFAULT_PORTS: Record<Exclude<TransportKind, 'unix'>, number> = {
    tcp: 50051,
    websocket: 50052
};

export const DEFAULT_SOCKET_PATH = process.platform === 'win32'
    ? '\\\\.\\pipe\\topic-broker'
    : '/tmp/topic-broker.sock';

export const BrokerConfigSchema = z.object({
    transport: TransportKindSchema,
    host: z.string().min(1),
    port: z.coerce.number().int().min(0).max(65535),
    socketPath: z.string().min(1),
    delivery: z.enum(DELIVERY_MODES),
    logLevel: z.enum(LOG_LEVELS)
});

export type BrokerConfig = z.infer<typeof BrokerConfigSchema>;

function flagValue(args: readonly string[], ...names: string[]): string | undefined {
    for (const name of names) {
        const index = args.indexOf(name);
        const value = index !== -1 ? args[index + 1] : undefined;
        if (value !== undefined && !value.startsWith('--')) {
            return value;
        }
    }
    return undefined;
}

function transportFromArgs(args: readonly string[]): TransportKind | undefined {
    if (args.includes('--unix') || args.includes('--socket')) return 'unix';
    if (args.includes('--ws') || args.includes('--websocket')) return 'websocket';
    if (args.includes('--tcp')) return 'tcp';
    return undefined;
}

/**
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(
    args: readonly string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env
): BrokerConfig {
    const transport = transportFromArgs(args) ?? env.BROKER_TRANSPORT?.toLowerCase() ?? 'tcp';
    const defaultPort = transport === 'websocket' ? DEFAULT_PORTS.websocket : DEFAULT_PORTS.tcp;

    const parsed = BrokerConfigSchema.safeParse({
        transport,
        host: flagValue(args, '--host') ?? env.BROKER_HOST ?? '0.0.0.0',
        port: flagValue(args, '--port') ?? env.BROKER_PORT ?? defaultPort,
        socketPath: flagValue(args, '--unix', '--socket') ?? env.BROKER_SOCKET ?? DEFAULT_SOCKET_PATH,
        delivery: flagValue(args, '--delivery') ?? env.BROKER_DELIVERY?.toLowerCase() ?? 'sequential',
        logLevel: flagValue(args, '--log-level') ?? env.BROKER_LOG_LEVEL?.toLowerCase() ?? 'info'
    });

    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid broker configuration: ${problems}`);
    }
    return parsed.data;
}
