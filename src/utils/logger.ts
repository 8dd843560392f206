/**
 * Logger - leveled stderr logging for the broker and its clients
 *
 * Every module takes a prefixed logger from createLogger(). Output goes to
 * stderr so a client process piping stdout stays clean.
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const log = createLogger('FanOut');
 *
 *   log.debug('snapshot taken');  // only with BROKER_LOG_LEVEL=debug
 *   log.warn('delivery failed');
 *
 * Environment:
 *   BROKER_LOG_LEVEL=debug|info|warn|error|silent (default: info)
 *   NODE_ENV=test silences output unless BROKER_LOG_LEVEL is set
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;

    /** Create a child logger, prefix joined with ':' */
    child(prefix: string): Logger;

    isEnabled(level: LogLevel): boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOG LEVEL CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

export function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVEL_PRIORITY;
}

function getConfiguredLevel(): LogLevel {
    const envLevel = process.env.BROKER_LOG_LEVEL?.toLowerCase();

    if (envLevel && isLogLevel(envLevel)) {
        return envLevel;
    }

    if (process.env.NODE_ENV === 'test') {
        return 'silent';
    }

    return 'info';
}

let configuredLevel: LogLevel | null = null;

function getLevel(): LogLevel {
    if (configuredLevel === null) {
        configuredLevel = getConfiguredLevel();
    }
    return configuredLevel;
}

/**
 * Drop the cached level so the next log call re-reads the environment
 */
export function resetLogLevel(): void {
    configuredLevel = null;
}

export function setLogLevel(level: LogLevel): void {
    configuredLevel = level;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

class StderrLogger implements Logger {
    constructor(private readonly prefix: string) {}

    isEnabled(level: LogLevel): boolean {
        if (level === 'silent') return false;
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLevel()];
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
        if (!this.isEnabled(level)) return;
        const timestamp = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
        const levelTag = level.toUpperCase().padEnd(5);
        console.error(`[${timestamp}] [${levelTag}] [${this.prefix}] ${message}`, ...args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.write('debug', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.write('info', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.write('warn', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.write('error', message, args);
    }

    child(prefix: string): Logger {
        return new StderrLogger(`${this.prefix}:${prefix}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * @example
 * const log = createLogger('Registry');
 * log.info('subscriber registered');
 * // Output: [12:34:56.789] [INFO ] [Registry] subscriber registered
 */
export function createLogger(prefix: string): Logger {
    return new StderrLogger(prefix);
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Logs the elapsed time at debug level when done() is called
 */
export function createTimer(logger: Logger): { done: (message: string) => void } {
    const start = performance.now();
    return {
        done(message: string): void {
            const duration = performance.now() - start;
            logger.debug(`${message} (${duration.toFixed(2)}ms)`);
        }
    };
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return String(error);
}

/**
 * Log an error, with its stack trace when debug output is on
 */
export function logError(logger: Logger, message: string, error: unknown): void {
    logger.error(`${message}: ${getErrorMessage(error)}`);

    if (error instanceof Error && error.stack && logger.isEnabled('debug')) {
        logger.debug(`Stack trace:\n${error.stack}`);
    }
}
