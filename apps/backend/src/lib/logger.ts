import pino from 'pino';
import { mkdirSync } from 'fs';
import type { ILogger } from '@plugcat/types';
import { env } from '../config/env.js';

/**
 * Logger utilities for the plugin catalog backend.
 *
 * Services never import this module directly; they receive an `ILogger` through
 * their constructor or module dependencies and derive child loggers from it.
 * Only the bootstrap and loaders use the singleton below.
 *
 * @example
 * ```typescript
 * import { logger } from './lib/logger.js';
 *
 * logger.info('Starting plugin catalog sync...');
 * const moduleLogger = logger.child({ module: 'plugins' });
 * moduleLogger.warn({ entryName }, 'could not read file contents');
 * ```
 */

/**
 * Resolve the active log level.
 *
 * An explicit LOG_LEVEL wins; otherwise production logs `info` and above and
 * every other environment logs `debug` and above.
 */
function resolveLevel(): pino.LevelWithSilent {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Creates a Pino logger instance with the standard backend configuration.
 *
 * Writes to both `.run/backend.log` (`pino/file`) and stdout (`pino-pretty`).
 * Under NODE_ENV=test no transport worker is started and the logger is silent
 * unless LOG_LEVEL asks for output.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const base = { service: 'plugin-catalog' };

    if (env.NODE_ENV === 'test') {
        return pino({ level: env.LOG_LEVEL ?? 'silent', base });
    }

    // Ensure .run directory exists before the file transport opens its destination
    try {
        mkdirSync('.run', { recursive: true });
    } catch (err) {
        console.error('Warning: Could not create .run directory:', err);
    }

    const level = resolveLevel();
    const targets: pino.TransportTargetOptions[] = [
        {
            level,
            target: 'pino/file',
            options: { destination: '.run/backend.log' }
        },
        {
            level,
            target: 'pino-pretty',
            options: {
                colorize: true,
                singleLine: false,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
    ];

    const transport = pino.transport({ targets });

    return pino({ level, base }, transport);
}

/**
 * Application logger singleton.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info('Server started');
 * logger.error({ error }, 'Failed to connect');
 */
export const logger: ILogger = createLogger();
