import pino from 'pino';
import type { ILogger } from '@actionindex/types';
import { env } from '../config/env.js';

/**
 * Logger utilities for the action indexer backend.
 *
 * `createLogger()` builds the Pino instance used by bootstrap; `logger` is the
 * process-wide root that modules derive `child({ module })` loggers from. The
 * normalizer core never imports this file: it receives an `ILogger` from its
 * caller.
 */

function resolveLevel(): pino.LevelWithSilent {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    if (env.NODE_ENV === 'test') {
        return 'silent';
    }
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Creates a Pino logger instance with the standard backend configuration.
 *
 * Production writes newline-delimited JSON to stdout for the log shipper.
 * Every other environment except `test` goes through `pino-pretty` with
 * colorized, human-readable output. Tests get a plain silent logger so no
 * transport worker is started.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const options: pino.LoggerOptions = {
        level: resolveLevel(),
        base: {
            service: 'actionindex-backend'
        }
    };

    if (env.NODE_ENV === 'production' || env.NODE_ENV === 'test') {
        return pino(options);
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return pino(options, transport);
}

/**
 * Application logger root.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info('Scheduler started');
 * logger.error({ error }, 'Failed to connect');
 */
export const logger: ILogger = createLogger();
