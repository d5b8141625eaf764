/**
 * Library-wide pino root. Every module takes a child tagged with its
 * `context` (Dispatcher, Rest, Server, ...) so a single interaction can be
 * followed across components by `interactionId`.
 *
 * The root reads LOG_LEVEL and NODE_ENV once, when the library is first
 * imported; hosts that validate their environment should do so before that
 * import. NODE_ENV=development switches to pino-pretty.
 */

import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger };

export function loggerOptions(env: NodeJS.ProcessEnv): LoggerOptions {
    const options: LoggerOptions = { level: env.LOG_LEVEL || 'info' };
    if (env.NODE_ENV === 'development') {
        options.transport = {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
        };
    }
    return options;
}

const root = pino(loggerOptions(process.env));

export function createLogger(context: string): Logger {
    return root.child({ context });
}
