import pino, { type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from './config';

export type { Logger };

/**
 * pino options shared by the fastify request logger and the engine logger
 */
export const loggerOptions = (config: Pick<AppConfig, 'logLevel' | 'prettyLogs'>): LoggerOptions => {
    if (!config.prettyLogs) {
        return { level: config.logLevel };
    }
    return {
        level: config.logLevel,
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                ignore: "pid,hostname",
                translateTime: "SYS:dd-mm-yyyy HH:MM:ss"
            }
        }
    };
}

export const createLogger = (config: Pick<AppConfig, 'logLevel' | 'prettyLogs'>): Logger => pino(loggerOptions(config));

/** Logger that discards everything, for tests and embedded use */
export const silentLogger = (): Logger => pino({ level: 'silent' });
