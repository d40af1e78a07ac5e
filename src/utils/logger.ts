/**
 * Structured Logging with Pino
 */

import { pino, type Logger } from 'pino';
import { config } from '../config/index.js';

const loggerOptions = {
    level: config.logging.level,
    base: { service: 'pricing-agent' },
};

let logger: Logger;

if (config.logging.pretty) {
    logger = pino({
        ...loggerOptions,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    });
} else {
    logger = pino(loggerOptions);
}

export { logger };
export type { Logger };

/**
 * Create a child logger for a single pricing query
 */
export function createQueryLogger(serviceCode: string, executionId?: string): Logger {
    return logger.child({
        serviceCode,
        ...(executionId ? { executionId } : {}),
        operation: 'pricing-query',
    });
}
