/**
 * Structured Logging with Pino
 * Everything goes to stderr so stdout only carries command output
 */

import pino, { type Logger } from 'pino';
import { config } from '../config/index.js';

// Create logger
const loggerOptions = {
    level: config.logging.level,
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
                destination: 2,
            },
        },
    });
} else {
    logger = pino(loggerOptions, pino.destination(2));
}

export { logger };

/**
 * Raise verbosity at runtime (the CLI's --debug flag)
 */
export function setLogLevel(level: string): void {
    logger.level = level;
}

/**
 * Create a child logger for one tariff's charge calculation
 */
export function createTariffLogger(productCode: string, tariffCode: string): Logger {
    return logger.child({ product: productCode, tariff: tariffCode });
}

/**
 * Create a child logger for API calls
 */
export function createApiLogger(endpoint: string): Logger {
    return logger.child({ endpoint, operation: 'api' });
}
