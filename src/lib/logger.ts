import pino from 'pino';
import env from '../config/env';

/**
 * Logger factory - creates structured logger instances
 */
export function createLogger(serviceName: string) {
    return pino({
        name: serviceName,
        level: env.LOG_LEVEL,
        formatters: {
            level: (label) => {
                return { level: label };
            },
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}

export type Logger = ReturnType<typeof createLogger>;
