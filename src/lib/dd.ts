// lib/dd.ts
// Request-level debug tracing, switched off with ENABLE_LOGS=false.
import env from '../config/env';
import { createLogger } from './logger';

const logger = createLogger('debug');
const enabled = env.ENABLE_LOGS === 'true';

export const ddl = (message: string, ...details: unknown[]): void => {
    if (!enabled) return;
    if (details.length === 0) {
        logger.debug(message);
        return;
    }
    logger.debug({ details: details.length === 1 ? details[0] : details }, message);
};
