import { Redis } from 'ioredis';
import { redisConfig } from '../config/redis';
import Helpers from './helpers';
import { createLogger } from './logger';

const logger = createLogger('redis');

/**
 * Redis connection holder for the job status store
 */
class RedisConnection {
    readonly client: Redis;

    constructor() {
        this.client = new Redis(redisConfig.url, redisConfig.options);

        this.client.on('error', (error: Error) => {
            logger.error({ error: error.message }, 'Redis error');
        });
        this.client.on('reconnecting', () => {
            logger.warn('Redis reconnecting');
        });
    }

    async connect(): Promise<void> {
        if (this.client.status === 'ready' || this.client.status === 'connecting') {
            return;
        }
        await this.client.connect();
        logger.info({ url: redisConfig.url.replace(/:([^@/]+)@/, ':****@') }, 'Redis connected');
    }

    async disconnect(): Promise<void> {
        if (this.client.status === 'end') return;
        try {
            await this.client.quit();
            logger.info('Redis disconnected gracefully');
        } catch (error) {
            logger.error({ error: Helpers.errorMessage(error) }, 'Error closing Redis');
            this.client.disconnect(false);
        }
    }

    async healthCheck(): Promise<{ healthy: boolean; status: string }> {
        try {
            const pong = await this.client.ping();
            return { healthy: pong === 'PONG', status: this.client.status };
        } catch {
            return { healthy: false, status: this.client.status };
        }
    }
}

// Singleton instance
export const redisConnection = new RedisConnection();
