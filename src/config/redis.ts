// config/redis.ts
import type { RedisOptions } from 'ioredis';
import env from './env';

export const redisConfig = {
    url: env.REDIS_URL,
    options: {
        keyPrefix: env.REDIS_KEY_PREFIX || undefined,
        lazyConnect: true,
        maxRetriesPerRequest: 3,
        enableReadyCheck: true,
        connectTimeout: 10000,
    } satisfies RedisOptions,

    // Job status hashes slide this TTL forward on every write
    jobStatusTtlSeconds: env.JOB_STATUS_TTL_SECONDS,
    jobKeyPrefix: 'job:',
};
