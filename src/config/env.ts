import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z
        .enum(['development', 'production', 'test'])
        .default('development'),
    CORS_ORIGIN: z.string().default('http://localhost:3000'),
    JWT_SECRET: z.string().default('dev-secret'),

    MONGO_URI: z.string().default('mongodb://localhost:27017/async_jobs'),
    MONGO_DB_NAME: z.string().default('async_jobs'),
    MONGO_MAX_POOL_SIZE: z.coerce.number().int().positive().default(10),
    MONGO_MIN_POOL_SIZE: z.coerce.number().int().nonnegative().default(2),

    REDIS_URL: z.string().default('redis://localhost:6379'),
    REDIS_KEY_PREFIX: z.string().default(''),
    RABBITMQ_URL: z.string().default('amqp://localhost:5672'),

    JOB_STATUS_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
    WORKER_QUEUES: z.string().default(''),
    WORKER_ID: z.string().default(''),
    WORKER_DEQUEUE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    WORKER_IDLE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    WORKER_HEARTBEAT_MS: z.coerce.number().int().positive().default(30000),
    WORKER_STALE_AFTER_MS: z.coerce.number().int().positive().default(600000),

    LOG_LEVEL: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
        .default('info'),
    ENABLE_LOGS: z.string().default('true'),

    STORAGE_PROVIDER: z.enum(['local']).default('local'),
    LOCAL_UPLOAD_DIR: z.string().default(path.join(process.cwd(), 'uploads')),
    PUBLIC_BASE_URL: z.string().default(''),

    LLM_PROVIDER: z.enum(['google', 'anthropic']).default('google'),
    GEMINI_API_KEY: z.string().default(''),
    GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
    GEMINI_TTS_MODEL: z.string().default('gemini-2.5-flash-preview-tts'),
    ANTHROPIC_API_KEY: z.string().default(''),
    ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-5'),
});

export type Env = z.infer<typeof envSchema>;

const env = envSchema.parse(process.env);

export default env;
