// config/queue.ts
import env from './env';
import { QUEUE_NAMES, type QueueName, type TerminalJobStatus } from '../types/job';

export interface CapabilityQueueConfig {
    name: string;
    routingKey: string;
    durable: boolean;
    /** Attempts per sub-unit before it is recorded as failed */
    unitRetryAttempts: number;
    /** Base delay for exponential backoff between sub-unit attempts */
    unitRetryDelayMs: number;
    /** Per-call limit on the external collaborator; 0 disables it */
    unitTimeoutMs: number;
    /** Final status when every sub-unit failed */
    allUnitsFailedStatus: Extract<TerminalJobStatus, 'completed' | 'failed'>;
}

// One queue per capability so worker pools scale independently
const queues: Record<QueueName, CapabilityQueueConfig> = {
    translation: {
        name: 'jobs.translation',
        routingKey: 'jobs.translation',
        durable: true,
        unitRetryAttempts: 3,
        unitRetryDelayMs: 2000,
        unitTimeoutMs: 5 * 60 * 1000,
        allUnitsFailedStatus: 'failed',
    },
    'slide-format': {
        name: 'jobs.slide-format',
        routingKey: 'jobs.slide-format',
        durable: true,
        unitRetryAttempts: 3,
        unitRetryDelayMs: 1000,
        unitTimeoutMs: 2 * 60 * 1000,
        allUnitsFailedStatus: 'failed',
    },
    'slide-generation': {
        name: 'jobs.slide-generation',
        routingKey: 'jobs.slide-generation',
        durable: true,
        unitRetryAttempts: 3,
        unitRetryDelayMs: 2000,
        unitTimeoutMs: 3 * 60 * 1000,
        allUnitsFailedStatus: 'failed',
    },
    'narration-audio': {
        name: 'jobs.narration-audio',
        routingKey: 'jobs.narration-audio',
        durable: true,
        unitRetryAttempts: 3,
        unitRetryDelayMs: 3000,
        unitTimeoutMs: 2 * 60 * 1000,
        allUnitsFailedStatus: 'failed',
    },
    'ai-editor': {
        name: 'jobs.ai-editor',
        routingKey: 'jobs.ai-editor',
        durable: true,
        unitRetryAttempts: 2,
        unitRetryDelayMs: 1000,
        unitTimeoutMs: 2 * 60 * 1000,
        allUnitsFailedStatus: 'failed',
    },
};

export const queueConfig = {
    rabbitmq: {
        url: env.RABBITMQ_URL,
        heartbeat: 60,
        reconnectDelay: 5000,
        maxReconnectAttempts: 10,
    },

    exchange: {
        name: 'jobs',
        type: 'direct' as const,
        durable: true,
    },

    queues,

    deadLetter: {
        exchange: 'jobs_dlx',
        queue: 'jobs.failed',
        routingKey: 'jobs.failed',
    },

    // Undelivered tasks older than this are dead-lettered
    messageTtlMs: 24 * 60 * 60 * 1000,

    worker: {
        id: env.WORKER_ID,
        queues: parseWorkerQueues(env.WORKER_QUEUES),
        dequeueTimeoutMs: env.WORKER_DEQUEUE_TIMEOUT_MS,
        idleDelayMs: env.WORKER_IDLE_DELAY_MS,
        heartbeatMs: env.WORKER_HEARTBEAT_MS,
        staleAfterMs: env.WORKER_STALE_AFTER_MS,
    },
};

export function parseWorkerQueues(value: string): QueueName[] {
    const requested = value
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0);

    if (requested.length === 0) {
        return [...QUEUE_NAMES];
    }

    return requested.map((name) => {
        const match = QUEUE_NAMES.find((queue) => queue === name);
        if (!match) {
            throw new Error(`Unknown worker queue "${name}"`);
        }
        return match;
    });
}
