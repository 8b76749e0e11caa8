import { randomUUID } from 'crypto';
import os from 'os';
import { createWorker } from './capabilities';
import { queueConfig } from './config/queue';
import { bookRepository } from './lib/books/bookRepository';
import database from './lib/database';
import Helpers from './lib/helpers';
import { jobTracker } from './lib/jobs';
import type { WorkerRunner } from './lib/jobs/workerHarness';
import { createLogger } from './lib/logger';
import { rabbitMQConnection } from './lib/queue/connection';
import { taskQueue } from './lib/queue/taskQueue';
import { redisConnection } from './lib/redis';
import { blobStore } from './lib/storage';
import { LLMProviderFactory } from './provider/LLMProviderFactory';

const logger = createLogger('worker-process');

const workerId = queueConfig.worker.id || `${os.hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;

const main = async () => {
    try {
        await database.connect();
        await redisConnection.connect();
        await rabbitMQConnection.connect();

        const runners: WorkerRunner[] = queueConfig.worker.queues.map((queue) =>
            createWorker(queue, {
                taskQueue,
                tracker: jobTracker,
                books: bookRepository,
                blobStore,
                textModel: () => LLMProviderFactory.createDefault(),
                speechModel: () => LLMProviderFactory.createSpeech(),
                workerId,
            })
        );

        await Promise.all(runners.map((runner) => runner.start()));
        logger.info({ workerId, queues: runners.map((runner) => runner.queue) }, 'Workers running');

        let stopping = false;
        const shutdown = (signal: string) => {
            if (stopping) return;
            stopping = true;
            logger.info({ signal }, 'Stopping workers after the current jobs');

            Promise.all(runners.map((runner) => runner.stop()))
                .then(async () => {
                    await rabbitMQConnection.close();
                    await redisConnection.disconnect();
                    await database.disconnect();
                    process.exit(0);
                })
                .catch((error: unknown) => {
                    logger.error({ error: Helpers.errorMessage(error) }, 'Error during shutdown');
                    process.exit(1);
                });
        };

        process.on('SIGTERM', () => shutdown('SIGTERM'));
        process.on('SIGINT', () => shutdown('SIGINT'));
    } catch (error) {
        logger.fatal({ error: Helpers.errorMessage(error) }, 'Failed to start worker');
        process.exit(1);
    }
};

void main();
