// lib/jobs/index.ts
import { redisConnection } from '../redis';
import { pointsLedger } from '../billing/pointsLedger';
import { taskQueue } from '../queue/taskQueue';
import { MongoJobLedger } from './jobLedger';
import { RedisJobStore } from './jobStore';
import { JobTracker } from './jobTracker';
import { JobProducer } from './producer';
import { StatusReader } from './statusReader';

export const jobStore = new RedisJobStore(redisConnection.client);
export const jobLedger = new MongoJobLedger();
export const jobTracker = new JobTracker(jobStore, jobLedger);
export const jobProducer = new JobProducer(taskQueue, jobTracker, pointsLedger);
export const statusReader = new StatusReader(jobTracker, jobLedger);
