// lib/jobs/producer.ts
import { v4 as uuidv4 } from 'uuid';
import { jobIdPrefix } from '../../config/pricing';
import type { CostLedger } from '../../types/collaborators';
import type { JobRecord, JsonObject, QueueName, UnitNoun } from '../../types/job';
import type { PayloadFor, Task, TaskQueue } from '../../types/queue';
import { APIError } from '../APIError';
import Helpers from '../helpers';
import { createLogger } from '../logger';
import { DuplicateJobError, type JobTracker } from './jobTracker';

const logger = createLogger('job-producer');

/** Queue name paired with that queue's payload, one member per capability */
export type TaskBody = {
    [Q in QueueName]: { queue: Q; payload: PayloadFor<Q> };
}[QueueName];

export interface SubmitRequest {
    userId: string;
    body: TaskBody;
    unitNoun: UnitNoun | null;
    /** Units known at accept time; the worker may refine it once it opens the source */
    unitsTotal: number;
    cost: number;
    /** Request fields echoed back in every snapshot */
    params: JsonObject;
}

export const newJobId = (queue: QueueName): string =>
    `${jobIdPrefix[queue]}_${uuidv4().replace(/-/g, '').slice(0, 12)}`;

/**
 * Accepts work: precondition, cost, job record, task. Answers as soon as the
 * task is handed to the queue.
 */
export class JobProducer {
    constructor(
        private readonly queue: TaskQueue,
        private readonly tracker: JobTracker,
        private readonly costLedger: CostLedger,
        private readonly now: () => Date = () => new Date()
    ) {}

    async submit(request: SubmitRequest): Promise<JobRecord> {
        const { userId, body, cost } = request;

        if (request.unitsTotal < 1) {
            throw new APIError({
                code: 400,
                errorCode: 'NOTHING_TO_PROCESS',
                message: 'Nothing to process',
            });
        }

        const jobId = newJobId(body.queue);

        const reservation = await this.costLedger.reserve(userId, cost, {
            service: body.queue,
            jobId,
        });
        if (!reservation.ok) {
            throw new APIError({
                code: 402,
                errorCode: 'INSUFFICIENT_POINTS',
                message: `Not enough points. Required: ${cost}, available: ${reservation.balance}`,
                data: { required: cost, balance: reservation.balance },
            });
        }

        const createdAt = this.now().toISOString();
        const record: JobRecord = {
            jobId,
            queue: body.queue,
            userId,
            status: 'pending',
            unitNoun: request.unitNoun,
            unitsTotal: request.unitsTotal,
            unitsCompleted: 0,
            unitsFailed: 0,
            failedUnits: [],
            currentUnitLabel: null,
            progressPercentage: 0,
            result: null,
            error: null,
            pointsDeducted: cost,
            cancelRequested: false,
            workerId: null,
            params: request.params,
            createdAt,
            updatedAt: createdAt,
            startedAt: null,
            completedAt: null,
            heartbeatAt: null,
        };

        try {
            await this.tracker.create(record);
        } catch (error) {
            if (error instanceof DuplicateJobError) throw error;
            await this.failUnqueued(jobId, `Could not record job: ${Helpers.errorMessage(error)}`);
            throw new APIError({
                code: 503,
                errorCode: 'JOB_STORE_UNAVAILABLE',
                message: 'Job store is unavailable, please try again later',
                data: { job_id: jobId },
            });
        }

        const task: Task = {
            ...body,
            taskId: uuidv4(),
            jobId,
            userId,
            enqueuedAt: createdAt,
        };

        let enqueued = false;
        let reason = 'queue refused the task';
        try {
            enqueued = await this.queue.enqueue(task);
        } catch (error) {
            reason = Helpers.errorMessage(error);
        }

        if (!enqueued) {
            await this.failUnqueued(jobId, `Could not enqueue task: ${reason}`);
            throw new APIError({
                code: 503,
                errorCode: 'QUEUE_UNAVAILABLE',
                message: 'Job queue is unavailable, please try again later',
                data: { job_id: jobId },
            });
        }

        logger.info({ jobId, queue: body.queue, userId, cost }, 'Job accepted');
        return record;
    }

    /** No task will ever run this job, so it ends here */
    private async failUnqueued(jobId: string, error: string): Promise<void> {
        logger.error({ jobId, error }, 'Job could not be queued');
        await this.tracker
            .finalize(jobId, 'failed', { error }, ['pending'])
            .catch((finalizeError: unknown) => {
                logger.error(
                    { jobId, error: Helpers.errorMessage(finalizeError) },
                    'Could not mark unqueued job failed'
                );
                return null;
            });
    }
}
