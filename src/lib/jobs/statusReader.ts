// lib/jobs/statusReader.ts
import type { JobListOptions, JobPage, JobRecord, QueueName } from '../../types/job';
import { APIError } from '../APIError';
import type { JobLedger } from './jobLedger';
import type { JobTracker } from './jobTracker';

const notFound = () =>
    new APIError({ code: 404, errorCode: 'JOB_NOT_FOUND', message: 'Job not found' });

/**
 * Poll, cancel and list for job owners. Someone else's job is reported as
 * missing rather than forbidden.
 */
export class StatusReader {
    constructor(
        private readonly tracker: JobTracker,
        private readonly ledger: JobLedger
    ) {}

    async get(jobId: string, userId: string, queue?: QueueName): Promise<JobRecord> {
        const record = await this.tracker.get(jobId);
        if (!record || record.userId !== userId) throw notFound();
        if (queue && record.queue !== queue) throw notFound();
        return record;
    }

    async cancel(jobId: string, userId: string, queue?: QueueName): Promise<JobRecord> {
        await this.get(jobId, userId, queue);

        const cancel = await this.tracker.requestCancel(jobId);
        switch (cancel.outcome) {
            case 'missing':
                throw notFound();
            case 'finished':
                throw new APIError({
                    code: 400,
                    errorCode: 'JOB_ALREADY_FINISHED',
                    message: `Cannot cancel a job that is already ${cancel.record.status}`,
                });
            case 'cancelled':
            case 'requested':
                return cancel.record;
        }
    }

    async list(userId: string, options: JobListOptions): Promise<JobPage> {
        return this.ledger.listByUser(userId, options);
    }
}
