import { statusReader } from '../../lib/jobs';
import { toSnapshot, type JobSnapshot } from '../../lib/jobs/snapshot';
import type { StatusReader } from '../../lib/jobs/statusReader';
import type { JobListOptions, JobRecord, QueueName } from '../../types/job';

export interface CancelView {
    job_id: string;
    status: JobRecord['status'];
    cancel_requested: boolean;
}

export interface SnapshotPage {
    jobs: JobSnapshot[];
    total: number;
}

/**
 * Status, cancel and history reads shared by the generic and the
 * per-capability job routes
 */
export class JobsService {
    constructor(private readonly reader: StatusReader) {}

    async getJob(userId: string, jobId: string, queue?: QueueName): Promise<JobSnapshot> {
        return toSnapshot(await this.reader.get(jobId, userId, queue));
    }

    async cancelJob(userId: string, jobId: string, queue?: QueueName): Promise<CancelView> {
        const record = await this.reader.cancel(jobId, userId, queue);
        return {
            job_id: record.jobId,
            status: record.status,
            cancel_requested: record.cancelRequested,
        };
    }

    async listJobs(userId: string, options: JobListOptions): Promise<SnapshotPage> {
        const page = await this.reader.list(userId, options);
        return { jobs: page.jobs.map(toSnapshot), total: page.total };
    }
}

export const pageMeta = (options: { limit: number; skip: number }, total: number) => ({
    page: Math.floor(options.skip / options.limit) + 1,
    limit: options.limit,
    total,
});

export const jobsService = new JobsService(statusReader);
