// lib/jobs/jobLedger.ts
import { mongo } from 'mongoose';
import { JobModel, type IJob } from '../../models/job';
import { jsonObjectSchema } from '../queue/schema';
import {
    TERMINAL_STATUSES,
    type JobListOptions,
    type JobPage,
    type JobRecord,
    type QueueName,
} from '../../types/job';

/**
 * Durable, non-expiring copy of every job. Written at creation, on the
 * claim into processing, and on terminal transitions.
 */
export interface JobLedger {
    insert(record: JobRecord): Promise<void>;
    /**
     * Overwrites the row with `record` unless the row is already terminal.
     * Returns false when the row was terminal and left as it was.
     */
    mirror(record: JobRecord): Promise<boolean>;
    get(jobId: string): Promise<JobRecord | null>;
    listByUser(userId: string, options: JobListOptions): Promise<JobPage>;
    /**
     * Jobs of `queue` still processing that started before `before`, and
     * jobs still pending that were created before it
     */
    findStale(queue: QueueName, before: Date): Promise<JobRecord[]>;
}

const toDate = (value: string | null): Date | null => (value ? new Date(value) : null);
const toIso = (value: Date | null | undefined): string | null =>
    value ? value.toISOString() : null;

export const toLedgerRow = (record: JobRecord): IJob => ({
    ...record,
    startedAt: toDate(record.startedAt),
    completedAt: toDate(record.completedAt),
    heartbeatAt: toDate(record.heartbeatAt),
    createdAt: new Date(record.createdAt),
    updatedAt: new Date(record.updatedAt),
});

export const fromLedgerRow = (row: IJob): JobRecord => ({
    jobId: row.jobId,
    queue: row.queue,
    userId: row.userId,
    status: row.status,
    unitNoun: row.unitNoun ?? null,
    unitsTotal: row.unitsTotal,
    unitsCompleted: row.unitsCompleted,
    unitsFailed: row.unitsFailed,
    failedUnits: row.failedUnits.map(({ index, label, error }) => ({ index, label, error })),
    currentUnitLabel: row.currentUnitLabel ?? null,
    progressPercentage: row.progressPercentage,
    result: row.result ? jsonObjectSchema.parse(row.result) : null,
    error: row.error ?? null,
    pointsDeducted: row.pointsDeducted,
    cancelRequested: row.cancelRequested,
    workerId: row.workerId ?? null,
    params: jsonObjectSchema.parse(row.params ?? {}),
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
    startedAt: toIso(row.startedAt),
    completedAt: toIso(row.completedAt),
    heartbeatAt: toIso(row.heartbeatAt),
});

const DUPLICATE_KEY = 11000;

export class MongoJobLedger implements JobLedger {
    async insert(record: JobRecord): Promise<void> {
        await JobModel.create(toLedgerRow(record));
    }

    async mirror(record: JobRecord): Promise<boolean> {
        try {
            // Upsert also recovers a row whose insert never landed; a
            // terminal row makes the filter miss and the upsert collide.
            await JobModel.updateOne(
                { jobId: record.jobId, status: { $nin: [...TERMINAL_STATUSES] } },
                { $set: toLedgerRow(record) },
                { upsert: true }
            );
            return true;
        } catch (error) {
            if (error instanceof mongo.MongoServerError && error.code === DUPLICATE_KEY) {
                return false;
            }
            throw error;
        }
    }

    async get(jobId: string): Promise<JobRecord | null> {
        const row = await JobModel.findOne({ jobId }).lean<IJob>();
        return row ? fromLedgerRow(row) : null;
    }

    async listByUser(userId: string, options: JobListOptions): Promise<JobPage> {
        const filter: Record<string, string> = { userId };
        if (options.queue) filter.queue = options.queue;
        for (const [key, value] of Object.entries(options.params ?? {})) {
            filter[`params.${key}`] = value;
        }

        const [rows, total] = await Promise.all([
            JobModel.find(filter)
                .sort({ createdAt: -1 })
                .skip(options.skip)
                .limit(options.limit)
                .lean<IJob[]>(),
            JobModel.countDocuments(filter),
        ]);

        return { jobs: rows.map(fromLedgerRow), total };
    }

    async findStale(queue: QueueName, before: Date): Promise<JobRecord[]> {
        const rows = await JobModel.find({
            queue,
            $or: [
                { status: 'processing', startedAt: { $lt: before } },
                { status: 'pending', createdAt: { $lt: before } },
            ],
        }).lean<IJob[]>();

        return rows.map(fromLedgerRow);
    }
}
