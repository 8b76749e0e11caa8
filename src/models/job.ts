// models/job.ts
import { Schema, model } from 'mongoose';
import {
    JOB_STATUSES,
    QUEUE_NAMES,
    type FailedUnit,
    type JobStatus,
    type QueueName,
    type UnitNoun,
} from '../types/job';

export interface IJob {
    jobId: string;
    queue: QueueName;
    userId: string;
    status: JobStatus;
    unitNoun: UnitNoun | null;
    unitsTotal: number;
    unitsCompleted: number;
    unitsFailed: number;
    failedUnits: FailedUnit[];
    currentUnitLabel: string | null;
    progressPercentage: number;
    // Mixed; narrowed to JSON when read back
    result: Record<string, unknown> | null;
    error: string | null;
    pointsDeducted: number;
    cancelRequested: boolean;
    workerId: string | null;
    params: Record<string, unknown>;
    startedAt: Date | null;
    completedAt: Date | null;
    heartbeatAt: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

const failedUnitSchema = new Schema<FailedUnit>(
    {
        index: { type: Number, required: true },
        label: { type: String, required: true },
        error: { type: String, required: true },
    },
    { _id: false }
);

const jobSchema = new Schema<IJob>(
    {
        jobId: {
            type: String,
            required: true,
            unique: true,
            index: true,
        },
        queue: {
            type: String,
            enum: QUEUE_NAMES,
            required: true,
        },
        userId: {
            type: String,
            required: true,
        },
        status: {
            type: String,
            enum: JOB_STATUSES,
            default: 'pending',
        },
        unitNoun: {
            type: String,
            enum: ['chapter', 'slide', null],
            default: null,
        },
        unitsTotal: { type: Number, default: 0 },
        unitsCompleted: { type: Number, default: 0 },
        unitsFailed: { type: Number, default: 0 },
        failedUnits: { type: [failedUnitSchema], default: [] },
        currentUnitLabel: { type: String, default: null },
        progressPercentage: {
            type: Number,
            default: 0,
            min: 0,
            max: 100,
        },
        result: { type: Schema.Types.Mixed, default: null },
        error: { type: String, default: null },
        pointsDeducted: { type: Number, default: 0 },
        cancelRequested: { type: Boolean, default: false },
        workerId: { type: String, default: null },
        params: { type: Schema.Types.Mixed, default: {} },
        startedAt: { type: Date, default: null },
        completedAt: { type: Date, default: null },
        heartbeatAt: { type: Date, default: null },
        // Copied from the job record rather than stamped by mongoose
        createdAt: { type: Date, required: true },
        updatedAt: { type: Date, required: true },
    },
    {
        timestamps: false,
        minimize: false,
    }
);

// Compound indexes
jobSchema.index({ userId: 1, createdAt: -1 });
jobSchema.index({ userId: 1, queue: 1, createdAt: -1 });
jobSchema.index({ queue: 1, status: 1, startedAt: 1 });
jobSchema.index({ queue: 1, status: 1, createdAt: 1 });

export const JobModel = model<IJob>('Job', jobSchema, 'jobs');
