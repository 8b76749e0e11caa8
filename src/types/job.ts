// types/job.ts
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const QUEUE_NAMES = [
    'translation',
    'slide-format',
    'slide-generation',
    'narration-audio',
    'ai-editor',
] as const;

export type QueueName = (typeof QUEUE_NAMES)[number];

export const JOB_STATUSES = [
    'pending',
    'processing',
    'completed',
    'failed',
    'cancelled',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type ActiveJobStatus = Extract<JobStatus, 'pending' | 'processing'>;
export type TerminalJobStatus = Exclude<JobStatus, ActiveJobStatus>;

export const ACTIVE_STATUSES: readonly ActiveJobStatus[] = ['pending', 'processing'];
export const TERMINAL_STATUSES: readonly TerminalJobStatus[] = [
    'completed',
    'failed',
    'cancelled',
];

export const isTerminalStatus = (
    status: JobStatus
): status is TerminalJobStatus => status !== 'pending' && status !== 'processing';

/**
 * What one sub-unit of a job is called on the wire (`chapters_completed`,
 * `failed_slides`, ...). Single-unit jobs have no noun.
 */
export type UnitNoun = 'chapter' | 'slide';

export interface FailedUnit {
    index: number;
    label: string;
    error: string;
}

/**
 * The job record as held in the fast store and mirrored to the ledger.
 */
export interface JobRecord {
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
    result: JsonObject | null;
    error: string | null;
    pointsDeducted: number;
    cancelRequested: boolean;
    workerId: string | null;
    /** Capability-specific request fields echoed back to clients */
    params: JsonObject;
    createdAt: string;
    updatedAt: string;
    startedAt: string | null;
    completedAt: string | null;
    heartbeatAt: string | null;
}

export type JobRecordFields = Partial<Omit<JobRecord, 'jobId'>>;

export interface JobListOptions {
    limit: number;
    skip: number;
    queue?: QueueName;
    /** Exact matches on echo fields, e.g. `{ book_id }` */
    params?: Record<string, string>;
}

export interface JobPage {
    jobs: JobRecord[];
    total: number;
}
