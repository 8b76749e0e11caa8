// lib/jobs/snapshot.ts
import type {
    FailedUnit,
    JobRecord,
    JobStatus,
    JsonObject,
    QueueName,
    UnitNoun,
} from '../../types/job';

/** Average seconds per unit, for the remaining-time estimate */
export const SECONDS_PER_UNIT_ESTIMATE = 60;

export type FailedUnitView = {
    index: number;
    label: string;
    error: string;
};

export type BaseSnapshot = {
    job_id: string;
    job_type: QueueName;
    status: JobStatus;
    user_id: string;
    progress_percentage: number;
    units_total: number;
    units_completed: number;
    units_failed: number;
    current_unit_label: string | null;
    failed_units: FailedUnitView[];
    estimated_time_remaining_seconds: number | null;
    result: JsonObject | null;
    error: string | null;
    points_deducted: number;
    cancel_requested: boolean;
    created_at: string;
    started_at: string | null;
    completed_at: string | null;
    updated_at: string;
};

/**
 * Unit-named copies of the progress fields: `chapters_total`,
 * `current_chapter_title`, `failed_slides`, ...
 */
export type UnitAliases<N extends UnitNoun> = {
    [K in `${N}s_total` | `${N}s_completed` | `${N}s_failed`]: number;
} & {
    [K in `current_${N}_title`]: string | null;
} & {
    [K in `failed_${N}s`]: FailedUnitView[];
};

export type JobSnapshot = BaseSnapshot &
    Partial<UnitAliases<'chapter'>> &
    Partial<UnitAliases<'slide'>> & {
        [echo: string]: unknown;
    };

const failedView = (failed: FailedUnit[]): FailedUnitView[] =>
    failed.map(({ index, label, error }) => ({ index, label, error }));

function unitAliases(
    record: JobRecord
): UnitAliases<'chapter'> | UnitAliases<'slide'> | Record<never, never> {
    const failed = failedView(record.failedUnits);

    switch (record.unitNoun) {
        case 'chapter':
            return {
                chapters_total: record.unitsTotal,
                chapters_completed: record.unitsCompleted,
                chapters_failed: record.unitsFailed,
                current_chapter_title: record.currentUnitLabel,
                failed_chapters: failed,
            };
        case 'slide':
            return {
                slides_total: record.unitsTotal,
                slides_completed: record.unitsCompleted,
                slides_failed: record.unitsFailed,
                current_slide_title: record.currentUnitLabel,
                failed_slides: failed,
            };
        default:
            return {};
    }
}

function estimateRemaining(record: JobRecord): number | null {
    if (record.unitNoun === null) return null;
    if (record.status !== 'pending' && record.status !== 'processing') return 0;

    const remaining = Math.max(
        0,
        record.unitsTotal - record.unitsCompleted - record.unitsFailed
    );
    return remaining * SECONDS_PER_UNIT_ESTIMATE;
}

/**
 * The normalized shape clients poll, whatever the capability. Echo fields
 * from `params` never shadow status fields.
 */
export function toSnapshot(record: JobRecord): JobSnapshot {
    const base: BaseSnapshot = {
        job_id: record.jobId,
        job_type: record.queue,
        status: record.status,
        user_id: record.userId,
        progress_percentage: record.progressPercentage,
        units_total: record.unitsTotal,
        units_completed: record.unitsCompleted,
        units_failed: record.unitsFailed,
        current_unit_label: record.currentUnitLabel,
        failed_units: failedView(record.failedUnits),
        estimated_time_remaining_seconds: estimateRemaining(record),
        result: record.result,
        error: record.error,
        points_deducted: record.pointsDeducted,
        cancel_requested: record.cancelRequested,
        created_at: record.createdAt,
        started_at: record.startedAt,
        completed_at: record.completedAt,
        updated_at: record.updatedAt,
    };

    const snapshot: JobSnapshot = { ...base, ...unitAliases(record) };
    for (const [key, value] of Object.entries(record.params)) {
        if (!(key in snapshot)) snapshot[key] = value;
    }
    return snapshot;
}
