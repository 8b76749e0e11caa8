// lib/jobs/jobRecord.ts
import { z } from 'zod';
import { jsonObjectSchema } from '../queue/schema';
import {
    JOB_STATUSES,
    QUEUE_NAMES,
    type JobRecord,
} from '../../types/job';

export const failedUnitSchema = z.object({
    index: z.number().int(),
    label: z.string(),
    error: z.string(),
});

export const jobRecordSchema = z.object({
    jobId: z.string().min(1),
    queue: z.enum(QUEUE_NAMES),
    userId: z.string().min(1),
    status: z.enum(JOB_STATUSES),
    unitNoun: z.enum(['chapter', 'slide']).nullable(),
    unitsTotal: z.number().int().nonnegative(),
    unitsCompleted: z.number().int().nonnegative(),
    unitsFailed: z.number().int().nonnegative(),
    failedUnits: z.array(failedUnitSchema),
    currentUnitLabel: z.string().nullable(),
    progressPercentage: z.number().min(0).max(100),
    result: jsonObjectSchema.nullable(),
    error: z.string().nullable(),
    pointsDeducted: z.number().nonnegative(),
    cancelRequested: z.boolean(),
    workerId: z.string().nullable(),
    params: jsonObjectSchema,
    createdAt: z.string(),
    updatedAt: z.string(),
    startedAt: z.string().nullable(),
    completedAt: z.string().nullable(),
    heartbeatAt: z.string().nullable(),
});

/**
 * Flattens fields into alternating hash field names and JSON-encoded
 * values. Undefined fields are left out so they never clobber stored ones.
 */
export function encodeJobFields(fields: Partial<JobRecord>): string[] {
    const encoded: string[] = [];
    for (const [name, value] of Object.entries(fields)) {
        if (value === undefined) continue;
        encoded.push(name, JSON.stringify(value));
    }
    return encoded;
}

export type DecodeResult =
    | { ok: true; record: JobRecord }
    | { ok: false; reason: string };

/**
 * Decodes a Redis hash written by `encodeJobFields`. An empty hash is what
 * HGETALL returns for a missing key.
 */
export function decodeJobHash(hash: Record<string, string>): DecodeResult | null {
    const entries = Object.entries(hash);
    if (entries.length === 0) return null;

    const raw: Record<string, unknown> = {};
    for (const [name, value] of entries) {
        try {
            raw[name] = JSON.parse(value);
        } catch {
            return { ok: false, reason: `field "${name}" is not valid JSON` };
        }
    }

    const parsed = jobRecordSchema.safeParse(raw);
    if (!parsed.success) {
        return {
            ok: false,
            reason: parsed.error.issues
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join('; '),
        };
    }

    return { ok: true, record: parsed.data };
}
