// lib/jobs/jobTracker.ts
import {
    isTerminalStatus,
    type ActiveJobStatus,
    type JobRecord,
    type JobRecordFields,
    type QueueName,
    type TerminalJobStatus,
} from '../../types/job';
import Helpers from '../helpers';
import { createLogger } from '../logger';
import type { JobLedger } from './jobLedger';
import type { JobStore } from './jobStore';

const logger = createLogger('job-tracker');

export const STALE_WORKER_ERROR = 'Worker stopped responding';
export const TASK_EXPIRED_ERROR = 'Task expired in queue';

export class DuplicateJobError extends Error {
    constructor(jobId: string) {
        super(`Job ${jobId} already exists`);
        this.name = 'DuplicateJobError';
    }
}

export interface ReapLimits {
    /** Processing jobs without a heartbeat for this long are failed */
    staleAfterMs: number;
    /** Pending jobs older than this lost their task to the queue TTL; 0 keeps them */
    taskTtlMs: number;
}

export type CancelOutcome =
    | { outcome: 'cancelled'; record: JobRecord }
    | { outcome: 'requested'; record: JobRecord }
    | { outcome: 'finished'; record: JobRecord }
    | { outcome: 'missing' };

/**
 * Every status change of a job goes through here. The fast store is written
 * first; the ledger follows on creation, on the claim and on terminal
 * transitions. A crash between the two leaves a stale or missing store
 * entry, never a regressed ledger row.
 */
export class JobTracker {
    constructor(
        private readonly store: JobStore,
        private readonly ledger: JobLedger,
        private readonly now: () => Date = () => new Date()
    ) {}

    private timestamp(): string {
        return this.now().toISOString();
    }

    async create(record: JobRecord): Promise<JobRecord> {
        const { jobId } = record;

        const created = await this.store.write(jobId, record, 'absent');
        if (!created) {
            throw new DuplicateJobError(jobId);
        }

        await this.ledger.insert(record);
        return record;
    }

    /** Fast store first, then the ledger once the store entry has expired */
    async get(jobId: string): Promise<JobRecord | null> {
        const live = await this.store.get(jobId);
        if (live) return live;
        return this.ledger.get(jobId);
    }

    /**
     * Moves a pending job to processing for `workerId`. Returns null when
     * the job is not pending (claimed already, finished, or unknown); the
     * caller must then leave the job alone.
     */
    async claim(jobId: string, workerId: string): Promise<JobRecord | null> {
        const at = this.timestamp();
        const fields: JobRecordFields = {
            status: 'processing',
            workerId,
            startedAt: at,
            heartbeatAt: at,
            updatedAt: at,
        };

        let claimed = await this.store.write(jobId, fields, ['pending']);

        // The task waited in the queue longer than the store TTL
        if (!claimed && (await this.reseedFromLedger(jobId, ['pending']))) {
            claimed = await this.store.write(jobId, fields, ['pending']);
        }

        if (!claimed) return null;

        const record = await this.store.get(jobId);
        if (!record) return null;

        try {
            await this.ledger.mirror(record);
        } catch (error) {
            await this.unclaim(jobId);
            throw error;
        }
        logger.debug({ jobId, workerId }, 'Job claimed');
        return record;
    }

    /** Hands a claim back so the redelivered task can take it again */
    private async unclaim(jobId: string): Promise<void> {
        const released = await this.store
            .write(
                jobId,
                {
                    status: 'pending',
                    workerId: null,
                    startedAt: null,
                    heartbeatAt: null,
                    updatedAt: this.timestamp(),
                },
                ['processing']
            )
            .catch((error: unknown) => {
                logger.error({ jobId, error: Helpers.errorMessage(error) }, 'Could not release claim');
                return false;
            });

        if (released) logger.warn({ jobId }, 'Claim released after ledger write failed');
    }

    /**
     * Merges progress fields while the job is processing; each report also
     * counts as a heartbeat. Returns false once the job left processing
     * (cancelled outright or reaped).
     */
    async report(jobId: string, fields: JobRecordFields): Promise<boolean> {
        const at = this.timestamp();
        return this.store.write(
            jobId,
            { ...fields, updatedAt: at, heartbeatAt: at },
            ['processing']
        );
    }

    async heartbeat(jobId: string): Promise<boolean> {
        return this.store.write(jobId, { heartbeatAt: this.timestamp() }, ['processing']);
    }

    /**
     * Terminal transition from one of `from`. Returns the final record, or
     * null when the job was not in an allowed status; a terminal job is
     * never rewritten.
     */
    async finalize(
        jobId: string,
        status: TerminalJobStatus,
        fields: JobRecordFields = {},
        from: readonly ActiveJobStatus[] = ['pending', 'processing']
    ): Promise<JobRecord | null> {
        const at = this.timestamp();
        const terminal: JobRecordFields = {
            ...fields,
            status,
            currentUnitLabel: null,
            completedAt: at,
            updatedAt: at,
        };

        const written = await this.store.write(jobId, terminal, from);
        if (written) {
            const record = await this.store.get(jobId);
            if (record) {
                await this.mirrorTerminal(record);
                return record;
            }
        }

        if (await this.store.get(jobId)) return null;

        // Store entry expired: finish from the ledger row and put the result
        // back in the store for pollers.
        const row = await this.ledger.get(jobId);
        if (!row || !from.some((allowed) => allowed === row.status)) return null;

        const record: JobRecord = { ...row, ...terminal, jobId };
        await this.store.write(jobId, record, 'absent');
        await this.mirrorTerminal(record);
        return record;
    }

    private async mirrorTerminal(record: JobRecord): Promise<void> {
        const mirrored = await this.ledger.mirror(record);
        if (!mirrored) {
            logger.warn({ jobId: record.jobId }, 'Ledger row already terminal');
        }
        logger.info(
            { jobId: record.jobId, queue: record.queue, status: record.status },
            'Job finished'
        );
    }

    /**
     * Pending jobs are cancelled outright. Processing jobs get a flag the
     * worker checks between units.
     */
    async requestCancel(jobId: string): Promise<CancelOutcome> {
        const current = await this.get(jobId);
        if (!current) return { outcome: 'missing' };
        if (isTerminalStatus(current.status)) return { outcome: 'finished', record: current };

        if (current.status === 'pending') {
            const cancelled = await this.finalize(
                jobId,
                'cancelled',
                { cancelRequested: true },
                ['pending']
            );
            if (cancelled) return { outcome: 'cancelled', record: cancelled };
        }

        const flagged = await this.store.write(
            jobId,
            { cancelRequested: true, updatedAt: this.timestamp() },
            ['processing']
        );

        const latest = await this.get(jobId);
        if (!latest) return { outcome: 'missing' };
        if (flagged) return { outcome: 'requested', record: latest };
        return isTerminalStatus(latest.status)
            ? { outcome: 'finished', record: latest }
            : { outcome: 'requested', record: latest };
    }

    async isCancelRequested(jobId: string): Promise<boolean> {
        const record = await this.store.get(jobId);
        return record?.cancelRequested === true;
    }

    /**
     * Fails jobs of `queue` that can no longer finish by themselves. They are
     * not re-queued: the cost was charged once and external calls must not
     * repeat.
     *
     * - processing, with no heartbeat for `staleAfterMs`
     *   (or whose store entry vanished): the worker died
     * - pending for longer than `taskTtlMs`: the queue dropped the task
     *
     * Ledger rows lagging a finished store record are repaired instead.
     * Returns how many jobs were failed.
     */
    async reapStale(queue: QueueName, limits: ReapLimits): Promise<number> {
        const { staleAfterMs, taskTtlMs } = limits;
        const now = this.now().getTime();
        const candidates = await this.ledger.findStale(queue, new Date(now - staleAfterMs));

        let reaped = 0;
        for (const candidate of candidates) {
            const live = await this.store.get(candidate.jobId);

            if (live && isTerminalStatus(live.status)) {
                await this.ledger.mirror(live);
                continue;
            }

            // The store is ahead of the ledger when a claim was never mirrored
            const current = live ?? candidate;
            let failed: JobRecord | null = null;

            if (current.status === 'processing') {
                const lastBeat = live?.heartbeatAt ? Date.parse(live.heartbeatAt) : Number.NaN;
                if (now - lastBeat < staleAfterMs) continue;

                failed = await this.finalize(
                    candidate.jobId,
                    'failed',
                    { error: STALE_WORKER_ERROR },
                    ['processing']
                );
            } else {
                if (taskTtlMs <= 0 || now - Date.parse(current.createdAt) < taskTtlMs) continue;

                failed = await this.finalize(
                    candidate.jobId,
                    'failed',
                    { error: TASK_EXPIRED_ERROR },
                    ['pending']
                );
            }

            if (failed) {
                reaped++;
                logger.warn(
                    { jobId: candidate.jobId, workerId: current.workerId, error: failed.error },
                    'Reaped job'
                );
            }
        }

        return reaped;
    }

    private async reseedFromLedger(
        jobId: string,
        from: readonly ActiveJobStatus[]
    ): Promise<boolean> {
        if (await this.store.get(jobId)) return false;

        const row = await this.ledger.get(jobId);
        if (!row || !from.some((allowed) => allowed === row.status)) return false;

        logger.info({ jobId }, 'Re-seeding expired job record from ledger');
        return this.store.write(jobId, row, 'absent');
    }
}
