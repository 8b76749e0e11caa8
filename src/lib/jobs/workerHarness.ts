// lib/jobs/workerHarness.ts
import type {
    FailedUnit,
    JobRecordFields,
    JsonObject,
    QueueName,
    TerminalJobStatus,
} from '../../types/job';
import type { ClaimedTask, TaskFor, TaskQueue } from '../../types/queue';
import Helpers from '../helpers';
import { createLogger } from '../logger';
import type { Capability, UnitSuccess, WorkUnit } from './capability';
import type { JobTracker } from './jobTracker';
import { withRetry, type RetryPolicy } from './retry';

const logger = createLogger('worker');

export interface WorkerHarnessOptions {
    workerId: string;
    dequeueTimeoutMs: number;
    idleDelayMs: number;
    heartbeatMs: number;
    staleAfterMs: number;
    /** Pending jobs older than the queue's message TTL are failed; 0 keeps them */
    taskTtlMs: number;
    /** 0 runs the reaper only on start */
    reapIntervalMs: number;
    retry: RetryPolicy;
    allUnitsFailedStatus: Extract<TerminalJobStatus, 'completed' | 'failed'>;
}

export interface WorkerRunner {
    readonly queue: QueueName;
    start(): Promise<void>;
    stop(): Promise<void>;
}

type UnitOutcome<R> = { ok: true; value: R } | { ok: false; error: string };

const percentage = (done: number, total: number): number =>
    total === 0 ? 0 : Math.round((done / total) * 100);

/**
 * Claim, execute, report, finalize, repeat; for one capability queue.
 */
export class WorkerHarness<Q extends QueueName, U extends WorkUnit, R>
    implements WorkerRunner
{
    private running = false;
    private loop: Promise<void> | null = null;
    private reapTimer: NodeJS.Timeout | null = null;

    constructor(
        private readonly capability: Capability<Q, U, R>,
        private readonly queueClient: TaskQueue,
        private readonly tracker: JobTracker,
        private readonly options: WorkerHarnessOptions
    ) {}

    get queue(): Q {
        return this.capability.queue;
    }

    async start(): Promise<void> {
        if (this.running) return;
        this.running = true;

        logger.info({ queue: this.queue, workerId: this.options.workerId }, 'Worker starting');

        await this.reap();
        if (this.options.reapIntervalMs > 0) {
            this.reapTimer = setInterval(() => {
                this.reap().catch((error: unknown) => {
                    logger.error({ error: Helpers.errorMessage(error) }, 'Reaper failed');
                });
            }, this.options.reapIntervalMs);
            this.reapTimer.unref();
        }

        this.loop = this.run();
    }

    /**
     * Stop taking tasks; resolves once the in-flight job is finished
     */
    async stop(): Promise<void> {
        logger.info({ queue: this.queue }, 'Worker stopping');
        this.running = false;

        if (this.reapTimer) {
            clearInterval(this.reapTimer);
            this.reapTimer = null;
        }

        await this.loop;
        this.loop = null;
        logger.info({ queue: this.queue }, 'Worker stopped');
    }

    private async run(): Promise<void> {
        while (this.running) {
            try {
                const handled = await this.runOnce();
                if (!handled && this.running) {
                    await Helpers.sleep(this.options.idleDelayMs);
                }
            } catch (error) {
                logger.error(
                    { queue: this.queue, error: Helpers.errorMessage(error) },
                    'Worker loop error'
                );
                await Helpers.sleep(this.options.idleDelayMs);
            }
        }
    }

    async reap(): Promise<number> {
        const reaped = await this.tracker.reapStale(this.queue, {
            staleAfterMs: this.options.staleAfterMs,
            taskTtlMs: this.options.taskTtlMs,
        });
        if (reaped > 0) {
            logger.warn({ queue: this.queue, reaped }, 'Failed jobs that can no longer finish');
        }
        return reaped;
    }

    /**
     * Takes at most one task off the queue and sees it through. Returns
     * false when the queue stayed empty for the dequeue timeout.
     */
    async runOnce(): Promise<boolean> {
        const claim = await this.queueClient.dequeue(
            this.queue,
            this.options.dequeueTimeoutMs,
            this.options.workerId
        );
        if (!claim) return false;

        try {
            await this.handle(claim);
        } catch (error) {
            await this.queueClient.release(claim);
            throw error;
        }
        return true;
    }

    private async handle(claim: ClaimedTask): Promise<void> {
        const task = this.capability.parse(claim.task);
        if (!task) {
            logger.error(
                { queue: this.queue, taskQueue: claim.task.queue, jobId: claim.task.jobId },
                'Task does not belong to this queue'
            );
            await this.queueClient.reject(claim);
            return;
        }

        const job = await this.tracker.claim(task.jobId, this.options.workerId);
        if (!job) {
            // Redelivery of a job another claim already advanced
            logger.info(
                { jobId: task.jobId, redelivered: claim.redelivered },
                'Job is not pending, skipping task'
            );
            await this.queueClient.ack(claim);
            return;
        }

        const startedAt = Date.now();
        try {
            await this.execute(task);
        } catch (error) {
            const message = Helpers.errorMessage(error);
            logger.error({ jobId: task.jobId, error: message }, 'Job failed');
            await this.tracker.finalize(task.jobId, 'failed', { error: message }, ['processing']);
        }

        logger.info({ jobId: task.jobId, duration: Date.now() - startedAt }, 'Task done');
        await this.queueClient.ack(claim);
    }

    private async execute(task: TaskFor<Q>): Promise<void> {
        const { jobId } = task;
        const units = await this.capability.open(task);
        const total = units.length;

        if (total === 0) {
            await this.tracker.finalize(jobId, 'failed', { error: 'Nothing to process' }, ['processing']);
            return;
        }

        const successes: UnitSuccess<U, R>[] = [];
        const failures: FailedUnit[] = [];

        if (!(await this.tracker.report(jobId, { unitsTotal: total }))) return;

        for (const unit of units) {
            if (await this.tracker.isCancelRequested(jobId)) {
                await this.finishCancelled(task, successes, failures);
                return;
            }

            const owned = await this.tracker.report(jobId, { currentUnitLabel: unit.label });
            if (!owned) {
                logger.warn({ jobId }, 'Job left processing; abandoning');
                return;
            }

            const outcome = await this.runUnit(unit, task);
            if (outcome.ok) {
                successes.push({ unit, value: outcome.value });
            } else {
                failures.push({ index: unit.index, label: unit.label, error: outcome.error });
            }

            const progressed = await this.tracker.report(jobId, {
                unitsCompleted: successes.length,
                unitsFailed: failures.length,
                failedUnits: failures,
                progressPercentage: percentage(successes.length + failures.length, total),
            });
            if (!progressed) {
                logger.warn({ jobId }, 'Job left processing; abandoning');
                return;
            }
        }

        if (successes.length > 0) {
            await this.finishCompleted(task, successes);
            return;
        }

        const status = this.options.allUnitsFailedStatus;
        const error =
            total === 1 ? failures[0].error : `All ${total} ${this.unitName()}s failed`;
        await this.tracker.finalize(
            jobId,
            status,
            { error, result: null, progressPercentage: 100 },
            ['processing']
        );
    }

    /**
     * Units that succeeded stay succeeded: when the result cannot be
     * assembled the job still completes, with the reason in `error`.
     */
    private async finishCompleted(task: TaskFor<Q>, successes: UnitSuccess<U, R>[]): Promise<void> {
        let fields: JobRecordFields;
        try {
            const result = await this.capability.buildResult(successes, task);
            fields = { result, progressPercentage: 100 };
        } catch (error) {
            const message = Helpers.errorMessage(error);
            logger.error({ jobId: task.jobId, error: message }, 'Could not assemble result');
            fields = {
                result: null,
                error: `Could not assemble result: ${message}`,
                progressPercentage: 100,
            };
        }

        await this.tracker.finalize(task.jobId, 'completed', fields, ['processing']);
    }

    private async finishCancelled(
        task: TaskFor<Q>,
        successes: UnitSuccess<U, R>[],
        failures: FailedUnit[]
    ): Promise<void> {
        let result: JsonObject | null = null;
        if (successes.length > 0) {
            try {
                result = await this.capability.buildResult(successes, task);
            } catch (error) {
                logger.warn(
                    { jobId: task.jobId, error: Helpers.errorMessage(error) },
                    'Could not assemble partial result'
                );
            }
        }

        logger.info(
            { jobId: task.jobId, completed: successes.length, failed: failures.length },
            'Job cancelled between units'
        );
        await this.tracker.finalize(task.jobId, 'cancelled', { result }, ['processing']);
    }

    private async runUnit(unit: U, task: TaskFor<Q>): Promise<UnitOutcome<R>> {
        const heartbeat = setInterval(() => {
            this.tracker.heartbeat(task.jobId).catch((error: unknown) => {
                logger.warn(
                    { jobId: task.jobId, error: Helpers.errorMessage(error) },
                    'Heartbeat failed'
                );
            });
        }, this.options.heartbeatMs);

        try {
            const value = await withRetry(
                () => this.capability.runUnit(unit, task),
                this.options.retry,
                {
                    onRetry: (attempt, delayMs, error) => {
                        logger.warn(
                            {
                                jobId: task.jobId,
                                unit: unit.index,
                                attempt,
                                delayMs,
                                error: Helpers.errorMessage(error),
                            },
                            'Unit attempt failed, retrying'
                        );
                    },
                }
            );
            return { ok: true, value };
        } catch (error) {
            const message = Helpers.errorMessage(error);
            logger.error({ jobId: task.jobId, unit: unit.index, error: message }, 'Unit failed');
            return { ok: false, error: message };
        } finally {
            clearInterval(heartbeat);
        }
    }

    private unitName(): string {
        return this.capability.unitNoun ?? 'unit';
    }
}
