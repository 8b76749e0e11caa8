import { describe, expect, it, vi } from 'vitest';
import type { Capability, UnitSuccess, WorkUnit } from '../../../src/lib/jobs/capability';
import { TASK_EXPIRED_ERROR, type JobTracker } from '../../../src/lib/jobs/jobTracker';
import { toSnapshot, type JobSnapshot } from '../../../src/lib/jobs/snapshot';
import { WorkerHarness, type WorkerHarnessOptions } from '../../../src/lib/jobs/workerHarness';
import type { JsonObject, UnitNoun } from '../../../src/types/job';
import type { Task, TranslationTask } from '../../../src/types/queue';
import { createTrackerContext, makeJob, makeTranslationTask } from '../../fakes/fixtures';
import { MemoryTaskQueue } from '../../fakes/memoryTaskQueue';

const JOB_ID = 'trans_000000000001';

const chapters: WorkUnit[] = [
    { index: 0, label: 'Chapter 1' },
    { index: 1, label: 'Chapter 2' },
    { index: 2, label: 'Chapter 3' },
];

class ScriptedCapability implements Capability<'translation', WorkUnit, string> {
    readonly queue = 'translation' as const;
    readonly calls: number[] = [];

    constructor(
        private readonly units: WorkUnit[],
        private readonly run: (unit: WorkUnit) => Promise<string>,
        readonly unitNoun: UnitNoun | null = 'chapter'
    ) {}

    parse(task: Task): TranslationTask | null {
        return task.queue === 'translation' ? task : null;
    }

    async open(): Promise<WorkUnit[]> {
        return this.units;
    }

    async runUnit(unit: WorkUnit): Promise<string> {
        this.calls.push(unit.index);
        return this.run(unit);
    }

    async buildResult(successes: UnitSuccess<WorkUnit, string>[]): Promise<JsonObject> {
        return { values: successes.map((success) => success.value) };
    }
}

const options = (overrides: Partial<WorkerHarnessOptions> = {}): WorkerHarnessOptions => ({
    workerId: 'worker-1',
    dequeueTimeoutMs: 10,
    idleDelayMs: 0,
    heartbeatMs: 60_000,
    staleAfterMs: 600_000,
    taskTtlMs: 0,
    reapIntervalMs: 0,
    retry: { attempts: 2, baseDelayMs: 0, timeoutMs: 0 },
    allUnitsFailedStatus: 'failed',
    ...overrides,
});

async function setup(
    capability: Capability<'translation', WorkUnit, string>,
    harnessOptions: WorkerHarnessOptions = options()
) {
    const context = createTrackerContext();
    const queue = new MemoryTaskQueue();
    await context.tracker.create(makeJob());
    queue.push('translation', makeTranslationTask());

    const harness = new WorkerHarness(capability, queue, context.tracker, harnessOptions);
    return { ...context, queue, harness };
}

const done = async (unit: WorkUnit) => `${unit.label} done`;

describe('WorkerHarness', () => {
    it('completes a job and acknowledges its task', async () => {
        const capability = new ScriptedCapability(chapters, done);
        const { tracker, ledger, queue, harness } = await setup(capability);

        expect(await harness.runOnce()).toBe(true);

        const record = await tracker.get(JOB_ID);
        expect(record).toMatchObject({
            status: 'completed',
            unitsTotal: 3,
            unitsCompleted: 3,
            unitsFailed: 0,
            progressPercentage: 100,
            currentUnitLabel: null,
            result: { values: ['Chapter 1 done', 'Chapter 2 done', 'Chapter 3 done'] },
        });
        expect((await ledger.get(JOB_ID))?.status).toBe('completed');
        expect(queue.acked).toEqual(['task-1']);
    });

    it('returns false when the queue is empty', async () => {
        const capability = new ScriptedCapability(chapters, done);
        const { queue, harness } = await setup(capability);
        await harness.runOnce();

        expect(queue.depth('translation')).toBe(0);
        expect(await harness.runOnce()).toBe(false);
    });

    it('reports progress and the current unit while working', async () => {
        let midway: JobSnapshot | null = null;
        let tracker: JobTracker | null = null;

        const capability = new ScriptedCapability(chapters, async (unit) => {
            if (unit.index === 1 && tracker) {
                const record = await tracker.get(JOB_ID);
                if (record) midway = toSnapshot(record);
            }
            return done(unit);
        });
        const context = await setup(capability);
        tracker = context.tracker;

        await context.harness.runOnce();

        expect(midway).toMatchObject({
            status: 'processing',
            chapters_total: 3,
            chapters_completed: 1,
            current_chapter_title: 'Chapter 2',
            progress_percentage: 33,
        });
    });

    it('completes with a failure list when some units fail', async () => {
        const capability = new ScriptedCapability(chapters, async (unit) => {
            if (unit.index === 1) throw new Error('translation service down');
            return done(unit);
        });
        const { tracker, harness } = await setup(capability);

        await harness.runOnce();

        const record = await tracker.get(JOB_ID);
        expect(record).toMatchObject({
            status: 'completed',
            unitsCompleted: 2,
            unitsFailed: 1,
            failedUnits: [{ index: 1, label: 'Chapter 2', error: 'translation service down' }],
            result: { values: ['Chapter 1 done', 'Chapter 3 done'] },
        });
        // two attempts for the failing chapter
        expect(capability.calls).toEqual([0, 1, 1, 2]);

        const snapshot = record ? toSnapshot(record) : null;
        expect(snapshot?.chapters_failed).toBe(1);
        expect(snapshot?.failed_chapters).toEqual([
            { index: 1, label: 'Chapter 2', error: 'translation service down' },
        ]);
    });

    it('processes a redelivered task only once', async () => {
        const capability = new ScriptedCapability(chapters, done);
        const { tracker, queue, harness } = await setup(capability);
        queue.push('translation', makeTranslationTask(), true);

        await harness.runOnce();
        await harness.runOnce();

        expect(capability.calls).toEqual([0, 1, 2]);
        expect(queue.acked).toEqual(['task-1', 'task-1']);
        expect((await tracker.get(JOB_ID))?.status).toBe('completed');
    });

    it('stops between units when cancellation is requested', async () => {
        let tracker: JobTracker | null = null;
        const capability = new ScriptedCapability(chapters, async (unit) => {
            if (unit.index === 0 && tracker) await tracker.requestCancel(JOB_ID);
            return done(unit);
        });
        const context = await setup(capability);
        tracker = context.tracker;

        await context.harness.runOnce();

        expect(capability.calls).toEqual([0]);
        expect(await context.tracker.get(JOB_ID)).toMatchObject({
            status: 'cancelled',
            unitsCompleted: 1,
            cancelRequested: true,
            result: { values: ['Chapter 1 done'] },
        });
    });

    it('fails the job when every unit fails', async () => {
        const capability = new ScriptedCapability(chapters, async () => {
            throw new Error('boom');
        });
        const { tracker, harness } = await setup(capability);

        await harness.runOnce();

        expect(await tracker.get(JOB_ID)).toMatchObject({
            status: 'failed',
            error: 'All 3 chapters failed',
            unitsFailed: 3,
            result: null,
        });
    });

    it('applies a completed policy when every unit fails', async () => {
        const capability = new ScriptedCapability(chapters, async () => {
            throw new Error('boom');
        });
        const { tracker, harness } = await setup(
            capability,
            options({ allUnitsFailedStatus: 'completed' })
        );

        await harness.runOnce();

        expect(await tracker.get(JOB_ID)).toMatchObject({
            status: 'completed',
            error: 'All 3 chapters failed',
            unitsFailed: 3,
        });
    });

    it('surfaces the unit error of a single-unit job', async () => {
        const capability = new ScriptedCapability(
            [{ index: 0, label: 'Editing content' }],
            async () => {
                throw new Error('model refused');
            },
            null
        );
        const { tracker, harness } = await setup(capability);

        await harness.runOnce();

        expect(await tracker.get(JOB_ID)).toMatchObject({
            status: 'failed',
            error: 'model refused',
        });
    });

    it('fails the whole job when the source cannot be opened', async () => {
        const capability = new ScriptedCapability(chapters, done);
        vi.spyOn(capability, 'open').mockRejectedValue(new Error('Book book-1 not found'));
        const { tracker, queue, harness } = await setup(capability);

        await harness.runOnce();

        expect(await tracker.get(JOB_ID)).toMatchObject({
            status: 'failed',
            error: 'Book book-1 not found',
        });
        expect(capability.calls).toEqual([]);
        expect(queue.acked).toEqual(['task-1']);
    });

    it('fails a job with nothing to process', async () => {
        const capability = new ScriptedCapability([], done);
        const { tracker, harness } = await setup(capability);

        await harness.runOnce();

        expect(await tracker.get(JOB_ID)).toMatchObject({
            status: 'failed',
            error: 'Nothing to process',
        });
    });

    it('counts a timed out unit as failed', async () => {
        const capability = new ScriptedCapability(
            [{ index: 0, label: 'Chapter 1' }],
            () => new Promise<string>(() => undefined)
        );
        const { tracker, harness } = await setup(
            capability,
            options({ retry: { attempts: 1, baseDelayMs: 0, timeoutMs: 20 } })
        );

        await harness.runOnce();

        expect(await tracker.get(JOB_ID)).toMatchObject({
            status: 'failed',
            failedUnits: [{ index: 0, label: 'Chapter 1', error: 'Timed out after 20ms' }],
        });
    });

    it('rejects a task that belongs to another queue', async () => {
        const capability = new ScriptedCapability(chapters, done);
        const { queue, harness } = await setup(capability);
        await harness.runOnce();

        queue.push('translation', {
            taskId: 'task-x',
            jobId: 'edit_000000000001',
            userId: 'user-a',
            enqueuedAt: '2026-01-01T00:00:00.000Z',
            queue: 'ai-editor',
            payload: {
                documentId: 'doc-1',
                operation: 'format',
                contentType: 'document',
                content: '<p>hi</p>',
                instruction: null,
                sourceLanguage: null,
                targetLanguage: null,
                bilingualStyle: null,
            },
        });

        expect(await harness.runOnce()).toBe(true);
        expect(queue.rejected).toEqual(['task-x']);
    });

    it('releases the task when the tracker is unreachable', async () => {
        const capability = new ScriptedCapability(chapters, done);
        const { tracker, queue, harness } = await setup(capability);
        vi.spyOn(tracker, 'claim').mockRejectedValue(new Error('store offline'));

        await expect(harness.runOnce()).rejects.toThrow('store offline');
        expect(queue.released).toEqual(['task-1']);
        expect(queue.depth('translation')).toBe(1);
    });

    it('completes with the reason when the result cannot be assembled', async () => {
        const capability = new ScriptedCapability(chapters, done);
        vi.spyOn(capability, 'buildResult').mockRejectedValue(new Error('disk full'));
        const { tracker, queue, harness } = await setup(capability);

        await harness.runOnce();

        expect(await tracker.get(JOB_ID)).toMatchObject({
            status: 'completed',
            unitsCompleted: 3,
            result: null,
            error: 'Could not assemble result: disk full',
            progressPercentage: 100,
        });
        expect(queue.acked).toEqual(['task-1']);
    });

    it('takes the job again after a claim the ledger could not record', async () => {
        const capability = new ScriptedCapability(chapters, done);
        const { tracker, ledger, queue, harness } = await setup(capability);
        vi.spyOn(ledger, 'mirror').mockRejectedValueOnce(new Error('ledger offline'));

        await expect(harness.runOnce()).rejects.toThrow('ledger offline');
        expect(queue.released).toEqual(['task-1']);
        expect((await tracker.get(JOB_ID))?.status).toBe('pending');

        expect(await harness.runOnce()).toBe(true);
        expect((await tracker.get(JOB_ID))?.status).toBe('completed');
        expect((await ledger.get(JOB_ID))?.status).toBe('completed');
        expect(queue.acked).toEqual(['task-1']);
    });

    it('fails pending jobs older than the task TTL when reaping', async () => {
        const capability = new ScriptedCapability(chapters, done);
        const { tracker, clock, harness } = await setup(
            capability,
            options({ staleAfterMs: 1000, taskTtlMs: 5000 })
        );
        clock.advance(6000);

        expect(await harness.reap()).toBe(1);
        expect(await tracker.get(JOB_ID)).toMatchObject({
            status: 'failed',
            error: TASK_EXPIRED_ERROR,
        });
    });

    it('runs queued work after start and drains on stop', async () => {
        const capability = new ScriptedCapability(chapters, done);
        const { tracker, harness } = await setup(capability);

        await harness.start();
        await vi.waitFor(async () => {
            expect((await tracker.get(JOB_ID))?.status).toBe('completed');
        });
        await harness.stop();
    });
});
