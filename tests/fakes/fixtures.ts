import { JobTracker } from '../../src/lib/jobs/jobTracker';
import type { JobRecord } from '../../src/types/job';
import type { TranslationTask } from '../../src/types/queue';
import { MemoryJobLedger } from './memoryJobLedger';
import { MemoryJobStore } from './memoryJobStore';

export const T0 = new Date('2026-01-01T00:00:00.000Z');

/** Clock the tests move by hand */
export class TestClock {
    private current: number;

    constructor(start: Date = T0) {
        this.current = start.getTime();
    }

    now = (): Date => new Date(this.current);

    advance(ms: number): void {
        this.current += ms;
    }
}

export function makeJob(overrides: Partial<JobRecord> = {}): JobRecord {
    return {
        jobId: 'trans_000000000001',
        queue: 'translation',
        userId: 'user-a',
        status: 'pending',
        unitNoun: 'chapter',
        unitsTotal: 3,
        unitsCompleted: 0,
        unitsFailed: 0,
        failedUnits: [],
        currentUnitLabel: null,
        progressPercentage: 0,
        result: null,
        error: null,
        pointsDeducted: 8,
        cancelRequested: false,
        workerId: null,
        params: { book_id: 'book-1', target_language: 'en', source_language: 'vi' },
        createdAt: T0.toISOString(),
        updatedAt: T0.toISOString(),
        startedAt: null,
        completedAt: null,
        heartbeatAt: null,
        ...overrides,
    };
}

export function makeTranslationTask(overrides: Partial<TranslationTask> = {}): TranslationTask {
    return {
        taskId: 'task-1',
        jobId: 'trans_000000000001',
        userId: 'user-a',
        enqueuedAt: T0.toISOString(),
        queue: 'translation',
        payload: { bookId: 'book-1', targetLanguage: 'en', sourceLanguage: 'vi' },
        ...overrides,
    };
}

export function createTrackerContext(clock: TestClock = new TestClock()) {
    const store = new MemoryJobStore();
    const ledger = new MemoryJobLedger();
    const tracker = new JobTracker(store, ledger, clock.now);
    return { store, ledger, tracker, clock };
}
