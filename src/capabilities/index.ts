// capabilities/index.ts
import { queueConfig } from '../config/queue';
import type { BookRepository } from '../lib/books/bookRepository';
import type { JobTracker } from '../lib/jobs/jobTracker';
import { WorkerHarness, type WorkerHarnessOptions, type WorkerRunner } from '../lib/jobs/workerHarness';
import type { BlobStore } from '../types/collaborators';
import type { QueueName } from '../types/job';
import type { SpeechModel, TextModel } from '../types/llm';
import type { TaskQueue } from '../types/queue';
import { AiEditorCapability } from './aiEditor';
import { NarrationAudioCapability } from './narrationAudio';
import { SlideFormatCapability } from './slideFormat';
import { SlideGenerationCapability } from './slideGeneration';
import { TranslationCapability } from './translation';

export interface WorkerDeps {
    taskQueue: TaskQueue;
    tracker: JobTracker;
    books: BookRepository;
    blobStore: BlobStore;
    /** Resolved lazily so a narration-only worker needs no text model key */
    textModel: () => TextModel;
    speechModel: () => SpeechModel;
    workerId: string;
    overrides?: Partial<WorkerHarnessOptions>;
}

function harnessOptions(queue: QueueName, deps: WorkerDeps): WorkerHarnessOptions {
    const capability = queueConfig.queues[queue];
    const { worker } = queueConfig;

    return {
        workerId: deps.workerId,
        dequeueTimeoutMs: worker.dequeueTimeoutMs,
        idleDelayMs: worker.idleDelayMs,
        heartbeatMs: worker.heartbeatMs,
        staleAfterMs: worker.staleAfterMs,
        taskTtlMs: queueConfig.messageTtlMs,
        reapIntervalMs: worker.staleAfterMs,
        retry: {
            attempts: capability.unitRetryAttempts,
            baseDelayMs: capability.unitRetryDelayMs,
            timeoutMs: capability.unitTimeoutMs,
        },
        allUnitsFailedStatus: capability.allUnitsFailedStatus,
        ...deps.overrides,
    };
}

/**
 * Builds the worker loop for one capability queue
 */
export function createWorker(queue: QueueName, deps: WorkerDeps): WorkerRunner {
    const options = harnessOptions(queue, deps);
    const { taskQueue, tracker, blobStore } = deps;

    switch (queue) {
        case 'translation':
            return new WorkerHarness(
                new TranslationCapability(deps.books, deps.textModel()),
                taskQueue,
                tracker,
                options
            );
        case 'slide-format':
            return new WorkerHarness(
                new SlideFormatCapability(deps.textModel(), blobStore),
                taskQueue,
                tracker,
                options
            );
        case 'slide-generation':
            return new WorkerHarness(
                new SlideGenerationCapability(deps.textModel(), blobStore),
                taskQueue,
                tracker,
                options
            );
        case 'narration-audio':
            return new WorkerHarness(
                new NarrationAudioCapability(deps.speechModel(), blobStore),
                taskQueue,
                tracker,
                options
            );
        case 'ai-editor':
            return new WorkerHarness(
                new AiEditorCapability(deps.textModel(), blobStore),
                taskQueue,
                tracker,
                options
            );
    }
}

export { AiEditorCapability } from './aiEditor';
export { NarrationAudioCapability } from './narrationAudio';
export { SlideFormatCapability } from './slideFormat';
export { SlideGenerationCapability } from './slideGeneration';
export { TranslationCapability } from './translation';
