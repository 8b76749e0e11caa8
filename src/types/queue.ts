// types/queue.ts
import type { z } from 'zod';
import type {
    aiEditorPayloadSchema,
    narrationAudioPayloadSchema,
    slideFormatPayloadSchema,
    slideGenerationPayloadSchema,
    taskSchema,
    translationPayloadSchema,
} from '../lib/queue/schema';
import type { QueueName } from './job';

export type TranslationPayload = z.infer<typeof translationPayloadSchema>;
export type SlideFormatPayload = z.infer<typeof slideFormatPayloadSchema>;
export type SlideGenerationPayload = z.infer<typeof slideGenerationPayloadSchema>;
export type NarrationAudioPayload = z.infer<typeof narrationAudioPayloadSchema>;
export type AiEditorPayload = z.infer<typeof aiEditorPayloadSchema>;

/**
 * A unit of work handed to one worker pool. Tasks are never mutated after
 * they are enqueued; progress lives on the job record.
 */
export type Task = z.infer<typeof taskSchema>;

export type TaskFor<Q extends QueueName> = Extract<Task, { queue: Q }>;

export type PayloadFor<Q extends QueueName> = TaskFor<Q>['payload'];

export type TranslationTask = TaskFor<'translation'>;
export type SlideFormatTask = TaskFor<'slide-format'>;
export type SlideGenerationTask = TaskFor<'slide-generation'>;
export type NarrationAudioTask = TaskFor<'narration-audio'>;
export type AiEditorTask = TaskFor<'ai-editor'>;

/**
 * A delivered task together with who holds it. The receipt is transport
 * specific (a RabbitMQ delivery tag, an in-memory token) and is only
 * meaningful to the queue that produced the claim.
 */
export interface ClaimedTask<T extends Task = Task> {
    task: T;
    workerId: string;
    claimedAt: string;
    receipt: string;
    redelivered: boolean;
}

export interface TaskQueue {
    enqueue(task: Task): Promise<boolean>;
    dequeue(
        queue: QueueName,
        timeoutMs: number,
        workerId: string
    ): Promise<ClaimedTask | null>;
    ack(claim: ClaimedTask): Promise<void>;
    release(claim: ClaimedTask): Promise<void>;
    reject(claim: ClaimedTask): Promise<void>;
}
