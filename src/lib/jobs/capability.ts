// lib/jobs/capability.ts
import type { JsonObject, QueueName, UnitNoun } from '../../types/job';
import type { Task, TaskFor } from '../../types/queue';

/** One independently retryable piece of a job: a chapter, a slide, ... */
export interface WorkUnit {
    index: number;
    label: string;
}

export interface UnitSuccess<U extends WorkUnit, R> {
    unit: U;
    value: R;
}

/**
 * The capability-specific half of a worker. The harness owns claiming,
 * progress, retries, cancellation and finalization; a capability only knows
 * how to load its source, process one unit and assemble the result.
 */
export interface Capability<Q extends QueueName, U extends WorkUnit, R> {
    readonly queue: Q;
    readonly unitNoun: UnitNoun | null;

    /** Narrows a dequeued task to this capability's variant */
    parse(task: Task): TaskFor<Q> | null;

    /**
     * Loads whatever the job works on and splits it into units. Throwing
     * here fails the whole job.
     */
    open(task: TaskFor<Q>): Promise<U[]>;

    runUnit(unit: U, task: TaskFor<Q>): Promise<R>;

    buildResult(successes: UnitSuccess<U, R>[], task: TaskFor<Q>): Promise<JsonObject>;
}
