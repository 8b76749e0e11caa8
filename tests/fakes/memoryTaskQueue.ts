import type { QueueName } from '../../src/types/job';
import type { ClaimedTask, Task, TaskQueue } from '../../src/types/queue';

/**
 * At-least-once queue in memory: released tasks go back to the front and
 * are flagged as redelivered.
 */
export class MemoryTaskQueue implements TaskQueue {
    private readonly ready = new Map<QueueName, { task: Task; redelivered: boolean }[]>();
    private receipts = 0;

    readonly enqueued: Task[] = [];
    readonly acked: string[] = [];
    readonly released: string[] = [];
    readonly rejected: string[] = [];

    /** false refuses publishes, an Error makes them throw */
    accept: boolean | Error = true;

    async enqueue(task: Task): Promise<boolean> {
        if (this.accept instanceof Error) throw this.accept;
        if (!this.accept) return false;

        this.enqueued.push(task);
        this.push(task.queue, task);
        return true;
    }

    /** Puts a message on `queue` directly, whatever its task says */
    push(queue: QueueName, task: Task, redelivered = false): void {
        const pending = this.ready.get(queue) ?? [];
        pending.push({ task: structuredClone(task), redelivered });
        this.ready.set(queue, pending);
    }

    depth(queue: QueueName): number {
        return this.ready.get(queue)?.length ?? 0;
    }

    async dequeue(queue: QueueName, _timeoutMs: number, workerId: string): Promise<ClaimedTask | null> {
        const next = this.ready.get(queue)?.shift();
        if (!next) return null;

        this.receipts++;
        return {
            task: next.task,
            workerId,
            claimedAt: new Date().toISOString(),
            receipt: String(this.receipts),
            redelivered: next.redelivered,
        };
    }

    async ack(claim: ClaimedTask): Promise<void> {
        this.acked.push(claim.task.taskId);
    }

    async release(claim: ClaimedTask): Promise<void> {
        this.released.push(claim.task.taskId);
        const pending = this.ready.get(claim.task.queue) ?? [];
        pending.unshift({ task: claim.task, redelivered: true });
        this.ready.set(claim.task.queue, pending);
    }

    async reject(claim: ClaimedTask): Promise<void> {
        this.rejected.push(claim.task.taskId);
    }
}
