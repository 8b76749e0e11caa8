import { JobProducer } from '../../src/lib/jobs/producer';
import { StatusReader } from '../../src/lib/jobs/statusReader';
import { JobsService } from '../../src/modules/jobs/service';
import { FakeCostLedger } from '../fakes/collaborators';
import { createTrackerContext } from '../fakes/fixtures';
import { MemoryTaskQueue } from '../fakes/memoryTaskQueue';

/** Producer and job reads over in-memory stores, with `balance` points for user-a */
export function createJobContext(balance = 100) {
    const context = createTrackerContext();
    const queue = new MemoryTaskQueue();
    const costLedger = new FakeCostLedger({ 'user-a': balance });
    const producer = new JobProducer(queue, context.tracker, costLedger, context.clock.now);
    const jobs = new JobsService(new StatusReader(context.tracker, context.ledger));
    return { ...context, queue, costLedger, producer, jobs };
}

export const rejection = (promise: Promise<unknown>): Promise<unknown> =>
    promise.then(
        () => {
            throw new Error('expected a rejection');
        },
        (error: unknown) => error
    );
