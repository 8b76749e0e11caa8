// lib/queue/taskQueue.ts
import type { ConfirmChannel, GetMessage } from 'amqplib';
import { rabbitMQConnection } from './connection';
import { taskSchema } from './schema';
import { queueConfig } from '../../config/queue';
import type { QueueName } from '../../types/job';
import type { ClaimedTask, Task, TaskQueue } from '../../types/queue';
import { formatZodIssues } from '../../middleware/validate';
import Helpers from '../helpers';
import { createLogger } from '../logger';

const logger = createLogger('task-queue');

const POLL_MIN_DELAY_MS = 100;
const POLL_MAX_DELAY_MS = 1000;

export type TaskChannel = Pick<ConfirmChannel, 'publish' | 'get' | 'ack' | 'nack'>;

/** What the queue needs from the broker connection */
export interface ChannelSource {
    connect(): Promise<void>;
    getChannel(): TaskChannel;
    currentChannel(): TaskChannel | null;
}

interface Delivery {
    message: GetMessage;
    channel: TaskChannel;
}

/**
 * Task queue on RabbitMQ. Deliveries are fetched with basic.get and
 * acknowledged manually, so a worker that dies before `ack` leaves the
 * task for redelivery.
 *
 * Delivery tags are only meaningful on the channel that issued them. A
 * claim whose channel has since closed is dropped on settle: the broker
 * already requeued the message, and the job claim keeps it from running
 * twice.
 */
export class RabbitTaskQueue implements TaskQueue {
    private readonly inFlight = new Map<string, Delivery>();
    private receipts = 0;

    constructor(private readonly connection: ChannelSource = rabbitMQConnection) {}

    async enqueue(task: Task): Promise<boolean> {
        await this.connection.connect();
        const channel = this.connection.getChannel();
        const queue = queueConfig.queues[task.queue];

        const message = Buffer.from(JSON.stringify(task));

        return new Promise((resolve, reject) => {
            channel.publish(
                queueConfig.exchange.name,
                queue.routingKey,
                message,
                {
                    persistent: true,
                    contentType: 'application/json',
                    messageId: task.taskId,
                    correlationId: task.jobId,
                    timestamp: Date.parse(task.enqueuedAt),
                },
                (err) => {
                    if (err) {
                        reject(err);
                    } else {
                        logger.debug({ jobId: task.jobId, queue: task.queue }, 'Task enqueued');
                        resolve(true);
                    }
                }
            );
        });
    }

    async dequeue(
        queue: QueueName,
        timeoutMs: number,
        workerId: string
    ): Promise<ClaimedTask | null> {
        await this.connection.connect();
        const deadline = Date.now() + timeoutMs;
        let delay = POLL_MIN_DELAY_MS;

        for (;;) {
            const channel = this.connection.getChannel();
            const message = await channel.get(queueConfig.queues[queue].name, {
                noAck: false,
            });

            if (message) {
                const claim = this.toClaim(channel, message, workerId);
                if (claim) return claim;
                continue;
            }

            const remaining = deadline - Date.now();
            if (remaining <= 0) return null;

            await Helpers.sleep(Math.min(delay, remaining));
            delay = Math.min(delay * 2, POLL_MAX_DELAY_MS);
        }
    }

    private toClaim(
        channel: TaskChannel,
        message: GetMessage,
        workerId: string
    ): ClaimedTask | null {
        let body: unknown;
        try {
            body = JSON.parse(message.content.toString('utf8'));
        } catch (error) {
            logger.error(
                { error: Helpers.errorMessage(error) },
                'Dropping task with unreadable body'
            );
            channel.nack(message, false, false);
            return null;
        }

        const parsed = taskSchema.safeParse(body);
        if (!parsed.success) {
            logger.error(
                { issues: formatZodIssues(parsed.error) },
                'Dropping malformed task'
            );
            channel.nack(message, false, false);
            return null;
        }

        this.receipts++;
        const receipt = `${this.receipts}:${message.fields.deliveryTag}`;
        this.inFlight.set(receipt, { message, channel });

        const claim: ClaimedTask = {
            task: parsed.data,
            workerId,
            claimedAt: new Date().toISOString(),
            receipt,
            redelivered: message.fields.redelivered,
        };

        logger.debug(
            { jobId: claim.task.jobId, workerId, redelivered: claim.redelivered },
            'Task claimed'
        );

        return claim;
    }

    async ack(claim: ClaimedTask): Promise<void> {
        const delivery = this.take(claim);
        if (delivery) delivery.channel.ack(delivery.message);
    }

    async release(claim: ClaimedTask): Promise<void> {
        const delivery = this.take(claim);
        if (delivery) delivery.channel.nack(delivery.message, false, true);
    }

    async reject(claim: ClaimedTask): Promise<void> {
        const delivery = this.take(claim);
        if (delivery) delivery.channel.nack(delivery.message, false, false);
    }

    /** The claim's delivery, if its channel is still the open one */
    private take(claim: ClaimedTask): Delivery | null {
        const delivery = this.inFlight.get(claim.receipt);
        this.inFlight.delete(claim.receipt);

        if (!delivery) {
            logger.warn({ jobId: claim.task.jobId }, 'Unknown delivery');
            return null;
        }
        if (delivery.channel !== this.connection.currentChannel()) {
            logger.warn(
                { jobId: claim.task.jobId },
                'Delivery channel closed; the broker has requeued the task'
            );
            return null;
        }
        return delivery;
    }
}

export const taskQueue = new RabbitTaskQueue();
