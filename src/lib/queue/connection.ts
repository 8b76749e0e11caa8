// lib/queue/connection.ts
import * as amqp from 'amqplib';
import type { ConfirmChannel } from 'amqplib';
import { EventEmitter } from 'events';
import { queueConfig } from '../../config/queue';
import Helpers from '../helpers';
import { createLogger } from '../logger';

const logger = createLogger('rabbitmq');

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

class RabbitMQConnection extends EventEmitter {
    private connection: AmqpConnection | null = null;
    private channel: ConfirmChannel | null = null;
    private connecting: Promise<void> | null = null;
    private reconnectAttempts = 0;
    private closing = false;

    /**
     * Connect to RabbitMQ; concurrent callers share one attempt
     */
    async connect(): Promise<void> {
        if (this.connection && this.channel) {
            return;
        }

        if (!this.connecting) {
            // A channel can close on its own; reuse the connection then
            const opening = this.connection ? this.openChannel(this.connection) : this.open();
            this.connecting = opening.finally(() => {
                this.connecting = null;
            });
        }

        return this.connecting;
    }

    private async open(): Promise<void> {
        this.closing = false;
        logger.info('Connecting to RabbitMQ');

        const connection = await amqp.connect(queueConfig.rabbitmq.url, {
            heartbeat: queueConfig.rabbitmq.heartbeat,
        });

        connection.on('error', (error: Error) => {
            logger.error({ error: error.message }, 'RabbitMQ connection error');
        });

        connection.on('close', () => {
            if (this.connection !== connection) return;
            logger.warn('RabbitMQ connection closed');
            this.scheduleReconnect();
        });

        this.connection = connection;
        await this.openChannel(connection);

        this.reconnectAttempts = 0;
        logger.info('RabbitMQ connected');
        this.emit('connected');
    }

    private async openChannel(connection: AmqpConnection): Promise<void> {
        // Confirm channel so publishes are acknowledged by the broker
        const channel = await connection.createConfirmChannel();

        channel.on('error', (error: Error) => {
            logger.error({ error: error.message }, 'RabbitMQ channel error');
        });

        channel.on('close', () => {
            if (this.channel !== channel) return;
            logger.warn('RabbitMQ channel closed');
            this.channel = null;
        });

        this.channel = channel;
        await this.setupTopology(channel);
    }

    /**
     * Setup exchanges and one durable queue per capability
     */
    private async setupTopology(channel: ConfirmChannel): Promise<void> {
        const { exchange, queues, deadLetter, messageTtlMs } = queueConfig;

        await channel.assertExchange(deadLetter.exchange, 'direct', {
            durable: true,
        });
        await channel.assertQueue(deadLetter.queue, { durable: true });
        await channel.bindQueue(
            deadLetter.queue,
            deadLetter.exchange,
            deadLetter.routingKey
        );

        await channel.assertExchange(exchange.name, exchange.type, {
            durable: exchange.durable,
        });

        for (const queue of Object.values(queues)) {
            await channel.assertQueue(queue.name, {
                durable: queue.durable,
                deadLetterExchange: deadLetter.exchange,
                deadLetterRoutingKey: deadLetter.routingKey,
                messageTtl: messageTtlMs,
            });

            await channel.bindQueue(queue.name, exchange.name, queue.routingKey);

            logger.debug({ queue: queue.name }, 'Queue ready');
        }
    }

    private scheduleReconnect(): void {
        this.channel = null;
        this.connection = null;

        if (this.closing) return;

        if (this.reconnectAttempts >= queueConfig.rabbitmq.maxReconnectAttempts) {
            logger.error('Max RabbitMQ reconnect attempts reached');
            this.emit('maxReconnectAttempts');
            return;
        }

        this.reconnectAttempts++;
        logger.info({ attempt: this.reconnectAttempts }, 'Reconnecting to RabbitMQ');

        setTimeout(() => {
            this.connect().catch((error: unknown) => {
                logger.error(
                    { error: Helpers.errorMessage(error) },
                    'RabbitMQ reconnect failed'
                );
                this.scheduleReconnect();
            });
        }, queueConfig.rabbitmq.reconnectDelay);
    }

    getChannel(): ConfirmChannel {
        if (!this.channel) {
            throw new Error('RabbitMQ channel not available');
        }
        return this.channel;
    }

    /** The open channel, or null between a close and the next connect */
    currentChannel(): ConfirmChannel | null {
        return this.channel;
    }

    isConnected(): boolean {
        return this.connection !== null && this.channel !== null;
    }

    async close(): Promise<void> {
        this.closing = true;
        try {
            if (this.channel) {
                await this.channel.close();
                this.channel = null;
            }
            if (this.connection) {
                await this.connection.close();
                this.connection = null;
            }
            logger.info('RabbitMQ connection closed');
        } catch (error) {
            logger.error({ error: Helpers.errorMessage(error) }, 'Error closing RabbitMQ connection');
        }
    }
}

// Singleton instance
export const rabbitMQConnection = new RabbitMQConnection();
export type { RabbitMQConnection };
