import mongoose from 'mongoose';
import { dbConfig } from '../config/database';
import Helpers from './helpers';
import { createLogger } from './logger';

const logger = createLogger('mongodb');

/**
 * Database Connection Class
 */
class Database {
    private connection: mongoose.Connection | null = null;
    private isConnected = false;
    private connectionAttempts = 0;

    /**
     * Connect to MongoDB with retry logic
     */
    async connect(): Promise<mongoose.Connection> {
        const uri = dbConfig.mongoURI;
        const dbName = dbConfig.databaseName;
        const { options, retry } = dbConfig;

        // Mask password in logs
        const maskedUri = uri.replace(/:([^@]+)@/, ':****@');

        logger.info({ uri: maskedUri }, 'Connecting to MongoDB');

        for (;;) {
            try {
                this.connectionAttempts++;

                await mongoose.connect(uri, { ...options, dbName });
                this.connection = mongoose.connection;
                this.isConnected = true;

                logger.info(
                    {
                        host: this.connection.host,
                        database: this.connection.name,
                        poolSize: options.maxPoolSize,
                    },
                    'MongoDB connected'
                );

                this.setupEventListeners();
                this.connectionAttempts = 0;

                return this.connection;
            } catch (error) {
                logger.error(
                    { attempt: this.connectionAttempts, error: Helpers.errorMessage(error) },
                    'MongoDB connection attempt failed'
                );

                if (this.connectionAttempts >= retry.maxAttempts) {
                    logger.fatal('Max MongoDB connection attempts reached');
                    throw error;
                }

                // Exponential backoff
                const delay = Math.min(
                    retry.initialDelayMs * Math.pow(2, this.connectionAttempts - 1),
                    retry.maxDelayMs
                );

                logger.info({ delayMs: delay }, 'Retrying MongoDB connection');
                await Helpers.sleep(delay);
            }
        }
    }

    /**
     * Setup Mongoose event listeners
     */
    private setupEventListeners() {
        const db = mongoose.connection;

        db.on('disconnected', () => {
            this.isConnected = false;
            logger.warn('MongoDB disconnected');
        });

        db.on('reconnected', () => {
            this.isConnected = true;
            logger.info('MongoDB reconnected');
        });

        db.on('error', (error: Error) => {
            this.isConnected = false;
            logger.error({ error: error.message }, 'MongoDB error');
        });
    }

    /**
     * Graceful disconnect
     */
    async disconnect() {
        if (!this.isConnected) {
            logger.info('MongoDB already disconnected');
            return;
        }

        await mongoose.connection.close();
        this.isConnected = false;
        logger.info('MongoDB disconnected gracefully');
    }

    /**
     * Health check
     */
    async healthCheck(): Promise<{ healthy: boolean; status: string; error?: string }> {
        const db = mongoose.connection.db;
        if (!this.isConnected || !db) {
            return { status: 'disconnected', healthy: false };
        }

        try {
            const result = await db.admin().ping();
            return { status: 'connected', healthy: result.ok === 1 };
        } catch (error) {
            return {
                status: 'error',
                healthy: false,
                error: Helpers.errorMessage(error),
            };
        }
    }
}

// Create singleton instance
const database = new Database();

export default database;
