// config/database.ts
import type { ConnectOptions } from 'mongoose';
import env from './env';

/**
 * MongoDB connection configuration for the job ledger and domain models
 */
const options: ConnectOptions = {
    maxPoolSize: env.MONGO_MAX_POOL_SIZE,
    minPoolSize: env.MONGO_MIN_POOL_SIZE,

    // Timeouts
    serverSelectionTimeoutMS: 5000,
    socketTimeoutMS: 45000,
    connectTimeoutMS: 10000,

    heartbeatFrequencyMS: 10000,

    // Terminal job rows are the audit trail, so writes wait for a majority
    writeConcern: { w: 'majority', wtimeoutMS: 2500 },

    readPreference: 'primaryPreferred',

    // Auto index in development only
    autoIndex: env.NODE_ENV !== 'production',

    retryWrites: true,
    retryReads: true,

    compressors: ['zlib'],
};

export const dbConfig = {
    mongoURI: env.MONGO_URI,
    databaseName: env.MONGO_DB_NAME,
    options,

    retry: {
        maxAttempts: 5,
        initialDelayMs: 1000,
        maxDelayMs: 30000,
    },
};
