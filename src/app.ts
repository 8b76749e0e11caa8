import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import cookieParser from 'cookie-parser';
import morgan from 'morgan';
import env from './config/env';
import { storageConfig } from './config/storage';
import database from './lib/database';
import { rabbitMQConnection } from './lib/queue/connection';
import { redisConnection } from './lib/redis';
import { asyncHandler } from './lib/asyncHandler';
import { errorHandler, notFoundHandler } from './middleware/error';
import { requestIdMiddleware } from './middleware/requestId';

// Route imports
import routes from './routes';

const app = express();

// Request ID middleware (should be early in the chain)
app.use(requestIdMiddleware);

// Cookie parser middleware
app.use(cookieParser());

// Security and performance middleware
app.use(helmet());
app.use(
    cors({
        origin: env.CORS_ORIGIN,
        credentials: true,
    })
);
app.use(compression());

// Body parsing middleware
app.use(express.json({ limit: '5mb' }));
app.use(express.urlencoded({ extended: true }));

// Logging middleware
if (env.NODE_ENV === 'development') {
    app.use(morgan('dev'));
} else if (env.NODE_ENV === 'production') {
    app.use(morgan('combined'));
}

// Stored results and narration audio
if (storageConfig.provider === 'local') {
    app.use('/uploads', express.static(storageConfig.local.uploadDir));
}

// Health check endpoint
app.get(
    '/health',
    asyncHandler(async (req, res) => {
        const [mongo, redis] = await Promise.all([
            database.healthCheck(),
            redisConnection.healthCheck(),
        ]);
        const rabbitmq = { healthy: rabbitMQConnection.isConnected() };
        const healthy = mongo.healthy && redis.healthy && rabbitmq.healthy;

        res.status(healthy ? 200 : 503).json({
            status: healthy ? 'ok' : 'degraded',
            services: { mongo, redis, rabbitmq },
            timestamp: new Date().toISOString(),
        });
    })
);

// API routes
app.use('/api/v1', routes);

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

export default app;
