import app from './app';
import env from './config/env';
import database from './lib/database';
import Helpers from './lib/helpers';
import { createLogger } from './lib/logger';
import { rabbitMQConnection } from './lib/queue/connection';
import { redisConnection } from './lib/redis';

const logger = createLogger('server');

const main = async () => {
    try {
        await database.connect();
        await redisConnection.connect();
        await rabbitMQConnection.connect();

        // Start Express server
        const server = app.listen(env.PORT, () => {
            logger.info(
                { port: env.PORT, environment: env.NODE_ENV },
                `API server running, health check: http://localhost:${env.PORT}/health`
            );
        });

        const closeConnections = async () => {
            await rabbitMQConnection.close();
            await redisConnection.disconnect();
            await database.disconnect();
        };

        // Graceful shutdown handlers
        const gracefulShutdown = (signal: string) => {
            logger.info({ signal }, 'Starting graceful shutdown');

            // Stop accepting new connections
            server.close(() => {
                logger.info('HTTP server closed');

                closeConnections()
                    .then(() => {
                        logger.info('Graceful shutdown completed');
                        process.exit(0);
                    })
                    .catch((error: unknown) => {
                        logger.error({ error: Helpers.errorMessage(error) }, 'Error during shutdown');
                        process.exit(1);
                    });
            });

            // Force shutdown after 30 seconds
            setTimeout(() => {
                logger.error('Forced shutdown after timeout');
                process.exit(1);
            }, 30000).unref();
        };

        // Listen for termination signals
        process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
        process.on('SIGINT', () => gracefulShutdown('SIGINT'));

        process.on('uncaughtException', (error) => {
            logger.fatal({ err: error }, 'Uncaught exception');
            gracefulShutdown('UNCAUGHT_EXCEPTION');
        });

        process.on('unhandledRejection', (reason) => {
            logger.fatal({ reason: Helpers.errorMessage(reason) }, 'Unhandled rejection');
            gracefulShutdown('UNHANDLED_REJECTION');
        });
    } catch (error) {
        logger.fatal({ error: Helpers.errorMessage(error) }, 'Failed to start server');
        process.exit(1);
    }
};

void main();
