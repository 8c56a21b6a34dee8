/**
 * Video Trend Collector - main entry point
 *
 * Worker-first service:
 * - BullMQ workers run scheduled and manual collection runs
 * - A repeatable job starts a run on the configured cron schedule
 * - Internal Fastify endpoints expose health, readiness, metrics and admin routes
 */
import { config, getRedactedConfig } from './config/index.js';
import { logger } from './observability/logger.js';
import { waitForRedis, closeRedisConnection } from './queues/redis.js';
import { initializeQueues, closeQueues } from './queues/index.js';
import { scheduleRuns } from './services/scheduler.service.js';
import { startWorkers, closeWorkers } from './workers/index.js';
import { startServer, stopServer } from './server/index.js';

const REDIS_STARTUP_TIMEOUT_MS = 30000;

async function main(): Promise<void> {
    logger.info('Starting Video Trend Collector...');
    logger.info('Configuration loaded', getRedactedConfig(config));

    try {
        logger.info('Connecting to Redis...');
        await waitForRedis(REDIS_STARTUP_TIMEOUT_MS);

        logger.info('Initializing queues...');
        initializeQueues();

        logger.info('Starting workers...');
        startWorkers();

        await scheduleRuns();

        logger.info('Starting HTTP server...');
        await startServer();

        logger.info('Video Trend Collector started successfully');
    } catch (error) {
        logger.error('Failed to start Video Trend Collector', error);
        process.exit(1);
    }
}

async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
        // Stop accepting new work
        await stopServer();

        // Wait for workers to finish current jobs
        await closeWorkers();

        await closeQueues();
        await closeRedisConnection();

        logger.info('Video Trend Collector stopped gracefully');
        process.exit(0);
    } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
    }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

void main();
