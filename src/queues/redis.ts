/**
 * Shared Redis connection for queues, workers and the flow producer
 */
import { Redis } from 'ioredis';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';

const CONNECTION_NAME = 'video-trend-collector';
const PING_RETRY_MS = 500;

let redisConnection: Redis | null = null;

export function getRedisConnection(): Redis {
    if (redisConnection) {
        return redisConnection;
    }

    const connection = new Redis(config.redisUrl, {
        connectionName: CONNECTION_NAME,
        // BullMQ workers block on Redis and must not give up on a request
        maxRetriesPerRequest: null,
        enableReadyCheck: false,
    });

    connection.on('ready', () => logger.info('Redis ready'));
    connection.on('error', (error: Error) => logger.error('Redis error', error));
    connection.on('close', () => logger.warn('Redis connection closed'));
    connection.on('reconnecting', (delayMs: number) => logger.info('Redis reconnecting', { delayMs }));

    redisConnection = connection;
    return connection;
}

export async function isRedisConnected(): Promise<boolean> {
    if (!redisConnection) return false;
    try {
        return await redisConnection.ping() === 'PONG';
    } catch {
        return false;
    }
}

/**
 * Resolve once Redis answers a ping; reject after timeoutMs
 */
export async function waitForRedis(timeoutMs: number): Promise<void> {
    const connection = getRedisConnection();
    const deadline = Date.now() + timeoutMs;

    for (;;) {
        try {
            await connection.ping();
            return;
        } catch (error) {
            if (Date.now() >= deadline) {
                throw new Error(`Redis not reachable at startup after ${timeoutMs}ms`, { cause: error });
            }
        }
        await new Promise(resolve => setTimeout(resolve, PING_RETRY_MS));
    }
}

export async function closeRedisConnection(): Promise<void> {
    if (!redisConnection) return;

    const connection = redisConnection;
    redisConnection = null;
    await connection.quit();
    logger.info('Redis connection closed');
}
