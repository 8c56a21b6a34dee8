/**
 * Trigger Run Script
 * Queues a manual run for the running service to process
 *
 * Usage: npm run trigger -- [keyword ...]
 */
import { waitForRedis, closeRedisConnection } from '../queues/redis.js';
import { closeQueues, initializeQueues } from '../queues/index.js';
import { cleanKeywords } from '../config/keywords.js';
import { logger } from '../observability/logger.js';
import { triggerRun } from '../services/scheduler.service.js';

async function main(): Promise<void> {
    try {
        await waitForRedis(5000);
        initializeQueues();

        const keywords = cleanKeywords(process.argv.slice(2));
        const run = await triggerRun('manual', keywords.length > 0 ? keywords : undefined);
        logger.info('Run queued', { runId: run.runId, keywords: run.keywords });
    } finally {
        await closeQueues();
        await closeRedisConnection();
    }
}

main().catch((error: unknown) => {
    logger.error('Failed to queue run', error);
    process.exit(1);
});
