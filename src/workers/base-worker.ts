/**
 * Base worker factory with retry logic and event handlers
 */
import { Worker, Job } from 'bullmq';
import { getRedisConnection } from '../queues/redis.js';
import { logger, createLogger, type Logger } from '../observability/logger.js';
import { jobsTotal, jobDuration, retryCount, dlqSize } from '../observability/metrics.js';
import { getQueue, QUEUE_NAMES, type DLQJob, type QueueName } from '../queues/index.js';

export interface WorkerConfig<TData, TResult> {
    queueName: QueueName;
    concurrency?: number;
    processor: (job: Job<TData, TResult>, jobLogger: Logger) => Promise<TResult>;
}

/**
 * Create a worker with standard event handlers and metrics
 */
export function createWorker<TData, TResult>(workerConfig: WorkerConfig<TData, TResult>): Worker<TData, TResult> {
    const { queueName, concurrency = 1, processor } = workerConfig;

    const worker = new Worker<TData, TResult>(
        queueName,
        async (job: Job<TData, TResult>) => {
            const jobLogger = createLogger({
                jobId: job.id,
                queue: queueName,
            });

            const startTime = Date.now();
            jobLogger.info('Job started', { name: job.name, attempt: job.attemptsMade + 1 });

            try {
                const result = await processor(job, jobLogger);

                jobDuration.labels(queueName).observe((Date.now() - startTime) / 1000);
                jobLogger.info('Job completed', { durationMs: Date.now() - startTime });

                return result;
            } catch (error) {
                jobLogger.error('Job failed', error);
                throw error; // Re-throw to let BullMQ handle retries
            }
        },
        {
            connection: getRedisConnection(),
            concurrency,
        }
    );

    worker.on('completed', (job: Job<TData, TResult>) => {
        jobsTotal.labels(queueName, 'completed').inc();
        logger.debug(`Job ${job.id} completed in queue ${queueName}`);
    });

    worker.on('failed', (job: Job<TData, TResult> | undefined, error: Error) => {
        jobsTotal.labels(queueName, 'failed').inc();
        if (!job) return;

        const attemptsMade = job.attemptsMade;
        retryCount.labels(queueName, String(attemptsMade)).inc();

        logger.warn(`Job ${job.id} failed in queue ${queueName}`, {
            error: error.message,
            attemptsMade,
            maxAttempts: job.opts.attempts,
        });

        // Move to DLQ once all retries are exhausted
        if (job.opts.attempts && attemptsMade >= job.opts.attempts) {
            moveToDeadLetterQueue(job, queueName, error.message).catch((dlqError: unknown) => {
                logger.error('Failed to move job to DLQ', dlqError, { jobId: job.id, queue: queueName });
            });
        }
    });

    worker.on('stalled', (jobId: string) => {
        jobsTotal.labels(queueName, 'stalled').inc();
        logger.warn(`Job ${jobId} stalled in queue ${queueName}`);
    });

    worker.on('error', (error: Error) => {
        logger.error(`Worker error in queue ${queueName}`, error);
    });

    worker.on('ready', () => {
        logger.info(`Worker ready for queue: ${queueName}`);
    });

    return worker;
}

async function moveToDeadLetterQueue<TData, TResult>(
    job: Job<TData, TResult>,
    originalQueue: QueueName,
    failureReason: string
): Promise<void> {
    const dlq = getQueue(QUEUE_NAMES.DLQ);
    if (!dlq) {
        logger.error('DLQ not initialized, cannot move failed job');
        return;
    }

    const dlqJob: DLQJob = {
        originalQueue,
        originalJobId: job.id || 'unknown',
        originalJobData: job.data,
        failureReason,
        failedAt: new Date().toISOString(),
        attemptsMade: job.attemptsMade,
    };

    await dlq.add('dead-letter', dlqJob);
    dlqSize.inc();

    logger.warn('Job moved to DLQ', {
        jobId: job.id,
        originalQueue,
        failureReason,
    });
}
