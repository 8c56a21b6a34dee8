/**
 * BullMQ queues and the flow producer that links a run's jobs
 */
import { FlowProducer, Queue } from 'bullmq';
import { getRedisConnection } from './redis.js';
import { QUEUE_NAMES, type QueueName } from './schemas.js';
import { logger } from '../observability/logger.js';
import { queueDepth, dlqSize } from '../observability/metrics.js';

export const DEFAULT_JOB_OPTIONS = {
    attempts: 3,
    backoff: {
        type: 'exponential' as const,
        delay: 1000, // 1s, 2s, 4s
    },
    removeOnComplete: {
        age: 86400, // Keep completed jobs (and their results) for 24 hours
        count: 1000,
    },
    removeOnFail: {
        age: 604800, // Keep failed jobs for 7 days
    },
};

const queues = new Map<QueueName, Queue>();
let flowProducer: FlowProducer | null = null;

export function initializeQueues(): Map<QueueName, Queue> {
    const connection = getRedisConnection();

    for (const queueName of Object.values(QUEUE_NAMES)) {
        const queue = new Queue(queueName, {
            connection,
            defaultJobOptions: DEFAULT_JOB_OPTIONS,
        });

        queues.set(queueName, queue);
        logger.info(`Queue initialized: ${queueName}`);
    }

    return queues;
}

export function getQueue(name: QueueName): Queue | undefined {
    return queues.get(name);
}

export function isQueueName(value: string): value is QueueName {
    return Object.values<string>(QUEUE_NAMES).includes(value);
}

/**
 * Flow producer for parent/child run jobs, created on first use
 */
export function getFlowProducer(): FlowProducer {
    if (!flowProducer) {
        flowProducer = new FlowProducer({ connection: getRedisConnection() });
    }
    return flowProducer;
}

/**
 * Update queue depth metrics for all queues
 */
export async function updateQueueMetrics(): Promise<void> {
    for (const [queueName, queue] of queues.entries()) {
        try {
            const counts = await queue.getJobCounts('waiting', 'active', 'delayed', 'waiting-children');
            const totalDepth = Object.values(counts).reduce((sum, count) => sum + count, 0);
            queueDepth.labels(queueName).set(totalDepth);

            if (queueName === QUEUE_NAMES.DLQ) {
                dlqSize.set(totalDepth);
            }
        } catch (error) {
            logger.error(`Failed to get queue metrics for ${queueName}`, error);
        }
    }
}

export async function closeQueues(): Promise<void> {
    if (flowProducer) {
        await flowProducer.close();
        flowProducer = null;
    }

    for (const [name, queue] of queues.entries()) {
        await queue.close();
        logger.info(`Queue closed: ${name}`);
    }
    queues.clear();
}

export * from './schemas.js';
