/**
 * Collect Worker - discovers, normalizes and ranks videos for one keyword
 */
import { Worker } from 'bullmq';
import { createWorker } from './base-worker.js';
import { config } from '../config/index.js';
import { QUEUE_NAMES, type CollectJob } from '../queues/index.js';
import {
    collectKeyword,
    collectorSettingsFromConfig,
    defaultCollectorDeps,
    type CollectorDeps,
    type KeywordResult,
} from '../services/collector.service.js';

export async function processCollectJob(
    data: CollectJob,
    deps: CollectorDeps = defaultCollectorDeps
): Promise<KeywordResult> {
    return collectKeyword(data.keyword, collectorSettingsFromConfig(config), deps);
}

export function createCollectWorker(): Worker<CollectJob, KeywordResult> {
    return createWorker<CollectJob, KeywordResult>({
        queueName: QUEUE_NAMES.COLLECT,
        // Keyword parallelism in the service is the worker's concurrency
        concurrency: config.keywordConcurrency,
        processor: async (job, jobLogger) => {
            const result = await processCollectJob(job.data);

            jobLogger.info('Keyword collection finished', {
                runId: job.data.runId,
                keyword: job.data.keyword,
                videos: result.videos.length,
                success: result.success,
            });

            return result;
        },
    });
}
