/**
 * Run Worker - turns each scheduled tick into a run flow
 */
import { Worker } from 'bullmq';
import { createWorker } from './base-worker.js';
import { QUEUE_NAMES, type RunJob } from '../queues/index.js';
import { triggerRun, type TriggeredRun } from '../services/scheduler.service.js';

export function createRunWorker(): Worker<RunJob, TriggeredRun> {
    return createWorker<RunJob, TriggeredRun>({
        queueName: QUEUE_NAMES.RUN,
        processor: async (job) => triggerRun(job.data.triggeredBy, job.data.keywords),
    });
}
