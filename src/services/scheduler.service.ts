/**
 * Scheduler Service
 * Registers the repeatable run job and starts runs as BullMQ flows
 */
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/index.js';
import { loadKeywords } from '../config/keywords.js';
import { DEFAULT_JOB_OPTIONS, getFlowProducer, getQueue, QUEUE_NAMES } from '../queues/index.js';
import type { CollectJob, ExportJob, RunJob, TriggerSource } from '../queues/schemas.js';
import { logger } from '../observability/logger.js';

const SCHEDULED_RUN_JOB = 'scheduled-run';

export interface TriggeredRun {
    runId: string;
    keywords: string[];
    exportJobId: string | undefined;
}

export interface ScheduledRun {
    key: string;
    name: string;
    pattern: string | null;
    tz: string | null;
    next: string | null;
}

/**
 * Start a run: one export job waiting on a collect child per keyword
 */
export async function triggerRun(
    triggeredBy: TriggerSource,
    keywordOverride?: string[]
): Promise<TriggeredRun> {
    const keywords = keywordOverride && keywordOverride.length > 0 ? keywordOverride : await loadKeywords();
    if (keywords.length === 0) {
        throw new Error('No keywords configured for the run');
    }

    const runId = uuidv4();
    const triggeredAt = new Date().toISOString();

    const exportJob: ExportJob = { runId, keywords, triggeredBy, triggeredAt };

    const flow = await getFlowProducer().add({
        name: `export-${runId}`,
        queueName: QUEUE_NAMES.EXPORT,
        data: exportJob,
        opts: { ...DEFAULT_JOB_OPTIONS, jobId: runId },
        children: keywords.map(keyword => {
            const collectJob: CollectJob = { runId, keyword, triggeredBy };
            return {
                name: `collect-${keyword}`,
                queueName: QUEUE_NAMES.COLLECT,
                data: collectJob,
                opts: {
                    ...DEFAULT_JOB_OPTIONS,
                    // A keyword that keeps failing must not block the export
                    ignoreDependencyOnFailure: true,
                },
            };
        }),
    });

    logger.info('Run triggered', {
        runId,
        triggeredBy,
        keywordCount: keywords.length,
        exportJobId: flow.job.id,
    });

    return { runId, keywords, exportJobId: flow.job.id };
}

/**
 * Register the repeatable run job, replacing any earlier schedule
 */
export async function scheduleRuns(): Promise<string | undefined> {
    const runQueue = getQueue(QUEUE_NAMES.RUN);
    if (!runQueue) {
        logger.error('Run queue not initialized');
        return undefined;
    }

    await unscheduleRuns();

    if (!config.scheduleEnabled) {
        logger.info('Scheduled runs disabled');
        return undefined;
    }

    const runJob: RunJob = {
        triggeredBy: 'schedule',
        triggeredAt: new Date().toISOString(),
    };

    const job = await runQueue.add(SCHEDULED_RUN_JOB, runJob, {
        repeat: {
            pattern: config.scheduleCron,
            tz: config.scheduleTz,
        },
        removeOnComplete: 10,
        removeOnFail: 20,
    });

    logger.info('Runs scheduled', {
        cron: config.scheduleCron,
        tz: config.scheduleTz,
        jobId: job.id,
    });

    return job.id ?? undefined;
}

export async function unscheduleRuns(): Promise<number> {
    const runQueue = getQueue(QUEUE_NAMES.RUN);
    if (!runQueue) {
        return 0;
    }

    let removed = 0;
    for (const job of await runQueue.getRepeatableJobs()) {
        if (job.name === SCHEDULED_RUN_JOB && await runQueue.removeRepeatableByKey(job.key)) {
            removed++;
        }
    }

    if (removed > 0) {
        logger.info('Removed previous run schedule', { removed });
    }
    return removed;
}

export async function getScheduledJobs(): Promise<ScheduledRun[]> {
    const runQueue = getQueue(QUEUE_NAMES.RUN);
    if (!runQueue) {
        return [];
    }

    const repeatableJobs = await runQueue.getRepeatableJobs();

    return repeatableJobs.map(job => ({
        key: job.key,
        name: job.name,
        pattern: job.pattern ?? null,
        tz: job.tz ?? null,
        next: typeof job.next === 'number' ? new Date(job.next).toISOString() : null,
    }));
}

export const scheduler = {
    triggerRun,
    scheduleRuns,
    unscheduleRuns,
    getScheduledJobs,
};
