/**
 * Export Worker - parent job of a run; merges the keyword results and exports them
 */
import { Worker } from 'bullmq';
import { createWorker } from './base-worker.js';
import { config } from '../config/index.js';
import { exportRun } from '../exporters/index.js';
import type { ExportOutcome } from '../exporters/types.js';
import { logger } from '../observability/logger.js';
import { QUEUE_NAMES, type ExportJob } from '../queues/index.js';
import { keywordResultSchema } from '../queues/results.js';
import { finalizeRun, type KeywordResult } from '../services/collector.service.js';

export interface RunReport {
    runId: string;
    videoCount: number;
    keywords: number;
    failedKeywords: string[];
    exports: ExportOutcome[];
}

/**
 * Read the collect children's return values, in the run's keyword order.
 * Keywords without a readable result (failed jobs) are reported as failed.
 */
export function readKeywordResults(
    keywords: readonly string[],
    childrenValues: Record<string, unknown>
): { results: KeywordResult[]; missing: string[] } {
    const byKeyword = new Map<string, KeywordResult>();

    for (const [jobKey, value] of Object.entries(childrenValues)) {
        const parsed = keywordResultSchema.safeParse(value);
        if (parsed.success) {
            byKeyword.set(parsed.data.keyword, parsed.data);
        } else {
            logger.warn('Ignoring unreadable collect result', { jobKey });
        }
    }

    const results: KeywordResult[] = [];
    const missing: string[] = [];
    for (const keyword of keywords) {
        const result = byKeyword.get(keyword);
        if (result) {
            results.push(result);
        } else {
            missing.push(keyword);
        }
    }

    return { results, missing };
}

export async function processExportJob(
    data: ExportJob,
    childrenValues: Record<string, unknown>
): Promise<RunReport> {
    const { results, missing } = readKeywordResults(data.keywords, childrenValues);
    const summary = finalizeRun(results, config.maxTotalVideos, config.sortByPerformance);

    const exports = await exportRun(summary.videos, {
        runId: data.runId,
        outputDir: config.outputDir,
        scrapedAt: new Date(data.triggeredAt),
    }, {
        formats: config.outputFormats,
    });

    return {
        runId: data.runId,
        videoCount: summary.videos.length,
        keywords: data.keywords.length,
        failedKeywords: [...summary.failedKeywords, ...missing],
        exports,
    };
}

export function createExportWorker(): Worker<ExportJob, RunReport> {
    return createWorker<ExportJob, RunReport>({
        queueName: QUEUE_NAMES.EXPORT,
        processor: async (job, jobLogger) => {
            const childrenValues = await job.getChildrenValues();
            const report = await processExportJob(job.data, childrenValues);

            jobLogger.info('Run complete', {
                runId: report.runId,
                videos: report.videoCount,
                failedKeywords: report.failedKeywords,
                exports: report.exports.map(outcome => `${outcome.exporter}:${outcome.status}`),
            });

            return report;
        },
    });
}
