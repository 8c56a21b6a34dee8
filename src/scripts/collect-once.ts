/**
 * Collect Once Script
 * Runs a full collection in-process, without Redis, and writes the exports
 *
 * Usage: npm run collect -- [keyword ...]
 */
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/index.js';
import { cleanKeywords, loadKeywords } from '../config/keywords.js';
import { exportRun } from '../exporters/index.js';
import { logger } from '../observability/logger.js';
import { collectorSettingsFromConfig, runCollection } from '../services/collector.service.js';

async function collectOnce(): Promise<void> {
    const argumentKeywords = cleanKeywords(process.argv.slice(2));
    const keywords = argumentKeywords.length > 0 ? argumentKeywords : await loadKeywords();
    const runId = uuidv4();
    const scrapedAt = new Date();

    logger.info('Starting one-off collection', {
        runId,
        keywords: keywords.length,
        mock: config.useMockData,
    });

    const summary = await runCollection(keywords, collectorSettingsFromConfig(config));
    const exports = await exportRun(summary.videos, { runId, outputDir: config.outputDir, scrapedAt }, {
        formats: config.outputFormats,
    });

    logger.info('One-off collection complete', {
        runId,
        videos: summary.videos.length,
        failedKeywords: summary.failedKeywords,
        exports: exports.map(outcome => outcome.location ?? `${outcome.exporter}:${outcome.status}`),
    });

    if (summary.videos.length === 0 || exports.some(outcome => outcome.status === 'failed')) {
        process.exitCode = 1;
    }
}

collectOnce().catch((error: unknown) => {
    logger.error('One-off collection failed', error);
    process.exit(1);
});
