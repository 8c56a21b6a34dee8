/**
 * Export dispatcher
 * Runs every configured exporter; one sink failing does not stop the others
 */
import type { CanonicalVideo } from '../normalizers/types.js';
import { createLogger } from '../observability/logger.js';
import { exportsTotal } from '../observability/metrics.js';
import { getExportKey, isStorageConfigured, uploadFile } from '../storage/index.js';
import { csvExporter } from './csv.exporter.js';
import { jsonExporter } from './json.exporter.js';
import { sheetsExporter } from './sheets.exporter.js';
import type { ExportContext, ExportOutcome, Exporter, OutputFormat } from './types.js';

const exporters: Map<OutputFormat, Exporter> = new Map([
    ['json', jsonExporter],
    ['csv', csvExporter],
    ['google_sheets', sheetsExporter],
]);

// Exporters whose location is a local file that may be uploaded
const FILE_EXPORTERS: ReadonlySet<OutputFormat> = new Set(['json', 'csv']);

export function getExporter(format: OutputFormat): Exporter | undefined {
    return exporters.get(format);
}

export interface ExportRunOptions {
    formats: readonly OutputFormat[];
    upload?: boolean;
}

/**
 * Export a run's final videos. Nothing is written for an empty run.
 */
export async function exportRun(
    videos: readonly CanonicalVideo[],
    context: ExportContext,
    options: ExportRunOptions
): Promise<ExportOutcome[]> {
    const log = createLogger({ runId: context.runId, stage: 'export' });

    if (videos.length === 0) {
        log.error('No videos to export, skipping all exporters');
        return [];
    }

    const upload = options.upload ?? isStorageConfigured();
    const outcomes: ExportOutcome[] = [];

    for (const format of options.formats) {
        const exporter = getExporter(format);
        if (!exporter) continue;

        try {
            const location = await exporter.export(videos, context);
            const outcome: ExportOutcome = { exporter: format, status: 'success', count: videos.length, location };

            if (upload && FILE_EXPORTERS.has(format)) {
                try {
                    outcome.uploadedUrl = await uploadFile(getExportKey(context.runId, location), location);
                } catch (error) {
                    log.error('Export upload failed', error, { exporter: format, location });
                }
            }

            exportsTotal.labels(format, 'success').inc();
            log.info('Export complete', { exporter: format, count: videos.length, location });
            outcomes.push(outcome);
        } catch (error) {
            exportsTotal.labels(format, 'failed').inc();
            log.error('Export failed', error, { exporter: format });
            outcomes.push({
                exporter: format,
                status: 'failed',
                count: 0,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    return outcomes;
}

export { toCsv, escapeCsvField } from './csv.exporter.js';
export { toSheetValues } from './sheets.exporter.js';
export * from './flatten.js';
export * from './types.js';
