/**
 * Exporter types and interfaces
 */
import type { OUTPUT_FORMATS } from '../config/index.js';
import type { CanonicalVideo } from '../normalizers/types.js';

export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface ExportContext {
    runId: string;
    outputDir: string;
    /** Run time; drives file names and the scrape_date/scrape_time columns */
    scrapedAt: Date;
}

export interface ExportOutcome {
    exporter: OutputFormat;
    status: 'success' | 'failed';
    count: number;
    /** File path, spreadsheet range or object URL */
    location?: string;
    uploadedUrl?: string;
    error?: string;
}

/**
 * Exporter interface - every sink implements this and returns where it wrote
 */
export interface Exporter {
    name: OutputFormat;
    export(videos: readonly CanonicalVideo[], context: ExportContext): Promise<string>;
}
