/**
 * CSV exporter
 */
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { CanonicalVideo } from '../normalizers/types.js';
import { EXPORT_COLUMNS, exportFileStem, flattenVideo, toRow, type CellValue } from './flatten.js';
import type { ExportContext, Exporter } from './types.js';

/**
 * RFC 4180 field: quoted when it holds a comma, quote, CR or LF; quotes doubled
 */
export function escapeCsvField(value: CellValue): string {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(videos: readonly CanonicalVideo[], scrapedAt: Date): string {
    const lines = [
        EXPORT_COLUMNS.join(','),
        ...videos.map(video => toRow(flattenVideo(video, scrapedAt)).map(escapeCsvField).join(',')),
    ];
    return `${lines.join('\r\n')}\r\n`;
}

export const csvExporter: Exporter = {
    name: 'csv',

    async export(videos: readonly CanonicalVideo[], context: ExportContext): Promise<string> {
        await mkdir(context.outputDir, { recursive: true });
        const filePath = join(context.outputDir, `${exportFileStem(context.scrapedAt)}.csv`);
        await writeFile(filePath, toCsv(videos, context.scrapedAt), 'utf-8');
        return filePath;
    },
};
