/**
 * Google Sheets exporter
 * Replaces the configured range with a header row followed by one row per video
 */
import { google } from 'googleapis';
import { config } from '../config/index.js';
import type { CanonicalVideo } from '../normalizers/types.js';
import { withCircuitBreaker } from '../services/resilience.js';
import { EXPORT_COLUMNS, flattenVideo, toRow, type CellValue } from './flatten.js';
import type { ExportContext, Exporter } from './types.js';

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export function toSheetValues(videos: readonly CanonicalVideo[], scrapedAt: Date): CellValue[][] {
    return [
        [...EXPORT_COLUMNS],
        ...videos.map(video => toRow(flattenVideo(video, scrapedAt))),
    ];
}

const RANGE_START_PATTERN = /^(?:(.+)!)?([A-Za-z]+)(\d+)(?::[A-Za-z]*\d*)?$/;

function columnIndex(letters: string): number {
    let index = 0;
    for (const letter of letters.toUpperCase()) {
        index = index * 26 + (letter.charCodeAt(0) - 64);
    }
    return index;
}

function columnLetters(index: number): string {
    let letters = '';
    for (let rest = index; rest > 0; rest = Math.floor((rest - 1) / 26)) {
        letters = String.fromCharCode(65 + ((rest - 1) % 26)) + letters;
    }
    return letters;
}

/**
 * The range the values are written to: it starts where the configured range
 * starts and grows to fit every row and column.
 */
export function fitRange(configured: string, rows: number, columns: number): string {
    const match = RANGE_START_PATTERN.exec(configured.trim());
    if (!match) {
        return configured;
    }

    const [, sheet, startColumn, startRow] = match;
    const endColumn = columnLetters(columnIndex(startColumn) + columns - 1);
    const endRow = Number(startRow) + rows - 1;
    const prefix = sheet ? `${sheet}!` : '';
    return `${prefix}${startColumn.toUpperCase()}${startRow}:${endColumn}${endRow}`;
}

export const sheetsExporter: Exporter = {
    name: 'google_sheets',

    async export(videos: readonly CanonicalVideo[], context: ExportContext): Promise<string> {
        const spreadsheetId = config.googleSheetsId;
        if (!spreadsheetId) {
            throw new Error('GOOGLE_SHEETS_ID is not configured');
        }

        // Credentials come from GOOGLE_APPLICATION_CREDENTIALS
        const auth = new google.auth.GoogleAuth({ scopes: [SHEETS_SCOPE] });
        const sheets = google.sheets({ version: 'v4', auth });
        const values = toSheetValues(videos, context.scrapedAt);
        const clearRange = config.googleSheetsRange;
        const range = fitRange(clearRange, values.length, EXPORT_COLUMNS.length);

        await withCircuitBreaker('sheets', async () => {
            await sheets.spreadsheets.values.clear({ spreadsheetId, range: clearRange });
            await sheets.spreadsheets.values.update({
                spreadsheetId,
                range,
                valueInputOption: 'RAW',
                requestBody: { values },
            });
        });

        return `${spreadsheetId}!${range}`;
    },
};
