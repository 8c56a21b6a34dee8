/**
 * JSON exporter - pretty-printed array of canonical videos
 */
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { CanonicalVideo } from '../normalizers/types.js';
import { exportFileStem } from './flatten.js';
import type { ExportContext, Exporter } from './types.js';

export const jsonExporter: Exporter = {
    name: 'json',

    async export(videos: readonly CanonicalVideo[], context: ExportContext): Promise<string> {
        await mkdir(context.outputDir, { recursive: true });
        const filePath = join(context.outputDir, `${exportFileStem(context.scrapedAt)}.json`);
        await writeFile(filePath, `${JSON.stringify(videos, null, 2)}\n`, 'utf-8');
        return filePath;
    },
};
