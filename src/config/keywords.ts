/**
 * Keyword list configuration
 * Keywords come from KEYWORDS (comma separated) or a JSON file at KEYWORDS_PATH
 */
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { config } from './index.js';
import { logger } from '../observability/logger.js';

const keywordFileSchema = z.object({
    keywords: z.array(z.string()),
});

let keywordCache: string[] | null = null;
let lastLoadTime = 0;
const CACHE_TTL = 300000; // 5 minutes

/**
 * Trim, drop empties and duplicates while keeping the configured order
 */
export function cleanKeywords(keywords: string[]): string[] {
    const seen = new Set<string>();
    const cleaned: string[] = [];

    for (const keyword of keywords) {
        const trimmed = keyword.trim();
        const key = trimmed.toLowerCase();
        if (!trimmed || seen.has(key)) continue;
        seen.add(key);
        cleaned.push(trimmed);
    }

    return cleaned;
}

/**
 * Load keywords from env or file
 */
export async function loadKeywords(): Promise<string[]> {
    const now = Date.now();

    if (keywordCache && now - lastLoadTime < CACHE_TTL) {
        return keywordCache;
    }

    if (config.keywords.length > 0) {
        keywordCache = cleanKeywords(config.keywords);
        logger.debug('Using keywords from environment', { count: keywordCache.length });
    } else {
        const content = await readFile(config.keywordsPath, 'utf-8');
        const parsed = keywordFileSchema.safeParse(JSON.parse(content));

        if (!parsed.success) {
            throw new Error(`Invalid keyword file ${config.keywordsPath}: expected { "keywords": [] }`);
        }

        keywordCache = cleanKeywords(parsed.data.keywords);
        logger.info('Loaded keywords from file', {
            path: config.keywordsPath,
            count: keywordCache.length,
        });
    }

    lastLoadTime = now;
    return keywordCache;
}

export const keywordConfig = {
    loadKeywords,
    cleanKeywords,
};
