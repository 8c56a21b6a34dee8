/**
 * Mock fetcher
 * Synthetic raw records for dry runs. Output is seeded by keyword and method,
 * so the same request always yields the same records.
 */
import { createHash } from 'crypto';
import type { DiscoveryMethod } from '../queues/schemas.js';
import type { DiscoveryRequest, Fetcher, FetchResult, RawVideoRecord } from './types.js';

const MAX_MOCK_RECORDS = 15;
const DAY_MS = 86400000;

const CREATORS = ['budgetqueen', 'financebro', 'moneytips', 'wealthtips', 'frugalliving', 'trendsetter'];

const DESCRIPTION_TEMPLATES = [
    'How I handle {keyword} on a $3000 salary. Saved more than ever #{tag} #finance',
    '3 {keyword} tips that changed my life! #{tag} #moneytips',
    'Stop doing this with your {keyword} #{tag} #fyp',
    'Nobody talks about this {keyword} trick\nwatch till the end #{tag} #viral',
];

const SOUNDS = [
    { title: 'original sound', authorName: 'moneytips' },
    { title: 'Lo-fi Study Beat', authorName: 'chillhop' },
    { title: 'Cash Flow', authorName: 'beatmaker' },
];

type Random = () => number;

// mulberry32
function seededRandom(seed: string): Random {
    let state = createHash('sha256').update(seed).digest().readUInt32LE(0);
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

function randomInt(random: Random, min: number, max: number): number {
    return Math.floor(random() * (max - min + 1)) + min;
}

function pick<T>(random: Random, items: readonly T[]): T {
    return items[Math.floor(random() * items.length)];
}

function compactNumber(value: number): string {
    if (value >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
    if (value >= 1_000) return `${(value / 1_000).toFixed(1)}K`;
    return String(value);
}

/**
 * One synthetic record. The shape rotates through the layouts real discovery paths return.
 */
function buildRecord(random: Random, keyword: string, method: DiscoveryMethod, index: number, now: number): RawVideoRecord {
    const id = String(7000000000000000000n + BigInt(randomInt(random, 1, 999_999_999)));
    const author = pick(random, CREATORS);
    const tag = keyword.replace(/\s+/g, '').toLowerCase();
    const desc = pick(random, DESCRIPTION_TEMPLATES).replace('{keyword}', keyword).replace('{tag}', tag);
    const createTime = Math.floor((now - randomInt(random, 0, 30) * DAY_MS - randomInt(random, 0, 23) * 3600000) / 1000);
    const sound = pick(random, SOUNDS);

    const views = randomInt(random, 1000, 1_000_000);
    const likes = randomInt(random, 100, Math.max(100, Math.floor(views / 10)));
    const comments = randomInt(random, 10, Math.max(10, Math.floor(likes / 5)));
    const shares = randomInt(random, 5, Math.max(5, Math.floor(likes / 10)));
    const favorites = randomInt(random, 0, Math.max(0, Math.floor(likes / 4)));

    switch (index % 4) {
        case 0:
            return {
                id,
                desc,
                createTime,
                author: { uniqueId: author },
                music: sound,
                video: { duration: randomInt(random, 8, 90) },
                stats: { playCount: views, diggCount: likes, commentCount: comments, shareCount: shares, collectCount: favorites },
            };
        case 1:
            return {
                itemInfo: {
                    itemStruct: {
                        id,
                        desc,
                        createTime: String(createTime),
                        author: { uniqueId: author },
                        stats: { playCount: views, diggCount: likes, commentCount: comments, shareCount: shares },
                    },
                },
            };
        case 2:
            return {
                url: `https://www.tiktok.com/@${author}/video/${id}`,
                description: desc,
                author: `@${author}`,
                timestamp: new Date(createTime * 1000).toISOString(),
                discoveredVia: method,
                statistics: { views, likes, comments, shares },
            };
        default:
            return {
                url: `https://www.tiktok.com/@${author}/video/${id}`,
                desc,
                statsText: `${compactNumber(views)} views, ${compactNumber(likes)} likes, ${compactNumber(comments)} comments`,
            };
    }
}

export function generateMockRecords(keyword: string, method: DiscoveryMethod, limit: number, now = Date.now()): RawVideoRecord[] {
    const random = seededRandom(`${keyword.toLowerCase()}:${method}`);
    const count = Math.max(0, Math.min(limit, MAX_MOCK_RECORDS));
    return Array.from({ length: count }, (_, index) => buildRecord(random, keyword, method, index, now));
}

export const mockFetcher: Fetcher = {
    name: 'mock',

    async discover(request: DiscoveryRequest): Promise<FetchResult> {
        const records = generateMockRecords(request.keyword, request.method, request.limit);
        return {
            records,
            metadata: {
                method: request.method,
                source: 'mock',
                totalFetched: records.length,
                durationMs: 0,
            },
        };
    },
};
