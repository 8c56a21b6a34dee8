/**
 * Collector
 * Runs discovery for keywords, normalizes and ranks the results, and merges a run
 */
import type { Config } from '../config/index.js';
import { discover } from '../fetchers/index.js';
import type { DiscoveryRequest, FetchResult } from '../fetchers/types.js';
import { normalizeBatch } from '../normalizers/index.js';
import type { CanonicalVideo, RankingOptions } from '../normalizers/types.js';
import { createLogger } from '../observability/logger.js';
import { videosTrending } from '../observability/metrics.js';
import type { DiscoveryMethod } from '../queues/schemas.js';
import { deduplicateByUrl } from './dedup.service.js';
import { filterTrending, rankAndLimit } from './ranker.service.js';

export interface DelayRange {
    minMs: number;
    maxMs: number;
}

export interface CollectorSettings {
    discoveryMethods: readonly DiscoveryMethod[];
    maxVideosPerKeyword: number;
    maxTotalVideos: number;
    minVideosRequired: number;
    keywordConcurrency: number;
    trendingOnly: boolean;
    sortByPerformance: boolean;
    hookMaxLength: number;
    requestDelay: DelayRange;
    batchDelay: DelayRange;
    ranking: RankingOptions;
}

export interface CollectorDeps {
    discover: (request: DiscoveryRequest) => Promise<FetchResult>;
    sleep: (ms: number) => Promise<void>;
    random: () => number;
    now: () => Date;
}

export interface KeywordResult {
    keyword: string;
    videos: CanonicalVideo[];
    discovered: number;
    fallbacks: number;
    failedMethods: DiscoveryMethod[];
    success: boolean;
}

export interface RunSummary {
    videos: CanonicalVideo[];
    keywords: Array<{
        keyword: string;
        count: number;
        success: boolean;
        failedMethods: DiscoveryMethod[];
    }>;
    failedKeywords: string[];
}

export const defaultCollectorDeps: CollectorDeps = {
    discover: request => discover(request),
    sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
    random: Math.random,
    now: () => new Date(),
};

export function rankingOptionsFromConfig(cfg: Config): RankingOptions {
    return {
        minViews: cfg.minViews,
        minEngagementRate: cfg.minEngagementRate,
        weights: {
            likes: cfg.scoreWeightLikes,
            comments: cfg.scoreWeightComments,
            shares: cfg.scoreWeightShares,
            engagementScale: cfg.scoreEngagementScale,
        },
    };
}

export function collectorSettingsFromConfig(cfg: Config): CollectorSettings {
    return {
        discoveryMethods: cfg.discoveryMethods,
        maxVideosPerKeyword: cfg.maxVideosPerKeyword,
        maxTotalVideos: cfg.maxTotalVideos,
        minVideosRequired: cfg.minVideosRequired,
        keywordConcurrency: cfg.keywordConcurrency,
        trendingOnly: cfg.trendingOnly,
        sortByPerformance: cfg.sortByPerformance,
        hookMaxLength: cfg.hookMaxLength,
        requestDelay: { minMs: cfg.requestDelayMinMs, maxMs: cfg.requestDelayMaxMs },
        batchDelay: { minMs: cfg.batchDelayMinMs, maxMs: cfg.batchDelayMaxMs },
        ranking: rankingOptionsFromConfig(cfg),
    };
}

/**
 * Uniform integer delay in [minMs, maxMs]
 */
export function randomDelay(range: DelayRange, random: () => number): number {
    const span = Math.max(0, range.maxMs - range.minMs);
    return range.minMs + Math.floor(random() * (span + 1));
}

/**
 * Collect one keyword: try each discovery method in order until enough unique
 * videos are found, then filter and rank. A failing method is skipped.
 */
export async function collectKeyword(
    keyword: string,
    settings: CollectorSettings,
    deps: CollectorDeps = defaultCollectorDeps
): Promise<KeywordResult> {
    const log = createLogger({ keyword, stage: 'discover' });
    const collections: CanonicalVideo[][] = [];
    const failedMethods: DiscoveryMethod[] = [];
    let discovered = 0;
    let fallbacks = 0;
    let unique = 0;

    for (const method of settings.discoveryMethods) {
        if (unique >= settings.maxVideosPerKeyword) break;

        await deps.sleep(randomDelay(settings.requestDelay, deps.random));

        try {
            const result = await deps.discover({ keyword, method, limit: settings.maxVideosPerKeyword });
            const normalized = normalizeBatch(result.records, keyword, {
                ranking: settings.ranking,
                hookMaxLength: settings.hookMaxLength,
                now: deps.now,
            }, method);

            discovered += result.records.length;
            fallbacks += normalized.fallbacks;
            collections.push(normalized.videos);
            unique = deduplicateByUrl(...collections).length;

            log.debug('Discovery method complete', {
                discoveryMethod: method,
                records: result.records.length,
                unique,
            });
        } catch (error) {
            failedMethods.push(method);
            log.warn('Discovery method failed, skipping', {
                discoveryMethod: method,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    const merged = deduplicateByUrl(...collections);
    const candidates = settings.trendingOnly ? filterTrending(merged) : merged;
    const videos = rankAndLimit(candidates, settings.maxVideosPerKeyword, settings.sortByPerformance);
    const trending = videos.filter(video => video.isTrending).length;
    if (trending > 0) {
        videosTrending.inc(trending);
    }

    const success = videos.length >= settings.minVideosRequired;
    const summary = { discovered, unique: merged.length, kept: videos.length, trending, failedMethods };
    if (success) {
        log.info('Keyword collected', summary);
    } else {
        log.warn('Keyword collected fewer videos than required', {
            ...summary,
            minVideosRequired: settings.minVideosRequired,
        });
    }

    return { keyword, videos, discovered, fallbacks, failedMethods, success };
}

/**
 * Collect keywords in batches of keywordConcurrency, pausing between batches
 */
export async function collectKeywords(
    keywords: readonly string[],
    settings: CollectorSettings,
    deps: CollectorDeps = defaultCollectorDeps
): Promise<KeywordResult[]> {
    const results: KeywordResult[] = [];
    const batchSize = Math.max(1, settings.keywordConcurrency);

    for (let start = 0; start < keywords.length; start += batchSize) {
        if (start > 0) {
            await deps.sleep(randomDelay(settings.batchDelay, deps.random));
        }

        const batch = keywords.slice(start, start + batchSize);
        results.push(...await Promise.all(batch.map(keyword => collectKeyword(keyword, settings, deps))));
    }

    return results;
}

/**
 * Merge keyword results into the run's final list: cross-keyword duplicates
 * keep their first occurrence in keyword order, then the total cap applies.
 */
export function finalizeRun(
    results: readonly KeywordResult[],
    maxTotalVideos: number,
    sortByPerformance: boolean
): RunSummary {
    const merged = deduplicateByUrl(...results.map(result => result.videos));

    return {
        videos: rankAndLimit(merged, maxTotalVideos, sortByPerformance),
        keywords: results.map(result => ({
            keyword: result.keyword,
            count: result.videos.length,
            success: result.success,
            failedMethods: result.failedMethods,
        })),
        failedKeywords: results.filter(result => !result.success).map(result => result.keyword),
    };
}

/**
 * Full in-process run without queues
 */
export async function runCollection(
    keywords: readonly string[],
    settings: CollectorSettings,
    deps: CollectorDeps = defaultCollectorDeps
): Promise<RunSummary> {
    const results = await collectKeywords(keywords, settings, deps);
    return finalizeRun(results, settings.maxTotalVideos, settings.sortByPerformance);
}

export const collectorService = {
    collectKeyword,
    collectKeywords,
    finalizeRun,
    runCollection,
};
