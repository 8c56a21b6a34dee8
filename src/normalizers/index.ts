/**
 * Normalizer entry point
 * Converts a batch of raw discovery records into canonical videos
 */
import { logger } from '../observability/logger.js';
import { normalizationFallbacks, videosNormalized } from '../observability/metrics.js';
import type { DiscoveryMethod } from '../queues/schemas.js';
import { normalizeVideo } from './video.normalizer.js';
import type { NormalizationResult, NormalizeOptions } from './types.js';

/**
 * Normalize a batch of raw records for one keyword. Every record yields a video;
 * unreadable ones come back as fallback records and are counted.
 */
export function normalizeBatch(
    records: readonly unknown[],
    keyword: string,
    options: NormalizeOptions,
    discoveryMethod?: DiscoveryMethod
): NormalizationResult {
    const normalizeOptions: NormalizeOptions = discoveryMethod
        ? { ...options, discoveryMethod }
        : options;

    const videos = records.map(record => normalizeVideo(record, keyword, normalizeOptions));
    const fallbacks = videos.filter(video => video.fallback).length;

    videosNormalized.inc(videos.length);
    if (fallbacks > 0) {
        normalizationFallbacks.inc(fallbacks);
    }

    logger.debug('Batch normalization complete', {
        keyword,
        discoveryMethod: discoveryMethod ?? null,
        total: records.length,
        fallbacks,
    });

    return { videos, fallbacks };
}

export { normalizeVideo, buildFallbackVideo, buildVideoUrl } from './video.normalizer.js';
export * from './types.js';
