/**
 * Discovery dispatcher
 * Picks the configured fetcher and records discovery metrics
 */
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { discoveryErrors, videosDiscovered } from '../observability/metrics.js';
import { mockFetcher } from './mock.fetcher.js';
import { providerFetcher } from './provider.fetcher.js';
import type { DiscoveryRequest, Fetcher, FetchResult } from './types.js';

/**
 * Mock data wins when enabled; otherwise the HTTP provider
 */
export function getFetcher(): Fetcher {
    return config.useMockData ? mockFetcher : providerFetcher;
}

/**
 * Run one discovery attempt. Failures are counted and rethrown to the caller.
 */
export async function discover(request: DiscoveryRequest, fetcher: Fetcher = getFetcher()): Promise<FetchResult> {
    logger.debug('Routing discovery request', {
        keyword: request.keyword,
        discoveryMethod: request.method,
        fetcher: fetcher.name,
        limit: request.limit,
    });

    try {
        const result = await fetcher.discover(request);
        videosDiscovered.labels(request.method).inc(result.records.length);
        return result;
    } catch (error) {
        discoveryErrors.labels(request.method).inc();
        throw error;
    }
}

export { mockFetcher, generateMockRecords } from './mock.fetcher.js';
export { providerFetcher, extractRecords, buildDiscoveryUrl, ProviderError } from './provider.fetcher.js';
export * from './types.js';
