/**
 * Discovery provider fetcher
 * Calls an HTTP service that performs the actual platform discovery and returns raw video records
 */
import { z } from 'zod';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { withCircuitBreaker } from '../services/resilience.js';
import type { DiscoveryRequest, Fetcher, FetchResult, RawVideoRecord } from './types.js';

const recordListSchema = z.array(z.unknown());

// Providers wrap their list under different keys; the first array found wins
const ENVELOPE_KEYS = ['items', 'itemList', 'data', 'videos'] as const;

const envelopeSchema = z.object({
    items: recordListSchema.optional(),
    itemList: recordListSchema.optional(),
    data: recordListSchema.optional(),
    videos: recordListSchema.optional(),
}).passthrough();

export class ProviderError extends Error {
    constructor(message: string, readonly status?: number) {
        super(message);
        this.name = 'ProviderError';
    }
}

/**
 * Pull the record list out of a provider response body
 */
export function extractRecords(body: unknown): RawVideoRecord[] {
    const list = recordListSchema.safeParse(body);
    if (list.success) {
        return list.data;
    }

    const envelope = envelopeSchema.safeParse(body);
    if (envelope.success) {
        for (const key of ENVELOPE_KEYS) {
            const records = envelope.data[key];
            if (records) return records;
        }
    }

    throw new ProviderError('Provider response contains no record list');
}

export function buildDiscoveryUrl(baseUrl: string, request: DiscoveryRequest): string {
    const url = new URL(`discover/${request.method}`, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
    url.searchParams.set('keyword', request.keyword);
    url.searchParams.set('limit', String(request.limit));
    return url.toString();
}

async function requestRecords(request: DiscoveryRequest, baseUrl: string): Promise<RawVideoRecord[]> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.providerTimeoutMs);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (config.providerToken) {
        headers['Authorization'] = `Bearer ${config.providerToken}`;
    }

    try {
        const response = await fetch(buildDiscoveryUrl(baseUrl, request), {
            headers,
            signal: controller.signal,
        });

        if (!response.ok) {
            throw new ProviderError(`Provider returned ${response.status} for ${request.method}`, response.status);
        }

        const body: unknown = await response.json();
        return extractRecords(body);
    } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
            throw new ProviderError(`Provider timed out after ${config.providerTimeoutMs}ms`);
        }
        throw error;
    } finally {
        clearTimeout(timeout);
    }
}

export const providerFetcher: Fetcher = {
    name: 'provider',

    async discover(request: DiscoveryRequest): Promise<FetchResult> {
        const baseUrl = config.providerBaseUrl;
        if (!baseUrl) {
            throw new ProviderError('PROVIDER_BASE_URL is not configured');
        }

        const startTime = Date.now();
        const records = await withCircuitBreaker('provider', () => requestRecords(request, baseUrl));
        const limited = records.slice(0, request.limit);

        logger.debug('Provider discovery complete', {
            keyword: request.keyword,
            discoveryMethod: request.method,
            returned: records.length,
            kept: limited.length,
        });

        return {
            records: limited,
            metadata: {
                method: request.method,
                source: 'provider',
                totalFetched: limited.length,
                durationMs: Date.now() - startTime,
            },
        };
    },
};
