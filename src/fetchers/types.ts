/**
 * Fetcher types and interfaces
 */
import type { DiscoveryMethod } from '../queues/schemas.js';

/**
 * Raw record as returned by a discovery path. Its shape is not trusted.
 */
export type RawVideoRecord = unknown;

/**
 * One discovery attempt for a keyword
 */
export interface DiscoveryRequest {
    keyword: string;
    method: DiscoveryMethod;
    limit: number;
}

export interface FetchResult {
    records: RawVideoRecord[];
    metadata: {
        method: DiscoveryMethod;
        source: string;
        totalFetched: number;
        durationMs: number;
    };
}

/**
 * Fetcher interface - every discovery source implements this
 */
export interface Fetcher {
    name: string;
    discover(request: DiscoveryRequest): Promise<FetchResult>;
}
