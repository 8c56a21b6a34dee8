/**
 * Deduplication helpers
 * Stable record hashes for id fallbacks and URL-based merging of discovery results
 */
import { createHash } from 'crypto';
import type { CanonicalVideo } from '../normalizers/types.js';

const TRACKING_PARAMS = [
    'utm_source',
    'utm_medium',
    'utm_campaign',
    'utm_content',
    'utm_term',
    'ref',
    'source',
    'is_from_webapp',
    'sender_device',
    'is_copy_url',
];

/**
 * Serialize with sorted keys so equal records hash equally regardless of key order
 */
function stableStringify(value: unknown, seen: WeakSet<object> = new WeakSet()): string {
    if (value === null || value === undefined) return 'null';
    if (typeof value === 'bigint') return `"${value.toString()}n"`;
    if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'null';
    if (typeof value === 'string' || typeof value === 'boolean') return JSON.stringify(value);
    if (typeof value !== 'object' || value === null) return 'null';
    if (value instanceof Date) return JSON.stringify(Number.isNaN(value.getTime()) ? null : value.toISOString());

    if (seen.has(value)) return '"[Circular]"';
    seen.add(value);

    let serialized: string;
    if (Array.isArray(value)) {
        serialized = `[${value.map(entry => stableStringify(entry, seen)).join(',')}]`;
    } else {
        const entries = Object.entries(value)
            .filter(([, entry]) => entry !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry, seen)}`);
        serialized = `{${entries.join(',')}}`;
    }

    seen.delete(value);
    return serialized;
}

/**
 * Deterministic 32-character id for records that carry none
 */
export function hashRecord(record: unknown): string {
    return createHash('sha256').update(stableStringify(record)).digest('hex').substring(0, 32);
}

/**
 * Canonicalize URL for consistent deduplication
 */
export function canonicalizeUrl(url: string): string {
    try {
        const parsed = new URL(url);
        // Remove tracking parameters
        TRACKING_PARAMS.forEach(param => parsed.searchParams.delete(param));
        // Remove trailing slash
        const path = parsed.pathname.replace(/\/+$/, '') || '/';
        // Lowercase host, keeping any port
        return `${parsed.protocol}//${parsed.host.toLowerCase()}${path}${parsed.search}`;
    } catch {
        // Not an absolute URL; compare it as written
        return url.trim();
    }
}

/**
 * Merge result sets from several discovery attempts. The first video seen for
 * a URL wins; later collections only add URLs not seen before.
 */
export function deduplicateByUrl(...collections: ReadonlyArray<readonly CanonicalVideo[]>): CanonicalVideo[] {
    const seen = new Set<string>();
    const merged: CanonicalVideo[] = [];

    for (const collection of collections) {
        for (const video of collection) {
            const key = canonicalizeUrl(video.url);
            if (seen.has(key)) continue;
            seen.add(key);
            merged.push(video);
        }
    }

    return merged;
}

export const dedupService = {
    hashRecord,
    canonicalizeUrl,
    deduplicateByUrl,
};
