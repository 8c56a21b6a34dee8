/**
 * Deduplication tests
 */
import { describe, it, expect } from 'vitest';
import { canonicalizeUrl, deduplicateByUrl, hashRecord } from '../../src/services/dedup.service.js';
import type { CanonicalVideo } from '../../src/normalizers/types.js';

const UNRESOLVED = { resolved: false, path: null };

function video(url: string, keyword = 'k'): CanonicalVideo {
    return {
        id: url,
        url,
        author: 'creator',
        description: '',
        hashtags: [],
        hook: '',
        music: '',
        timestamp: '2024-01-01T00:00:00.000Z',
        durationSec: 0,
        statistics: { views: 0, likes: 0, comments: 0, shares: 0, favorites: 0 },
        engagementRate: 0,
        performanceScore: 0,
        isTrending: false,
        keyword,
        discoveryMethod: null,
        resolution: {
            id: UNRESOLVED, url: UNRESOLVED, author: UNRESOLVED, description: UNRESOLVED,
            timestamp: UNRESOLVED, music: UNRESOLVED, durationSec: UNRESOLVED, views: UNRESOLVED,
            likes: UNRESOLVED, comments: UNRESOLVED, shares: UNRESOLVED, favorites: UNRESOLVED,
        },
        fallback: false,
    };
}

const A = 'https://www.tiktok.com/@a/video/1';
const B = 'https://www.tiktok.com/@b/video/2';
const C = 'https://www.tiktok.com/@c/video/3';

describe('deduplicateByUrl', () => {
    it('keeps first-seen order across collections', () => {
        const merged = deduplicateByUrl([video(A), video(B)], [video(A), video(C)]);
        expect(merged.map(v => v.url)).toEqual([A, B, C]);
    });

    it('keeps the first occurrence of a duplicate', () => {
        const merged = deduplicateByUrl([video(A, 'first')], [video(A, 'second')]);
        expect(merged).toHaveLength(1);
        expect(merged[0].keyword).toBe('first');
    });

    it('treats tracking parameters and trailing slashes as the same video', () => {
        const merged = deduplicateByUrl([video(A)], [video(`${A}/?is_from_webapp=1&sender_device=pc`)]);
        expect(merged).toHaveLength(1);
    });

    it('handles no collections and empty collections', () => {
        expect(deduplicateByUrl()).toEqual([]);
        expect(deduplicateByUrl([], [])).toEqual([]);
    });
});

describe('canonicalizeUrl', () => {
    it('lowercases the host and drops tracking parameters', () => {
        expect(canonicalizeUrl('https://WWW.TikTok.com/@a/video/1/?utm_source=x&lang=en'))
            .toBe('https://www.tiktok.com/@a/video/1?lang=en');
    });

    it('keeps a non-default port in the key', () => {
        expect(canonicalizeUrl('https://Media.Example.com:8443/v/1/')).toBe('https://media.example.com:8443/v/1');
        expect(canonicalizeUrl('https://media.example.com:443/v/1')).toBe('https://media.example.com/v/1');
    });

    it('returns relative or invalid URLs trimmed', () => {
        expect(canonicalizeUrl('  not a url  ')).toBe('not a url');
    });
});

describe('hashRecord', () => {
    it('is stable under key order and 32 hex characters long', () => {
        const first = hashRecord({ a: 1, b: { c: [1, 2] } });
        expect(first).toMatch(/^[0-9a-f]{32}$/);
        expect(hashRecord({ b: { c: [1, 2] }, a: 1 })).toBe(first);
    });

    it('differs for different records', () => {
        expect(hashRecord({ a: 1 })).not.toBe(hashRecord({ a: 2 }));
    });

    it('handles circular references', () => {
        const record: Record<string, unknown> = { a: 1 };
        record.self = record;
        expect(hashRecord(record)).toMatch(/^[0-9a-f]{32}$/);
    });
});
