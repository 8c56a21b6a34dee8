/**
 * Ranker tests
 */
import { describe, it, expect } from 'vitest';
import {
    classifyTrending,
    computeEngagementRate,
    DEFAULT_RANKING_OPTIONS,
    enrichVideo,
    filterTrending,
    rankAndLimit,
    score,
} from '../../src/services/ranker.service.js';
import type { CanonicalVideo, VideoStatistics } from '../../src/normalizers/types.js';

const UNRESOLVED = { resolved: false, path: null };

function makeVideo(id: string, performanceScore: number, isTrending = true): CanonicalVideo {
    return {
        id,
        url: `https://www.tiktok.com/@creator/video/${id}`,
        author: 'creator',
        description: '',
        hashtags: [],
        hook: '',
        music: '',
        timestamp: '2024-01-01T00:00:00.000Z',
        durationSec: 0,
        statistics: { views: 0, likes: 0, comments: 0, shares: 0, favorites: 0 },
        engagementRate: 0,
        performanceScore,
        isTrending,
        keyword: 'k',
        discoveryMethod: null,
        resolution: {
            id: UNRESOLVED, url: UNRESOLVED, author: UNRESOLVED, description: UNRESOLVED,
            timestamp: UNRESOLVED, music: UNRESOLVED, durationSec: UNRESOLVED, views: UNRESOLVED,
            likes: UNRESOLVED, comments: UNRESOLVED, shares: UNRESOLVED, favorites: UNRESOLVED,
        },
        fallback: false,
    };
}

function stats(views: number, likes = 0, comments = 0, shares = 0): VideoStatistics {
    return { views, likes, comments, shares, favorites: 0 };
}

describe('computeEngagementRate', () => {
    it('divides interactions by views', () => {
        expect(computeEngagementRate(stats(20000, 1000, 200, 50))).toBe(0.0625);
    });

    it('is zero without views', () => {
        expect(computeEngagementRate(stats(0, 10, 10, 10))).toBe(0);
    });
});

describe('classifyTrending', () => {
    it('requires both thresholds', () => {
        expect(classifyTrending(stats(20000, 1000, 200, 50), 10000, 0.05)).toBe(true);
        expect(classifyTrending(stats(9999, 5000), 10000, 0.05)).toBe(false);
        expect(classifyTrending(stats(20000, 900), 10000, 0.05)).toBe(false);
    });

    it('accepts values exactly at the thresholds', () => {
        expect(classifyTrending(stats(10000, 500), 10000, 0.05)).toBe(true);
    });

    it('never classifies zero views as trending', () => {
        expect(classifyTrending(stats(0, 100), 0, 0)).toBe(false);
    });
});

describe('score', () => {
    it('combines log views and weighted engagement, rounded to two decimals', () => {
        expect(score(stats(20000, 1000, 200, 50))).toBe(5.85);
    });

    it('is zero without views', () => {
        expect(score(stats(0, 50, 5, 5))).toBe(0);
    });

    it('does not decrease as views grow with no engagement', () => {
        const views = [1, 10, 100, 1000, 10000, 100000, 1000000];
        const scores = views.map(v => score(stats(v)));

        for (let i = 1; i < scores.length; i++) {
            expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1]);
        }
    });

    it('applies custom weights', () => {
        // log10(100) = 2 plus (10 * 1) / 99 * 10 = 1.0101
        expect(score(stats(99, 10), { likes: 1, comments: 0, shares: 0, engagementScale: 10 })).toBe(3.01);
    });
});

describe('enrichVideo', () => {
    it('recomputes derived fields from the statistics', () => {
        const base = { ...makeVideo('1', 99, false), statistics: stats(20000, 1000, 200, 50) };
        const enriched = enrichVideo(base, DEFAULT_RANKING_OPTIONS);

        expect(enriched.engagementRate).toBe(0.0625);
        expect(enriched.performanceScore).toBe(5.85);
        expect(enriched.isTrending).toBe(true);
        expect(base.performanceScore).toBe(99);
    });
});

describe('rankAndLimit', () => {
    it('sorts by score descending and truncates', () => {
        const videos = [makeVideo('a', 1), makeVideo('b', 3), makeVideo('c', 2)];
        expect(rankAndLimit(videos, 2, true).map(v => v.id)).toEqual(['b', 'c']);
    });

    it('keeps input order for equal scores', () => {
        const videos = [makeVideo('a', 2), makeVideo('b', 5), makeVideo('c', 2), makeVideo('d', 2)];
        expect(rankAndLimit(videos, 10, true).map(v => v.id)).toEqual(['b', 'a', 'c', 'd']);
    });

    it('only truncates when sorting is disabled', () => {
        const videos = [makeVideo('a', 1), makeVideo('b', 3), makeVideo('c', 2)];
        expect(rankAndLimit(videos, 2, false).map(v => v.id)).toEqual(['a', 'b']);
    });

    it('returns an empty list for a non-positive limit', () => {
        expect(rankAndLimit([makeVideo('a', 1)], 0, true)).toEqual([]);
        expect(rankAndLimit([makeVideo('a', 1)], -3, true)).toEqual([]);
    });

    it('does not modify its input', () => {
        const videos = [makeVideo('a', 1), makeVideo('b', 3)];
        rankAndLimit(videos, 2, true);
        expect(videos.map(v => v.id)).toEqual(['a', 'b']);
    });
});

describe('filterTrending', () => {
    it('keeps trending videos only', () => {
        const videos = [makeVideo('a', 1, true), makeVideo('b', 1, false), makeVideo('c', 1, true)];
        expect(filterTrending(videos).map(v => v.id)).toEqual(['a', 'c']);
    });
});
