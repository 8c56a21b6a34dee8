/**
 * Text and timestamp helper tests
 */
import { describe, it, expect } from 'vitest';
import { extractHashtags, extractHook, extractTextStatistics, parseCount } from '../../src/normalizers/text.js';
import { normalizeTimestamp } from '../../src/normalizers/timestamp.js';

describe('parseCount', () => {
    it.each([
        ['12', 12],
        ['1,234', 1234],
        ['1.2K', 1200],
        ['3m', 3000000],
        ['2.5B', 2500000000],
        [' 45 ', 45],
    ])('parses %j as %d', (text, expected) => {
        expect(parseCount(text)).toBe(expected);
    });

    it.each(['', 'abc', '-5', '1.2X', '12 views'])('rejects %j', (text) => {
        expect(parseCount(text)).toBeUndefined();
    });

    it.each([
        `1${'0'.repeat(300)}B`,
        '10000000B',
        '9007199254740993',
    ])('rejects counts beyond the safe integer range (%s)', (text) => {
        expect(parseCount(text)).toBeUndefined();
    });
});

describe('extractTextStatistics', () => {
    it('reads labelled counts', () => {
        expect(extractTextStatistics('1.2K views, 300 likes')).toEqual({ views: 1200, likes: 300 });
    });

    it('maps plays and saves onto views and favorites', () => {
        expect(extractTextStatistics('5M plays · 20 saves · 3 shares · 1 comment'))
            .toEqual({ views: 5000000, favorites: 20, shares: 3, comments: 1 });
    });

    it('keeps the first mention of a statistic', () => {
        expect(extractTextStatistics('100 likes and later 999 likes')).toEqual({ likes: 100 });
    });

    it('skips a statistic whose count overflows', () => {
        expect(extractTextStatistics(`1${'0'.repeat(300)}B views, 300 likes`)).toEqual({ likes: 300 });
    });

    it('returns nothing for text without counts', () => {
        expect(extractTextStatistics('no numbers here')).toEqual({});
    });
});

describe('extractHashtags', () => {
    it('deduplicates in first-seen order and keeps case', () => {
        expect(extractHashtags('#Money tips #fyp #money #fyp')).toEqual(['Money', 'fyp', 'money']);
    });

    it('returns an empty list without hashtags', () => {
        expect(extractHashtags('plain caption')).toEqual([]);
    });
});

describe('extractHook', () => {
    it('uses the first sentence', () => {
        expect(extractHook('Stop wasting money! Here is how. #tips', 100)).toBe('Stop wasting money!');
    });

    it('uses the first line when it is shorter than the first sentence', () => {
        expect(extractHook('Three rules\nthat made me rich. Really', 100)).toBe('Three rules');
    });

    it('removes hashtags from the hook', () => {
        expect(extractHook('Save #money every day', 100)).toBe('Save every day');
    });

    it('truncates with an ellipsis', () => {
        expect(extractHook('abcdefghij', 5)).toBe('abcd…');
    });

    it('never splits an emoji when truncating', () => {
        const hook = extractHook('abc😀😀😀😀 more words here', 5);

        expect(hook).toBe('abc😀…');
        expect([...hook]).toHaveLength(5);
    });

    it('measures the limit in characters rather than UTF-16 units', () => {
        expect(extractHook('😀😀😀', 3)).toBe('😀😀😀');
    });

    it('is empty for an empty description', () => {
        expect(extractHook('   ', 100)).toBe('');
    });

    it('is empty when the caption is only hashtags', () => {
        expect(extractHook('#fyp #viral', 100)).toBe('');
    });
});

describe('normalizeTimestamp', () => {
    const now = () => new Date('2024-05-01T00:00:00.000Z');

    it('treats seconds and milliseconds as the same instant', () => {
        expect(normalizeTimestamp(1700000000).iso).toBe(normalizeTimestamp(1700000000000).iso);
        expect(normalizeTimestamp(1700000000).iso).toBe('2023-11-14T22:13:20.000Z');
    });

    it('parses numeric strings and ISO strings', () => {
        expect(normalizeTimestamp('1700000000')).toEqual({ iso: '2023-11-14T22:13:20.000Z', parsed: true });
        expect(normalizeTimestamp('2024-02-03T04:05:06Z')).toEqual({ iso: '2024-02-03T04:05:06.000Z', parsed: true });
    });

    it.each([undefined, null, 0, -5, Number.NaN, 'not a date', {}])('uses now for %j', (raw) => {
        expect(normalizeTimestamp(raw, now)).toEqual({ iso: '2024-05-01T00:00:00.000Z', parsed: false });
    });
});
