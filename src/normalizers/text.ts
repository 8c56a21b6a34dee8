/**
 * Text helpers: hashtags, hooks and human-formatted counts
 */
import type { StatisticField } from './types.js';

/**
 * Shared by hashtag extraction and hook cleanup
 */
export const HASHTAG_PATTERN = /#([\p{L}\p{N}_]+)/gu;

const HOOK_FALLBACK_WORDS = 15;

const COUNT_SUFFIXES: Record<string, number> = {
    k: 1_000,
    m: 1_000_000,
    b: 1_000_000_000,
};

const COUNT_PATTERN = /^(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?|\.\d+)\s*([kmb])?$/i;

const TEXT_STAT_PATTERN =
    /(?<![\w.,])(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?)\s*([kmb])?\s*(views?|plays?|likes?|comments?|shares?|saves?|favou?rites?)\b/gi;

const TEXT_STAT_LABELS: Record<string, StatisticField> = {
    view: 'views',
    play: 'views',
    like: 'likes',
    comment: 'comments',
    share: 'shares',
    save: 'favorites',
    favorite: 'favorites',
    favourite: 'favorites',
};

/**
 * Parse "1,234", "1.2K", "3M" or "12" into an integer
 */
export function parseCount(text: string): number | undefined {
    const match = COUNT_PATTERN.exec(text.trim());
    if (!match) {
        return undefined;
    }

    const [, digits, suffix] = match;
    const value = Number(digits.replace(/,/g, ''));
    if (!Number.isFinite(value)) {
        return undefined;
    }

    const count = suffix
        ? Math.round(value * COUNT_SUFFIXES[suffix.toLowerCase()])
        : Math.trunc(value);
    return Number.isSafeInteger(count) ? count : undefined;
}

/**
 * Scan free text such as "1.2K views, 300 likes" for engagement counts.
 * The first mention of each statistic wins.
 */
export function extractTextStatistics(text: string): Partial<Record<StatisticField, number>> {
    const stats: Partial<Record<StatisticField, number>> = {};

    for (const match of text.matchAll(TEXT_STAT_PATTERN)) {
        const [, digits, suffix, label] = match;
        const field = TEXT_STAT_LABELS[label.toLowerCase().replace(/s$/, '')];
        if (!field || stats[field] !== undefined) continue;

        const count = parseCount(`${digits}${suffix ?? ''}`);
        if (count !== undefined) {
            stats[field] = count;
        }
    }

    return stats;
}

/**
 * Hashtags without the leading '#', deduplicated in first-seen order
 */
export function extractHashtags(text: string): string[] {
    const seen = new Set<string>();
    for (const match of text.matchAll(HASHTAG_PATTERN)) {
        seen.add(match[1]);
    }
    return [...seen];
}

function stripHashtags(text: string): string {
    return text.replace(HASHTAG_PATTERN, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * The attention grabber of a caption: the shorter of its first line and
 * first sentence, hashtags removed, capped at maxLength characters
 */
export function extractHook(description: string, maxLength: number): string {
    const text = description.trim();
    if (!text) {
        return '';
    }

    const firstLine = text.split(/\r?\n/).find(line => line.trim().length > 0) ?? '';
    const sentenceMatch = /^(.*?[.!?])(?:\s|$)/s.exec(text);
    const firstSentence = sentenceMatch ? sentenceMatch[1] : '';

    const candidates = [firstLine, firstSentence]
        .map(stripHashtags)
        .filter(candidate => candidate.length > 0)
        .sort((a, b) => a.length - b.length);

    const hook = candidates[0]
        ?? stripHashtags(text).split(' ').slice(0, HOOK_FALLBACK_WORDS).join(' ');

    // Cut on code points so emoji are never split
    const codePoints = [...hook];
    if (codePoints.length <= maxLength) {
        return hook;
    }
    return `${codePoints.slice(0, Math.max(0, maxLength - 1)).join('').trimEnd()}…`;
}
