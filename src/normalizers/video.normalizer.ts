/**
 * Video Normalizer
 * Maps raw video records of any recognised shape to the canonical video record
 */
import { logger } from '../observability/logger.js';
import { hashRecord } from '../services/dedup.service.js';
import { enrichVideo } from '../services/ranker.service.js';
import {
    AUTHOR_CANDIDATES,
    DESCRIPTION_CANDIDATES,
    DURATION_CANDIDATES,
    ID_CANDIDATES,
    MUSIC_ARTIST_CANDIDATES,
    MUSIC_TITLE_CANDIDATES,
    STATISTIC_CANDIDATES,
    STATS_TEXT_CANDIDATES,
    TIMESTAMP_CANDIDATES,
    URL_CANDIDATES,
    getPath,
    isRawObject,
    resolveFirst,
    toText,
    type RawObject,
    type Resolved,
} from './resolvers.js';
import { extractHashtags, extractHook, extractTextStatistics } from './text.js';
import { normalizeTimestamp } from './timestamp.js';
import {
    STATISTIC_FIELDS,
    type CanonicalVideo,
    type FieldResolution,
    type NormalizeOptions,
    type ResolutionMap,
    type StatisticField,
    type VideoStatistics,
} from './types.js';

export const UNKNOWN_AUTHOR = 'unknown';
const VIDEO_URL_BASE = 'https://www.tiktok.com';

const UNRESOLVED: FieldResolution = { resolved: false, path: null };

function resolvedAt(path: string): FieldResolution {
    return { resolved: true, path };
}

function markOf<T>(result: Resolved<T> | undefined): FieldResolution {
    return result ? resolvedAt(result.path) : UNRESOLVED;
}

export function buildVideoUrl(author: string, id: string): string {
    return `${VIDEO_URL_BASE}/@${encodeURIComponent(author)}/video/${encodeURIComponent(id)}`;
}

function idFromUrl(url: string): string | undefined {
    return /\/video\/(\d+)/.exec(url)?.[1];
}

function authorFromUrl(url: string): string | undefined {
    const match = /\/@([^/?#]+)/.exec(url);
    if (!match) return undefined;
    try {
        return decodeURIComponent(match[1]);
    } catch {
        return match[1];
    }
}

function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

/**
 * Statistics from structured fields, or from free text when no structured field exists
 */
function resolveStatistics(record: RawObject): {
    statistics: VideoStatistics;
    marks: Record<StatisticField, FieldResolution>;
} {
    const statistics: VideoStatistics = { views: 0, likes: 0, comments: 0, shares: 0, favorites: 0 };
    const marks: Record<StatisticField, FieldResolution> = {
        views: UNRESOLVED,
        likes: UNRESOLVED,
        comments: UNRESOLVED,
        shares: UNRESOLVED,
        favorites: UNRESOLVED,
    };

    let structured = false;
    for (const field of STATISTIC_FIELDS) {
        const result = resolveFirst(record, STATISTIC_CANDIDATES[field]);
        if (result) {
            statistics[field] = result.value;
            marks[field] = resolvedAt(result.path);
            structured = true;
        }
    }

    if (structured) {
        return { statistics, marks };
    }

    for (const candidate of STATS_TEXT_CANDIDATES) {
        const text = candidate.coerce(getPath(record, candidate.path));
        if (!text) continue;

        const found = extractTextStatistics(text);
        let matched = false;
        for (const field of STATISTIC_FIELDS) {
            const count = found[field];
            if (count !== undefined) {
                statistics[field] = count;
                marks[field] = resolvedAt(`text:${candidate.path}`);
                matched = true;
            }
        }
        if (matched) break;
    }

    return { statistics, marks };
}

function resolveMusic(record: RawObject): { music: string; mark: FieldResolution } {
    const title = resolveFirst(record, MUSIC_TITLE_CANDIDATES);
    const artist = resolveFirst(record, MUSIC_ARTIST_CANDIDATES);

    if (title && artist) {
        return { music: `${title.value} - ${artist.value}`, mark: resolvedAt(title.path) };
    }
    if (title) return { music: title.value, mark: resolvedAt(title.path) };
    if (artist) return { music: artist.value, mark: resolvedAt(artist.path) };
    return { music: '', mark: UNRESOLVED };
}

function buildVideo(record: RawObject, keyword: string, options: NormalizeOptions): CanonicalVideo {
    const now = options.now ?? (() => new Date());

    const urlResult = resolveFirst(record, URL_CANDIDATES);

    const authorResult = resolveFirst(record, AUTHOR_CANDIDATES);
    const authorFromLink = urlResult ? authorFromUrl(urlResult.value) : undefined;
    const author = authorResult?.value ?? authorFromLink ?? UNKNOWN_AUTHOR;
    const authorMark = authorResult
        ? resolvedAt(authorResult.path)
        : authorFromLink ? resolvedAt(urlResult?.path ?? 'url') : UNRESOLVED;

    const idResult = resolveFirst(record, ID_CANDIDATES);
    const idFromLink = urlResult ? idFromUrl(urlResult.value) : undefined;
    const id = idResult?.value ?? idFromLink ?? hashRecord(record);
    const idMark = idResult
        ? resolvedAt(idResult.path)
        : idFromLink ? resolvedAt(urlResult?.path ?? 'url') : UNRESOLVED;

    const url = urlResult?.value ?? buildVideoUrl(author, id);

    const descriptionResult = resolveFirst(record, DESCRIPTION_CANDIDATES);
    const description = descriptionResult?.value ?? '';

    const timestampResult = resolveFirst(record, TIMESTAMP_CANDIDATES);
    const timestamp = normalizeTimestamp(timestampResult?.value, now);
    if (timestampResult && !timestamp.parsed) {
        logger.warn('Unparseable video timestamp, using current time', {
            keyword,
            path: timestampResult.path,
            value: String(timestampResult.value),
        });
    }

    const durationResult = resolveFirst(record, DURATION_CANDIDATES);
    const { music, mark: musicMark } = resolveMusic(record);
    const { statistics, marks: statisticMarks } = resolveStatistics(record);

    const resolution: ResolutionMap = {
        id: idMark,
        url: markOf(urlResult),
        author: authorMark,
        description: markOf(descriptionResult),
        timestamp: timestampResult && timestamp.parsed ? resolvedAt(timestampResult.path) : UNRESOLVED,
        music: musicMark,
        durationSec: markOf(durationResult),
        ...statisticMarks,
    };

    return {
        id,
        url,
        author,
        description,
        hashtags: extractHashtags(description),
        hook: extractHook(description, options.hookMaxLength),
        music,
        timestamp: timestamp.iso,
        durationSec: durationResult?.value ?? 0,
        statistics,
        engagementRate: 0,
        performanceScore: 0,
        isTrending: false,
        keyword,
        discoveryMethod: options.discoveryMethod ?? null,
        resolution,
        fallback: false,
    };
}

/**
 * Minimal record used when a raw record cannot be read at all
 */
// Records with throwing getters cannot be hashed
const UNHASHABLE_RECORD_ID = 'unhashable-record';

function fallbackId(raw: unknown): string {
    try {
        return hashRecord(raw);
    } catch {
        return UNHASHABLE_RECORD_ID;
    }
}

function safeExternalId(raw: RawObject): string | null {
    try {
        return toText(raw.id) ?? null;
    } catch {
        return null;
    }
}

export function buildFallbackVideo(raw: unknown, keyword: string, options: NormalizeOptions): CanonicalVideo {
    const now = options.now ?? (() => new Date());
    const id = fallbackId(raw);

    const video: CanonicalVideo = {
        id,
        url: buildVideoUrl(UNKNOWN_AUTHOR, id),
        author: UNKNOWN_AUTHOR,
        description: '',
        hashtags: [],
        hook: '',
        music: '',
        timestamp: now().toISOString(),
        durationSec: 0,
        statistics: { views: 0, likes: 0, comments: 0, shares: 0, favorites: 0 },
        engagementRate: 0,
        performanceScore: 0,
        isTrending: false,
        keyword,
        discoveryMethod: options.discoveryMethod ?? null,
        resolution: {
            id: UNRESOLVED,
            url: UNRESOLVED,
            author: UNRESOLVED,
            description: UNRESOLVED,
            timestamp: UNRESOLVED,
            music: UNRESOLVED,
            durationSec: UNRESOLVED,
            views: UNRESOLVED,
            likes: UNRESOLVED,
            comments: UNRESOLVED,
            shares: UNRESOLVED,
            favorites: UNRESOLVED,
        },
        fallback: true,
    };

    return enrichVideo(video, options.ranking);
}

/**
 * Normalize one raw record. Never throws: unreadable input yields the fallback record.
 */
export function normalizeVideo(raw: unknown, keyword: string, options: NormalizeOptions): CanonicalVideo {
    if (!isRawObject(raw)) {
        logger.warn('Raw video record is not an object, using fallback record', {
            keyword,
            type: describeValue(raw),
        });
        return buildFallbackVideo(raw, keyword, options);
    }

    try {
        return enrichVideo(buildVideo(raw, keyword, options), options.ranking);
    } catch (error) {
        logger.warn('Failed to normalize raw video record, using fallback record', {
            keyword,
            error: error instanceof Error ? error.message : String(error),
            externalId: safeExternalId(raw),
        });
        return buildFallbackVideo(raw, keyword, options);
    }
}

export const videoNormalizer = {
    normalize: normalizeVideo,
    buildFallbackVideo,
    buildVideoUrl,
};
