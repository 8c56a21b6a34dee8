/**
 * Field resolution for raw video records
 *
 * Each logical attribute owns an ordered list of candidate key paths. The
 * first path holding a value its coercer accepts wins.
 */
import type { StatisticField } from './types.js';
import { parseCount } from './text.js';

export type RawObject = Record<string, unknown>;

export type Coercer<T> = (value: unknown) => T | undefined;

export interface Candidate<T> {
    path: string;
    coerce: Coercer<T>;
}

export interface Resolved<T> {
    value: T;
    path: string;
}

export function isRawObject(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a dotted path from a nested record
 */
export function getPath(record: RawObject, path: string): unknown {
    let current: unknown = record;
    for (const segment of path.split('.')) {
        if (!isRawObject(current)) {
            return undefined;
        }
        current = current[segment];
    }
    return current;
}

/**
 * Integers from numbers, numeric strings and count strings such as "1.2K"
 */
export const toCount: Coercer<number> = (value) => {
    if (typeof value === 'number') {
        return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : undefined;
    }
    if (typeof value === 'bigint') {
        return value >= 0n && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : undefined;
    }
    if (typeof value === 'string') {
        return parseCount(value);
    }
    return undefined;
};

export const toText: Coercer<string> = (value) => {
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed.length > 0 ? trimmed : undefined;
    }
    return undefined;
};

/**
 * Identifiers arrive as strings, numbers or bigints depending on the source
 */
export const toIdentifier: Coercer<string> = (value) => {
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) && value >= 0 ? String(value) : undefined;
    }
    if (typeof value === 'bigint') {
        return value >= 0n ? value.toString() : undefined;
    }
    return toText(value);
};

export const toHandle: Coercer<string> = (value) => {
    const text = toText(value);
    if (!text) return undefined;
    const handle = text.replace(/^@+/, '').trim();
    return handle.length > 0 && !/\s/.test(handle) ? handle : undefined;
};

export const toHttpUrl: Coercer<string> = (value) => {
    const text = toText(value);
    return text && /^https?:\/\//i.test(text) ? text : undefined;
};

/**
 * Timestamps stay raw here; the timestamp module owns their interpretation
 */
export const toRawTimestamp: Coercer<string | number | Date> = (value) => {
    if (typeof value === 'number' || value instanceof Date) return value;
    return toText(value);
};

const ITEM = 'itemInfo.itemStruct';

function paths<T>(coerce: Coercer<T>, ...candidatePaths: string[]): Candidate<T>[] {
    return candidatePaths.map(path => ({ path, coerce }));
}

export const ID_CANDIDATES = paths(toIdentifier, 'id', 'videoId', 'aweme_id', 'item_id', `${ITEM}.id`, 'video.id');

export const URL_CANDIDATES = paths(toHttpUrl, 'url', 'webVideoUrl', 'shareUrl', 'videoUrl', 'video_url', `${ITEM}.shareUrl`);

export const AUTHOR_CANDIDATES = paths(
    toHandle,
    'author.uniqueId',
    'author',
    'authorUniqueId',
    'uniqueId',
    'authorMeta.name',
    `${ITEM}.author.uniqueId`,
    'nickname',
);

export const DESCRIPTION_CANDIDATES = paths(toText, 'desc', 'description', 'caption', 'title', `${ITEM}.desc`);

export const TIMESTAMP_CANDIDATES = paths(
    toRawTimestamp,
    'createTime',
    'create_time',
    'createdAt',
    'timestamp',
    `${ITEM}.createTime`,
);

export const MUSIC_TITLE_CANDIDATES = paths(toText, 'music.title', 'musicMeta.musicName', 'musicTitle', `${ITEM}.music.title`);

export const MUSIC_ARTIST_CANDIDATES = paths(
    toText,
    'music.authorName',
    'musicMeta.musicAuthor',
    'musicAuthor',
    `${ITEM}.music.authorName`,
);

export const DURATION_CANDIDATES = paths(toCount, 'video.duration', 'videoMeta.duration', 'duration', `${ITEM}.video.duration`);

export const STATISTIC_CANDIDATES: Record<StatisticField, Candidate<number>[]> = {
    views: paths(
        toCount,
        'playCount',
        'stats.playCount',
        'stats.viewCount',
        'statsV2.playCount',
        'videoData.playCount',
        `${ITEM}.stats.playCount`,
        'statistics.views',
        'viewCount',
        'views',
    ),
    likes: paths(
        toCount,
        'diggCount',
        'stats.diggCount',
        'stats.likeCount',
        'statsV2.diggCount',
        `${ITEM}.stats.diggCount`,
        'statistics.likes',
        'likeCount',
        'likes',
    ),
    comments: paths(
        toCount,
        'commentCount',
        'stats.commentCount',
        'statsV2.commentCount',
        `${ITEM}.stats.commentCount`,
        'statistics.comments',
        'comments',
    ),
    shares: paths(
        toCount,
        'shareCount',
        'stats.shareCount',
        'statsV2.shareCount',
        `${ITEM}.stats.shareCount`,
        'statistics.shares',
        'shares',
    ),
    favorites: paths(
        toCount,
        'collectCount',
        'stats.collectCount',
        'stats.favoriteCount',
        'statsV2.collectCount',
        `${ITEM}.stats.collectCount`,
        'statistics.favorites',
        'favorites',
    ),
};

/**
 * Free-text fields scanned for "<count> views|likes|..." when no structured statistic exists
 */
export const STATS_TEXT_CANDIDATES = paths(toText, 'text', 'statsText', 'innerText', 'ariaLabel', 'alt');

/**
 * Resolve the first candidate that yields a value
 */
export function resolveFirst<T>(record: RawObject, candidates: Candidate<T>[]): Resolved<T> | undefined {
    for (const candidate of candidates) {
        const value = candidate.coerce(getPath(record, candidate.path));
        if (value !== undefined) {
            return { value, path: candidate.path };
        }
    }
    return undefined;
}
