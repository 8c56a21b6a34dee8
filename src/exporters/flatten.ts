/**
 * Flat row layout shared by the CSV and Sheets exporters
 */
import type { CanonicalVideo } from '../normalizers/types.js';

export const EXPORT_COLUMNS = [
    'url',
    'author',
    'keyword',
    'performance_score',
    'engagement_rate',
    'scrape_date',
    'scrape_time',
    'timestamp',
    'stats_views',
    'stats_likes',
    'stats_comments',
    'stats_shares',
    'stats_favorites',
    'id',
    'description',
    'hook',
    'hashtags',
    'music',
    'duration_sec',
    'discovery_method',
    'is_trending',
] as const;

export type ExportColumn = typeof EXPORT_COLUMNS[number];
export type CellValue = string | number | boolean;
export type FlatVideo = Record<ExportColumn, CellValue>;

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * UTC date parts: YYYY-MM-DD and HH:MM:SS
 */
export function formatScrapeDate(date: Date): { date: string; time: string } {
    return {
        date: `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`,
        time: `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`,
    };
}

/**
 * trending_videos_YYYYMMDD_HHMMSS (UTC)
 */
export function exportFileStem(date: Date): string {
    const { date: day, time } = formatScrapeDate(date);
    return `trending_videos_${day.replace(/-/g, '')}_${time.replace(/:/g, '')}`;
}

export function flattenVideo(video: CanonicalVideo, scrapedAt: Date): FlatVideo {
    const scrape = formatScrapeDate(scrapedAt);

    return {
        url: video.url,
        author: video.author,
        keyword: video.keyword,
        performance_score: video.performanceScore,
        engagement_rate: Math.round(video.engagementRate * 10000) / 10000,
        scrape_date: scrape.date,
        scrape_time: scrape.time,
        timestamp: video.timestamp,
        stats_views: video.statistics.views,
        stats_likes: video.statistics.likes,
        stats_comments: video.statistics.comments,
        stats_shares: video.statistics.shares,
        stats_favorites: video.statistics.favorites,
        id: video.id,
        description: video.description,
        hook: video.hook,
        hashtags: video.hashtags.join(', '),
        music: video.music,
        duration_sec: video.durationSec,
        discovery_method: video.discoveryMethod ?? '',
        is_trending: video.isTrending,
    };
}

export function toRow(flat: FlatVideo): CellValue[] {
    return EXPORT_COLUMNS.map(column => flat[column]);
}
