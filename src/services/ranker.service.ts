/**
 * Ranker
 * Engagement metrics, trending classification and ordering of canonical videos.
 * Everything here is pure: thresholds and weights arrive as arguments.
 */
import type {
    CanonicalVideo,
    RankingOptions,
    ScoreWeights,
    VideoStatistics,
} from '../normalizers/types.js';

type EngagementCounts = Pick<VideoStatistics, 'views' | 'likes' | 'comments' | 'shares'>;

export const DEFAULT_SCORE_WEIGHTS: ScoreWeights = {
    likes: 1,
    comments: 2,
    shares: 3,
    engagementScale: 20,
};

export const DEFAULT_RANKING_OPTIONS: RankingOptions = {
    minViews: 10000,
    minEngagementRate: 0.05,
    weights: DEFAULT_SCORE_WEIGHTS,
};

/**
 * (likes + comments + shares) / views, or 0 for videos without views
 */
export function computeEngagementRate(stats: EngagementCounts): number {
    if (stats.views <= 0) {
        return 0;
    }
    return (stats.likes + stats.comments + stats.shares) / Math.max(stats.views, 1);
}

/**
 * A video trends when it clears both the view floor and the engagement-rate floor.
 * Zero views never trend, whatever the thresholds.
 */
export function classifyTrending(
    stats: EngagementCounts,
    minViews: number,
    minEngagementRate: number
): boolean {
    if (stats.views <= 0) {
        return false;
    }
    if (stats.views < minViews) {
        return false;
    }
    return computeEngagementRate(stats) >= minEngagementRate;
}

/**
 * Ranking key: log10 view volume plus weighted per-view engagement.
 * Only the relative order within one batch is meaningful.
 */
export function score(stats: EngagementCounts, weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS): number {
    if (stats.views <= 0) {
        return 0;
    }

    const viewTerm = Math.log10(1 + stats.views);
    const weightedEngagement =
        stats.likes * weights.likes +
        stats.comments * weights.comments +
        stats.shares * weights.shares;
    const engagementTerm = (weightedEngagement / Math.max(stats.views, 1)) * weights.engagementScale;

    return Math.round((viewTerm + engagementTerm) * 100) / 100;
}

/**
 * Recompute every derived field from the video's final statistics.
 * The result is frozen: videos are not modified once ranked.
 */
export function enrichVideo(video: CanonicalVideo, options: RankingOptions): CanonicalVideo {
    const statistics = Object.freeze({ ...video.statistics });

    return Object.freeze({
        ...video,
        statistics,
        hashtags: Object.freeze([...video.hashtags]),
        engagementRate: computeEngagementRate(statistics),
        performanceScore: score(statistics, options.weights),
        isTrending: classifyTrending(statistics, options.minViews, options.minEngagementRate),
    });
}

export function filterTrending(videos: readonly CanonicalVideo[]): CanonicalVideo[] {
    return videos.filter(video => video.isTrending);
}

/**
 * Order by performance score (stable, highest first) when sorting is enabled,
 * then keep the first maxCount videos
 */
export function rankAndLimit(
    videos: readonly CanonicalVideo[],
    maxCount: number,
    sortEnabled: boolean
): CanonicalVideo[] {
    const ordered = [...videos];

    if (sortEnabled) {
        // Array.prototype.sort is stable, so equal scores keep discovery order
        ordered.sort((a, b) => b.performanceScore - a.performanceScore);
    }

    return ordered.slice(0, Math.max(0, Math.floor(maxCount)));
}

export const rankerService = {
    computeEngagementRate,
    classifyTrending,
    score,
    enrichVideo,
    filterTrending,
    rankAndLimit,
};
