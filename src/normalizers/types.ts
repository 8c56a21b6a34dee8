/**
 * Normalizer types and interfaces
 */
import type { DiscoveryMethod } from '../queues/schemas.js';

export interface VideoStatistics {
    views: number;
    likes: number;
    comments: number;
    shares: number;
    favorites: number;
}

export type StatisticField = keyof VideoStatistics;

export const STATISTIC_FIELDS: readonly StatisticField[] = ['views', 'likes', 'comments', 'shares', 'favorites'];

/**
 * Logical attributes resolved from raw records
 */
export type ResolvedField =
    | 'id'
    | 'url'
    | 'author'
    | 'description'
    | 'timestamp'
    | 'music'
    | 'durationSec'
    | StatisticField;

/**
 * Where a field's value came from. `path` names the raw key path that won,
 * `text:<key>` for counts scanned out of free text, or is null when the
 * field fell back to its default.
 */
export interface FieldResolution {
    resolved: boolean;
    path: string | null;
}

export type ResolutionMap = Record<ResolvedField, FieldResolution>;

/**
 * Canonical video record shared by ranking and every exporter
 */
export interface CanonicalVideo {
    id: string;
    url: string;
    author: string;
    description: string;
    hashtags: readonly string[];
    hook: string;
    music: string;
    timestamp: string;
    durationSec: number;
    statistics: VideoStatistics;

    // Derived by the ranker
    engagementRate: number;
    performanceScore: number;
    isTrending: boolean;

    // Provenance
    keyword: string;
    discoveryMethod: DiscoveryMethod | null;

    resolution: ResolutionMap;
    fallback: boolean;
}

export interface ScoreWeights {
    likes: number;
    comments: number;
    shares: number;
    /** Multiplier that brings the per-view engagement term up to the log10(views) range */
    engagementScale: number;
}

export interface RankingOptions {
    minViews: number;
    minEngagementRate: number;
    weights: ScoreWeights;
}

export interface NormalizeOptions {
    ranking: RankingOptions;
    hookMaxLength: number;
    discoveryMethod?: DiscoveryMethod;
    /** Clock used for unparseable timestamps */
    now?: () => Date;
}

/**
 * Result of normalization for a batch
 */
export interface NormalizationResult {
    videos: CanonicalVideo[];
    fallbacks: number;
}
