/**
 * Job return values travel through Redis as JSON; these schemas read them back
 */
import { z } from 'zod';
import { DISCOVERY_METHODS } from './schemas.js';

const fieldResolutionSchema = z.object({
    resolved: z.boolean(),
    path: z.string().nullable(),
});

const countSchema = z.number().int().min(0);

export const canonicalVideoSchema = z.object({
    id: z.string(),
    url: z.string(),
    author: z.string(),
    description: z.string(),
    hashtags: z.array(z.string()),
    hook: z.string(),
    music: z.string(),
    timestamp: z.string(),
    durationSec: countSchema,
    statistics: z.object({
        views: countSchema,
        likes: countSchema,
        comments: countSchema,
        shares: countSchema,
        favorites: countSchema,
    }),
    engagementRate: z.number(),
    performanceScore: z.number(),
    isTrending: z.boolean(),
    keyword: z.string(),
    discoveryMethod: z.enum(DISCOVERY_METHODS).nullable(),
    resolution: z.object({
        id: fieldResolutionSchema,
        url: fieldResolutionSchema,
        author: fieldResolutionSchema,
        description: fieldResolutionSchema,
        timestamp: fieldResolutionSchema,
        music: fieldResolutionSchema,
        durationSec: fieldResolutionSchema,
        views: fieldResolutionSchema,
        likes: fieldResolutionSchema,
        comments: fieldResolutionSchema,
        shares: fieldResolutionSchema,
        favorites: fieldResolutionSchema,
    }),
    fallback: z.boolean(),
});

export const keywordResultSchema = z.object({
    keyword: z.string(),
    videos: z.array(canonicalVideoSchema),
    discovered: z.number().int().min(0),
    fallbacks: z.number().int().min(0),
    failedMethods: z.array(z.enum(DISCOVERY_METHODS)),
    success: z.boolean(),
});
