/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';
import { DISCOVERY_METHODS } from '../queues/schemas.js';

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const portSchema = z.coerce.number().int().min(1).max(65535);
const positiveIntSchema = z.coerce.number().int().positive();
const nonNegativeIntSchema = z.coerce.number().int().min(0);
const nonNegativeNumberSchema = z.coerce.number().min(0);

// "false", "0", "no" and "off" must read as false; z.coerce.boolean would make them true
const booleanSchema = (fallback: boolean) => z.preprocess(
    (val) => {
        if (val === undefined || val === '') return fallback;
        if (typeof val === 'string') return !['false', '0', 'no', 'off'].includes(val.trim().toLowerCase());
        return val;
    },
    z.boolean()
);

const csvListSchema = (fallback: string) => z.string().default(fallback).transform(s =>
    s.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0)
);

export { DISCOVERY_METHODS };
export const OUTPUT_FORMATS = ['json', 'csv', 'google_sheets'] as const;

// Configuration schema
const configSchema = z.object({
    // Core
    redisUrl: z.string().min(1, 'Redis URL is required').default('redis://localhost:6379'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    metricsPort: portSchema.default(3001),

    // Keywords
    keywords: csvListSchema(''),
    keywordsPath: z.string().default('config/keywords.json'),

    // Collection
    maxVideosPerKeyword: positiveIntSchema.default(50),
    maxTotalVideos: positiveIntSchema.default(100),
    minVideosRequired: nonNegativeIntSchema.default(5),
    keywordConcurrency: positiveIntSchema.default(2),
    discoveryMethods: csvListSchema('search,hashtag,explore').pipe(
        z.array(z.enum(DISCOVERY_METHODS)).min(1, 'At least one discovery method is required')
    ),
    requestDelayMinMs: nonNegativeIntSchema.default(1000),
    requestDelayMaxMs: nonNegativeIntSchema.default(5000),
    batchDelayMinMs: nonNegativeIntSchema.default(5000),
    batchDelayMaxMs: nonNegativeIntSchema.default(15000),
    useMockData: booleanSchema(false),

    // Ranking
    trendingOnly: booleanSchema(true),
    minViews: nonNegativeIntSchema.default(10000),
    minEngagementRate: nonNegativeNumberSchema.default(0.05),
    sortByPerformance: booleanSchema(true),
    scoreWeightLikes: nonNegativeNumberSchema.default(1),
    scoreWeightComments: nonNegativeNumberSchema.default(2),
    scoreWeightShares: nonNegativeNumberSchema.default(3),
    scoreEngagementScale: nonNegativeNumberSchema.default(20),
    hookMaxLength: positiveIntSchema.default(100),

    // Discovery provider
    providerBaseUrl: urlSchema.nullable().default(null),
    providerToken: z.string().nullable().default(null),
    providerTimeoutMs: positiveIntSchema.default(30000),

    // Output
    outputFormats: csvListSchema('json,csv').pipe(z.array(z.enum(OUTPUT_FORMATS))),
    outputDir: z.string().default('data'),
    googleSheetsId: z.string().nullable().default(null),
    googleSheetsRange: z.string().default('A1:Z1000'),

    // Optional - S3-compatible upload of exported files
    storageEndpoint: urlSchema.nullable().default(null),
    storageBucket: z.string().nullable().default(null),
    storageAccessKey: z.string().default('minioadmin'),
    storageSecretKey: z.string().default('minioadmin'),
    storagePublicUrl: urlSchema.default('http://localhost:9000'),
    storageRegion: z.string().default('us-east-1'),

    // Schedule
    scheduleEnabled: booleanSchema(true),
    scheduleCron: z.string().min(1).default('0 3 * * *'),
    scheduleTz: z.string().default('UTC'),

    // Circuit Breaker Tuning
    cbFailureThreshold: positiveIntSchema.default(5),
    cbResetTimeoutMs: positiveIntSchema.default(30000),
    cbHalfOpenRequests: positiveIntSchema.default(3),

    // Admin auth
    jwtSecret: z.string().default(''),
    adminJwtIssuer: z.string().default('trend-console'),
    adminJwtAudience: z.string().default('trend-collector'),
    adminAllowedRoles: csvListSchema('admin'),
}).refine(cfg => cfg.requestDelayMinMs <= cfg.requestDelayMaxMs, {
    message: 'Must not be greater than REQUEST_DELAY_MAX_MS',
    path: ['requestDelayMinMs'],
}).refine(cfg => cfg.batchDelayMinMs <= cfg.batchDelayMaxMs, {
    message: 'Must not be greater than BATCH_DELAY_MAX_MS',
    path: ['batchDelayMinMs'],
}).refine(cfg => !cfg.outputFormats.includes('google_sheets') || cfg.googleSheetsId !== null, {
    message: 'Required when OUTPUT_FORMATS includes google_sheets',
    path: ['googleSheetsId'],
});

export type Config = z.infer<typeof configSchema>;

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(): Record<string, unknown> {
    return {
        redisUrl: process.env.REDIS_URL,
        logLevel: process.env.LOG_LEVEL,
        metricsPort: process.env.METRICS_PORT,

        keywords: process.env.KEYWORDS,
        keywordsPath: process.env.KEYWORDS_PATH,

        maxVideosPerKeyword: process.env.MAX_VIDEOS_PER_KEYWORD,
        maxTotalVideos: process.env.MAX_TOTAL_VIDEOS,
        minVideosRequired: process.env.MIN_VIDEOS_REQUIRED,
        keywordConcurrency: process.env.KEYWORD_CONCURRENCY,
        discoveryMethods: process.env.DISCOVERY_METHODS,
        requestDelayMinMs: process.env.REQUEST_DELAY_MIN_MS,
        requestDelayMaxMs: process.env.REQUEST_DELAY_MAX_MS,
        batchDelayMinMs: process.env.BATCH_DELAY_MIN_MS,
        batchDelayMaxMs: process.env.BATCH_DELAY_MAX_MS,
        useMockData: process.env.USE_MOCK_DATA,

        trendingOnly: process.env.TRENDING_ONLY,
        minViews: process.env.MIN_VIEWS,
        minEngagementRate: process.env.MIN_ENGAGEMENT_RATE,
        sortByPerformance: process.env.SORT_BY_PERFORMANCE,
        scoreWeightLikes: process.env.SCORE_WEIGHT_LIKES,
        scoreWeightComments: process.env.SCORE_WEIGHT_COMMENTS,
        scoreWeightShares: process.env.SCORE_WEIGHT_SHARES,
        scoreEngagementScale: process.env.SCORE_ENGAGEMENT_SCALE,
        hookMaxLength: process.env.HOOK_MAX_LENGTH,

        providerBaseUrl: process.env.PROVIDER_BASE_URL || null,
        providerToken: process.env.PROVIDER_TOKEN || null,
        providerTimeoutMs: process.env.PROVIDER_TIMEOUT_MS,

        outputFormats: process.env.OUTPUT_FORMATS,
        outputDir: process.env.OUTPUT_DIR,
        googleSheetsId: process.env.GOOGLE_SHEETS_ID || null,
        googleSheetsRange: process.env.GOOGLE_SHEETS_RANGE,

        storageEndpoint: process.env.STORAGE_ENDPOINT || null,
        storageBucket: process.env.STORAGE_BUCKET || null,
        storageAccessKey: process.env.STORAGE_ACCESS_KEY,
        storageSecretKey: process.env.STORAGE_SECRET_KEY,
        storagePublicUrl: process.env.STORAGE_PUBLIC_URL,
        storageRegion: process.env.STORAGE_REGION,

        scheduleEnabled: process.env.SCHEDULE_ENABLED,
        scheduleCron: process.env.SCHEDULE_CRON,
        scheduleTz: process.env.SCHEDULE_TZ,

        cbFailureThreshold: process.env.CB_FAILURE_THRESHOLD,
        cbResetTimeoutMs: process.env.CB_RESET_TIMEOUT_MS,
        cbHalfOpenRequests: process.env.CB_HALF_OPEN_REQUESTS,

        jwtSecret: process.env.JWT_SECRET,
        adminJwtIssuer: process.env.ADMIN_JWT_ISSUER,
        adminJwtAudience: process.env.ADMIN_JWT_AUDIENCE,
        adminAllowedRoles: process.env.ADMIN_ALLOWED_ROLES,
    };
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    const rawConfig = mapEnvToConfig();

    const result = configSchema.safeParse(rawConfig);

    if (!result.success) {
        const errors = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            const envVar = pathToEnvVar(path);
            return `  - ${envVar}: ${issue.message}`;
        });

        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are missing or invalid:\n');
        console.error(errors.join('\n'));
        console.error('\nSee .env.example for required configuration.\n');

        process.exit(1);
    }

    return result.data;
}

/**
 * Convert config path to environment variable name
 */
function pathToEnvVar(path: string): string {
    return path
        .replace(/\.\d+$/, '')
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        redisUrl: cfg.redisUrl.replace(/\/\/.*@/, '//<redacted>@'),
        logLevel: cfg.logLevel,
        metricsPort: cfg.metricsPort,
        keywordsPath: cfg.keywords.length > 0 ? null : cfg.keywordsPath,
        keywordCount: cfg.keywords.length,
        maxVideosPerKeyword: cfg.maxVideosPerKeyword,
        maxTotalVideos: cfg.maxTotalVideos,
        keywordConcurrency: cfg.keywordConcurrency,
        discoveryMethods: cfg.discoveryMethods,
        useMockData: cfg.useMockData,
        trendingOnly: cfg.trendingOnly,
        minViews: cfg.minViews,
        minEngagementRate: cfg.minEngagementRate,
        providerBaseUrl: cfg.providerBaseUrl,
        providerToken: cfg.providerToken ? '[REDACTED]' : null,
        outputFormats: cfg.outputFormats,
        outputDir: cfg.outputDir,
        googleSheetsId: cfg.googleSheetsId ? '[CONFIGURED]' : null,
        storageEndpoint: cfg.storageEndpoint,
        storageBucket: cfg.storageBucket,
        storageAccessKey: '[REDACTED]',
        storageSecretKey: '[REDACTED]',
        scheduleEnabled: cfg.scheduleEnabled,
        scheduleCron: cfg.scheduleCron,
        jwtSecret: cfg.jwtSecret ? '[REDACTED]' : null,
    };
}

// Export singleton config
export const config = loadConfig();
