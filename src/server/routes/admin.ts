/**
 * Admin routes for manual runs and inspection
 */
import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { config } from '../../config/index.js';
import { cleanKeywords } from '../../config/keywords.js';
import { logger } from '../../observability/logger.js';
import { getQueue, isQueueName, QUEUE_NAMES } from '../../queues/index.js';
import { DISCOVERY_METHODS } from '../../queues/schemas.js';
import {
    collectKeyword,
    collectorSettingsFromConfig,
    defaultCollectorDeps,
} from '../../services/collector.service.js';
import { getAllCircuitStates } from '../../services/resilience.js';
import { scheduler } from '../../services/scheduler.service.js';
import type { CircuitSnapshot } from '../../services/circuit-breaker.js';
import { verifyAdminAuth } from '../plugins/admin-auth.js';

const MAX_PREVIEW_VIDEOS = 50;

const runBodySchema = z.object({
    keywords: z.array(z.string().max(200)).max(100).optional(),
}).optional();

const previewBodySchema = z.object({
    keyword: z.string().trim().min(1, 'keyword is required').max(200),
    methods: z.array(z.enum(DISCOVERY_METHODS)).min(1).optional(),
    limit: z.number().int().min(1).max(MAX_PREVIEW_VIDEOS).optional(),
    trendingOnly: z.boolean().optional(),
});

interface RunResponse {
    success: boolean;
    runId?: string;
    jobId?: string;
    keywords?: string[];
    message: string;
}

interface QueueStatsResponse {
    queue: string;
    waiting: number;
    active: number;
    completed: number;
    failed: number;
    delayed: number;
    waitingChildren: number;
}

interface JobResponse {
    id: string;
    name: string;
    queue: string;
    data: unknown;
    state: string;
    attemptsMade: number;
    returnValue: unknown;
    failedReason?: string;
    processedOn?: number;
    finishedOn?: number;
    timestamp: number;
}

interface PreviewResponse {
    success: boolean;
    message: string;
    keyword?: string;
    discovered?: number;
    fallbacks?: number;
    failedMethods?: string[];
    videos?: Array<{
        url: string;
        author: string;
        hook: string;
        views: number;
        engagementRate: number;
        performanceScore: number;
        isTrending: boolean;
        discoveryMethod: string | null;
    }>;
}

function firstIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    return issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request body';
}

export async function adminRoutes(fastify: FastifyInstance): Promise<void> {
    /**
     * Start a collection run, optionally for a subset of keywords
     * POST /admin/runs
     */
    fastify.post<{ Reply: RunResponse }>(
        '/admin/runs',
        { preHandler: verifyAdminAuth },
        async (request, reply) => {
            const parsed = runBodySchema.safeParse(request.body ?? undefined);
            if (!parsed.success) {
                return reply.status(400).send({ success: false, message: firstIssue(parsed.error) });
            }

            const keywords = parsed.data?.keywords ? cleanKeywords(parsed.data.keywords) : undefined;

            try {
                const run = await scheduler.triggerRun('manual', keywords);
                return reply.status(202).send({
                    success: true,
                    runId: run.runId,
                    jobId: run.exportJobId,
                    keywords: run.keywords,
                    message: 'Run triggered',
                });
            } catch (error) {
                logger.error('Failed to trigger run', error);
                return reply.status(500).send({
                    success: false,
                    message: error instanceof Error ? error.message : 'Failed to trigger run',
                });
            }
        }
    );

    /**
     * Discover, normalize and rank one keyword without exporting
     * POST /admin/preview
     */
    fastify.post<{ Reply: PreviewResponse }>(
        '/admin/preview',
        { preHandler: verifyAdminAuth },
        async (request, reply) => {
            const parsed = previewBodySchema.safeParse(request.body);
            if (!parsed.success) {
                return reply.status(400).send({ success: false, message: firstIssue(parsed.error) });
            }

            const { keyword, methods, limit, trendingOnly } = parsed.data;
            const base = collectorSettingsFromConfig(config);

            try {
                const result = await collectKeyword(keyword, {
                    ...base,
                    discoveryMethods: methods ?? base.discoveryMethods,
                    maxVideosPerKeyword: limit ?? Math.min(base.maxVideosPerKeyword, MAX_PREVIEW_VIDEOS),
                    trendingOnly: trendingOnly ?? base.trendingOnly,
                    // Previews answer an HTTP request; no pacing between methods
                    requestDelay: { minMs: 0, maxMs: 0 },
                }, defaultCollectorDeps);

                return reply.send({
                    success: true,
                    message: result.success
                        ? 'Preview complete'
                        : `Fewer than ${base.minVideosRequired} videos found`,
                    keyword,
                    discovered: result.discovered,
                    fallbacks: result.fallbacks,
                    failedMethods: result.failedMethods,
                    videos: result.videos.map(video => ({
                        url: video.url,
                        author: video.author,
                        hook: video.hook,
                        views: video.statistics.views,
                        engagementRate: video.engagementRate,
                        performanceScore: video.performanceScore,
                        isTrending: video.isTrending,
                        discoveryMethod: video.discoveryMethod,
                    })),
                });
            } catch (error) {
                logger.error('Preview failed', error, { keyword });
                return reply.status(500).send({
                    success: false,
                    message: error instanceof Error ? error.message : 'Preview failed',
                });
            }
        }
    );

    /**
     * Get all queue statistics
     * GET /admin/queues
     */
    fastify.get<{ Reply: QueueStatsResponse[] }>(
        '/admin/queues',
        { preHandler: verifyAdminAuth },
        async (_request, reply) => {
            const stats: QueueStatsResponse[] = [];

            for (const queueName of Object.values(QUEUE_NAMES)) {
                const queue = getQueue(queueName);
                if (!queue) continue;

                const counts = await queue.getJobCounts(
                    'waiting', 'active', 'completed', 'failed', 'delayed', 'waiting-children'
                );

                stats.push({
                    queue: queueName,
                    waiting: counts.waiting || 0,
                    active: counts.active || 0,
                    completed: counts.completed || 0,
                    failed: counts.failed || 0,
                    delayed: counts.delayed || 0,
                    waitingChildren: counts['waiting-children'] || 0,
                });
            }

            return reply.send(stats);
        }
    );

    /**
     * Get a job, including its return value (keyword result or run report)
     * GET /admin/jobs/:queue/:id
     */
    fastify.get<{ Params: { queue: string; id: string }; Reply: JobResponse | { error: string } }>(
        '/admin/jobs/:queue/:id',
        { preHandler: verifyAdminAuth },
        async (request, reply) => {
            const { queue: queueName, id } = request.params;

            const queue = isQueueName(queueName) ? getQueue(queueName) : undefined;
            if (!queue) {
                return reply.status(404).send({ error: `Queue '${queueName}' not found` });
            }

            const job = await queue.getJob(id);
            if (!job || !job.id) {
                return reply.status(404).send({ error: `Job '${id}' not found` });
            }

            return reply.send({
                id: job.id,
                name: job.name,
                queue: queueName,
                data: job.data,
                state: await job.getState(),
                attemptsMade: job.attemptsMade,
                returnValue: job.returnvalue ?? null,
                failedReason: job.failedReason,
                processedOn: job.processedOn,
                finishedOn: job.finishedOn,
                timestamp: job.timestamp,
            });
        }
    );

    /**
     * Registered run schedule
     * GET /admin/schedule
     */
    fastify.get('/admin/schedule', { preHandler: verifyAdminAuth }, async (_request, reply) => {
        const jobs = await scheduler.getScheduledJobs();
        return reply.send({
            enabled: config.scheduleEnabled,
            cron: config.scheduleCron,
            tz: config.scheduleTz,
            jobs,
        });
    });

    /**
     * Circuit breaker states
     * GET /admin/circuits
     */
    fastify.get<{ Reply: CircuitSnapshot[] }>(
        '/admin/circuits',
        { preHandler: verifyAdminAuth },
        async (_request, reply) => reply.send(getAllCircuitStates())
    );
}
