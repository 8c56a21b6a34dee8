/**
 * Admin Endpoints Tests
 * Request validation and response shapes of the admin API
 */
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { adminToken, setAdminTestEnv } from '../helpers/jwt.js';

const mocks = vi.hoisted(() => ({
    getJob: vi.fn(),
    triggerRun: vi.fn(),
}));

vi.mock('../../src/observability/logger.js', async () =>
    (await import('../helpers/logger-mock.js')).createLoggerMock()
);

vi.mock('../../src/queues/index.js', () => {
    const QUEUE_NAMES = {
        RUN: 'run-queue',
        COLLECT: 'collect-queue',
        EXPORT: 'export-queue',
        DLQ: 'trend-dlq',
    };
    return {
        QUEUE_NAMES,
        isQueueName: (value: string) => Object.values(QUEUE_NAMES).includes(value),
        getQueue: vi.fn(() => ({
            getJobCounts: vi.fn().mockResolvedValue({
                waiting: 10,
                active: 2,
                completed: 100,
                failed: 5,
                delayed: 3,
            }),
            getJob: mocks.getJob,
        })),
        updateQueueMetrics: vi.fn().mockResolvedValue(undefined),
    };
});

vi.mock('../../src/queues/redis.js', () => ({
    isRedisConnected: vi.fn().mockResolvedValue(true),
}));

vi.mock('../../src/services/scheduler.service.js', () => ({
    scheduler: {
        triggerRun: mocks.triggerRun,
        getScheduledJobs: vi.fn().mockResolvedValue([
            { key: 'k1', name: 'scheduled-run', pattern: '0 3 * * *', tz: 'UTC', next: '2024-05-02T03:00:00.000Z' },
        ]),
    },
}));

describe('Admin Endpoints', () => {
    let server: FastifyInstance;
    const headers = { authorization: `Bearer ${adminToken()}` };

    beforeAll(async () => {
        setAdminTestEnv();
        const { createServer, registerRoutes } = await import('../../src/server/index.js');
        server = createServer();
        await registerRoutes(server);
    });

    afterAll(async () => {
        await server.close();
    });

    beforeEach(() => {
        vi.clearAllMocks();
        mocks.getJob.mockResolvedValue(null);
        mocks.triggerRun.mockResolvedValue({ runId: 'run-123', keywords: ['Budgeting'], exportJobId: 'run-123' });
    });

    describe('POST /admin/runs', () => {
        it('triggers a run with cleaned keywords', async () => {
            const response = await server.inject({
                method: 'POST',
                url: '/admin/runs',
                headers,
                payload: { keywords: [' Budgeting ', 'budgeting', ''] },
            });

            expect(response.statusCode).toBe(202);
            expect(response.json()).toEqual({
                success: true,
                runId: 'run-123',
                jobId: 'run-123',
                keywords: ['Budgeting'],
                message: 'Run triggered',
            });
            expect(mocks.triggerRun).toHaveBeenCalledWith('manual', ['Budgeting']);
        });

        it('uses the configured keywords without a body', async () => {
            const response = await server.inject({ method: 'POST', url: '/admin/runs', headers });

            expect(response.statusCode).toBe(202);
            expect(mocks.triggerRun).toHaveBeenCalledWith('manual', undefined);
        });

        it('rejects a malformed body', async () => {
            const response = await server.inject({
                method: 'POST',
                url: '/admin/runs',
                headers,
                payload: { keywords: 'budgeting' },
            });

            expect(response.statusCode).toBe(400);
            expect(response.json()).toMatchObject({ success: false });
            expect(mocks.triggerRun).not.toHaveBeenCalled();
        });

        it('returns 500 when the run cannot be queued', async () => {
            mocks.triggerRun.mockRejectedValue(new Error('No keywords configured for the run'));

            const response = await server.inject({ method: 'POST', url: '/admin/runs', headers });

            expect(response.statusCode).toBe(500);
            expect(response.json()).toEqual({ success: false, message: 'No keywords configured for the run' });
        });
    });

    describe('POST /admin/preview', () => {
        it('collects one keyword from synthetic data', async () => {
            const response = await server.inject({
                method: 'POST',
                url: '/admin/preview',
                headers,
                payload: { keyword: 'budgeting', methods: ['search'], limit: 5, trendingOnly: false },
            });

            expect(response.statusCode).toBe(200);
            const body = response.json();
            expect(body.success).toBe(true);
            expect(body.keyword).toBe('budgeting');
            expect(body.discovered).toBe(5);
            expect(body.videos).toHaveLength(5);
            expect(body.failedMethods).toEqual([]);
        });

        it('requires a keyword', async () => {
            const response = await server.inject({
                method: 'POST',
                url: '/admin/preview',
                headers,
                payload: { keyword: '   ' },
            });

            expect(response.statusCode).toBe(400);
            expect(response.json()).toEqual({ success: false, message: 'keyword: keyword is required' });
        });

        it('rejects an unknown discovery method and an oversized limit', async () => {
            const badMethod = await server.inject({
                method: 'POST',
                url: '/admin/preview',
                headers,
                payload: { keyword: 'budgeting', methods: ['trending'] },
            });
            const badLimit = await server.inject({
                method: 'POST',
                url: '/admin/preview',
                headers,
                payload: { keyword: 'budgeting', limit: 51 },
            });

            expect(badMethod.statusCode).toBe(400);
            expect(badLimit.statusCode).toBe(400);
        });
    });

    describe('GET /admin/queues', () => {
        it('returns counts for every queue', async () => {
            const response = await server.inject({ method: 'GET', url: '/admin/queues', headers });

            expect(response.statusCode).toBe(200);
            const stats = response.json();
            expect(stats).toHaveLength(4);
            expect(stats[0]).toEqual({
                queue: 'run-queue',
                waiting: 10,
                active: 2,
                completed: 100,
                failed: 5,
                delayed: 3,
                waitingChildren: 0,
            });
        });
    });

    describe('GET /admin/jobs/:queue/:id', () => {
        it('returns 404 for an unknown queue', async () => {
            const response = await server.inject({ method: 'GET', url: '/admin/jobs/nope/1', headers });

            expect(response.statusCode).toBe(404);
            expect(response.json()).toEqual({ error: "Queue 'nope' not found" });
        });

        it('returns 404 for an unknown job', async () => {
            const response = await server.inject({ method: 'GET', url: '/admin/jobs/export-queue/missing', headers });

            expect(response.statusCode).toBe(404);
            expect(response.json()).toEqual({ error: "Job 'missing' not found" });
        });

        it('returns a job with its return value', async () => {
            mocks.getJob.mockResolvedValue({
                id: 'run-123',
                name: 'export-run-123',
                data: { runId: 'run-123' },
                attemptsMade: 1,
                returnvalue: { videoCount: 12 },
                failedReason: undefined,
                processedOn: 1000,
                finishedOn: 2000,
                timestamp: 500,
                getState: vi.fn().mockResolvedValue('completed'),
            });

            const response = await server.inject({ method: 'GET', url: '/admin/jobs/export-queue/run-123', headers });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toEqual({
                id: 'run-123',
                name: 'export-run-123',
                queue: 'export-queue',
                data: { runId: 'run-123' },
                state: 'completed',
                attemptsMade: 1,
                returnValue: { videoCount: 12 },
                processedOn: 1000,
                finishedOn: 2000,
                timestamp: 500,
            });
        });
    });

    describe('GET /admin/schedule', () => {
        it('returns the schedule settings and repeatable jobs', async () => {
            const response = await server.inject({ method: 'GET', url: '/admin/schedule', headers });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toEqual({
                enabled: true,
                cron: '0 3 * * *',
                tz: 'UTC',
                jobs: [
                    { key: 'k1', name: 'scheduled-run', pattern: '0 3 * * *', tz: 'UTC', next: '2024-05-02T03:00:00.000Z' },
                ],
            });
        });
    });
});
