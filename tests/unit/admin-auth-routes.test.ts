import { afterEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { adminToken, makeJwt, setAdminTestEnv, TEST_JWT_SECRET } from '../helpers/jwt.js';

const queueMocks = vi.hoisted(() => ({
    getJobCounts: vi.fn().mockResolvedValue({
        waiting: 1,
        active: 2,
        completed: 3,
        failed: 0,
        delayed: 0,
        'waiting-children': 4,
    }),
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
            getJobCounts: queueMocks.getJobCounts,
            getJob: vi.fn().mockResolvedValue(null),
        })),
        updateQueueMetrics: vi.fn().mockResolvedValue(undefined),
    };
});

vi.mock('../../src/queues/redis.js', () => ({
    isRedisConnected: vi.fn().mockResolvedValue(false),
}));

vi.mock('../../src/services/scheduler.service.js', () => ({
    scheduler: {
        triggerRun: vi.fn().mockResolvedValue({ runId: 'run-123', keywords: ['budgeting'], exportJobId: 'run-123' }),
        getScheduledJobs: vi.fn().mockResolvedValue([]),
    },
}));

async function buildServer(env: Record<string, string> = {}): Promise<FastifyInstance> {
    vi.resetModules();

    setAdminTestEnv();
    Object.assign(process.env, env);

    const { createServer, registerRoutes } = await import('../../src/server/index.js');
    const fastify = createServer();
    await registerRoutes(fastify);
    return fastify;
}

async function getQueues(server: FastifyInstance, token?: string) {
    return server.inject({
        method: 'GET',
        url: '/admin/queues',
        headers: token ? { authorization: `Bearer ${token}` } : {},
    });
}

describe('Admin auth and route protections', () => {
    afterEach(async () => {
        vi.clearAllMocks();
    });

    it('keeps /health public', async () => {
        const server = await buildServer();
        const response = await server.inject({ method: 'GET', url: '/health' });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toMatchObject({ status: 'healthy', service: 'video-trend-collector' });
        await server.close();
    });

    it('reports not ready while Redis is down', async () => {
        const server = await buildServer();
        const response = await server.inject({ method: 'GET', url: '/ready' });

        expect(response.statusCode).toBe(503);
        expect(response.json()).toMatchObject({
            status: 'not_ready',
            dependencies: { redis: 'disconnected', provider: 'mock' },
        });
        await server.close();
    });

    it('returns 401 when admin token is missing', async () => {
        const server = await buildServer();
        const response = await getQueues(server);

        expect(response.statusCode).toBe(401);
        expect(response.json()).toEqual({ message: 'Authentication required' });
        await server.close();
    });

    it('returns 401 for invalid signature', async () => {
        const server = await buildServer();
        const token = makeJwt({ iss: 'trend-console', aud: 'trend-collector', role: 'admin' }, 'wrong-secret');

        const response = await getQueues(server, token);

        expect(response.statusCode).toBe(401);
        expect(response.json()).toEqual({ message: 'Invalid authentication token' });
        await server.close();
    });

    it('rejects tokens signed with another algorithm', async () => {
        const server = await buildServer();
        const token = makeJwt(
            { iss: 'trend-console', aud: 'trend-collector', role: 'admin', exp: Math.floor(Date.now() / 1000) + 3600 },
            TEST_JWT_SECRET,
            { alg: 'none', typ: 'JWT' }
        );

        const response = await getQueues(server, token);

        expect(response.statusCode).toBe(401);
        await server.close();
    });

    it('returns 401 for an expired token', async () => {
        const server = await buildServer();
        const response = await getQueues(server, adminToken({ exp: Math.floor(Date.now() / 1000) - 10 }));

        expect(response.statusCode).toBe(401);
        expect(response.json()).toEqual({ message: 'Token has expired' });
        await server.close();
    });

    it('returns 401 for the wrong issuer or audience', async () => {
        const server = await buildServer();

        const wrongIssuer = await getQueues(server, adminToken({ iss: 'someone-else' }));
        const wrongAudience = await getQueues(server, adminToken({ aud: ['another-service'] }));

        expect(wrongIssuer.json()).toEqual({ message: 'Invalid token issuer' });
        expect(wrongAudience.json()).toEqual({ message: 'Invalid token audience' });
        expect(wrongIssuer.statusCode).toBe(401);
        expect(wrongAudience.statusCode).toBe(401);
        await server.close();
    });

    it('returns 403 for disallowed role', async () => {
        const server = await buildServer();
        const response = await getQueues(server, adminToken({ role: 'viewer' }));

        expect(response.statusCode).toBe(403);
        await server.close();
    });

    it('allows admin and manager roles', async () => {
        const server = await buildServer();

        const adminResponse = await getQueues(server, adminToken());
        const managerResponse = await getQueues(server, adminToken({ role: 'Manager', aud: ['trend-collector'] }));

        expect(adminResponse.statusCode).toBe(200);
        expect(managerResponse.statusCode).toBe(200);
        await server.close();
    });

    it('returns 503 when no JWT secret is configured', async () => {
        const server = await buildServer({ JWT_SECRET: '' });
        const response = await getQueues(server, adminToken());

        expect(response.statusCode).toBe(503);
        await server.close();
    });
});
