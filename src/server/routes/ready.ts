/**
 * Ready endpoint - readiness check with dependency status
 * GET /ready
 */
import { FastifyInstance } from 'fastify';
import { isRedisConnected } from '../../queues/redis.js';
import { config } from '../../config/index.js';
import { hasOpenCircuit } from '../../services/resilience.js';

type DependencyStatus = 'connected' | 'disconnected' | 'configured' | 'not_configured' | 'mock';

interface ReadyResponse {
    status: 'ready' | 'not_ready';
    dependencies: {
        redis: DependencyStatus;
        provider: DependencyStatus;
        sheets: DependencyStatus;
        storage: DependencyStatus;
    };
    openCircuits: boolean;
}

export async function readyRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get<{ Reply: ReadyResponse }>('/ready', async (_request, reply) => {
        const redisStatus: DependencyStatus = await isRedisConnected() ? 'connected' : 'disconnected';

        const providerStatus: DependencyStatus = config.useMockData
            ? 'mock'
            : config.providerBaseUrl ? 'configured' : 'not_configured';

        const sheetsStatus: DependencyStatus = config.outputFormats.includes('google_sheets') && config.googleSheetsId
            ? 'configured'
            : 'not_configured';

        const storageStatus: DependencyStatus = config.storageEndpoint && config.storageBucket
            ? 'configured'
            : 'not_configured';

        // Redis carries every run; discovery needs a provider unless mock data is on
        const isReady = redisStatus === 'connected' && providerStatus !== 'not_configured';

        return reply.status(isReady ? 200 : 503).send({
            status: isReady ? 'ready' : 'not_ready',
            dependencies: {
                redis: redisStatus,
                provider: providerStatus,
                sheets: sheetsStatus,
                storage: storageStatus,
            },
            openCircuits: hasOpenCircuit(),
        });
    });
}
