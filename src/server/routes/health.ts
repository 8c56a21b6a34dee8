/**
 * Health endpoint - liveness only; dependencies are reported by /ready
 * GET /health
 */
import { FastifyInstance } from 'fastify';

const SERVICE_NAME = 'video-trend-collector';

interface HealthResponse {
    status: 'healthy';
    service: string;
    uptimeSeconds: number;
    timestamp: string;
}

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
        return reply.send({
            status: 'healthy',
            service: SERVICE_NAME,
            uptimeSeconds: Math.floor(process.uptime()),
            timestamp: new Date().toISOString(),
        });
    });
}
