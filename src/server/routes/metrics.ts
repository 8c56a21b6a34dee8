/**
 * Metrics endpoint - Prometheus format
 * GET /metrics
 */
import { FastifyInstance } from 'fastify';
import { getMetrics, getContentType } from '../../observability/metrics.js';
import { updateQueueMetrics } from '../../queues/index.js';
import { getAllCircuitStates } from '../../services/resilience.js';

export async function metricsRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get('/metrics', async (_request, reply) => {
        await updateQueueMetrics();
        // An open circuit only moves to half-open when read; refresh the state gauges
        getAllCircuitStates();

        return reply
            .header('Content-Type', getContentType())
            .send(await getMetrics());
    });
}
