/**
 * Fastify server setup
 */
import Fastify, { FastifyInstance } from 'fastify';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { healthRoutes } from './routes/health.js';
import { readyRoutes } from './routes/ready.js';
import { metricsRoutes } from './routes/metrics.js';
import { adminRoutes } from './routes/admin.js';

let server: FastifyInstance | null = null;

const BODY_LIMIT_BYTES = 64 * 1024;

/**
 * Create and configure Fastify server
 */
export function createServer(): FastifyInstance {
    const fastify = Fastify({
        logger: {
            level: config.logLevel,
        },
        // Probes and scrapes would drown everything else at info level
        disableRequestLogging: config.logLevel !== 'debug',
        bodyLimit: BODY_LIMIT_BYTES,
    });

    fastify.setErrorHandler((error, request, reply) => {
        const statusCode = error.statusCode ?? 500;
        if (statusCode >= 500) {
            logger.error('Request failed', error, { method: request.method, url: request.url });
        }
        void reply.status(statusCode).send({
            success: false,
            message: statusCode >= 500 ? 'Internal server error' : error.message,
        });
    });

    fastify.setNotFoundHandler((request, reply) => {
        void reply.status(404).send({ error: `Route ${request.method} ${request.url} not found` });
    });

    return fastify;
}

/**
 * Register all routes
 */
export async function registerRoutes(fastify: FastifyInstance): Promise<void> {
    await fastify.register(healthRoutes);
    await fastify.register(readyRoutes);
    await fastify.register(metricsRoutes);
    await fastify.register(adminRoutes);

    logger.info('Routes registered: /health, /ready, /metrics, /admin/*');
}

/**
 * Start the server
 */
export async function startServer(): Promise<FastifyInstance> {
    server = createServer();
    await registerRoutes(server);

    const port = config.metricsPort;
    const host = '0.0.0.0';

    await server.listen({ port, host });
    logger.info(`Server listening on http://${host}:${port}`);

    return server;
}

/**
 * Stop the server
 */
export async function stopServer(): Promise<void> {
    if (server) {
        await server.close();
        server = null;
        logger.info('Server stopped');
    }
}
