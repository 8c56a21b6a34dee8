/**
 * Prometheus metrics for the trend collector
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================================================
// JOB METRICS
// ============================================================================

/**
 * Counter: Total jobs processed by queue and status
 */
export const jobsTotal = new client.Counter({
    name: 'trend_jobs_total',
    help: 'Total number of jobs processed',
    labelNames: ['queue', 'status'] as const,
    registers: [registry],
});

/**
 * Gauge: Current queue depth by queue name
 */
export const queueDepth = new client.Gauge({
    name: 'trend_queue_depth',
    help: 'Current number of jobs in queue',
    labelNames: ['queue'] as const,
    registers: [registry],
});

/**
 * Histogram: Job duration in seconds
 */
export const jobDuration = new client.Histogram({
    name: 'trend_job_duration_seconds',
    help: 'Job processing duration in seconds',
    labelNames: ['queue'] as const,
    buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300, 600],
    registers: [registry],
});

/**
 * Gauge: DLQ size
 */
export const dlqSize = new client.Gauge({
    name: 'trend_dlq_size',
    help: 'Number of jobs in dead letter queue',
    registers: [registry],
});

/**
 * Counter: Retry attempts
 */
export const retryCount = new client.Counter({
    name: 'trend_retry_count',
    help: 'Number of retry attempts',
    labelNames: ['queue', 'attempt'] as const,
    registers: [registry],
});

// ============================================================================
// CIRCUIT BREAKER METRICS
// ============================================================================

/**
 * Gauge: Circuit breaker state (0 = closed, 1 = open, 2 = half-open)
 */
export const circuitState = new client.Gauge({
    name: 'trend_circuit_state',
    help: 'Circuit breaker state (0=closed, 1=open, 2=half-open)',
    labelNames: ['dependency'] as const,
    registers: [registry],
});

/**
 * Counter: Circuit breaker trips (open events)
 */
export const circuitTrips = new client.Counter({
    name: 'trend_circuit_trips_total',
    help: 'Number of times circuit breaker opened',
    labelNames: ['dependency'] as const,
    registers: [registry],
});

// ============================================================================
// PIPELINE METRICS
// ============================================================================

export const videosDiscovered = new client.Counter({
    name: 'trend_videos_discovered_total',
    help: 'Raw video records returned by discovery, by method',
    labelNames: ['method'] as const,
    registers: [registry],
});

export const discoveryErrors = new client.Counter({
    name: 'trend_discovery_errors_total',
    help: 'Failed discovery attempts, by method',
    labelNames: ['method'] as const,
    registers: [registry],
});

export const videosNormalized = new client.Counter({
    name: 'trend_videos_normalized_total',
    help: 'Raw records converted to canonical videos',
    registers: [registry],
});

export const normalizationFallbacks = new client.Counter({
    name: 'trend_normalization_fallbacks_total',
    help: 'Raw records that produced the minimal fallback video',
    registers: [registry],
});

export const videosTrending = new client.Counter({
    name: 'trend_videos_trending_total',
    help: 'Canonical videos classified as trending',
    registers: [registry],
});

export const exportsTotal = new client.Counter({
    name: 'trend_exports_total',
    help: 'Export attempts by exporter and status',
    labelNames: ['exporter', 'status'] as const,
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}

/**
 * Get content type for Prometheus
 */
export function getContentType(): string {
    return registry.contentType;
}
