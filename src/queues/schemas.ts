/**
 * Queue job type definitions
 */

// Discovery paths a keyword can be searched through
export const DISCOVERY_METHODS = ['search', 'hashtag', 'profile', 'explore'] as const;

export type DiscoveryMethod = typeof DISCOVERY_METHODS[number];

export type TriggerSource = 'schedule' | 'manual';

/**
 * Run Job - repeatable tick that starts a collection run
 */
export interface RunJob {
    triggeredBy: TriggerSource;
    triggeredAt: string;
    keywords?: string[];
}

/**
 * Collect Job - discovers, normalizes and ranks videos for one keyword
 */
export interface CollectJob {
    runId: string;
    keyword: string;
    triggeredBy: TriggerSource;
}

/**
 * Export Job - parent of a run's collect jobs; merges their results and exports them
 */
export interface ExportJob {
    runId: string;
    keywords: string[];
    triggeredBy: TriggerSource;
    triggeredAt: string;
}

/**
 * DLQ Job - failed job moved to dead letter queue
 */
export interface DLQJob {
    originalQueue: string;
    originalJobId: string;
    originalJobData: unknown;
    failureReason: string;
    failedAt: string;
    attemptsMade: number;
}

// Queue names
export const QUEUE_NAMES = {
    RUN: 'run-queue',
    COLLECT: 'collect-queue',
    EXPORT: 'export-queue',
    DLQ: 'trend-dlq',
} as const;

export type QueueName = typeof QUEUE_NAMES[keyof typeof QUEUE_NAMES];
