/**
 * Structured logger
 * Every line carries the run/keyword context it was created with, so a run can be
 * followed from the trigger through discovery to the exporters.
 */
import pino from 'pino';
import { config } from '../config/index.js';
import type { DiscoveryMethod, QueueName } from '../queues/schemas.js';

const SERVICE_NAME = 'video-trend-collector';

// Log data sometimes carries request headers or provider settings
const REDACTED_PATHS = [
    'authorization',
    'headers.authorization',
    'providerToken',
    'jwtSecret',
    'storageSecretKey',
];

const baseLogger = pino({
    level: config.logLevel,
    base: {
        service: SERVICE_NAME,
    },
    redact: {
        paths: REDACTED_PATHS,
        censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
        level: (label) => ({ level: label }),
    },
});

export type LogStage = 'discover' | 'normalize' | 'rank' | 'export';

export interface LogContext {
    runId?: string;
    jobId?: string;
    queue?: QueueName;
    keyword?: string;
    discoveryMethod?: DiscoveryMethod;
    stage?: LogStage;
}

function describeError(error: unknown): Record<string, unknown> {
    if (!(error instanceof Error)) {
        return { error };
    }

    return {
        error: {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(error.cause !== undefined && {
                cause: error.cause instanceof Error ? error.cause.message : error.cause,
            }),
        },
    };
}

export class Logger {
    private readonly logger: pino.Logger;

    constructor(context?: LogContext, parent: pino.Logger = baseLogger) {
        this.logger = context ? parent.child(context) : parent;
    }

    child(context: LogContext): Logger {
        return new Logger(context, this.logger);
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.logger.debug(data ?? {}, message);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.logger.info(data ?? {}, message);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.logger.warn(data ?? {}, message);
    }

    error(message: string, error?: unknown, data?: Record<string, unknown>): void {
        this.logger.error({ ...describeError(error), ...data }, message);
    }
}

export const logger = new Logger();
export const createLogger = (context: LogContext): Logger => new Logger(context);
