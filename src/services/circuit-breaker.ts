/**
 * Circuit Breaker
 *
 * States:
 * - CLOSED: calls pass through, consecutive failures are counted
 * - OPEN: calls fail fast until the reset timeout has passed
 * - HALF_OPEN: a limited number of probe calls decide whether to close again
 */
import { logger } from '../observability/logger.js';
import { circuitState, circuitTrips } from '../observability/metrics.js';

export enum CircuitState {
    CLOSED = 0,
    OPEN = 1,
    HALF_OPEN = 2,
}

export interface CircuitBreakerOptions {
    name: string;
    failureThreshold: number;   // consecutive failures before opening
    resetTimeout: number;       // ms spent open before probing
    halfOpenRequests: number;   // probe calls allowed, and successes needed to close
    now?: () => number;
}

export interface CircuitSnapshot {
    name: string;
    state: keyof typeof CircuitState;
    failureCount: number;
    openedAt: string | null;
}

const DEFAULT_OPTIONS: Omit<CircuitBreakerOptions, 'name'> = {
    failureThreshold: 5,
    resetTimeout: 30000,
    halfOpenRequests: 3,
};

export class CircuitBreaker {
    private state: CircuitState = CircuitState.CLOSED;
    private failureCount = 0;
    private successCount = 0;
    private halfOpenAttempts = 0;
    private openedAt = 0;
    private readonly options: CircuitBreakerOptions;
    private readonly now: () => number;

    constructor(options: Partial<CircuitBreakerOptions> & { name: string }) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
        this.now = options.now ?? Date.now;
        this.updateMetrics();
    }

    get name(): string {
        return this.options.name;
    }

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        const state = this.getState();

        if (state === CircuitState.OPEN) {
            throw new CircuitOpenError(this.options.name);
        }

        if (state === CircuitState.HALF_OPEN) {
            if (this.halfOpenAttempts >= this.options.halfOpenRequests) {
                throw new CircuitOpenError(this.options.name);
            }
            this.halfOpenAttempts++;
        }

        try {
            const result = await fn();
            this.onSuccess();
            return result;
        } catch (error) {
            this.onFailure();
            throw error;
        }
    }

    private onSuccess(): void {
        if (this.state === CircuitState.HALF_OPEN) {
            this.successCount++;
            if (this.successCount >= this.options.halfOpenRequests) {
                this.transitionTo(CircuitState.CLOSED);
            }
        } else {
            this.failureCount = 0;
        }
    }

    private onFailure(): void {
        this.failureCount++;

        if (this.state === CircuitState.HALF_OPEN) {
            this.transitionTo(CircuitState.OPEN);
        } else if (this.state === CircuitState.CLOSED && this.failureCount >= this.options.failureThreshold) {
            this.transitionTo(CircuitState.OPEN);
        }
    }

    private transitionTo(next: CircuitState): void {
        const previous = this.state;
        this.state = next;

        if (next === CircuitState.OPEN) {
            this.openedAt = this.now();
            circuitTrips.labels(this.options.name).inc();
        } else if (next === CircuitState.CLOSED) {
            this.failureCount = 0;
            this.successCount = 0;
            this.halfOpenAttempts = 0;
        } else {
            this.successCount = 0;
            this.halfOpenAttempts = 0;
        }

        const level = next === CircuitState.OPEN ? 'warn' : 'info';
        logger[level](`Circuit breaker ${this.options.name} transitioned`, {
            from: CircuitState[previous],
            to: CircuitState[next],
        });

        this.updateMetrics();
    }

    private updateMetrics(): void {
        circuitState.labels(this.options.name).set(this.state);
    }

    /**
     * Current state; an open circuit whose timeout has passed moves to HALF_OPEN here
     */
    getState(): CircuitState {
        if (this.state === CircuitState.OPEN && this.now() - this.openedAt >= this.options.resetTimeout) {
            this.transitionTo(CircuitState.HALF_OPEN);
        }
        return this.state;
    }

    isAllowingRequests(): boolean {
        const state = this.getState();
        return state === CircuitState.CLOSED ||
            (state === CircuitState.HALF_OPEN && this.halfOpenAttempts < this.options.halfOpenRequests);
    }

    snapshot(): CircuitSnapshot {
        const state = this.getState();
        return {
            name: this.options.name,
            state: state === CircuitState.OPEN ? 'OPEN' : state === CircuitState.HALF_OPEN ? 'HALF_OPEN' : 'CLOSED',
            failureCount: this.failureCount,
            openedAt: state === CircuitState.CLOSED ? null : new Date(this.openedAt).toISOString(),
        };
    }

    reset(): void {
        this.transitionTo(CircuitState.CLOSED);
    }
}

export class CircuitOpenError extends Error {
    constructor(circuitName: string) {
        super(`Circuit breaker '${circuitName}' is open`);
        this.name = 'CircuitOpenError';
    }
}
