/**
 * Resilience utilities - one circuit breaker per external dependency
 */
import { CircuitBreaker, CircuitState, type CircuitSnapshot } from './circuit-breaker.js';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';

export type Dependency = 'provider' | 'sheets' | 'storage';

const circuitBreakers: Map<Dependency, CircuitBreaker> = new Map();

export function getCircuitBreaker(name: Dependency): CircuitBreaker {
    let cb = circuitBreakers.get(name);

    if (!cb) {
        const options = {
            failureThreshold: config.cbFailureThreshold,
            resetTimeout: config.cbResetTimeoutMs,
            halfOpenRequests: config.cbHalfOpenRequests,
        };
        cb = new CircuitBreaker({ name, ...options });
        circuitBreakers.set(name, cb);
        logger.debug(`Circuit breaker created: ${name}`, options);
    }

    return cb;
}

export function getAllCircuitStates(): CircuitSnapshot[] {
    return Array.from(circuitBreakers.values(), cb => cb.snapshot());
}

export function hasOpenCircuit(): boolean {
    for (const cb of circuitBreakers.values()) {
        if (cb.getState() === CircuitState.OPEN) {
            return true;
        }
    }
    return false;
}

export function resetAllCircuits(): void {
    for (const [name, cb] of circuitBreakers) {
        cb.reset();
        logger.info(`Circuit breaker reset: ${name}`);
    }
}

/**
 * Execute with circuit breaker protection
 */
export async function withCircuitBreaker<T>(name: Dependency, fn: () => Promise<T>): Promise<T> {
    return getCircuitBreaker(name).execute(fn);
}
