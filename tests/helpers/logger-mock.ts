import { vi } from 'vitest';

/**
 * Silent stand-in for src/observability/logger.js
 */
export function createLoggerMock() {
    const log = {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        child: vi.fn(),
    };
    log.child.mockReturnValue(log);

    return {
        logger: log,
        createLogger: vi.fn(() => log),
        Logger: vi.fn(() => log),
    };
}
