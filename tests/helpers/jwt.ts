import { createHmac } from 'node:crypto';

export const TEST_JWT_SECRET = 'test-jwt-secret';
export const TEST_ISSUER = 'trend-console';
export const TEST_AUDIENCE = 'trend-collector';

export function makeJwt(
    payload: Record<string, unknown>,
    secret: string = TEST_JWT_SECRET,
    header: Record<string, unknown> = { alg: 'HS256', typ: 'JWT' }
): string {
    const headerB64 = Buffer.from(JSON.stringify(header)).toString('base64url');
    const body = Buffer.from(JSON.stringify(payload)).toString('base64url');
    const signature = createHmac('sha256', secret)
        .update(`${headerB64}.${body}`)
        .digest('base64url');
    return `${headerB64}.${body}.${signature}`;
}

export function adminToken(overrides: Record<string, unknown> = {}): string {
    return makeJwt({
        iss: TEST_ISSUER,
        aud: TEST_AUDIENCE,
        role: 'admin',
        exp: Math.floor(Date.now() / 1000) + 3600,
        ...overrides,
    });
}

/**
 * Environment for building the server in tests
 */
export function setAdminTestEnv(): void {
    process.env.REDIS_URL = 'redis://localhost:6379';
    process.env.LOG_LEVEL = 'error';
    process.env.USE_MOCK_DATA = 'true';
    process.env.OUTPUT_FORMATS = 'json';
    process.env.JWT_SECRET = TEST_JWT_SECRET;
    process.env.ADMIN_JWT_ISSUER = TEST_ISSUER;
    process.env.ADMIN_JWT_AUDIENCE = TEST_AUDIENCE;
    process.env.ADMIN_ALLOWED_ROLES = 'admin,manager';
}
