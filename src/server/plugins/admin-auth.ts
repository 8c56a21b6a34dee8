/**
 * HS256 bearer-token guard for the admin routes
 */
import { createHmac, timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { config } from '../../config/index.js';

const jwtHeaderSchema = z.object({
    alg: z.string().optional(),
}).passthrough();

const jwtPayloadSchema = z.object({
    iss: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    exp: z.number().optional(),
    role: z.string().optional(),
    sub: z.string().optional(),
}).passthrough();

type JwtPayload = z.infer<typeof jwtPayloadSchema>;

function decodeSegment(segment: string): unknown {
    return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
}

function parseJwtPayload(token: string, secret: string): JwtPayload {
    const parts = token.split('.');
    if (parts.length !== 3) {
        throw new Error('Malformed token');
    }

    const [headerB64, payloadB64, signatureB64] = parts;
    const header = jwtHeaderSchema.parse(decodeSegment(headerB64));
    if (header.alg !== 'HS256') {
        throw new Error('Invalid token algorithm');
    }

    const expectedSignature = createHmac('sha256', secret)
        .update(`${headerB64}.${payloadB64}`)
        .digest('base64url');

    const signature = Buffer.from(signatureB64);
    const expected = Buffer.from(expectedSignature);
    if (signature.length !== expected.length || !timingSafeEqual(signature, expected)) {
        throw new Error('Invalid token signature');
    }

    return jwtPayloadSchema.parse(decodeSegment(payloadB64));
}

function hasExpectedAudience(aud: string | string[] | undefined, expected: string): boolean {
    if (Array.isArray(aud)) {
        return aud.includes(expected);
    }
    return aud === expected;
}

function isExpired(exp: number | undefined): boolean {
    if (typeof exp !== 'number') {
        return true;
    }
    return exp <= Math.floor(Date.now() / 1000);
}

export async function verifyAdminAuth(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    // Without a secret every token would be forgeable
    if (!config.jwtSecret) {
        await reply.status(503).send({ message: 'Admin API is not configured' });
        return;
    }

    const authHeader = request.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
        await reply.status(401).send({ message: 'Authentication required' });
        return;
    }

    const token = authHeader.slice(7).trim();
    if (!token) {
        await reply.status(401).send({ message: 'Invalid authentication token' });
        return;
    }

    let payload: JwtPayload;
    try {
        payload = parseJwtPayload(token, config.jwtSecret);
    } catch {
        await reply.status(401).send({ message: 'Invalid authentication token' });
        return;
    }

    if (isExpired(payload.exp)) {
        await reply.status(401).send({ message: 'Token has expired' });
        return;
    }

    if (payload.iss !== config.adminJwtIssuer) {
        await reply.status(401).send({ message: 'Invalid token issuer' });
        return;
    }

    if (!hasExpectedAudience(payload.aud, config.adminJwtAudience)) {
        await reply.status(401).send({ message: 'Invalid token audience' });
        return;
    }

    const role = payload.role?.toLowerCase() ?? '';
    const allowedRoles = new Set(config.adminAllowedRoles.map((entry) => entry.toLowerCase()));
    if (!allowedRoles.has(role)) {
        await reply.status(403).send({ message: 'Forbidden' });
        return;
    }
}
