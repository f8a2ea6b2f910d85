import { FastifyRequest, FastifyReply } from 'fastify';
import { CredentialsError } from '../services/auth/auth.errors';
import type { UserWithRoles } from '../types/auth';

// Extend Fastify request with the resolved user
declare module 'fastify' {
    interface FastifyRequest {
        authUser?: UserWithRoles;
    }
}

/** Token from an `Authorization: Bearer <token>` header, or null when absent or malformed. */
export function extractBearerToken(header: string | undefined): string | null {
    if (!header) return null;
    const [scheme, token, ...rest] = header.trim().split(/\s+/);
    if (rest.length > 0 || !token || scheme.toLowerCase() !== 'bearer') return null;
    return token;
}

/**
 * Fastify preHandler hook that resolves the bearer access token to a user loaded with
 * roles and permissions, and attaches it as `request.authUser`.
 * Any failure surfaces as a CredentialsError (401).
 */
export async function authenticate(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const token = extractBearerToken(request.headers.authorization);
    request.authUser = await request.server.authService.resolveAccessToken(request.db, token);
}

/** Second-stage hook for routes that only rely on an active account. */
export async function requireActiveUser(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    request.authUser = request.server.authService.ensureActive(currentUser(request));
}

export function currentUser(request: FastifyRequest): UserWithRoles {
    if (!request.authUser) throw new CredentialsError('Authentication required');
    return request.authUser;
}
