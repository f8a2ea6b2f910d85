import { FastifyRequest, FastifyReply } from 'fastify';
import { PermissionDeniedError } from '../services/auth/auth.errors';
import { hasPermission } from '../services/auth/permissions';
import { currentUser } from './auth.middleware';

/**
 * Factory that returns a Fastify preHandler hook enforcing one permission code.
 * Must be used AFTER `authenticate` so `request.authUser` is available.
 *
 * @example
 *   fastify.get('/api/admin/roles', {
 *     preHandler: [authenticate, requirePermission('users.view')],
 *   }, handler);
 */
export function requirePermission(code: string) {
    return async function (request: FastifyRequest, _reply: FastifyReply): Promise<void> {
        const user = currentUser(request);
        if (!hasPermission(user, code)) {
            throw new PermissionDeniedError(`Permission '${code}' required`);
        }
    };
}
