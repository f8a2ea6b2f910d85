import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate, currentUser } from '../middleware/auth.middleware';
import { requirePermission } from '../middleware/rbac.middleware';

const roleQuerySchema = z.object({
    active: z.enum(['true', 'false']).optional(),
});

const permissionQuerySchema = z.object({
    category: z.string().trim().min(1).optional(),
});

const userParamsSchema = z.object({
    userId: z.string().uuid(),
});

const setRolesSchema = z.object({
    role_ids: z.array(z.string().uuid()),
});

export async function adminRoutes(fastify: FastifyInstance) {
    const { identityService } = fastify;

    const viewGuard = { preHandler: [authenticate, requirePermission('users.view')] };
    const rolesGuard = { preHandler: [authenticate, requirePermission('users.roles')] };
    const editGuard = { preHandler: [authenticate, requirePermission('users.edit')] };

    // ─── List roles ───
    fastify.get('/api/admin/roles', viewGuard, async (request, reply) => {
        const parsed = roleQuerySchema.safeParse(request.query);
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }
        const { active } = parsed.data;
        const roles = await identityService.listRoles(request.db, {
            active: active === undefined ? undefined : active === 'true',
        });
        return { roles };
    });

    // ─── List permissions ───
    fastify.get('/api/admin/permissions', viewGuard, async (request, reply) => {
        const parsed = permissionQuerySchema.safeParse(request.query);
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }
        const permissions = await identityService.listPermissions(request.db, parsed.data);
        return { permissions };
    });

    // ─── Permission / role matrix ───
    fastify.get('/api/admin/permissions/matrix', viewGuard, async (request) => {
        return identityService.getPermissionMatrix(request.db);
    });

    // ─── Effective permissions of a user ───
    fastify.get('/api/admin/users/:userId/permissions', viewGuard, async (request, reply) => {
        const params = userParamsSchema.safeParse(request.params);
        if (!params.success) {
            reply.code(404).send({ error: 'User not found' });
            return;
        }
        const permissions = await identityService.getUserPermissions(request.db, params.data.userId);
        return { permissions };
    });

    // ─── Mark a registration as validated ───
    fastify.post('/api/admin/users/:userId/verify-email', editGuard, async (request, reply) => {
        const params = userParamsSchema.safeParse(request.params);
        if (!params.success) {
            reply.code(404).send({ error: 'User not found' });
            return;
        }
        const { password_hash: _passwordHash, ...profile } = await identityService.verifyEmail(
            request.db,
            params.data.userId
        );
        return { user: profile };
    });

    // ─── Enable / disable an account ───
    fastify.post('/api/admin/users/:userId/toggle-active', editGuard, async (request, reply) => {
        const params = userParamsSchema.safeParse(request.params);
        if (!params.success) {
            reply.code(404).send({ error: 'User not found' });
            return;
        }
        const { password_hash: _passwordHash, ...profile } = await identityService.toggleActive(
            request.db,
            params.data.userId
        );
        return { user: profile };
    });

    // ─── Replace the roles of a user ───
    fastify.put('/api/admin/users/:userId/roles', rolesGuard, async (request, reply) => {
        const params = userParamsSchema.safeParse(request.params);
        if (!params.success) {
            reply.code(404).send({ error: 'User not found' });
            return;
        }
        const parsed = setRolesSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }

        const user = await identityService.setUserRoles(
            request.db,
            params.data.userId,
            parsed.data.role_ids,
            currentUser(request).id
        );
        const { password_hash: _passwordHash, ...profile } = user;
        return { user: profile };
    });
}
