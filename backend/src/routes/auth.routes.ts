import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticate, currentUser, requireActiveUser } from '../middleware/auth.middleware';
import { effectivePermissionCodes, highestRoleLevel } from '../services/auth/permissions';
import type { UserProfile, UserWithRoles } from '../types/auth';

// ─── Validation Schemas ───

const formLoginSchema = z.object({
    username: z.string().trim().min(1),
    password: z.string().min(1),
});

const jsonLoginSchema = z.object({
    email: z.string().trim().email(),
    password: z.string().min(6),
});

const registerSchema = z.object({
    email: z.string().trim().email(),
    password: z.string().min(8, 'Password must be at least 8 characters'),
    first_name: z.string().trim().min(1).max(100),
    last_name: z.string().trim().min(1).max(100),
    salutation: z.enum(['Mr', 'Mrs', 'Dr', 'Pr']).nullable().optional(),
    birthday_day: z.number().int().min(1).max(31).nullable().optional(),
    birthday_month: z.number().int().min(1).max(12).nullable().optional(),
    linkedin: z.string().trim().max(255).nullable().optional(),
});

const refreshSchema = z.object({
    refresh_token: z.string().min(1),
});

const changePasswordSchema = z.object({
    current_password: z.string().min(1),
    new_password: z.string().min(8, 'Password must be at least 8 characters'),
});

const optionalText = (max: number) => z.string().trim().max(max).nullable().optional();

const profileUpdateSchema = z.object({
    first_name: z.string().trim().min(1).max(100).optional(),
    last_name: z.string().trim().min(1).max(100).optional(),
    salutation: z.enum(['Mr', 'Mrs', 'Dr', 'Pr']).nullable().optional(),
    birth_date: z.string().date('Expected a calendar date (YYYY-MM-DD)').nullable().optional(),
    phone: optionalText(30),
    phone_whatsapp: optionalText(30),
    linkedin: optionalText(255),
    city: optionalText(100),
    address: z.string().trim().nullable().optional(),
});

function toProfile(user: UserWithRoles): UserProfile {
    const { password_hash: _passwordHash, roles: _roles, ...profile } = user;
    return profile;
}

export async function authRoutes(fastify: FastifyInstance) {
    const { authService } = fastify;

    // ─── POST /api/auth/login ─── (form-encoded: username, password)
    fastify.post('/api/auth/login', async (request, reply) => {
        const parsed = formLoginSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }
        return authService.login(request.db, parsed.data.username, parsed.data.password);
    });

    // ─── POST /api/auth/login/json ───
    fastify.post('/api/auth/login/json', async (request, reply) => {
        const parsed = jsonLoginSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }
        return authService.login(request.db, parsed.data.email, parsed.data.password);
    });

    // ─── POST /api/auth/register ───
    fastify.post('/api/auth/register', async (request, reply) => {
        const parsed = registerSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }
        const user = await authService.register(request.db, parsed.data);
        reply.code(201);
        return { id: user.id, email: user.email };
    });

    // ─── POST /api/auth/refresh ───
    fastify.post('/api/auth/refresh', async (request, reply) => {
        const parsed = refreshSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }
        return authService.refresh(request.db, parsed.data.refresh_token);
    });

    // ─── POST /api/auth/logout ───
    // Tokens are not stored server-side, so nothing is revoked here.
    fastify.post('/api/auth/logout', { preHandler: [authenticate] }, async () => {
        return { message: 'Logged out. Discard your tokens on the client.' };
    });

    // ─── GET /api/auth/me ───
    fastify.get('/api/auth/me', { preHandler: [authenticate] }, async (request) => {
        const user = currentUser(request);
        return {
            ...toProfile(user),
            roles: user.roles,
            permissions: effectivePermissionCodes(user),
            highest_role_level: highestRoleLevel(user),
        };
    });

    // ─── PUT /api/auth/me ───
    fastify.put('/api/auth/me', { preHandler: [authenticate, requireActiveUser] }, async (request, reply) => {
        const parsed = profileUpdateSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }
        const updated = await authService.updateProfile(request.db, currentUser(request), parsed.data);
        request.authUser = updated;
        return toProfile(updated);
    });

    // ─── PUT /api/auth/me/password ───
    fastify.put('/api/auth/me/password', { preHandler: [authenticate, requireActiveUser] }, async (request, reply) => {
        const parsed = changePasswordSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
            reply.code(400).send({ error: 'Invalid input', details: parsed.error.flatten() });
            return;
        }
        await authService.changePassword(
            request.db,
            currentUser(request),
            parsed.data.current_password,
            parsed.data.new_password
        );
        return { message: 'Password changed successfully' };
    });
}
