import { z } from 'zod';
import { query, queryOne, type Queryable } from '../db';
import type { NewUser, User, UserProfileUpdate, UserStatusUpdate, UserWithRoles } from '../types/auth';

export interface UserRepository {
    /** User with roles and role permissions, materialised in a single round trip. */
    findByIdWithRoles(id: string): Promise<UserWithRoles | null>;
    findByEmailWithRoles(email: string): Promise<UserWithRoles | null>;
    findById(id: string): Promise<User | null>;
    create(user: NewUser): Promise<User>;
    touchLastLogin(id: string, at: Date): Promise<void>;
    /** Writes only the keys present in `changes`; returns the refreshed row. */
    updateProfile(id: string, changes: UserProfileUpdate): Promise<User | null>;
    updatePasswordHash(id: string, passwordHash: string): Promise<void>;
    /** Sets `active` and/or `email_verified`; null when the user does not exist. */
    updateStatus(id: string, status: UserStatusUpdate): Promise<User | null>;
    replaceRoles(userId: string, roleIds: string[], assignedBy: string | null): Promise<void>;
}

export const PROFILE_COLUMNS = [
    'first_name',
    'last_name',
    'salutation',
    'birth_date',
    'phone',
    'phone_whatsapp',
    'linkedin',
    'city',
    'address',
] as const satisfies ReadonlyArray<keyof UserProfileUpdate>;

const uuidSchema = z.string().uuid();

const USER_COLUMNS = `
    u.id, u.email, u.password_hash, u.last_name, u.first_name, u.salutation,
    to_char(u.birth_date, 'YYYY-MM-DD') AS birth_date,
    u.phone, u.phone_whatsapp, u.linkedin, u.city, u.address,
    u.active, u.email_verified, u.last_login_at, u.created_at, u.updated_at`;

const ROLES_JSON = `
    COALESCE((
        SELECT json_agg(json_build_object(
            'id', r.id, 'code', r.code, 'name', r.name, 'description', r.description,
            'hierarchy_level', r.hierarchy_level, 'active', r.active,
            'permissions', COALESCE((
                SELECT json_agg(json_build_object(
                    'id', p.id, 'code', p.code, 'name', p.name,
                    'description', p.description, 'category', p.category
                ) ORDER BY p.code)
                FROM role_permissions rp
                JOIN permissions p ON p.id = rp.permission_id
                WHERE rp.role_id = r.id
            ), '[]'::json)
        ) ORDER BY r.hierarchy_level DESC, r.code)
        FROM user_roles ur
        JOIN roles r ON r.id = ur.role_id
        WHERE ur.user_id = u.id
    ), '[]'::json) AS roles`;

export class PgUserRepository implements UserRepository {
    constructor(private readonly db: Queryable) {}

    async findByIdWithRoles(id: string): Promise<UserWithRoles | null> {
        if (!uuidSchema.safeParse(id).success) return null;
        return queryOne<UserWithRoles>(
            this.db,
            `SELECT ${USER_COLUMNS}, ${ROLES_JSON} FROM users u WHERE u.id = $1`,
            [id]
        );
    }

    async findByEmailWithRoles(email: string): Promise<UserWithRoles | null> {
        return queryOne<UserWithRoles>(
            this.db,
            `SELECT ${USER_COLUMNS}, ${ROLES_JSON} FROM users u WHERE u.email = $1`,
            [email]
        );
    }

    async findById(id: string): Promise<User | null> {
        if (!uuidSchema.safeParse(id).success) return null;
        return queryOne<User>(this.db, `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = $1`, [id]);
    }

    async create(user: NewUser): Promise<User> {
        const rows = await query<User>(
            this.db,
            `INSERT INTO users AS u
                (email, password_hash, first_name, last_name, salutation, birth_date, linkedin, active, email_verified)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
             RETURNING ${USER_COLUMNS}`,
            [
                user.email,
                user.password_hash,
                user.first_name,
                user.last_name,
                user.salutation ?? null,
                user.birth_date ?? null,
                user.linkedin ?? null,
                user.active,
                user.email_verified,
            ]
        );
        return rows[0];
    }

    async touchLastLogin(id: string, at: Date): Promise<void> {
        await query(this.db, 'UPDATE users SET last_login_at = $2 WHERE id = $1', [id, at]);
    }

    async updateProfile(id: string, changes: UserProfileUpdate): Promise<User | null> {
        const assignments: string[] = [];
        const params: unknown[] = [id];
        for (const column of PROFILE_COLUMNS) {
            const value = changes[column];
            if (value === undefined) continue;
            params.push(value);
            assignments.push(`${column} = $${params.length}`);
        }
        if (assignments.length === 0) return this.findById(id);

        return queryOne<User>(
            this.db,
            `UPDATE users AS u SET ${assignments.join(', ')}, updated_at = NOW()
             WHERE u.id = $1
             RETURNING ${USER_COLUMNS}`,
            params
        );
    }

    async updatePasswordHash(id: string, passwordHash: string): Promise<void> {
        await query(this.db, 'UPDATE users SET password_hash = $2, updated_at = NOW() WHERE id = $1', [
            id,
            passwordHash,
        ]);
    }

    async updateStatus(id: string, status: UserStatusUpdate): Promise<User | null> {
        if (!uuidSchema.safeParse(id).success) return null;
        const assignments: string[] = [];
        const params: unknown[] = [id];
        if (status.active !== undefined) {
            params.push(status.active);
            assignments.push(`active = $${params.length}`);
        }
        if (status.email_verified !== undefined) {
            params.push(status.email_verified);
            assignments.push(`email_verified = $${params.length}`);
        }
        if (assignments.length === 0) return this.findById(id);

        return queryOne<User>(
            this.db,
            `UPDATE users AS u SET ${assignments.join(', ')}, updated_at = NOW()
             WHERE u.id = $1
             RETURNING ${USER_COLUMNS}`,
            params
        );
    }

    async replaceRoles(userId: string, roleIds: string[], assignedBy: string | null): Promise<void> {
        await query(this.db, 'DELETE FROM user_roles WHERE user_id = $1', [userId]);
        if (roleIds.length === 0) return;
        await query(
            this.db,
            `INSERT INTO user_roles (user_id, role_id, assigned_by)
             SELECT $1, role_id, $3 FROM unnest($2::uuid[]) AS role_id`,
            [userId, roleIds, assignedBy]
        );
    }
}
