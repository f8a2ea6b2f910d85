import { z } from 'zod';
import { query, queryOne, type Queryable } from '../db';
import type { Permission, Role, RoleWithPermissions } from '../types/auth';

export interface RoleFilter {
    active?: boolean;
}

export interface PermissionFilter {
    category?: string;
}

export interface RoleRepository {
    /** Roles with permissions, ordered by hierarchy level (highest first) then code. */
    list(filter?: RoleFilter): Promise<RoleWithPermissions[]>;
    findByIds(ids: string[]): Promise<Role[]>;
    findByCode(code: string): Promise<Role | null>;
    /** Ordered by category, then code. */
    listPermissions(filter?: PermissionFilter): Promise<Permission[]>;
}

const uuidSchema = z.string().uuid();

const ROLE_COLUMNS = 'r.id, r.code, r.name, r.description, r.hierarchy_level, r.active';

export class PgRoleRepository implements RoleRepository {
    constructor(private readonly db: Queryable) {}

    async list(filter: RoleFilter = {}): Promise<RoleWithPermissions[]> {
        const params: unknown[] = [];
        let where = '';
        if (filter.active !== undefined) {
            params.push(filter.active);
            where = 'WHERE r.active = $1';
        }
        return query<RoleWithPermissions>(
            this.db,
            `SELECT ${ROLE_COLUMNS},
                COALESCE((
                    SELECT json_agg(json_build_object(
                        'id', p.id, 'code', p.code, 'name', p.name,
                        'description', p.description, 'category', p.category
                    ) ORDER BY p.code)
                    FROM role_permissions rp
                    JOIN permissions p ON p.id = rp.permission_id
                    WHERE rp.role_id = r.id
                ), '[]'::json) AS permissions
             FROM roles r
             ${where}
             ORDER BY r.hierarchy_level DESC, r.code`,
            params
        );
    }

    async findByIds(ids: string[]): Promise<Role[]> {
        const valid = ids.filter((id) => uuidSchema.safeParse(id).success);
        if (valid.length === 0) return [];
        return query<Role>(this.db, `SELECT ${ROLE_COLUMNS} FROM roles r WHERE r.id = ANY($1::uuid[])`, [valid]);
    }

    async findByCode(code: string): Promise<Role | null> {
        return queryOne<Role>(this.db, `SELECT ${ROLE_COLUMNS} FROM roles r WHERE r.code = $1`, [code]);
    }

    async listPermissions(filter: PermissionFilter = {}): Promise<Permission[]> {
        const params: unknown[] = [];
        let where = '';
        if (filter.category) {
            params.push(filter.category);
            where = 'WHERE p.category = $1';
        }
        return query<Permission>(
            this.db,
            `SELECT p.id, p.code, p.name, p.description, p.category
             FROM permissions p
             ${where}
             ORDER BY p.category NULLS LAST, p.code`,
            params
        );
    }
}
