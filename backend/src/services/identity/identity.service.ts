import type { DbSession } from '../../db/session';
import type { PermissionFilter, RoleFilter } from '../../repositories/role.repository';
import type { Permission, RoleWithPermissions, UserWithRoles } from '../../types/auth';
import { createChildLogger } from '../../utils/logger';
import { NotFoundError } from '../auth/auth.errors';
import { effectivePermissionCodes, hasRole, SUPER_ADMIN_ROLE } from '../auth/permissions';

const log = createChildLogger({ component: 'identity' });

export interface PermissionMatrixEntry {
    id: string;
    name: string;
    category: string | null;
    roles: Record<string, boolean>;
}

export interface PermissionMatrix {
    permissions: Record<string, PermissionMatrixEntry>;
    roles: Array<{ id: string; code: string; name: string }>;
}

/**
 * Read and assignment operations over roles and permissions.
 */
export class IdentityService {
    async listRoles(db: DbSession, filter: RoleFilter = {}): Promise<RoleWithPermissions[]> {
        return db.roles.list(filter);
    }

    async listPermissions(db: DbSession, filter: PermissionFilter = {}): Promise<Permission[]> {
        return db.roles.listPermissions(filter);
    }

    /** Explicit grants only: super_admin shows what it was given, not what it implies. */
    async getPermissionMatrix(db: DbSession): Promise<PermissionMatrix> {
        const roles = await db.roles.list();
        const permissions = await db.roles.listPermissions();

        const matrix: Record<string, PermissionMatrixEntry> = {};
        for (const permission of permissions) {
            const grants: Record<string, boolean> = {};
            for (const role of roles) {
                grants[role.code] = role.permissions.some((p) => p.id === permission.id);
            }
            matrix[permission.code] = {
                id: permission.id,
                name: permission.name,
                category: permission.category,
                roles: grants,
            };
        }

        return {
            permissions: matrix,
            roles: roles.map((role) => ({ id: role.id, code: role.code, name: role.name })),
        };
    }

    async getUserPermissions(db: DbSession, userId: string): Promise<string[]> {
        const user = await db.users.findByIdWithRoles(userId);
        if (!user) throw new NotFoundError('User not found');

        if (hasRole(user, SUPER_ADMIN_ROLE)) {
            const all = await db.roles.listPermissions();
            return all.map((permission) => permission.code).sort();
        }
        return effectivePermissionCodes(user);
    }

    async verifyEmail(db: DbSession, userId: string): Promise<UserWithRoles> {
        const updated = await db.users.updateStatus(userId, { email_verified: true });
        if (!updated) throw new NotFoundError('User not found');
        log.info({ userId }, 'User email verified');
        return this.reload(db, userId);
    }

    async toggleActive(db: DbSession, userId: string): Promise<UserWithRoles> {
        const user = await db.users.findById(userId);
        if (!user) throw new NotFoundError('User not found');

        await db.users.updateStatus(userId, { active: !user.active });
        log.info({ userId, active: !user.active }, 'User active flag toggled');
        return this.reload(db, userId);
    }

    async setUserRoles(db: DbSession, userId: string, roleIds: string[], assignedBy: string): Promise<UserWithRoles> {
        const user = await db.users.findById(userId);
        if (!user) throw new NotFoundError('User not found');

        const uniqueIds = Array.from(new Set(roleIds));
        const roles = await db.roles.findByIds(uniqueIds);
        const found = new Set(roles.map((role) => role.id));
        const missing = uniqueIds.find((id) => !found.has(id));
        if (missing) throw new NotFoundError(`Role ${missing} not found`);

        await db.users.replaceRoles(userId, uniqueIds, assignedBy);
        log.info({ userId, roleIds: uniqueIds, assignedBy }, 'User roles replaced');

        return this.reload(db, userId);
    }

    private async reload(db: DbSession, userId: string): Promise<UserWithRoles> {
        const reloaded = await db.users.findByIdWithRoles(userId);
        if (!reloaded) throw new NotFoundError('User not found');
        return reloaded;
    }
}
