import type { UserWithRoles } from '../../types/auth';

/** Holding this role grants every permission, whatever its explicit set. */
export const SUPER_ADMIN_ROLE = 'super_admin';

type RoleGraph = Pick<UserWithRoles, 'roles'>;

// These read the already-loaded aggregate only; none of them touch the database.
// Role.active is not consulted here, only the administration listings filter on it.

export function hasPermission(user: RoleGraph, code: string): boolean {
    for (const role of user.roles) {
        if (role.code === SUPER_ADMIN_ROLE) return true;
        if (role.permissions.some((permission) => permission.code === code)) return true;
    }
    return false;
}

export function hasRole(user: RoleGraph, code: string): boolean {
    return user.roles.some((role) => role.code === code);
}

export function highestRoleLevel(user: RoleGraph): number {
    if (user.roles.length === 0) return 0;
    return Math.max(...user.roles.map((role) => role.hierarchy_level));
}

/** Explicitly granted permission codes, de-duplicated and sorted. */
export function effectivePermissionCodes(user: RoleGraph): string[] {
    const codes = new Set<string>();
    for (const role of user.roles) {
        for (const permission of role.permissions) {
            codes.add(permission.code);
        }
    }
    return Array.from(codes).sort();
}
