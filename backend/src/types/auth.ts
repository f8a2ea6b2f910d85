// ─── Identity & RBAC Types ───

export type Salutation = 'Mr' | 'Mrs' | 'Dr' | 'Pr';

export interface User {
    id: string;
    email: string;
    password_hash: string | null;   // null ⇒ account not configured for password login
    last_name: string;
    first_name: string;
    salutation: Salutation | null;
    birth_date: string | null;      // YYYY-MM-DD
    phone: string | null;
    phone_whatsapp: string | null;
    linkedin: string | null;
    city: string | null;
    address: string | null;
    active: boolean;
    email_verified: boolean;
    last_login_at: Date | null;
    created_at: Date;
    updated_at: Date;
}

export interface Permission {
    id: string;
    code: string;                   // opaque dotted key, e.g. "users.view"
    name: string;
    description: string | null;
    category: string | null;
}

export interface Role {
    id: string;
    code: string;
    name: string;
    description: string | null;
    hierarchy_level: number;
    active: boolean;
}

export interface RoleWithPermissions extends Role {
    permissions: Permission[];
}

/** User aggregate loaded together with roles and role permissions. */
export interface UserWithRoles extends User {
    roles: RoleWithPermissions[];
}

/** Profile fields a user may edit on their own account. */
export interface UserProfileUpdate {
    first_name?: string;
    last_name?: string;
    salutation?: Salutation | null;
    birth_date?: string | null;
    phone?: string | null;
    phone_whatsapp?: string | null;
    linkedin?: string | null;
    city?: string | null;
    address?: string | null;
}

export interface NewUser {
    email: string;
    password_hash: string | null;
    first_name: string;
    last_name: string;
    salutation?: Salutation | null;
    birth_date?: string | null;
    linkedin?: string | null;
    active: boolean;
    email_verified: boolean;
}

/** Account flags only administrators change. */
export interface UserStatusUpdate {
    active?: boolean;
    email_verified?: boolean;
}

/** Public sign-up; the birthday is kept without its year. */
export interface Registration {
    email: string;
    password: string;
    first_name: string;
    last_name: string;
    salutation?: Salutation | null;
    birthday_day?: number | null;
    birthday_month?: number | null;
    linkedin?: string | null;
}

/** User as returned to clients: never carries password_hash. */
export type UserProfile = Omit<User, 'password_hash'>;

export type TokenKind = 'access' | 'refresh';

/** Decoded claims of a signed bearer token. */
export interface TokenPayload {
    sub?: string;       // user.id
    type?: string;      // TokenKind for tokens this service issued
    exp: number;
    iat?: number;
    jti?: string;
}

export interface TokenPair {
    access_token: string;
    refresh_token: string;
    token_type: 'bearer';
}
