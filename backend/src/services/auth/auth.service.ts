import type { DbSession } from '../../db/session';
import type { Registration, TokenPair, User, UserProfileUpdate, UserWithRoles } from '../../types/auth';
import { createChildLogger } from '../../utils/logger';
import { CredentialsError } from './auth.errors';
import type { PasswordHasher } from './password.service';
import type { TokenCodec } from './token.service';

const log = createChildLogger({ component: 'auth' });

export interface AuthServiceDeps {
    passwords: PasswordHasher;
    tokens: TokenCodec;
}

/**
 * Login / refresh orchestration, access-token resolution and self-service account changes.
 * Every method runs inside the caller's database session.
 */
export class AuthService {
    private readonly passwords: PasswordHasher;
    private readonly tokens: TokenCodec;

    constructor(deps: AuthServiceDeps) {
        this.passwords = deps.passwords;
        this.tokens = deps.tokens;
    }

    // ─── Login Flow ───

    async login(db: DbSession, email: string, password: string): Promise<TokenPair> {
        const user = await db.users.findByEmailWithRoles(email);
        if (!user) throw new CredentialsError('Incorrect email or password');
        if (!user.password_hash) throw new CredentialsError('Account not configured');

        const valid = await this.passwords.verify(password, user.password_hash);
        if (!valid) throw new CredentialsError('Incorrect email or password');

        if (!user.active) throw new CredentialsError('Account disabled');
        if (!user.email_verified) throw new CredentialsError('Account pending administrator validation');

        await db.users.touchLastLogin(user.id, new Date());

        log.info({ userId: user.id }, 'User logged in');
        return this.issueTokens(user.id);
    }

    // ─── Registration ───

    /** Creates an active account that cannot log in until an administrator verifies its email. */
    async register(db: DbSession, registration: Registration): Promise<User> {
        const existing = await db.users.findByEmailWithRoles(registration.email);
        if (existing) throw new CredentialsError('An account with this email already exists');

        const user = await db.users.create({
            email: registration.email,
            password_hash: await this.passwords.hash(registration.password),
            first_name: registration.first_name,
            last_name: registration.last_name,
            salutation: registration.salutation ?? null,
            birth_date: birthDateFromBirthday(registration.birthday_day, registration.birthday_month),
            linkedin: registration.linkedin ?? null,
            active: true,
            email_verified: false,
        });

        log.info({ userId: user.id }, 'User registered, awaiting validation');
        return user;
    }

    // ─── Refresh Flow ───

    /** Issues a fresh pair; the presented refresh token is not blacklisted (nothing is persisted). */
    async refresh(db: DbSession, refreshToken: string): Promise<TokenPair> {
        const payload = this.tokens.decode(refreshToken);
        if (!payload) throw new CredentialsError('Invalid or expired refresh token');
        if (payload.type !== 'refresh') throw new CredentialsError('Invalid token type');
        if (!payload.sub) throw new CredentialsError('Invalid token');

        const user = await db.users.findById(payload.sub);
        if (!user) throw new CredentialsError('User not found');
        if (!user.active) throw new CredentialsError('Account disabled');

        return this.issueTokens(user.id);
    }

    // ─── Access Token Resolution ───

    async resolveAccessToken(db: DbSession, token: string | null): Promise<UserWithRoles> {
        if (!token) throw new CredentialsError('Not authenticated');

        const payload = this.tokens.decode(token);
        if (!payload) throw new CredentialsError('Invalid or expired token');
        if (payload.type !== 'access') throw new CredentialsError('Invalid token type');
        if (!payload.sub) throw new CredentialsError('Invalid token');

        const user = await db.users.findByIdWithRoles(payload.sub);
        if (!user) throw new CredentialsError('User not found');

        return this.ensureActive(user);
    }

    ensureActive(user: UserWithRoles): UserWithRoles {
        if (!user.active) throw new CredentialsError('Account disabled');
        return user;
    }

    // ─── Self-service ───

    async updateProfile(db: DbSession, user: UserWithRoles, changes: UserProfileUpdate): Promise<UserWithRoles> {
        if (Object.keys(changes).length === 0) return user;

        const updated = await db.users.updateProfile(user.id, changes);
        if (!updated) throw new CredentialsError('User not found');
        return { ...updated, roles: user.roles };
    }

    /** Outstanding tokens stay valid after a change; there is no revocation store. */
    async changePassword(
        db: DbSession,
        user: UserWithRoles,
        currentPassword: string,
        newPassword: string
    ): Promise<void> {
        if (!user.password_hash) throw new CredentialsError('Account not configured');

        const valid = await this.passwords.verify(currentPassword, user.password_hash);
        if (!valid) throw new CredentialsError('Incorrect current password');

        const passwordHash = await this.passwords.hash(newPassword);
        await db.users.updatePasswordHash(user.id, passwordHash);
        log.info({ userId: user.id }, 'Password changed');
    }

    private issueTokens(userId: string): TokenPair {
        return {
            access_token: this.tokens.createAccessToken(userId),
            refresh_token: this.tokens.createRefreshToken(userId),
            token_type: 'bearer',
        };
    }
}

const BIRTHDAY_YEAR = 2000;

/** Day and month stored against a fixed leap year; an impossible pair (31 February) is dropped. */
export function birthDateFromBirthday(
    day: number | null | undefined,
    month: number | null | undefined
): string | null {
    if (!day || !month) return null;
    const date = new Date(Date.UTC(BIRTHDAY_YEAR, month - 1, day));
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
    return date.toISOString().slice(0, 10);
}
