#!/usr/bin/env tsx
/**
 * Administrator bootstrap
 *
 * Creates a verified, active user holding the super_admin role.
 * Run the migrations first: the role is seeded by 002_identity_seed.sql.
 *
 * Usage:
 *   npx tsx scripts/create-admin.ts --email admin@example.edu --password "..." [--first-name Ada] [--last-name Admin]
 */

import { loadConfig } from '../backend/src/config';
import { createPool } from '../backend/src/db';
import { PgSessionFactory } from '../backend/src/db/session';
import { PasswordHasher } from '../backend/src/services/auth/password.service';
import { SUPER_ADMIN_ROLE } from '../backend/src/services/auth/permissions';

async function main() {
    const args = process.argv.slice(2);
    const email = getArg(args, '--email');
    const password = getArg(args, '--password');
    const firstName = getArg(args, '--first-name') ?? 'Platform';
    const lastName = getArg(args, '--last-name') ?? 'Administrator';

    if (!email || !password) {
        console.error('Usage: npx tsx scripts/create-admin.ts --email <email> --password <password> [--first-name X] [--last-name Y]');
        process.exit(1);
    }
    if (password.length < 8) {
        console.error('Password must be at least 8 characters');
        process.exit(1);
    }

    const config = loadConfig();
    const sessions = new PgSessionFactory(createPool(config));
    const db = await sessions.open();

    try {
        const existing = await db.users.findByEmailWithRoles(email);
        if (existing) {
            console.log(`User ${email} already exists, nothing to do.`);
            return;
        }

        const role = await db.roles.findByCode(SUPER_ADMIN_ROLE);
        if (!role) {
            throw new Error(`Role "${SUPER_ADMIN_ROLE}" not found; run the migrations first`);
        }

        const passwordHash = await new PasswordHasher(config).hash(password);
        const user = await db.users.create({
            email,
            password_hash: passwordHash,
            first_name: firstName,
            last_name: lastName,
            active: true,
            email_verified: true,
        });
        await db.users.replaceRoles(user.id, [role.id], null);
        await db.commit();

        console.log(`Created ${email} with role ${SUPER_ADMIN_ROLE}`);
        console.log(`   ID: ${user.id}`);
    } finally {
        await db.release();
        await sessions.close();
    }
}

function getArg(args: string[], flag: string): string | undefined {
    const idx = args.indexOf(flag);
    return idx >= 0 ? args[idx + 1] : undefined;
}

main().catch((err) => {
    console.error('Admin creation failed:', err);
    process.exit(1);
});
