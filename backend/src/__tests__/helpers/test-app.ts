import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../app';
import { loadConfig, type AppConfig } from '../../config';
import { PasswordHasher } from '../../services/auth/password.service';
import { TokenCodec } from '../../services/auth/token.service';
import type { User } from '../../types/auth';
import { MemorySessionFactory, MemoryStore } from './memory-db';

export const TEST_PASSWORD = 'TestPass123!';

export interface TestContext {
    app: FastifyInstance;
    store: MemoryStore;
    sessions: MemorySessionFactory;
    config: AppConfig;
    tokens: TokenCodec;
    users: {
        root: User;
        admin: User;
        editor: User;
        student: User;
    };
}

/**
 * Four roles, four permissions and one user per role, all able to log in with TEST_PASSWORD.
 */
export async function seedIdentity(store: MemoryStore, passwords: PasswordHasher) {
    store.addPermission('users.view');
    store.addPermission('users.roles');
    store.addPermission('news.create');
    store.addPermission('news.view');

    store.addRole('super_admin', { level: 100 });
    store.addRole('admin', { level: 80, permissions: ['users.view', 'users.roles'] });
    store.addRole('editor', { level: 40, permissions: ['news.create', 'news.view'] });
    store.addRole('user', { level: 10 });

    const passwordHash = await passwords.hash(TEST_PASSWORD);
    return {
        root: store.addUser({ email: 'root@univ.test', password_hash: passwordHash }, ['super_admin']),
        admin: store.addUser({ email: 'admin@univ.test', password_hash: passwordHash }, ['admin']),
        editor: store.addUser({ email: 'editor@univ.test', password_hash: passwordHash }, ['editor']),
        student: store.addUser({ email: 'student@univ.test', password_hash: passwordHash }, ['user']),
    };
}

export async function createTestApp(): Promise<TestContext> {
    const config = loadConfig();
    const store = new MemoryStore();
    const sessions = new MemorySessionFactory(store);
    const users = await seedIdentity(store, new PasswordHasher(config));

    const app = await buildApp({ config, sessions });
    await app.ready();

    return { app, store, sessions, config, tokens: new TokenCodec(config), users };
}

export function bearer(token: string): { authorization: string } {
    return { authorization: `Bearer ${token}` };
}
