import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import type { AppConfig } from './config';
import type { SessionFactory } from './db/session';
import { registerDbSession } from './middleware/db-session.middleware';
import { registerErrorHandler } from './middleware/error-handler';
import { adminRoutes } from './routes/admin.routes';
import { authRoutes } from './routes/auth.routes';
import { AuthService } from './services/auth/auth.service';
import { PasswordHasher } from './services/auth/password.service';
import { TokenCodec } from './services/auth/token.service';
import { IdentityService } from './services/identity/identity.service';

declare module 'fastify' {
    interface FastifyInstance {
        authService: AuthService;
        identityService: IdentityService;
    }
}

export interface AppDeps {
    config: AppConfig;
    sessions: SessionFactory;
}

export async function buildApp({ config, sessions }: AppDeps): Promise<FastifyInstance> {
    const app = Fastify({
        logger: false, // We use pino directly
    });

    // ─── Plugins ───
    await app.register(cors, {
        origin: config.corsOrigins.length > 0 ? [...config.corsOrigins] : true,
        credentials: true,
    });
    await app.register(formbody);

    // ─── Services ───
    const authService = new AuthService({
        passwords: new PasswordHasher(config),
        tokens: new TokenCodec(config),
    });
    app.decorate('authService', authService);
    app.decorate('identityService', new IdentityService());

    registerDbSession(app, sessions);
    registerErrorHandler(app);

    // ─── Routes ───
    await app.register(authRoutes);
    await app.register(adminRoutes);

    // ─── Health Check ───
    app.get('/health', async () => {
        return { status: 'ok', timestamp: new Date().toISOString() };
    });

    return app;
}
