import { buildApp } from './app';
import { loadConfig } from './config';
import { createPool } from './db';
import { PgSessionFactory } from './db/session';
import { logger } from './utils/logger';

async function main() {
    const config = loadConfig();
    const sessions = new PgSessionFactory(createPool(config));
    const app = await buildApp({ config, sessions });

    // ─── Start Server ───
    try {
        await app.listen({ port: config.port, host: '0.0.0.0' });
        logger.info({ port: config.port, env: config.nodeEnv }, 'University admin API started');
    } catch (err) {
        logger.error({ err }, 'Failed to start server');
        await sessions.close();
        process.exit(1);
    }

    // ─── Graceful Shutdown ───
    const shutdown = async () => {
        logger.info('Shutting down...');
        await app.close();
        await sessions.close();
        process.exit(0);
    };
    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
        });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
});
