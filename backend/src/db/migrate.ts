import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { loadConfig } from '../config';
import { createChildLogger } from '../utils/logger';
import { createPool, transaction } from './index';

const log = createChildLogger({ component: 'migrate' });

async function migrate() {
    const pool = createPool(loadConfig());
    const migrationsDir = join(__dirname, 'migrations');
    const files = readdirSync(migrationsDir)
        .filter((f) => f.endsWith('.sql'))
        .sort(); // lexicographic sort ensures 001 < 002 < 003...

    log.info(`Found ${files.length} migration files`);

    try {
        await pool.query(`
            CREATE TABLE IF NOT EXISTS migrations_history (
                id SERIAL PRIMARY KEY,
                filename VARCHAR(255) UNIQUE NOT NULL,
                applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
            );
        `);

        for (const file of files) {
            const sql = readFileSync(join(migrationsDir, file), 'utf-8');

            const { rows } = await pool.query('SELECT id FROM migrations_history WHERE filename = $1', [file]);
            if (rows.length > 0) {
                log.info(`${file} already applied, skipping`);
                continue;
            }

            // The migration and its history row commit together
            try {
                await transaction(pool, async (client) => {
                    await client.query(sql);
                    await client.query('INSERT INTO migrations_history (filename) VALUES ($1)', [file]);
                });
            } catch (err) {
                log.error({ err, file }, `${file} failed, transaction rolled back`);
                throw err;
            }

            log.info(`${file} applied`);
        }

        log.info('All migrations complete');
    } finally {
        await pool.end();
    }
}

migrate().catch((err) => {
    log.error({ err }, 'Migration error');
    process.exit(1);
});
