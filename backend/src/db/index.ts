import { Pool, PoolClient, PoolConfig } from 'pg';
import type { AppConfig } from '../config';
import { logger } from '../utils/logger';

/** A checked-out client; every statement of a request runs on the same one. */
export type Queryable = PoolClient;

export function createPool(config: Pick<AppConfig, 'databaseUrl'>): Pool {
    const poolConfig: PoolConfig = {
        connectionString: config.databaseUrl,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
    };
    const pool = new Pool(poolConfig);
    pool.on('error', (err) => {
        logger.error({ err }, 'Unexpected database pool error');
    });
    return pool;
}

export async function query<T = Record<string, unknown>>(
    db: Queryable,
    text: string,
    params?: unknown[]
): Promise<T[]> {
    const start = Date.now();
    const result = await db.query(text, params);
    const duration = Date.now() - start;
    logger.debug({ query: text.slice(0, 100), duration, rows: result.rowCount }, 'DB query');
    return result.rows;
}

export async function queryOne<T = Record<string, unknown>>(
    db: Queryable,
    text: string,
    params?: unknown[]
): Promise<T | null> {
    const rows = await query<T>(db, text, params);
    return rows[0] ?? null;
}

export async function transaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
        await client.query('BEGIN');
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
    } catch (err) {
        await client.query('ROLLBACK');
        throw err;
    } finally {
        client.release();
    }
}
