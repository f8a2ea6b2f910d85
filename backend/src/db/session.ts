import type { Pool, PoolClient } from 'pg';
import { PgRoleRepository, type RoleRepository } from '../repositories/role.repository';
import { PgUserRepository, type UserRepository } from '../repositories/user.repository';
import { logger } from '../utils/logger';

/**
 * One unit of work: the repositories of a single request, bound to one transaction.
 */
export interface DbSession {
    readonly users: UserRepository;
    readonly roles: RoleRepository;
    commit(): Promise<void>;
    rollback(): Promise<void>;
    /** Returns the connection; rolls back first if the transaction is still open. */
    release(): Promise<void>;
}

export interface SessionFactory {
    open(): Promise<DbSession>;
    close(): Promise<void>;
}

type SessionState = 'open' | 'finished' | 'released';

class PgSession implements DbSession {
    readonly users: UserRepository;
    readonly roles: RoleRepository;
    private state: SessionState = 'open';

    constructor(private readonly client: PoolClient) {
        this.users = new PgUserRepository(client);
        this.roles = new PgRoleRepository(client);
    }

    async commit(): Promise<void> {
        if (this.state !== 'open') return;
        this.state = 'finished';
        await this.client.query('COMMIT');
    }

    async rollback(): Promise<void> {
        if (this.state !== 'open') return;
        this.state = 'finished';
        await this.client.query('ROLLBACK');
    }

    async release(): Promise<void> {
        if (this.state === 'released') return;
        try {
            await this.rollback();
        } finally {
            this.state = 'released';
            this.client.release();
        }
    }
}

export class PgSessionFactory implements SessionFactory {
    constructor(private readonly pool: Pool) {}

    async open(): Promise<DbSession> {
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
        } catch (err) {
            logger.error({ err }, 'Could not open database transaction');
            client.release();
            throw err;
        }
        return new PgSession(client);
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
