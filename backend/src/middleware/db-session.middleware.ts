import { FastifyInstance, FastifyRequest } from 'fastify';
import type { DbSession, SessionFactory } from '../db/session';

declare module 'fastify' {
    interface FastifyRequest {
        db: DbSession;
    }
}

/**
 * Gives every request its own database session: opened before routing, committed when
 * the response status is below 400, rolled back otherwise, and released before the payload
 * is written. onResponse and onRequestAbort release whatever never reached onSend.
 */
export function registerDbSession(app: FastifyInstance, sessions: SessionFactory): void {
    const opened = new WeakMap<FastifyRequest, DbSession>();

    const release = async (request: FastifyRequest) => {
        const session = opened.get(request);
        if (!session) return;
        opened.delete(request);
        await session.release();
    };

    app.decorateRequest('db', null);

    app.addHook('onRequest', async (request) => {
        const session = await sessions.open();
        opened.set(request, session);
        request.db = session;
    });

    // The session is finished and released here: once the client has gone away, onResponse never runs.
    app.addHook('onSend', async (request, reply, payload) => {
        const session = opened.get(request);
        if (!session) return payload;
        try {
            if (reply.statusCode < 400) {
                await session.commit();
            } else {
                await session.rollback();
            }
        } finally {
            await release(request);
        }
        return payload;
    });

    app.addHook('onResponse', release);
    app.addHook('onRequestAbort', release);
}
