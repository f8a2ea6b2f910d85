import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import http from 'http';
import { createTestApp, TEST_PASSWORD, type TestContext } from './helpers/test-app';

describe('request database session', () => {
    let ctx: TestContext;

    beforeEach(async () => {
        ctx = await createTestApp();
    });

    afterEach(async () => {
        await ctx.app.close();
    });

    it('should commit and release before the response is returned', async () => {
        const res = await ctx.app.inject({
            method: 'POST',
            url: '/api/auth/login/json',
            payload: { email: 'editor@univ.test', password: TEST_PASSWORD },
        });

        expect(res.statusCode).toBe(200);
        expect(ctx.sessions.last().state).toBe('committed');
        expect(ctx.sessions.last().released).toBe(true);
    });

    it('should roll back and release a failed request', async () => {
        const res = await ctx.app.inject({
            method: 'POST',
            url: '/api/auth/login/json',
            payload: { email: 'editor@univ.test', password: 'WrongPass123' },
        });

        expect(res.statusCode).toBe(401);
        expect(ctx.sessions.last().state).toBe('rolled_back');
        expect(ctx.sessions.last().released).toBe(true);
    });

    it('should open one session per request', async () => {
        await ctx.app.inject({ method: 'GET', url: '/health' });
        await ctx.app.inject({ method: 'GET', url: '/health' });

        expect(ctx.sessions.opened).toHaveLength(2);
        expect(ctx.sessions.opened.every((session) => session.released)).toBe(true);
    });

    it('should release the session when the client disconnects while the handler runs', async () => {
        ctx.store.emailLookupDelayMs = 200;
        await ctx.app.listen({ port: 0, host: '127.0.0.1' });
        const address = ctx.app.server.address();
        if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');

        const body = JSON.stringify({ email: 'editor@univ.test', password: TEST_PASSWORD });
        const clientErrors: Error[] = [];
        const request = http.request({
            host: '127.0.0.1',
            port: address.port,
            method: 'POST',
            path: '/api/auth/login/json',
            headers: { 'content-type': 'application/json', 'content-length': Buffer.byteLength(body) },
        });
        request.on('error', (err) => clientErrors.push(err));
        request.end(body);

        // the body has been parsed and the handler is waiting on the lookup
        await vi.waitFor(() => expect(ctx.store.emailLookups).toBe(1), { timeout: 2000 });
        request.destroy();

        await vi.waitFor(() => expect(ctx.sessions.last().released).toBe(true), { timeout: 5000 });
        expect(ctx.sessions.opened).toHaveLength(1);
        expect(ctx.sessions.last().state).toBe('committed');
        expect(ctx.store.user(ctx.users.editor.id).last_login_at).toBeInstanceOf(Date);
    });
});
