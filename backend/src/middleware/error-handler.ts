import { FastifyError, FastifyInstance } from 'fastify';
import { AuthError } from '../services/auth/auth.errors';
import { logger } from '../utils/logger';

/**
 * Translates typed service errors into HTTP responses at the boundary.
 * Unexpected errors are logged and answered with a bare 500.
 */
export function registerErrorHandler(app: FastifyInstance): void {
    app.setErrorHandler((error: FastifyError | AuthError, request, reply) => {
        if (error instanceof AuthError) {
            reply.code(error.statusCode).headers(error.headers).send({ error: error.message });
            return;
        }

        // Fastify's own client errors (body parsing, content type)
        if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
            reply.code(error.statusCode).send({ error: error.message });
            return;
        }

        logger.error({ err: error, method: request.method, url: request.url }, 'Unhandled request error');
        reply.code(500).send({ error: 'Internal server error' });
    });
}
