// ─── Error Classes ───

export class AuthError extends Error {
    public statusCode: number;
    public headers: Record<string, string>;
    constructor(message: string, statusCode = 401, headers: Record<string, string> = {}) {
        super(message);
        this.name = 'AuthError';
        this.statusCode = statusCode;
        this.headers = headers;
    }
}

/**
 * Any authentication failure: bad password, bad token, unknown or disabled account.
 * The message is for humans; callers are not told which check failed beyond it.
 */
export class CredentialsError extends AuthError {
    constructor(message = 'Invalid credentials') {
        super(message, 401, { 'WWW-Authenticate': 'Bearer' });
        this.name = 'CredentialsError';
    }
}

export class PermissionDeniedError extends AuthError {
    constructor(message = 'Permission denied') {
        super(message, 403);
        this.name = 'PermissionDeniedError';
    }
}

export class NotFoundError extends AuthError {
    constructor(message = 'Resource not found') {
        super(message, 404);
        this.name = 'NotFoundError';
    }
}
