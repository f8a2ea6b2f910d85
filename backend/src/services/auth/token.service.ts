import crypto from 'crypto';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { AppConfig } from '../../config';
import type { TokenKind, TokenPayload } from '../../types/auth';
import { logger } from '../../utils/logger';

const claimsSchema = z
    .object({
        sub: z.string().optional(),
        type: z.string().optional(),
        exp: z.number(),
        iat: z.number().optional(),
        jti: z.string().optional(),
    })
    .passthrough();

type TokenConfig = Pick<
    AppConfig,
    'jwtSecret' | 'jwtAlgorithm' | 'jwtAccessTokenExpireMinutes' | 'jwtRefreshTokenExpireDays'
>;

/**
 * Signs and verifies bearer tokens of the form `{sub, type, exp}`.
 * The codec never interprets `type`: every consumer checks it before trusting the payload.
 */
export class TokenCodec {
    constructor(private readonly config: TokenConfig) {}

    defaultTtl(kind: TokenKind): number {
        return kind === 'access'
            ? this.config.jwtAccessTokenExpireMinutes * 60
            : this.config.jwtRefreshTokenExpireDays * 86400;
    }

    create(subject: string, kind: TokenKind, ttlSeconds = this.defaultTtl(kind)): string {
        const now = Math.floor(Date.now() / 1000);
        return jwt.sign(
            { sub: subject, type: kind, iat: now, exp: now + ttlSeconds },
            this.config.jwtSecret,
            {
                algorithm: this.config.jwtAlgorithm,
                // unique per token: two tokens for one subject in the same second still differ
                jwtid: crypto.randomUUID(),
            }
        );
    }

    createAccessToken(subject: string): string {
        return this.create(subject, 'access');
    }

    createRefreshToken(subject: string): string {
        return this.create(subject, 'refresh');
    }

    /** Verified claims, or null when the token is expired, malformed or wrongly signed. */
    decode(token: string): TokenPayload | null {
        let verified: string | jwt.JwtPayload;
        try {
            verified = jwt.verify(token, this.config.jwtSecret, {
                algorithms: [this.config.jwtAlgorithm],
            });
        } catch (err) {
            logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'JWT verification failed');
            return null;
        }

        const claims = claimsSchema.safeParse(verified);
        if (!claims.success) return null;
        return claims.data;
    }
}
