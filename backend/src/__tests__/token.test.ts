import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenCodec } from '../services/auth/token.service';

const SECRET = 'test-secret';

describe('TokenCodec', () => {
    const codec = new TokenCodec({
        jwtSecret: SECRET,
        jwtAlgorithm: 'HS256',
        jwtAccessTokenExpireMinutes: 30,
        jwtRefreshTokenExpireDays: 7,
    });

    it('should derive default lifetimes from configuration', () => {
        expect(codec.defaultTtl('access')).toBe(1800);
        expect(codec.defaultTtl('refresh')).toBe(604800);
    });

    it('should round-trip subject and kind', () => {
        const payload = codec.decode(codec.createAccessToken('user-1'));
        expect(payload?.sub).toBe('user-1');
        expect(payload?.type).toBe('access');
    });

    it('should set exp from the lifetime of each kind', () => {
        const access = codec.decode(codec.createAccessToken('user-1'));
        const refresh = codec.decode(codec.createRefreshToken('user-1'));
        expect(access && access.iat !== undefined ? access.exp - access.iat : null).toBe(1800);
        expect(refresh && refresh.iat !== undefined ? refresh.exp - refresh.iat : null).toBe(604800);
        expect(refresh?.type).toBe('refresh');
    });

    it('should honour an explicit lifetime', () => {
        const payload = codec.decode(codec.create('user-1', 'access', 60));
        expect(payload && payload.iat !== undefined ? payload.exp - payload.iat : null).toBe(60);
    });

    it('should issue distinct tokens for the same subject within one second', () => {
        const first = codec.createAccessToken('user-1');
        const second = codec.createAccessToken('user-1');
        expect(first).not.toBe(second);
    });

    it('should return null for an expired token', () => {
        expect(codec.decode(codec.create('user-1', 'access', -10))).toBeNull();
    });

    it('should treat a zero lifetime as already expired', () => {
        expect(codec.decode(codec.create('user-1', 'access', 0))).toBeNull();
    });

    it('should return null for a token signed with another secret', () => {
        const foreign = new TokenCodec({
            jwtSecret: 'other-secret',
            jwtAlgorithm: 'HS256',
            jwtAccessTokenExpireMinutes: 30,
            jwtRefreshTokenExpireDays: 7,
        });
        expect(codec.decode(foreign.createAccessToken('user-1'))).toBeNull();
    });

    it('should return null for a token signed with another algorithm', () => {
        const token = jwt.sign({ sub: 'user-1', type: 'access' }, SECRET, { algorithm: 'HS512', expiresIn: 60 });
        expect(codec.decode(token)).toBeNull();
    });

    it('should return null for an unsigned token', () => {
        const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
        const exp = Math.floor(Date.now() / 1000) + 60;
        const token = `${encode({ alg: 'none', typ: 'JWT' })}.${encode({ sub: 'user-1', type: 'access', exp })}.`;
        expect(codec.decode(token)).toBeNull();
    });

    it('should return null when the payload was tampered with', () => {
        const [header, , signature] = codec.createAccessToken('user-1').split('.');
        const exp = Math.floor(Date.now() / 1000) + 60;
        const forged = Buffer.from(JSON.stringify({ sub: 'user-2', type: 'access', exp })).toString('base64url');
        expect(codec.decode(`${header}.${forged}.${signature}`)).toBeNull();
    });

    it('should return null for garbage input', () => {
        expect(codec.decode('not.a.jwt')).toBeNull();
        expect(codec.decode('')).toBeNull();
    });

    it('should return null when exp is missing', () => {
        const token = jwt.sign({ sub: 'user-1', type: 'access' }, SECRET, { algorithm: 'HS256', noTimestamp: true });
        expect(codec.decode(token)).toBeNull();
    });

    it('should decode a validly signed token without sub or type', () => {
        const token = jwt.sign({ scope: 'x' }, SECRET, { algorithm: 'HS256', expiresIn: 60 });
        const payload = codec.decode(token);
        expect(payload).not.toBeNull();
        expect(payload?.sub).toBeUndefined();
        expect(payload?.type).toBeUndefined();
    });
});
