import { describe, it, expect } from 'vitest';
import { PasswordHasher } from '../services/auth/password.service';

describe('PasswordHasher', () => {
    const hasher = new PasswordHasher({ bcryptRounds: 4 });

    it('should verify a password against its own digest', async () => {
        const digest = await hasher.hash('correct horse');
        expect(await hasher.verify('correct horse', digest)).toBe(true);
    });

    it('should reject a different password', async () => {
        const digest = await hasher.hash('correct horse');
        expect(await hasher.verify('battery staple', digest)).toBe(false);
    });

    it('should salt every digest', async () => {
        const first = await hasher.hash('same-password');
        const second = await hasher.hash('same-password');
        expect(first).not.toBe(second);
        expect(await hasher.verify('same-password', first)).toBe(true);
        expect(await hasher.verify('same-password', second)).toBe(true);
    });

    it('should use the configured cost factor', async () => {
        const digest = await hasher.hash('pw');
        expect(digest.startsWith('$2a$04$')).toBe(true);
    });

    it('should return false for a digest that is not bcrypt', async () => {
        expect(await hasher.verify('anything', 'not-a-bcrypt-digest')).toBe(false);
        expect(await hasher.verify('anything', '')).toBe(false);
    });
});
