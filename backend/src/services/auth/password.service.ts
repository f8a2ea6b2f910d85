import bcrypt from 'bcryptjs';
import type { AppConfig } from '../../config';
import { logger } from '../../utils/logger';

/**
 * Salted one-way password digests (bcrypt).
 */
export class PasswordHasher {
    private readonly rounds: number;

    constructor(config: Pick<AppConfig, 'bcryptRounds'>) {
        this.rounds = config.bcryptRounds;
    }

    async hash(password: string): Promise<string> {
        return bcrypt.hash(password, this.rounds);
    }

    /** Resolves false for a mismatch and for digests bcrypt cannot read. */
    async verify(password: string, hash: string): Promise<boolean> {
        try {
            return await bcrypt.compare(password, hash);
        } catch (err) {
            logger.debug({ err }, 'Password digest could not be verified');
            return false;
        }
    }
}
