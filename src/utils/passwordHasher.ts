import { compare, hash } from 'bcryptjs';
import { ServiceError } from './errors';

/** bcrypt only consumes the first 72 bytes of its input. */
export const BCRYPT_MAX_BYTES = 72;

const byteLength = (secret: string): number => Buffer.byteLength(secret, 'utf8');

/**
 * bcrypt wrapper for account keys.
 * Over-long input is rejected instead of truncated so two keys sharing a 72-byte prefix never collide.
 */
export class PasswordHasher {
  constructor(private readonly rounds: number) {}

  /**
   * @throws {ServiceError} - 'PasswordEmpty' | 'PasswordTooLong'
   */
  public async hash(secret: string): Promise<string> {
    if (secret.length === 0) {
      throw new ServiceError('PasswordEmpty');
    }
    if (byteLength(secret) > BCRYPT_MAX_BYTES) {
      throw new ServiceError('PasswordTooLong', `limit is ${BCRYPT_MAX_BYTES} bytes`);
    }
    return hash(secret, this.rounds);
  }

  public async verify(secret: string, hashed: string): Promise<boolean> {
    if (secret.length === 0 || byteLength(secret) > BCRYPT_MAX_BYTES || !hashed) {
      return false;
    }
    try {
      return await compare(secret, hashed);
    } catch {
      // bcryptjs throws on a stored value that is not a bcrypt hash
      return false;
    }
  }
}
