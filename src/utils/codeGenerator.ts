import { randomInt } from 'crypto';

export const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export const USERNAME_LENGTH = 6;
export const ACCOUNT_KEY_LENGTH = 10;

/**
 * Returns `length` characters drawn uniformly from A-Z0-9 with the CSPRNG.
 * `randomInt` rejects biased samples internally, so no modulo skew.
 */
export function generateCode(length: number): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`Code length must be a positive integer, got ${length}`);
  }

  let code = '';
  for (let i = 0; i < length; i++) {
    code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return code;
}
