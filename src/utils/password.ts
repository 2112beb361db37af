import bcrypt from 'bcrypt';
import { timingSafeEqual } from 'crypto';

const SALT_ROUNDS = 10;

export const password = {
  async hash(plain: string) {
    return bcrypt.hash(plain, SALT_ROUNDS);
  },
  async compare(plain: string, hash: string) {
    return bcrypt.compare(plain, hash);
  },
  /**
   * Checks the shared password that gates writes to the order book.
   * UPDATE_PASSWORD_HASH (bcrypt) takes precedence over UPDATE_PASSWORD.
   */
  async matchesUpdatePassword(candidate: string) {
    const hash = process.env.UPDATE_PASSWORD_HASH;
    if (hash) return bcrypt.compare(candidate, hash);
    const expected = Buffer.from(process.env.UPDATE_PASSWORD || 'change-me');
    const given = Buffer.from(candidate);
    return given.length === expected.length && timingSafeEqual(given, expected);
  },
};
