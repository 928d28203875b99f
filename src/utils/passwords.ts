import crypto from 'crypto';

const SCHEME = 'scrypt';
const KEY_LENGTH = 64;

const COMMON_PASSWORDS = new Set(['password', '123456', '123456789', 'qwerty', 'abc123', 'letmein']);

export function hashPassword(plaintext: string): string {
  const salt = crypto.randomBytes(16).toString('hex');
  const hash = crypto.scryptSync(plaintext, salt, KEY_LENGTH).toString('hex');
  return `${SCHEME}$${salt}$${hash}`;
}

export function verifyPassword(plaintext: string, stored: string): boolean {
  const [scheme, salt, expectedHash] = stored.split('$');
  if (scheme !== SCHEME || !salt || !expectedHash) return false;
  const expected = Buffer.from(expectedHash, 'hex');
  if (expected.length !== KEY_LENGTH) return false;
  const actual = crypto.scryptSync(plaintext, salt, KEY_LENGTH);
  return crypto.timingSafeEqual(actual, expected);
}

// At least 8 chars, not a well-known password, not only digits or only letters.
export function validatePassword(password: string): boolean {
  if (password.length < 8) return false;
  if (COMMON_PASSWORDS.has(password.toLowerCase())) return false;
  if (/^\d+$/.test(password) || /^\p{L}+$/u.test(password)) return false;
  return true;
}
