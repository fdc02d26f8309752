import bcrypt from 'bcryptjs';
import { createHash, timingSafeEqual } from 'crypto';
import type { PasswordScheme } from '../config/index.js';

/**
 * Checks a submitted password against what the user store holds.
 * Handlers only see this interface, so the storage scheme can change underneath them.
 */
export interface PasswordVerifier {
  verify(candidate: string, stored: string): Promise<boolean>;
}

const digest = (value: string): Buffer => createHash('sha256').update(value, 'utf8').digest();

// Stored passwords are raw strings. Dummy auth only.
// Compares fixed-length SHA-256 digests, never the raw lengths.
export class PlaintextPasswordVerifier implements PasswordVerifier {
  async verify(candidate: string, stored: string): Promise<boolean> {
    return timingSafeEqual(digest(candidate), digest(stored));
  }
}

export class BcryptPasswordVerifier implements PasswordVerifier {
  async verify(candidate: string, stored: string): Promise<boolean> {
    return bcrypt.compare(candidate, stored);
  }
}

export const createPasswordVerifier = (scheme: PasswordScheme): PasswordVerifier =>
  scheme === 'bcrypt' ? new BcryptPasswordVerifier() : new PlaintextPasswordVerifier();

// Turns a seed password into what the store should hold under `scheme`.
export const encodePassword = async (password: string, scheme: PasswordScheme): Promise<string> =>
  scheme === 'bcrypt' ? bcrypt.hash(password, 10) : password;
