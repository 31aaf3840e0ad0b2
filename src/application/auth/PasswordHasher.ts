/**
 * Gatehouse - Password Hashing
 *
 * One-way credential hashing. Stored hashes have the form
 * `scrypt$<salt>$<key>`, both parts base64url.
 */

import { randomBytes, scrypt, timingSafeEqual } from 'crypto';

export interface IPasswordHasher {
  hash(password: string): Promise<string>;

  /**
   * False for a mismatch or a hash this hasher did not produce
   */
  verify(password: string, credentialHash: string): Promise<boolean>;
}

const SCHEME = 'scrypt';
const SALT_BYTES = 16;
const KEY_LENGTH = 64;

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (error, derivedKey) => {
      if (error) {
        reject(error);
      } else {
        resolve(derivedKey);
      }
    });
  });
}

export class ScryptPasswordHasher implements IPasswordHasher {
  async hash(password: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const key = await deriveKey(password, salt);
    return [SCHEME, salt.toString('base64url'), key.toString('base64url')].join('$');
  }

  async verify(password: string, credentialHash: string): Promise<boolean> {
    const [scheme, salt, key, ...rest] = credentialHash.split('$');
    if (scheme !== SCHEME || !salt || !key || rest.length > 0) {
      return false;
    }

    const expected = Buffer.from(key, 'base64url');
    if (expected.length !== KEY_LENGTH) {
      return false;
    }

    const actual = await deriveKey(password, Buffer.from(salt, 'base64url'));
    return timingSafeEqual(actual, expected);
  }
}
