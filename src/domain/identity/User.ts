/**
 * Gatehouse - Identity Types
 */

export enum Role {
  Administrator = 'Administrator',
  User = 'User',
}

/**
 * Registered account. Replaced wholesale, never edited in place.
 */
export interface User {
  readonly identity: string;
  /** Output of the password hasher; opaque to everything else */
  readonly credentialHash: string;
  readonly role: Role;
}

/**
 * Proof of authentication issued by login.
 * Never re-armed: `expiresAt` is fixed when the session is issued.
 */
export interface Session {
  readonly token: string;
  readonly identity: string;
  readonly role: Role;
  readonly issuedAt: number;
  readonly expiresAt: number;
}

/**
 * Parse a role name case-insensitively
 */
export function parseRole(value: string): Role | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'administrator' || normalized === 'admin') {
    return Role.Administrator;
  }
  if (normalized === 'user') {
    return Role.User;
  }
  return undefined;
}
