/**
 * Gatehouse - Authentication Service
 *
 * Session lifecycle:
 *
 * ```
 * login ──→ Issued/Valid ──(now >= expiresAt)──→ Expired ──sweep──→ gone
 *                │
 *                └──logout──→ Revoked (gone)
 * ```
 *
 * Every outcome a client can cause is returned as a {@link PipelineResult};
 * only programming errors (a token collision) are thrown.
 */

import { randomBytes } from 'crypto';
import { Role, Session, User } from '../../domain/identity/User';
import { Errors, PipelineResult, failure, success } from '../../domain/result/Result';
import { ISessionStore } from '../../infrastructure/sessions/SessionStore';
import type { ILogger } from '../../infrastructure/platform/logger';
import { IPasswordHasher } from './PasswordHasher';
import { IUserStore } from './UserStore';

export interface AuthServiceOptions {
  /** Session lifetime in milliseconds */
  sessionTtlMs: number;

  /** Unknown user → NotFound; otherwise Unauthorized like a bad password */
  distinguishUnknownUser: boolean;

  /** Clock, epoch milliseconds */
  now?: () => number;

  /** Session token source */
  generateToken?: () => string;
}

export function generateSessionToken(): string {
  return randomBytes(32).toString('base64url');
}

export class AuthService {
  private readonly now: () => number;
  private readonly generateToken: () => string;

  constructor(
    private readonly users: IUserStore,
    private readonly sessions: ISessionStore,
    private readonly hasher: IPasswordHasher,
    private readonly logger: ILogger,
    private readonly options: AuthServiceOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.generateToken = options.generateToken ?? generateSessionToken;
  }

  /**
   * Verify credentials and issue a session
   *
   * @throws SessionTokenCollisionError if the generated token is already live
   */
  async login(identity: string, credential: string, path: string): Promise<PipelineResult<Session>> {
    const user = await this.users.get(identity);

    if (!user) {
      this.logger.warn(`Login failed for unknown user '${identity}'`);
      return failure(
        this.options.distinguishUnknownUser
          ? Errors.entityNotFound('User not found', path)
          : Errors.unauthorized(path, 'Invalid username or password'),
      );
    }

    if (!(await this.hasher.verify(credential, user.credentialHash))) {
      this.logger.warn(`Login failed for '${user.identity}': bad credentials`);
      return failure(Errors.unauthorized(path, 'Invalid username or password'));
    }

    const issuedAt = this.now();
    const session: Session = {
      token: this.generateToken(),
      identity: user.identity,
      role: user.role,
      issuedAt,
      expiresAt: issuedAt + this.options.sessionTtlMs,
    };

    await this.sessions.insert(session);
    this.logger.info(`Session issued for '${user.identity}'`);
    return success(session);
  }

  /**
   * Resolve a bearer token to its session, checking expiry and role.
   * Expired sessions are left in place for the sweep.
   */
  async authenticate(
    token: string,
    path: string,
    requiredRoles: readonly Role[] = [],
  ): Promise<PipelineResult<Session>> {
    const session = await this.sessions.get(token);

    if (!session) {
      return failure(Errors.unauthorized(path, 'Invalid or unknown session token'));
    }

    if (this.now() >= session.expiresAt) {
      return failure(Errors.unauthorized(path, 'Session expired'));
    }

    if (requiredRoles.length > 0 && !requiredRoles.includes(session.role)) {
      return failure(Errors.forbidden(path, `Role ${session.role} may not access ${path}`));
    }

    return success(session);
  }

  /**
   * Revoke a session
   */
  async logout(token: string, path: string): Promise<PipelineResult<void>> {
    if (!(await this.sessions.remove(token))) {
      return failure(Errors.entityNotFound('Session not found', path));
    }
    this.logger.info('Session revoked');
    return success(undefined);
  }

  /**
   * Remove every session with `expiresAt <= now`
   */
  async sweep(): Promise<number> {
    const removed = await this.sessions.removeExpired(this.now());
    if (removed > 0) {
      this.logger.info(`Swept ${removed} expired session(s)`);
    } else {
      this.logger.debug('Session sweep found nothing to remove');
    }
    return removed;
  }

  /**
   * Hash and store an account, replacing any with the same identity
   */
  async addUser(identity: string, password: string, role: Role = Role.User): Promise<User> {
    const user: User = {
      identity,
      credentialHash: await this.hasher.hash(password),
      role,
    };
    const replaced = await this.users.put(user);
    this.logger.info(`${replaced ? 'Replaced' : 'Added'} user '${identity}' with role ${role}`);
    return user;
  }

  activeSessions(): Promise<number> {
    return this.sessions.count();
  }
}
