/**
 * Gatehouse - Session Store
 *
 * Token → session map. Every operation runs under the store mutex, so
 * check-then-insert on issue and enumerate-then-remove on sweep are atomic
 * against concurrent login, authenticate and logout calls.
 */

import { Session } from '../../domain/identity/User';
import { createMutex, Mutex } from '../concurrency/mutex';

/**
 * Raised when a freshly generated token is already live.
 * This is a bug in token generation, not a client error.
 */
export class SessionTokenCollisionError extends Error {
  constructor() {
    super('Generated session token collides with a live session');
    this.name = 'SessionTokenCollisionError';
    Object.setPrototypeOf(this, SessionTokenCollisionError.prototype);
  }
}

export interface ISessionStore {
  insert(session: Session): Promise<void>;
  get(token: string): Promise<Session | undefined>;
  remove(token: string): Promise<boolean>;
  removeExpired(now: number): Promise<number>;
  count(): Promise<number>;
}

export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly mutex: Mutex = createMutex();

  /**
   * @throws SessionTokenCollisionError if the token is already present
   */
  insert(session: Session): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (this.sessions.has(session.token)) {
        throw new SessionTokenCollisionError();
      }
      this.sessions.set(session.token, session);
    });
  }

  get(token: string): Promise<Session | undefined> {
    return this.mutex.runExclusive(() => this.sessions.get(token));
  }

  remove(token: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.sessions.delete(token));
  }

  /**
   * Remove every session with `expiresAt <= now`
   */
  removeExpired(now: number): Promise<number> {
    return this.mutex.runExclusive(() => {
      let removed = 0;
      for (const [token, session] of this.sessions) {
        if (session.expiresAt <= now) {
          this.sessions.delete(token);
          removed++;
        }
      }
      return removed;
    });
  }

  count(): Promise<number> {
    return this.mutex.runExclusive(() => this.sessions.size);
  }
}
