/**
 * Gatehouse - User Store
 *
 * Accounts keyed by identity, compared case-insensitively.
 */

import { User } from '../../domain/identity/User';
import { createMutex, Mutex } from '../../infrastructure/concurrency/mutex';

export interface IUserStore {
  get(identity: string): Promise<User | undefined>;

  /**
   * Insert or replace. Resolves true when an existing account was replaced.
   */
  put(user: User): Promise<boolean>;

  count(): Promise<number>;
}

export class InMemoryUserStore implements IUserStore {
  private readonly users = new Map<string, User>();
  private readonly mutex: Mutex = createMutex();

  get(identity: string): Promise<User | undefined> {
    return this.mutex.runExclusive(() => this.users.get(identity.toLowerCase()));
  }

  put(user: User): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const key = user.identity.toLowerCase();
      const replaced = this.users.has(key);
      this.users.set(key, user);
      return replaced;
    });
  }

  count(): Promise<number> {
    return this.mutex.runExclusive(() => this.users.size);
  }
}
