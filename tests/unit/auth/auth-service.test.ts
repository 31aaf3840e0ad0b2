import { AuthService } from '../../../src/application/auth/AuthService';
import { ScryptPasswordHasher } from '../../../src/application/auth/PasswordHasher';
import { InMemoryUserStore } from '../../../src/application/auth/UserStore';
import { Role } from '../../../src/domain/identity/User';
import { ErrorKind, Errors, failure } from '../../../src/domain/result/Result';
import { InMemorySessionStore } from '../../../src/infrastructure/sessions/SessionStore';
import { ManualClock, PlainTextHasher, RecordingLogger, sequentialTokens } from '../../support/fixtures';

const TTL = 60_000;

describe('AuthService', () => {
  let clock: ManualClock;
  let sessions: InMemorySessionStore;
  let logger: RecordingLogger;
  let auth: AuthService;

  function createService(distinguishUnknownUser: boolean): AuthService {
    return new AuthService(new InMemoryUserStore(), sessions, new PlainTextHasher(), logger, {
      sessionTtlMs: TTL,
      distinguishUnknownUser,
      now: clock.now,
      generateToken: sequentialTokens(),
    });
  }

  beforeEach(async () => {
    clock = new ManualClock();
    sessions = new InMemorySessionStore();
    logger = new RecordingLogger();
    auth = createService(true);
    await auth.addUser('alice@example.com', 'test-password');
  });

  // ============================================================================
  // login
  // ============================================================================

  describe('login', () => {
    it('should issue a session expiring one TTL after login', async () => {
      const result = await auth.login('alice@example.com', 'test-password', '/login');

      expect(result).toEqual({
        ok: true,
        value: {
          token: 'token-1',
          identity: 'alice@example.com',
          role: Role.User,
          issuedAt: clock.current,
          expiresAt: clock.current + TTL,
        },
      });
      await expect(auth.activeSessions()).resolves.toBe(1);
    });

    it('should match the identity case-insensitively', async () => {
      const result = await auth.login('Alice@Example.com', 'test-password', '/login');

      expect(result.ok && result.value.identity).toBe('alice@example.com');
    });

    it('should return Unauthorized for a wrong password', async () => {
      const result = await auth.login('alice@example.com', 'wrong', '/login');

      expect(result).toEqual(failure(Errors.unauthorized('/login', 'Invalid username or password')));
      await expect(auth.activeSessions()).resolves.toBe(0);
    });

    it('should return NotFound for an unknown user', async () => {
      const result = await auth.login('nobody@example.com', 'test-password', '/login');

      expect(result).toEqual(failure(Errors.entityNotFound('User not found', '/login')));
    });

    it('should answer an unknown user like a bad password when configured to', async () => {
      const quiet = createService(false);

      const result = await quiet.login('nobody@example.com', 'test-password', '/login');

      expect(result).toEqual(failure(Errors.unauthorized('/login', 'Invalid username or password')));
    });

    it('should issue a fresh token per login', async () => {
      const first = await auth.login('alice@example.com', 'test-password', '/login');
      const second = await auth.login('alice@example.com', 'test-password', '/login');

      expect(first.ok && first.value.token).toBe('token-1');
      expect(second.ok && second.value.token).toBe('token-2');
      await expect(auth.activeSessions()).resolves.toBe(2);
    });
  });

  // ============================================================================
  // authenticate
  // ============================================================================

  describe('authenticate', () => {
    it('should accept a live session', async () => {
      await auth.login('alice@example.com', 'test-password', '/login');

      const result = await auth.authenticate('token-1', '/hello');

      expect(result.ok && result.value.identity).toBe('alice@example.com');
    });

    it('should reject a session at its expiry instant but leave it for the sweep', async () => {
      await auth.login('alice@example.com', 'test-password', '/login');
      clock.advance(TTL - 1);
      await expect(auth.authenticate('token-1', '/hello')).resolves.toBeSuccess();

      clock.advance(1);
      const result = await auth.authenticate('token-1', '/hello');

      expect(result).toEqual(failure(Errors.unauthorized('/hello', 'Session expired')));
      await expect(auth.activeSessions()).resolves.toBe(1);
    });

    it('should reject an unknown token', async () => {
      const result = await auth.authenticate('never-issued', '/hello');

      expect(result).toEqual(failure(Errors.unauthorized('/hello', 'Invalid or unknown session token')));
    });

    it('should check the role after the session', async () => {
      await auth.login('alice@example.com', 'test-password', '/login');

      const denied = await auth.authenticate('token-1', '/adduser', [Role.Administrator]);
      const allowed = await auth.authenticate('token-1', '/hello', [Role.User, Role.Administrator]);

      expect(denied).toEqual(failure(Errors.forbidden('/adduser', 'Role User may not access /adduser')));
      expect(!denied.ok && denied.error.statusCode).toBe(403);
      expect(allowed).toBeSuccess();
    });
  });

  // ============================================================================
  // logout and sweep
  // ============================================================================

  describe('logout', () => {
    it('should revoke the session so it no longer authenticates', async () => {
      await auth.login('alice@example.com', 'test-password', '/login');

      await expect(auth.logout('token-1', '/logout')).resolves.toEqual({ ok: true, value: undefined });
      await expect(auth.authenticate('token-1', '/hello')).resolves.toBeFailureOf(ErrorKind.Unauthorized);
    });

    it('should return NotFound for a second logout', async () => {
      await auth.login('alice@example.com', 'test-password', '/login');
      await auth.logout('token-1', '/logout');

      const result = await auth.logout('token-1', '/logout');

      expect(result).toEqual(failure(Errors.entityNotFound('Session not found', '/logout')));
    });
  });

  describe('sweep', () => {
    it('should remove exactly the expired sessions and be idempotent', async () => {
      await auth.login('alice@example.com', 'test-password', '/login');
      clock.advance(TTL / 2);
      await auth.login('alice@example.com', 'test-password', '/login');
      clock.advance(TTL / 2);

      await expect(auth.sweep()).resolves.toBe(1);
      await expect(auth.sweep()).resolves.toBe(0);
      await expect(auth.authenticate('token-2', '/hello')).resolves.toBeSuccess();
      expect(logger.messages('info')).toContain('Swept 1 expired session(s)');
      expect(logger.messages('debug')).toEqual(['Session sweep found nothing to remove']);
    });
  });

  describe('addUser', () => {
    it('should replace an existing account', async () => {
      await auth.addUser('alice@example.com', 'new-password', Role.Administrator);

      await expect(auth.login('alice@example.com', 'test-password', '/login')).resolves.toBeFailureOf(
        ErrorKind.Unauthorized,
      );
      const result = await auth.login('alice@example.com', 'new-password', '/login');
      expect(result.ok && result.value.role).toBe(Role.Administrator);
      expect(logger.messages('info')).toContain("Replaced user 'alice@example.com' with role Administrator");
    });
  });
});

describe('ScryptPasswordHasher', () => {
  const hasher = new ScryptPasswordHasher();

  it('should verify the original password only', async () => {
    const hash = await hasher.hash('test-password');

    expect(hash).toMatch(/^scrypt\$[\w-]+\$[\w-]+$/);
    await expect(hasher.verify('test-password', hash)).resolves.toBe(true);
    await expect(hasher.verify('test-passwore', hash)).resolves.toBe(false);
  });

  it('should salt every hash', async () => {
    const [a, b] = await Promise.all([hasher.hash('same'), hasher.hash('same')]);

    expect(a).not.toBe(b);
  });

  it('should reject hashes it did not produce', async () => {
    await expect(hasher.verify('x', 'plain$x')).resolves.toBe(false);
    await expect(hasher.verify('x', 'scrypt$abc$short')).resolves.toBe(false);
  });
});
