export { AuthService, generateSessionToken } from './AuthService';
export type { AuthServiceOptions } from './AuthService';
export { ScryptPasswordHasher } from './PasswordHasher';
export type { IPasswordHasher } from './PasswordHasher';
export { InMemoryUserStore } from './UserStore';
export type { IUserStore } from './UserStore';
export { SessionSweepService } from './SessionSweepService';
