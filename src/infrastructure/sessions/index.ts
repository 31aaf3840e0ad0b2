export { InMemorySessionStore, SessionTokenCollisionError } from './SessionStore';
export type { ISessionStore } from './SessionStore';
