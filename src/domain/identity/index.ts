/**
 * Gatehouse - Identity Module
 */

export { Role, parseRole } from './User';
export type { User, Session } from './User';
