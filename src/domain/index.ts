/**
 * Gatehouse - Domain Layer
 */

export * from './context';
export * from './exceptions';
export * from './identity';
export * from './result';
