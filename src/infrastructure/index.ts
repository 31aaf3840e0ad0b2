/**
 * Gatehouse - Infrastructure Layer
 */

export * from './actors';
export * from './cache';
export * from './concurrency';
export * from './config';
export * from './http';
export * from './pipeline';
export * from './platform';
export * from './routing';
export * from './sessions';
