/**
 * Gatehouse - Context Module
 *
 * Per-request context propagation and cancellation
 */

export type { IContext, GatehouseContextData, GatehouseContext } from './IContext';
export { RequestContext, getCurrentContext, tryGetCurrentContext } from './RequestContext';
