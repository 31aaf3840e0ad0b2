/**
 * Gatehouse - Application Layer
 */

export * from './di';
export * from './host';
export * from './auth';
export * from './middleware';
export * from './handlers';
export { Tokens, addGatehouseServices } from './services';
export type { GatehouseServices, ServiceOverrides, Clock, AppContext, AppHandler, AppMiddleware } from './services';
