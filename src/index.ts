/**
 * @fileoverview Gatehouse - HTTP request engine
 * @description
 * A single-process request pipeline: composable middleware over an explicit
 * request environment with short-circuit results, session authentication
 * and role authorization, a TTL response cache, and actor services for the
 * request counter and the logger.
 *
 * ## Architecture Layers
 *
 * - **domain**: results and errors, request context, identities
 * - **application**: dependency registry, auth service, handlers, app and host
 * - **infrastructure**: effect pipeline, middleware, router, stores, actors, node:http adapter
 *
 * @packageDocumentation
 * @module gatehouse
 * @version 1.0.0
 */

export * from './domain';
export * from './application';
export * from './infrastructure';
export { createGatehouse, registerRoutes } from './bootstrap';
export type { Gatehouse, CreateGatehouseOptions } from './bootstrap';
