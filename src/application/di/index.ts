/**
 * @module gatehouse/application/di
 * @description Dependency injection: typed tokens, lifetimes and per-request scopes
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  IServiceCollection,
  IDIServiceProvider,
  IServiceScope,
  ServiceDescriptor,
  ServiceFactory,
  ServiceDisposer,
  ServiceRegistrationOptions,
} from './IDependencyInjection';

// ============================================================================
// Tokens & Enums
// ============================================================================

export { ServiceScope, ServiceToken, createToken } from './IDependencyInjection';

// ============================================================================
// Implementation
// ============================================================================

export { ServiceCollection, ServiceProvider } from './ServiceCollection';

// ============================================================================
// Error Classes
// ============================================================================

export { DependencyResolutionError } from './IDependencyInjection';

