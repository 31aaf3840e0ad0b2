/**
 * @fileoverview Dependency Injection - typed tokens, lifetimes, scopes
 *
 * @packageDocumentation
 * @module gatehouse/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Services are registered against a {@link ServiceToken}, a typed key
 * created with {@link createToken}. Looking a service up by its token returns
 * the token's type, so no call site ever casts the result.
 *
 * ## Lifetimes
 *
 * | Scope       | Instances                                        |
 * |-------------|--------------------------------------------------|
 * | `Singleton` | one per root provider, created on first access   |
 * | `Scoped`    | one per scope (one scope per request)            |
 * | `Transient` | a new one on every access                        |
 *
 * Factories are synchronous, so the check-and-construct of a singleton
 * cannot interleave with another caller: exactly one instance is created.
 * Scopes resolve singletons through the root provider and share its cache.
 *
 * ## Fatal configuration errors
 *
 * The following throw {@link DependencyResolutionError} and are meant to
 * surface at startup, not to be handled per request:
 *
 * - looking up a token that was never registered
 * - a circular dependency (`A → B → A`)
 * - a scoped service requested from the root provider, or from inside a
 *   singleton factory (a singleton must not capture a per-request instance)
 *
 * Each error carries a rendering of the resolution path:
 *
 * ```
 * AuthService
 *   └─> SessionStore
 *       └─> AuthService (CIRCULAR!)
 * ```
 *
 * @example
 * ```typescript
 * const Clock = createToken<() => number>('Clock');
 * const Cache = createToken<CacheManager<string>>('Cache');
 *
 * const provider = new ServiceCollection()
 *   .addSingleton(Clock, () => Date.now)
 *   .addSingleton(Cache, (p) => new CacheManager({ now: p.getService(Clock) }))
 *   .buildServiceProvider();
 *
 * const scope = provider.createScope();
 * scope.getServiceProvider().getService(Cache);
 * scope.dispose();
 * ```
 *
 * @version 1.0.0
 */

/**
 * Service lifetime scopes for dependency injection
 */
export enum ServiceScope {
  Singleton = 'singleton',
  Transient = 'transient',
  Scoped = 'scoped',
}

/**
 * Thrown for registry misconfiguration. Not recoverable per request.
 */
export class DependencyResolutionError extends Error {
  public readonly dependencyGraph: string;

  constructor(message: string, dependencyGraph: string = '') {
    super(message);
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, DependencyResolutionError.prototype);
  }
}

/**
 * Typed registry key
 *
 * A token keeps, per registry, the descriptor registered against it and,
 * per owning provider, the instance that provider created. Both maps are
 * typed by `T`, so lookups come back typed without a cast.
 */
export class ServiceToken<T> {
  /** @internal descriptor per registry */
  readonly descriptors = new WeakMap<object, ServiceDescriptor<T>>();

  /** @internal instance per owning provider */
  readonly instances = new WeakMap<object, { value: T }>();

  constructor(readonly name: string) {}

  toString(): string {
    return this.name;
  }
}

/**
 * Create a new, unique service token
 */
export function createToken<T>(name: string): ServiceToken<T> {
  return new ServiceToken<T>(name);
}

/**
 * Factory function type for creating service instances
 */
export type ServiceFactory<T> = (provider: IDIServiceProvider) => T;

/**
 * Disposal hook run when the owning scope (or root) is disposed
 */
export type ServiceDisposer<T> = (instance: T) => void;

export interface ServiceRegistrationOptions<T> {
  /** Called with the instance when its owning scope is disposed */
  dispose?: ServiceDisposer<T>;
}

/**
 * Service descriptor containing registration metadata
 */
export interface ServiceDescriptor<T> {
  token: ServiceToken<T>;
  scope: ServiceScope;
  factory: ServiceFactory<T>;
  options: ServiceRegistrationOptions<T>;
}

/**
 * Service collection interface - registration phase
 */
export interface IServiceCollection {
  addSingleton<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options?: ServiceRegistrationOptions<T>): this;
  addScoped<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options?: ServiceRegistrationOptions<T>): this;
  addTransient<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options?: ServiceRegistrationOptions<T>): this;

  /**
   * Register an already constructed singleton
   */
  addInstance<T>(token: ServiceToken<T>, instance: T): this;

  has<T>(token: ServiceToken<T>): boolean;
  buildServiceProvider(): IDIServiceProvider;
}

/**
 * Service provider interface - resolution phase
 */
export interface IDIServiceProvider {
  /**
   * @throws DependencyResolutionError for unregistered, circular or captive lookups
   */
  getService<T>(token: ServiceToken<T>): T;

  has<T>(token: ServiceToken<T>): boolean;
  createScope(): IServiceScope;
}

/**
 * Service scope interface - one per request
 */
export interface IServiceScope {
  getServiceProvider(): IDIServiceProvider;

  /**
   * Dispose scoped instances. Idempotent.
   */
  dispose(): void;
}
