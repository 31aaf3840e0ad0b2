/**
 * @fileoverview Service collection and provider
 *
 * @packageDocumentation
 * @module gatehouse/application/di
 */

import {
  DependencyResolutionError,
  IDIServiceProvider,
  IServiceCollection,
  IServiceScope,
  ServiceDescriptor,
  ServiceFactory,
  ServiceRegistrationOptions,
  ServiceScope,
  ServiceToken,
} from './IDependencyInjection';

interface ResolutionFrame {
  token: object;
  name: string;
  scope: ServiceScope;
}

/**
 * Render a resolution path as an indented tree
 */
function renderGraph(path: readonly ResolutionFrame[], last: string, marker: string): string {
  const names = [...path.map((frame) => frame.name), `${last}${marker}`];
  return names.map((name, depth) => (depth === 0 ? name : `${'  '.repeat(depth)}└─> ${name}`)).join('\n');
}

/**
 * Registration phase. Registering a token again replaces its descriptor.
 * The collection is sealed once a provider has been built from it.
 */
export class ServiceCollection implements IServiceCollection {
  private readonly registry = {};
  private readonly tokens = new Set<object>();
  private sealed = false;

  addSingleton<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options: ServiceRegistrationOptions<T> = {}): this {
    return this.register({ token, scope: ServiceScope.Singleton, factory, options });
  }

  addScoped<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options: ServiceRegistrationOptions<T> = {}): this {
    return this.register({ token, scope: ServiceScope.Scoped, factory, options });
  }

  addTransient<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, options: ServiceRegistrationOptions<T> = {}): this {
    return this.register({ token, scope: ServiceScope.Transient, factory, options });
  }

  addInstance<T>(token: ServiceToken<T>, instance: T): this {
    return this.addSingleton(token, () => instance);
  }

  has<T>(token: ServiceToken<T>): boolean {
    return token.descriptors.has(this.registry);
  }

  get count(): number {
    return this.tokens.size;
  }

  buildServiceProvider(): ServiceProvider {
    this.sealed = true;
    return new ServiceProvider(this.registry);
  }

  private register<T>(descriptor: ServiceDescriptor<T>): this {
    if (this.sealed) {
      throw new DependencyResolutionError(
        `Cannot register '${descriptor.token.name}': a service provider has already been built`,
      );
    }
    descriptor.token.descriptors.set(this.registry, descriptor);
    this.tokens.add(descriptor.token);
    return this;
  }
}

/**
 * Resolution phase. The root provider owns singletons; each scope created
 * from it owns its scoped instances and shares the root's singletons.
 */
export class ServiceProvider implements IDIServiceProvider {
  private readonly disposers: Array<() => void> = [];
  private readonly stack: ResolutionFrame[] = [];
  private disposed = false;

  constructor(
    private readonly registry: object,
    private readonly root: ServiceProvider | null = null,
  ) {}

  getService<T>(token: ServiceToken<T>): T {
    if (this.disposed) {
      throw new DependencyResolutionError(`Cannot resolve '${token.name}': provider has been disposed`);
    }

    const descriptor = token.descriptors.get(this.registry);
    if (!descriptor) {
      throw new DependencyResolutionError(
        `Service '${token.name}' is not registered`,
        renderGraph(this.stack, token.name, ' (NOT REGISTERED)'),
      );
    }

    if (this.stack.some((frame) => frame.token === token)) {
      throw new DependencyResolutionError(
        `Circular dependency detected while resolving '${token.name}'`,
        renderGraph(this.stack, token.name, ' (CIRCULAR!)'),
      );
    }

    switch (descriptor.scope) {
      case ServiceScope.Singleton:
        return this.resolveOwned(descriptor, this.root ?? this);

      case ServiceScope.Scoped: {
        if (!this.isScope) {
          throw new DependencyResolutionError(
            `Scoped service '${token.name}' cannot be resolved from the root provider`,
            renderGraph(this.stack, token.name, ' (SCOPED)'),
          );
        }
        const captor = this.stack.find((frame) => frame.scope === ServiceScope.Singleton);
        if (captor) {
          throw new DependencyResolutionError(
            `Scoped service '${token.name}' cannot be injected into singleton '${captor.name}'`,
            renderGraph(this.stack, token.name, ' (SCOPED)'),
          );
        }
        return this.resolveOwned(descriptor, this);
      }

      case ServiceScope.Transient:
        return this.construct(descriptor);
    }
  }

  has<T>(token: ServiceToken<T>): boolean {
    return token.descriptors.has(this.registry);
  }

  createScope(): IServiceScope {
    return new ServiceProviderScope(new ServiceProvider(this.registry, this.root ?? this));
  }

  get isScope(): boolean {
    return this.root !== null;
  }

  /**
   * Run disposal hooks of owned instances in reverse creation order. Idempotent.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const dispose of this.disposers.reverse()) {
      dispose();
    }
    this.disposers.length = 0;
  }

  private resolveOwned<T>(descriptor: ServiceDescriptor<T>, owner: ServiceProvider): T {
    const cached = descriptor.token.instances.get(owner);
    if (cached) {
      return cached.value;
    }

    // Factories are synchronous: nothing else can construct this instance
    // between the lookup above and the store below
    const value = this.construct(descriptor);
    descriptor.token.instances.set(owner, { value });

    const { dispose } = descriptor.options;
    if (dispose) {
      owner.disposers.push(() => dispose(value));
    }
    return value;
  }

  private construct<T>(descriptor: ServiceDescriptor<T>): T {
    this.stack.push({ token: descriptor.token, name: descriptor.token.name, scope: descriptor.scope });
    try {
      return descriptor.factory(this);
    } finally {
      this.stack.pop();
    }
  }
}

class ServiceProviderScope implements IServiceScope {
  constructor(private readonly provider: ServiceProvider) {}

  getServiceProvider(): ServiceProvider {
    return this.provider;
  }

  dispose(): void {
    this.provider.dispose();
  }
}
