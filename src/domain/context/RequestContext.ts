/**
 * @fileoverview RequestContext - AsyncLocalStorage-backed context
 *
 * @packageDocumentation
 * @module gatehouse/domain/context
 *
 * The adapter opens one context per request with {@link RequestContext.run};
 * the same context object is also placed on the middleware environment, so
 * pipeline code reaches it explicitly through `ctx.context`. The ambient
 * lookup ({@link RequestContext.current}) exists for log correlation only:
 * code deep inside a service can tag its log lines with the trace ID without
 * every signature growing a context parameter.
 *
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';
import { GatehouseContextData, IContext } from './IContext';

/**
 * Internal storage for one request
 */
interface ContextStore {
  data: Partial<GatehouseContextData>;
  cancelCallbacks: Set<() => void>;
  cancelled: boolean;
}

/**
 * RequestContext - per-request data and cancellation
 *
 * @example
 * ```typescript
 * await RequestContext.run({ traceId: 'trace-1' }, async () => {
 *   const ctx = RequestContext.current();
 *   ctx?.get('traceId'); // 'trace-1'
 * });
 * ```
 */
export class RequestContext implements IContext<GatehouseContextData> {
  private static als = new AsyncLocalStorage<ContextStore>();

  private readonly store: ContextStore;

  private constructor(store?: ContextStore) {
    this.store = store ?? {
      data: {},
      cancelCallbacks: new Set(),
      cancelled: false,
    };
  }

  /**
   * Create a detached context (not bound to the async scope)
   */
  static create(initialData: Partial<GatehouseContextData> = {}): RequestContext {
    return new RequestContext({
      data: { ...initialData },
      cancelCallbacks: new Set(),
      cancelled: false,
    });
  }

  /**
   * Run a callback inside a fresh context scope
   */
  static run<R>(initialData: Partial<GatehouseContextData>, callback: () => R): R {
    return RequestContext.runWithContext(RequestContext.create(initialData), callback);
  }

  /**
   * Run a callback with an existing context bound to the async scope
   */
  static runWithContext<R>(context: RequestContext, callback: () => R): R {
    return RequestContext.als.run(context.store, callback);
  }

  /**
   * Context bound to the current async scope, if any
   */
  static current(): RequestContext | undefined {
    const store = RequestContext.als.getStore();
    if (!store) {
      return undefined;
    }
    return new RequestContext(store);
  }

  static hasContext(): boolean {
    return RequestContext.als.getStore() !== undefined;
  }

  // ==================== IContext Implementation ====================

  get<K extends keyof GatehouseContextData>(key: K): GatehouseContextData[K] | undefined {
    return this.store.data[key];
  }

  set<K extends keyof GatehouseContextData>(key: K, value: GatehouseContextData[K]): void {
    this.store.data[key] = value;
  }

  has<K extends keyof GatehouseContextData>(key: K): boolean {
    return this.store.data[key] !== undefined;
  }

  delete<K extends keyof GatehouseContextData>(key: K): boolean {
    const existed = this.has(key);
    delete this.store.data[key];
    return existed;
  }

  isCancelled(): boolean {
    return this.store.cancelled;
  }

  onCancel(callback: () => void): void {
    if (this.store.cancelled) {
      RequestContext.invokeSafely(callback);
    } else {
      this.store.cancelCallbacks.add(callback);
    }
  }

  cancel(): void {
    if (this.store.cancelled) {
      return;
    }

    this.store.cancelled = true;

    for (const callback of this.store.cancelCallbacks) {
      RequestContext.invokeSafely(callback);
    }
    this.store.cancelCallbacks.clear();
  }

  /**
   * Whether the request deadline (if any) has passed
   */
  isPastDeadline(now: number): boolean {
    const deadline = this.store.data.deadline;
    return deadline !== undefined && now >= deadline;
  }

  getAll(): Readonly<Partial<GatehouseContextData>> {
    return { ...this.store.data };
  }

  /**
   * Copy the data into a new, uncancelled context
   */
  clone(additionalData?: Partial<GatehouseContextData>): RequestContext {
    return RequestContext.create({ ...this.store.data, ...additionalData });
  }

  get traceId(): string | undefined {
    return this.store.data.traceId;
  }

  get identity(): string | undefined {
    return this.store.data.identity;
  }

  private static invokeSafely(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      console.error('Error in cancel callback:', error);
    }
  }
}

/**
 * Get the current context (throws outside a context scope)
 */
export function getCurrentContext(): RequestContext {
  const context = RequestContext.current();
  if (!context) {
    throw new Error('No active context. Make sure you are within a RequestContext.run() scope.');
  }
  return context;
}

/**
 * Try to get the current context (returns null outside a context scope)
 */
export function tryGetCurrentContext(): RequestContext | null {
  return RequestContext.current() ?? null;
}
