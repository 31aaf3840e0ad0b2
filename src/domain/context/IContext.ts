/**
 * @fileoverview IContext - Request-scoped data carrier
 *
 * @packageDocumentation
 * @module gatehouse/domain/context
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The context is the per-request bag of metadata (trace ID, authenticated
 * identity, deadline) plus a cancellation signal. Exactly one context exists
 * per in-flight request and it is never shared between requests.
 *
 * The context carries *metadata only*. Service handles live on the
 * middleware environment (`MiddlewareContext.services`) and are passed
 * explicitly; the context never doubles as a service locator.
 *
 * ## Cancellation
 *
 * When a client disconnects mid-request the adapter calls {@link IContext.cancel}.
 * The pipeline composer checks {@link IContext.isCancelled} before every stage
 * and abandons the rest of the chain:
 *
 * ```
 * [logging] → [method] → cancel() → (auth, cache, handler skipped)
 * ```
 *
 * Callbacks registered with {@link IContext.onCancel} run once, in
 * registration order. Registering on an already cancelled context invokes the
 * callback immediately.
 *
 * @version 1.0.0
 */

import type { Role } from '../identity/User';

/**
 * Context contract
 *
 * @template T - Shape of the data carried by the context
 */
export interface IContext<T> {
  /**
   * Read a value
   */
  get<K extends keyof T>(key: K): T[K] | undefined;

  /**
   * Write a value
   */
  set<K extends keyof T>(key: K, value: T[K]): void;

  /**
   * Whether the request was cancelled
   */
  isCancelled(): boolean;

  /**
   * Register a callback for cancellation
   */
  onCancel(callback: () => void): void;

  /**
   * Cancel the request. Idempotent.
   */
  cancel(): void;

  /**
   * Snapshot of all values
   */
  getAll(): Readonly<Partial<T>>;

  has<K extends keyof T>(key: K): boolean;

  delete<K extends keyof T>(key: K): boolean;
}

/**
 * Data carried by every request context
 */
export interface GatehouseContextData {
  /** Correlation ID for log lines */
  traceId?: string;

  /** Request ID assigned by the adapter */
  requestId?: string;

  /** Authenticated identity, set by the auth middleware */
  identity?: string;

  /** Role of the authenticated identity */
  role?: Role;

  /** Token of the session that authenticated the request */
  sessionToken?: string;

  /** Epoch milliseconds when the request started */
  timestamp?: number;

  /** Epoch milliseconds after which remaining stages are skipped */
  deadline?: number;

  method?: string;
  url?: string;
  ip?: string;
  userAgent?: string;
}

export type GatehouseContext = IContext<GatehouseContextData>;
