/**
 * Gatehouse - Adapter Interface
 *
 * An adapter bridges a transport (here, node:http) and the request engine.
 * It turns a raw request into a {@link GatehouseRequest}, hands it to the
 * engine, and writes the resulting {@link GatehouseResponse} back.
 */

import { RequestContext } from '../../domain/context/RequestContext';
import { GatehouseRequest, GatehouseResponse, ProtocolType } from './types';

/**
 * Entry point adapters dispatch into. Never rejects.
 */
export type RequestHandler = (request: GatehouseRequest, context: RequestContext) => Promise<GatehouseResponse>;

/**
 * Server information returned after starting
 */
export interface ServerInfo {
  /** Protocol (http) */
  protocol: string;

  /** Host address */
  host: string;

  /** Port number */
  port: number;

  /** Full URL */
  url: string;
}

export interface IAdapter {
  readonly name: string;
  readonly protocol: ProtocolType;

  /**
   * Start listening
   *
   * @throws when the listener cannot be bound
   */
  start(): Promise<ServerInfo>;

  /**
   * Stop listening and wait for in-flight requests
   */
  stop(): Promise<void>;

  isRunning(): boolean;
}

/**
 * Base adapter class with common functionality
 */
export abstract class AdapterBase implements IAdapter {
  abstract readonly name: string;
  abstract readonly protocol: ProtocolType;

  protected running = false;

  constructor(protected readonly handler: RequestHandler) {}

  abstract start(): Promise<ServerInfo>;
  abstract stop(): Promise<void>;

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run the engine for one request inside its request context
   */
  protected dispatch(request: GatehouseRequest, context: RequestContext): Promise<GatehouseResponse> {
    return RequestContext.runWithContext(context, () => this.handler(request, context));
  }
}
