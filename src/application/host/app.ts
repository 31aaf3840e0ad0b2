/**
 * Gatehouse - Application
 *
 * Holds the global middleware list and the route table, and turns one
 * {@link GatehouseRequest} into one {@link GatehouseResponse}:
 *
 * 1. open a DI scope and build the request environment
 * 2. run global middleware → router → route middleware → handler
 * 3. convert the outcome (a thrown defect included) into a response
 * 4. dispose the scope
 *
 * {@link GatehouseApp.handle} never rejects, which makes the whole engine
 * drivable without a listener.
 */

import { v4 as uuidv4 } from 'uuid';
import { RequestContext } from '../../domain/context/RequestContext';
import { toHttpError } from '../../domain/exceptions/exceptions';
import { PipelineResult, failure } from '../../domain/result/Result';
import { ChainOptions, chain } from '../../infrastructure/pipeline/builder';
import { ensure, run } from '../../infrastructure/pipeline/effect';
import { IAdapter, RequestHandler, ServerInfo } from '../../infrastructure/platform/adapter';
import type { ILogger } from '../../infrastructure/platform/logger';
import { MiddlewareFunction, createMiddleware, isMiddleware } from '../../infrastructure/platform/middleware';
import {
  GatehouseRequest,
  GatehouseResponse,
  HeaderValue,
  ResponsePayload,
  createErrorResponse,
  createSuccessResponse,
} from '../../infrastructure/platform/types';
import { Router } from '../../infrastructure/routing/Router';
import { ServiceProvider } from '../di/ServiceCollection';
import { AppContext, AppHandler, AppMiddleware, GatehouseServices, Tokens } from '../services';
import { GatehouseHost, HostOptions, IBackgroundService } from './host';

/**
 * Application options
 */
export interface GatehouseAppOptions extends HostOptions {
  /** Per-request deadline in milliseconds; none when absent */
  requestTimeoutMs?: number;
}

/**
 * GatehouseApp - Main application class
 *
 * @example
 * ```typescript
 * const app = GatehouseApp.create(provider, { name: 'gatehouse' });
 *
 * app.use(new LoggingMiddleware(logger));
 * app.get('/hello', hello);
 * app.post('/adduser', addUser, requireRole(Role.Administrator));
 *
 * const response = await app.handle(request);
 * ```
 */
export class GatehouseApp {
  private middlewares: AppMiddleware[] = [];
  private readonly router = new Router<GatehouseServices>();
  private backgroundServices: IBackgroundService[] = [];
  private host: GatehouseHost | null = null;
  private pipeline: AppHandler | null = null;
  private readonly logger: ILogger;
  private readonly now: () => number;

  private constructor(
    private readonly provider: ServiceProvider,
    private readonly options: GatehouseAppOptions = {},
  ) {
    this.logger = options.logger ?? provider.getService(Tokens.Logger);
    this.now = provider.getService(Tokens.Clock);
  }

  /**
   * Create a new application over a root service provider
   */
  static create(provider: ServiceProvider, options?: GatehouseAppOptions): GatehouseApp {
    return new GatehouseApp(provider, options);
  }

  // ==================== Middleware Configuration ====================

  /**
   * Add middleware to the global pipeline
   */
  use(middleware: AppMiddleware | MiddlewareFunction<GatehouseServices>): this {
    this.middlewares.push(isMiddleware(middleware) ? middleware : createMiddleware(middleware));
    this.pipeline = null;
    return this;
  }

  // ==================== Routes ====================

  route(method: string, path: string, handler: AppHandler, ...middlewares: AppMiddleware[]): this {
    this.router.add(method, path, handler, ...middlewares);
    return this;
  }

  get(path: string, handler: AppHandler, ...middlewares: AppMiddleware[]): this {
    return this.route('GET', path, handler, ...middlewares);
  }

  post(path: string, handler: AppHandler, ...middlewares: AppMiddleware[]): this {
    return this.route('POST', path, handler, ...middlewares);
  }

  // ==================== Services ====================

  addService(service: IBackgroundService): this {
    this.backgroundServices.push(service);
    return this;
  }

  // ==================== Request Handling ====================

  /**
   * Process one request. Never rejects.
   */
  async handle(request: GatehouseRequest, context?: RequestContext): Promise<GatehouseResponse> {
    const requestContext = context ?? this.createContext(request);
    const headers: Record<string, HeaderValue> = {};
    const { path } = request;

    if (this.options.requestTimeoutMs !== undefined && requestContext.get('deadline') === undefined) {
      requestContext.set('deadline', this.now() + this.options.requestTimeoutMs);
    }

    const scope = this.provider.createScope();
    let ctx: AppContext;
    try {
      ctx = {
        context: requestContext,
        request,
        response: { headers },
        items: new Map(),
        services: scope.getServiceProvider().getService(Tokens.RequestServices),
      };
    } catch (error) {
      scope.dispose();
      this.logger.error(`Failed to set up request ${request.id}`, error);
      return this.toResponse(failure(toHttpError(error, path)), headers);
    }

    const result = await RequestContext.runWithContext(requestContext, () =>
      run(
        ctx,
        ensure(this.getPipeline(), () => scope.dispose()),
        {
          path,
          onDefect: (error) => this.logger.error(`Unhandled error on ${request.method} ${path}`, error),
        },
      ),
    );

    return this.toResponse(result, headers);
  }

  /**
   * Entry point for adapters
   */
  requestHandler(): RequestHandler {
    return (request, context) => this.handle(request, context);
  }

  // ==================== Application Lifecycle ====================

  /**
   * Start the given adapters and the background services under a host
   */
  async run(...adapters: IAdapter[]): Promise<ServerInfo[]> {
    if (adapters.length === 0) {
      throw new Error('No adapters given. Pass at least one adapter to run()');
    }

    this.host = new GatehouseHost({ ...this.options, logger: this.logger });

    for (const adapter of adapters) {
      this.host.addAdapter(adapter);
    }
    for (const service of this.backgroundServices) {
      this.host.addBackgroundService(service);
    }

    return this.host.start();
  }

  async stop(): Promise<void> {
    if (this.host) {
      await this.host.stop();
      this.host = null;
    }
    this.logger.info('Application stopped');
  }

  // ==================== Pipeline Building ====================

  private getPipeline(): AppHandler {
    if (!this.pipeline) {
      const options: ChainOptions = { now: this.now };
      this.pipeline = chain([...this.middlewares], this.router.toHandler(options), options);
    }
    return this.pipeline;
  }

  private createContext(request: GatehouseRequest): RequestContext {
    return RequestContext.create({
      traceId: uuidv4(),
      requestId: request.id,
      timestamp: this.now(),
      method: request.method,
      url: request.url,
      ip: request.ip,
      userAgent: typeof request.headers['user-agent'] === 'string' ? request.headers['user-agent'] : undefined,
    });
  }

  private toResponse(result: PipelineResult<ResponsePayload>, headers: Record<string, HeaderValue>): GatehouseResponse {
    const response = result.ok ? createSuccessResponse(result.value) : createErrorResponse(result.error);
    return { ...response, headers: { ...headers, ...response.headers } };
  }
}

