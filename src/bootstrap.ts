/**
 * Gatehouse - Bootstrap
 *
 * Builds the service registry, seeds the administrator account, declares
 * the middleware order and the route table, and registers the session
 * sweep. Everything process-wide is created here, once.
 */

import { AuthService } from './application/auth/AuthService';
import { SessionSweepService } from './application/auth/SessionSweepService';
import { ServiceCollection, ServiceProvider } from './application/di/ServiceCollection';
import { addUser, login, logout } from './application/handlers/account';
import { goodbye, hello, publicContent, simulatedError, stats } from './application/handlers/demo';
import { GatehouseApp } from './application/host/app';
import { requireAuth, requireRole } from './application/middleware/AuthMiddleware';
import { cached } from './application/middleware/CachingMiddleware';
import { ServiceOverrides, Tokens, addGatehouseServices } from './application/services';
import { Role } from './domain/identity/User';
import { CounterActor } from './infrastructure/actors/CounterActor';
import { LoggerActor } from './infrastructure/actors/LoggerActor';
import type { GatehouseConfig } from './infrastructure/config/loader';
import { LoggingMiddleware, MethodCheckMiddleware } from './infrastructure/platform/middleware';

export interface Gatehouse {
  app: GatehouseApp;
  provider: ServiceProvider;
  logger: LoggerActor;
  auth: AuthService;
  counter: CounterActor;

  /**
   * Stop the app, then drain and close the actors
   */
  shutdown(): Promise<void>;
}

export interface CreateGatehouseOptions extends ServiceOverrides {
  /** Run the session sweep as a background service (default true) */
  sessionSweep?: boolean;

  /** Forwarded to the host */
  onSignalShutdown?: (signal: string) => void;
}

/**
 * Declare the route table. Everything but the public route, login and
 * logout needs a session; adding users and reading stats need an
 * Administrator.
 */
export function registerRoutes(app: GatehouseApp): GatehouseApp {
  return app
    .post('/login', login)
    .post('/logout', logout)
    .post('/adduser', addUser, requireRole(Role.Administrator))
    .get('/hello', hello, requireAuth(), cached())
    .get('/goodbye', goodbye, requireAuth(), cached())
    .get('/error', simulatedError, requireAuth())
    .get('/public', publicContent, cached())
    .get('/stats', stats, requireRole(Role.Administrator));
}

export async function createGatehouse(
  config: GatehouseConfig,
  options: CreateGatehouseOptions = {},
): Promise<Gatehouse> {
  const provider = addGatehouseServices(new ServiceCollection(), config, options).buildServiceProvider();

  const logger = provider.getService(Tokens.Logger);
  const auth = provider.getService(Tokens.Auth);
  const counter = provider.getService(Tokens.Counter);
  const clock = provider.getService(Tokens.Clock);

  await auth.addUser(config.admin.username, config.admin.password, Role.Administrator);

  const app = GatehouseApp.create(provider, {
    name: 'gatehouse',
    logger,
    requestTimeoutMs: config.requestTimeoutMs,
    onSignalShutdown: options.onSignalShutdown,
  });

  app.use(new LoggingMiddleware(logger, { now: clock })).use(new MethodCheckMiddleware(config.allowedMethods));
  registerRoutes(app);

  if (options.sessionSweep !== false) {
    app.addService(new SessionSweepService(auth, logger, config.sweepIntervalMs));
  }

  return {
    app,
    provider,
    logger,
    auth,
    counter,
    async shutdown() {
      await app.stop();
      await counter.close();
      await logger.flush();
      await logger.close();
      provider.dispose();
    },
  };
}
