/**
 * Gatehouse - Service Registrations
 *
 * Tokens for every process-wide service and the registrations wiring them
 * together. Stores and actors are singletons, created once and shared by
 * every request; each request gets its own {@link GatehouseServices} handle
 * bundle from its scope.
 */

import { CounterActor } from '../infrastructure/actors/CounterActor';
import { LoggerActor, LogSink, createPinoSink } from '../infrastructure/actors/LoggerActor';
import { CacheManager } from '../infrastructure/cache/CacheManager';
import type { GatehouseConfig } from '../infrastructure/config/loader';
import type { ILogger } from '../infrastructure/platform/logger';
import type { Handler, IGatehouseMiddleware, MiddlewareContext } from '../infrastructure/platform/middleware';
import type { ResponsePayload } from '../infrastructure/platform/types';
import { ISessionStore, InMemorySessionStore } from '../infrastructure/sessions/SessionStore';
import { AuthService } from './auth/AuthService';
import { IPasswordHasher, ScryptPasswordHasher } from './auth/PasswordHasher';
import { IUserStore, InMemoryUserStore } from './auth/UserStore';
import { ServiceCollection } from './di/ServiceCollection';
import { createToken } from './di/IDependencyInjection';

export type Clock = () => number;

/**
 * Handles into process-wide services, as seen by one request
 */
export interface GatehouseServices {
  readonly config: GatehouseConfig;
  readonly clock: Clock;
  readonly logger: ILogger;
  readonly counter: CounterActor;
  readonly cache: CacheManager<ResponsePayload>;
  readonly auth: AuthService;
}

/** Request environment of this application */
export type AppContext = MiddlewareContext<GatehouseServices>;
export type AppHandler = Handler<GatehouseServices>;
export type AppMiddleware = IGatehouseMiddleware<GatehouseServices>;

export const Tokens = {
  Config: createToken<GatehouseConfig>('Config'),
  Clock: createToken<Clock>('Clock'),
  Logger: createToken<LoggerActor>('Logger'),
  Counter: createToken<CounterActor>('RequestCounter'),
  Cache: createToken<CacheManager<ResponsePayload>>('ResponseCache'),
  Sessions: createToken<ISessionStore>('SessionStore'),
  Users: createToken<IUserStore>('UserStore'),
  PasswordHasher: createToken<IPasswordHasher>('PasswordHasher'),
  Auth: createToken<AuthService>('AuthService'),
  RequestServices: createToken<GatehouseServices>('RequestServices'),
} as const;

export interface ServiceOverrides {
  clock?: Clock;
  logSink?: LogSink;
  passwordHasher?: IPasswordHasher;
  generateToken?: () => string;
}

/**
 * Register the standard services for `config`
 */
export function addGatehouseServices(
  services: ServiceCollection,
  config: GatehouseConfig,
  overrides: ServiceOverrides = {},
): ServiceCollection {
  return services
    .addInstance(Tokens.Config, config)
    .addInstance(Tokens.Clock, overrides.clock ?? Date.now)
    .addSingleton(
      Tokens.Logger,
      () => new LoggerActor(overrides.logSink ?? createPinoSink({ level: config.logLevel })),
    )
    .addSingleton(Tokens.Counter, () => new CounterActor())
    .addSingleton(
      Tokens.Cache,
      (p) =>
        new CacheManager<ResponsePayload>({
          capacity: config.cacheCapacity,
          defaultTtl: config.cacheTtlMs,
          now: p.getService(Tokens.Clock),
        }),
    )
    .addSingleton(Tokens.Sessions, () => new InMemorySessionStore())
    .addSingleton(Tokens.Users, () => new InMemoryUserStore())
    .addSingleton(Tokens.PasswordHasher, () => overrides.passwordHasher ?? new ScryptPasswordHasher())
    .addSingleton(
      Tokens.Auth,
      (p) =>
        new AuthService(
          p.getService(Tokens.Users),
          p.getService(Tokens.Sessions),
          p.getService(Tokens.PasswordHasher),
          p.getService(Tokens.Logger),
          {
            sessionTtlMs: config.sessionTtlMs,
            distinguishUnknownUser: config.distinguishUnknownUser,
            now: p.getService(Tokens.Clock),
            generateToken: overrides.generateToken,
          },
        ),
    )
    .addScoped(Tokens.RequestServices, (p) => ({
      config: p.getService(Tokens.Config),
      clock: p.getService(Tokens.Clock),
      logger: p.getService(Tokens.Logger),
      counter: p.getService(Tokens.Counter),
      cache: p.getService(Tokens.Cache),
      auth: p.getService(Tokens.Auth),
    }));
}
