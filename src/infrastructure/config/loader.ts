/**
 * Gatehouse - Configuration
 *
 * Reads the process environment once at startup. Every value is validated
 * by a zod schema; an invalid environment is a {@link ConfigurationError}.
 */

import { z } from 'zod';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const methodList = z
  .string()
  .default('GET,POST')
  .transform((value) =>
    value
      .split(',')
      .map((method) => method.trim().toUpperCase())
      .filter((method) => method.length > 0),
  )
  .pipe(z.array(z.string().regex(/^[A-Z]+$/, 'HTTP method names are letters only')).min(1));

export const EnvironmentSchema = z.object({
  GATEHOUSE_PREFIX: z.string().url().default('http://localhost:8080/'),
  GATEHOUSE_ROUTE_CACHE_TTL_MS: positiveInt(30_000),
  GATEHOUSE_CACHE_TTL_MS: positiveInt(300_000),
  GATEHOUSE_CACHE_CAPACITY: positiveInt(1000),
  GATEHOUSE_SESSION_TTL_MS: positiveInt(3_600_000),
  GATEHOUSE_SWEEP_INTERVAL_MS: positiveInt(60_000),
  GATEHOUSE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  GATEHOUSE_ALLOWED_METHODS: methodList,
  GATEHOUSE_ADMIN_USERNAME: z.string().min(1).default('admin'),
  GATEHOUSE_ADMIN_PASSWORD: z.string().min(1).default('password'),
  GATEHOUSE_DISTINGUISH_UNKNOWN_USER: flag(true),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type LogLevelName = z.infer<typeof EnvironmentSchema>['LOG_LEVEL'];

export interface ListenAddress {
  prefix: string;
  host: string;
  port: number;
}

export interface GatehouseConfig {
  listen: ListenAddress;
  routeCacheTtlMs: number;
  cacheTtlMs: number;
  cacheCapacity: number;
  sessionTtlMs: number;
  sweepIntervalMs: number;
  /** Per-request deadline; absent means none */
  requestTimeoutMs?: number;
  allowedMethods: string[];
  admin: { username: string; password: string };
  /** Login answers 404 for an unknown user (otherwise 401, like a bad password) */
  distinguishUnknownUser: boolean;
  logLevel: LogLevelName;
}

/**
 * Split a listener prefix such as `http://localhost:8080/` into host and port
 *
 * @throws ConfigurationError for anything but an http prefix ending in `/`
 */
export function parsePrefix(prefix: string): ListenAddress {
  let url: URL;
  try {
    url = new URL(prefix);
  } catch {
    throw new ConfigurationError(`Invalid listener prefix '${prefix}'`);
  }

  if (url.protocol !== 'http:') {
    throw new ConfigurationError(`Listener prefix '${prefix}' must use http`);
  }
  if (!prefix.endsWith('/')) {
    throw new ConfigurationError(`Listener prefix '${prefix}' must end with '/'`);
  }

  return {
    prefix,
    host: url.hostname,
    port: url.port === '' ? 80 : Number(url.port),
  };
}

/**
 * Build the configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatehouseConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

  const parsed = EnvironmentSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    listen: parsePrefix(vars.GATEHOUSE_PREFIX),
    routeCacheTtlMs: vars.GATEHOUSE_ROUTE_CACHE_TTL_MS,
    cacheTtlMs: vars.GATEHOUSE_CACHE_TTL_MS,
    cacheCapacity: vars.GATEHOUSE_CACHE_CAPACITY,
    sessionTtlMs: vars.GATEHOUSE_SESSION_TTL_MS,
    sweepIntervalMs: vars.GATEHOUSE_SWEEP_INTERVAL_MS,
    requestTimeoutMs: vars.GATEHOUSE_REQUEST_TIMEOUT_MS,
    allowedMethods: vars.GATEHOUSE_ALLOWED_METHODS,
    admin: { username: vars.GATEHOUSE_ADMIN_USERNAME, password: vars.GATEHOUSE_ADMIN_PASSWORD },
    distinguishUnknownUser: vars.GATEHOUSE_DISTINGUISH_UNKNOWN_USER,
    logLevel: vars.LOG_LEVEL,
  };
}
