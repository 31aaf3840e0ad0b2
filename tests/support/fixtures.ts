/**
 * Shared test doubles: requests, clocks, loggers, sinks, hashers and a
 * ready-made request environment.
 */

import { ServiceCollection, ServiceProvider } from '../../src/application/di/ServiceCollection';
import type { ILogger, LogLevel } from '../../src/infrastructure/platform/logger';
import { IPasswordHasher } from '../../src/application/auth/PasswordHasher';
import { AppContext, ServiceOverrides, Tokens, addGatehouseServices } from '../../src/application/services';
import { RequestContext } from '../../src/domain/context/RequestContext';
import type { LogSink } from '../../src/infrastructure/actors/LoggerActor';
import { GatehouseConfig, loadConfig } from '../../src/infrastructure/config/loader';
import type { GatehouseRequest } from '../../src/infrastructure/platform/types';

export interface RequestInit {
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: string;
}

let requestSequence = 0;

export function makeRequest(method: string, path: string, init: RequestInit = {}): GatehouseRequest {
  const query = init.query ?? {};
  const search = new URLSearchParams(query).toString();
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(init.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }

  requestSequence += 1;
  return {
    id: `req-${requestSequence}`,
    method,
    path,
    url: search ? `${path}?${search}` : path,
    headers,
    query: { ...query },
    body: init.body ?? '',
    ip: '127.0.0.1',
    protocol: 'http',
  };
}

export function jsonRequest(method: string, path: string, body: unknown, headers: Record<string, string> = {}) {
  return makeRequest(method, path, {
    headers: { 'content-type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

export function bearer(token: string): Record<string, string> {
  return { authorization: `Bearer ${token}` };
}

/**
 * Clock the test moves by hand
 */
export class ManualClock {
  constructor(public current: number = 1_000_000) {}

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  args: unknown[];
}

/**
 * ILogger that keeps every call
 */
export class RecordingLogger implements ILogger {
  readonly entries: LogEntry[] = [];

  debug(message: string, ...args: unknown[]): void {
    this.entries.push({ level: 'debug', message, args });
  }

  info(message: string, ...args: unknown[]): void {
    this.entries.push({ level: 'info', message, args });
  }

  warn(message: string, ...args: unknown[]): void {
    this.entries.push({ level: 'warn', message, args });
  }

  error(message: string, ...args: unknown[]): void {
    this.entries.push({ level: 'error', message, args });
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }
}

export interface SinkRecord {
  level: LogLevel;
  bindings: Record<string, unknown>;
  message: string;
}

/**
 * LogSink that keeps every record the logger actor writes
 */
export class RecordingSink implements LogSink {
  readonly records: SinkRecord[] = [];

  debug(bindings: Record<string, unknown>, message: string): void {
    this.records.push({ level: 'debug', bindings, message });
  }

  info(bindings: Record<string, unknown>, message: string): void {
    this.records.push({ level: 'info', bindings, message });
  }

  warn(bindings: Record<string, unknown>, message: string): void {
    this.records.push({ level: 'warn', bindings, message });
  }

  error(bindings: Record<string, unknown>, message: string): void {
    this.records.push({ level: 'error', bindings, message });
  }

  messages(): string[] {
    return this.records.map((record) => record.message);
  }
}

/**
 * Reversible "hash" so tests skip key derivation
 */
export class PlainTextHasher implements IPasswordHasher {
  async hash(password: string): Promise<string> {
    return `plain$${password}`;
  }

  async verify(password: string, credentialHash: string): Promise<boolean> {
    return credentialHash === `plain$${password}`;
  }
}

export const ADMIN_PASSWORD = 'test-admin-password';

export function testConfig(overrides: Partial<GatehouseConfig> = {}): GatehouseConfig {
  return {
    ...loadConfig({ GATEHOUSE_ADMIN_PASSWORD: ADMIN_PASSWORD, LOG_LEVEL: 'silent' }),
    ...overrides,
  };
}

/**
 * Sequential session tokens: token-1, token-2, ...
 */
export function sequentialTokens(prefix: string = 'token'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export interface TestEnvironment {
  provider: ServiceProvider;
  ctx: AppContext;
  sink: RecordingSink;
  clock: ManualClock;
  dispose(): void;
}

/**
 * A request environment over real services with test doubles for the
 * clock, the log sink, the hasher and token generation
 */
export function createTestEnvironment(
  request: GatehouseRequest,
  config: GatehouseConfig = testConfig(),
  overrides: ServiceOverrides = {},
): TestEnvironment {
  const clock = new ManualClock();
  const sink = new RecordingSink();
  const provider = addGatehouseServices(new ServiceCollection(), config, {
    clock: clock.now,
    logSink: sink,
    passwordHasher: new PlainTextHasher(),
    generateToken: sequentialTokens(),
    ...overrides,
  }).buildServiceProvider();

  const scope = provider.createScope();
  const ctx: AppContext = {
    context: RequestContext.create({ traceId: 'trace-test', requestId: request.id }),
    request,
    response: { headers: {} },
    items: new Map(),
    services: scope.getServiceProvider().getService(Tokens.RequestServices),
  };

  return {
    provider,
    ctx,
    sink,
    clock,
    dispose() {
      scope.dispose();
      provider.dispose();
    },
  };
}
