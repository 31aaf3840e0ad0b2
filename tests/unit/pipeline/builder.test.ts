/**
 * @file Pipeline builder tests
 * @description Onion ordering, short-circuits and the cancellation/deadline guard
 */

import { ErrorKind, Errors, failure, success } from '../../../src/domain/result/Result';
import {
  branch,
  chain,
  compose,
  createPipeline,
  forMethods,
  forPaths,
} from '../../../src/infrastructure/pipeline/builder';
import {
  Handler,
  IGatehouseMiddleware,
  MiddlewareFunction,
  createMiddleware,
} from '../../../src/infrastructure/platform/middleware';
import { text } from '../../../src/infrastructure/platform/types';
import { TestEnvironment, createTestEnvironment, makeRequest } from '../../support/fixtures';

function tracing(label: string, calls: string[]): MiddlewareFunction {
  return async (_ctx, next) => {
    calls.push(`${label}:before`);
    const result = await next();
    calls.push(`${label}:after`);
    return result;
  };
}

function terminal(calls: string[]): Handler {
  return async () => {
    calls.push('handler');
    return success(text('done'));
  };
}

describe('PipelineBuilder', () => {
  let testEnv: TestEnvironment;

  beforeEach(() => {
    testEnv = createTestEnvironment(makeRequest('GET', '/hello'));
  });

  afterEach(() => {
    testEnv.dispose();
  });

  // ============================================================================
  // Ordering
  // ============================================================================

  describe('ordering', () => {
    it('should run middlewares in onion order around the handler', async () => {
      const calls: string[] = [];
      const handler = createPipeline()
        .use(tracing('one', calls))
        .use(tracing('two', calls))
        .toHandler(terminal(calls));

      const result = await handler(testEnv.ctx);

      expect(result).toEqual(success(text('done')));
      expect(calls).toEqual(['one:before', 'two:before', 'handler', 'two:after', 'one:after']);
    });

    it('should honor prepend and insertAt', async () => {
      const calls: string[] = [];
      const builder = createPipeline()
        .use(tracing('b', calls))
        .prepend(tracing('a', calls))
        .insertAt(99, tracing('c', calls))
        .insertAt(1, tracing('ab', calls));

      expect(builder.length).toBe(4);
      await builder.toHandler(terminal(calls))(testEnv.ctx);

      expect(calls.filter((call) => call.endsWith(':before'))).toEqual([
        'a:before',
        'ab:before',
        'b:before',
        'c:before',
      ]);
    });

    it('should skip useIf middlewares when the condition is false', () => {
      const builder = createPipeline()
        .useIf(false, tracing('skipped', []))
        .useIf(true, tracing('kept', []));

      expect(builder.length).toBe(1);
      expect(builder.clear().length).toBe(0);
    });
  });

  // ============================================================================
  // Short-circuit
  // ============================================================================

  describe('short-circuit', () => {
    it('should not run later stages once a middleware fails', async () => {
      const calls: string[] = [];
      const error = Errors.unauthorized('/hello');
      const handler = createPipeline()
        .use(tracing('outer', calls))
        .use(async () => failure(error))
        .use(tracing('inner', calls))
        .toHandler(terminal(calls));

      const result = await handler(testEnv.ctx);

      expect(result).toEqual(failure(error));
      expect(calls).toEqual(['outer:before', 'outer:after']);
    });

    it('should let a middleware answer without calling next', async () => {
      const calls: string[] = [];
      const handler = chain(
        [createMiddleware(async () => success(text('early')))],
        terminal(calls),
      );

      await expect(handler(testEnv.ctx)).resolves.toEqual(success(text('early')));
      expect(calls).toEqual([]);
    });
  });

  // ============================================================================
  // Guard
  // ============================================================================

  describe('cancellation and deadline', () => {
    it('should return Cancelled and skip the remaining stages after cancel()', async () => {
      const calls: string[] = [];
      const handler = createPipeline()
        .use(tracing('logging', calls))
        .use(async (ctx, next) => {
          ctx.context.cancel();
          return next();
        })
        .use(tracing('auth', calls))
        .toHandler(terminal(calls));

      const result = await handler(testEnv.ctx);

      expect(result).toEqual(failure(Errors.cancelled('/hello')));
      expect(calls).toEqual(['logging:before', 'logging:after']);
    });

    it('should return Timeout once the deadline has passed', async () => {
      const calls: string[] = [];
      const { ctx, clock } = testEnv;
      ctx.context.set('deadline', clock.current + 100);

      const handler = createPipeline({ now: clock.now })
        .use(async (_ctx, next) => {
          clock.advance(100);
          return next();
        })
        .toHandler(terminal(calls));

      const result = await handler(ctx);

      expect(result).toBeFailureOf(ErrorKind.Timeout);
      expect(!result.ok && result.error.statusCode).toBe(503);
      expect(calls).toEqual([]);
    });

    it('should run normally before the deadline', async () => {
      const { ctx, clock } = testEnv;
      ctx.context.set('deadline', clock.current + 100);

      const result = await createPipeline({ now: clock.now }).toHandler(terminal([]))(ctx);

      expect(result).toBeSuccess();
    });
  });

  // ============================================================================
  // Composition helpers
  // ============================================================================

  describe('composition helpers', () => {
    it('should compose middlewares into one that continues the outer chain', async () => {
      const calls: string[] = [];
      const composed: IGatehouseMiddleware = compose(tracing('x', calls), tracing('y', calls));

      await chain([composed], terminal(calls))(testEnv.ctx);

      expect(calls).toEqual(['x:before', 'y:before', 'handler', 'y:after', 'x:after']);
    });

    it('should branch on a predicate', async () => {
      const calls: string[] = [];
      const tagged = branch(
        (ctx) => ctx.request.path === '/hello',
        createMiddleware(tracing('yes', calls)),
        createMiddleware(tracing('no', calls)),
      );

      await chain([tagged], terminal(calls))(testEnv.ctx);

      expect(calls).toEqual(['yes:before', 'handler', 'yes:after']);
    });

    it('should apply forMethods only to the listed methods', async () => {
      const calls: string[] = [];
      const postOnly = forMethods(['post'], createMiddleware(tracing('post-only', calls)));

      await chain([postOnly], terminal(calls))(testEnv.ctx);

      expect(calls).toEqual(['handler']);
    });

    it('should apply forPaths to prefixes and patterns', async () => {
      const calls: string[] = [];
      const byPrefix = forPaths(['/hel'], createMiddleware(tracing('prefix', calls)));
      const byPattern = forPaths([/^\/admin/], createMiddleware(tracing('pattern', calls)));

      await chain([byPrefix, byPattern], terminal(calls))(testEnv.ctx);

      expect(calls).toEqual(['prefix:before', 'handler', 'prefix:after']);
    });
  });
});
