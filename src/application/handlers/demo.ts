/**
 * Gatehouse - Demo Handlers
 */

import { Errors, failure, success } from '../../domain/result/Result';
import { succeed } from '../../infrastructure/pipeline/effect';
import { json } from '../../infrastructure/platform/types';
import type { AppHandler } from '../services';

/**
 * Counts the request, then greets `?name=` (default `World`)
 */
export const hello: AppHandler = async (ctx) => {
  const { counter } = ctx.services;
  counter.increment();
  const requestCount = await counter.getCount();
  const name = ctx.request.query.name ?? 'World';

  return success(json({ message: `Hello, ${name}!`, requestCount, path: ctx.request.path }));
};

export const goodbye: AppHandler = succeed(json({ message: 'Goodbye, World!' }));

export const publicContent: AppHandler = succeed(json({ message: 'Public content' }));

/**
 * Always fails with BadRequest
 */
export const simulatedError: AppHandler = async (ctx) => failure(Errors.badRequest('Simulated error', ctx.request.path));

/**
 * Request count, session count and cache statistics
 */
export const stats: AppHandler = async (ctx) => {
  const { counter, cache, auth } = ctx.services;
  const [requestCount, activeSessions] = await Promise.all([counter.getCount(), auth.activeSessions()]);

  return success(json({ requestCount, activeSessions, cache: cache.stats() }));
};

