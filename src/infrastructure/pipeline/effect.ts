/**
 * @fileoverview Effect - environment threading with short-circuit results
 *
 * @packageDocumentation
 * @module gatehouse/infrastructure/pipeline
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * An {@link Effect} is a step that reads an environment, may suspend, and
 * yields a {@link PipelineResult}:
 *
 * ```typescript
 * type Effect<Env, A> = (env: Env) => Promise<PipelineResult<A>>;
 * ```
 *
 * Every middleware and handler is an effect over the request environment
 * (`MiddlewareContext`). The environment is passed by reference to every
 * step of a chain and is never swapped out mid-chain; steps reach mutable
 * services through the handles it carries.
 *
 * ## The short-circuit law
 *
 * `bind(a, f)` runs `a`. On `Success(x)` it runs `f(x)` with the same
 * environment. On `Failure(e)` it returns `Failure(e)` as is: `f` is never
 * called, nothing is retried and the error is not rewritten. The law holds
 * for every composition built from these combinators, so the first failure
 * in a chain is the result of the whole chain.
 *
 * ```
 * a: Success(x) → f(x): Success(y) → g(y): Failure(e) → h … never runs
 *                                                    ↓
 *                                               Failure(e)
 * ```
 *
 * ## Failures are values, exceptions are defects
 *
 * Steps report expected failures by value. A thrown exception is a defect;
 * {@link liftAsync} does not catch it. {@link run}, the pipeline boundary,
 * catches anything thrown and returns `Failure(InternalError)` instead (an
 * `HttpException` keeps its own kind), handing the original error to the
 * caller's `onDefect` hook for logging.
 *
 * @version 1.0.0
 */

import { toHttpError } from '../../domain/exceptions/exceptions';
import {
  HttpError,
  PipelineResult,
  failure,
  success,
} from '../../domain/result/Result';

/**
 * A step over environment `Env` producing `A`
 */
export type Effect<Env, A> = (env: Env) => Promise<PipelineResult<A>>;

/**
 * How a step ended, as seen by an {@link ensure} finalizer
 */
export type Outcome<A> =
  | { readonly kind: 'result'; readonly result: PipelineResult<A> }
  | { readonly kind: 'thrown'; readonly error: unknown };

/**
 * Always succeeds with `value`
 */
export function succeed<Env, A>(value: A): Effect<Env, A> {
  return async () => success(value);
}

/**
 * Always fails with `error`
 */
export function fail<Env, A = never>(error: HttpError): Effect<Env, A> {
  return async () => failure(error);
}

/**
 * Yields the environment itself
 */
export function ask<Env>(): Effect<Env, Env> {
  return async (env) => success(env);
}

/**
 * Lift an already computed result
 */
export function liftResult<Env, A>(result: PipelineResult<A>): Effect<Env, A> {
  return async () => result;
}

/**
 * Lift a plain asynchronous computation. The result is always a success;
 * a rejection propagates as a defect for {@link run} to convert.
 */
export function liftAsync<Env, A>(computation: (env: Env) => Promise<A>): Effect<Env, A> {
  return async (env) => success(await computation(env));
}

/**
 * Run `effect`, then feed its value to `next`. Failures skip `next`.
 */
export function bind<Env, A, B>(
  effect: Effect<Env, A>,
  next: (value: A) => Effect<Env, B>,
): Effect<Env, B> {
  return async (env) => {
    const result = await effect(env);
    if (!result.ok) {
      return result;
    }
    return next(result.value)(env);
  };
}

/**
 * Transform the success value
 */
export function map<Env, A, B>(effect: Effect<Env, A>, transform: (value: A) => B): Effect<Env, B> {
  return bind(effect, (value) => succeed<Env, B>(transform(value)));
}

/**
 * Run effects left to right, stopping at the first failure
 */
export function sequence<Env, A>(effects: ReadonlyArray<Effect<Env, A>>): Effect<Env, A[]> {
  return async (env) => {
    const values: A[] = [];
    for (const effect of effects) {
      const result = await effect(env);
      if (!result.ok) {
        return result;
      }
      values.push(result.value);
    }
    return success(values);
  };
}

/**
 * Run `finalizer` exactly once after `effect`, whether it returned a
 * result or threw. A thrown error is rethrown after the finalizer.
 */
export function ensure<Env, A>(
  effect: Effect<Env, A>,
  finalizer: (outcome: Outcome<A>, env: Env) => void | Promise<void>,
): Effect<Env, A> {
  return async (env) => {
    let outcome: Outcome<A>;
    try {
      outcome = { kind: 'result', result: await effect(env) };
    } catch (error) {
      outcome = { kind: 'thrown', error };
    }

    await finalizer(outcome, env);

    if (outcome.kind === 'thrown') {
      throw outcome.error;
    }
    return outcome.result;
  };
}

export interface RunOptions {
  /** Path reported on an InternalError */
  path?: string | null;

  /** Receives anything thrown inside the effect */
  onDefect?: (error: unknown) => void;
}

/**
 * Pipeline boundary: execute `effect` against `env`. Never rejects.
 */
export async function run<Env, A>(
  env: Env,
  effect: Effect<Env, A>,
  options: RunOptions = {},
): Promise<PipelineResult<A>> {
  try {
    return await effect(env);
  } catch (error) {
    options.onDefect?.(error);
    return failure(toHttpError(error, options.path ?? null));
  }
}
