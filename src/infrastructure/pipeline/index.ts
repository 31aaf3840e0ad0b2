/**
 * Gatehouse - Pipeline Module
 *
 * Effect combinators and middleware composition
 */

export {
  PipelineBuilder,
  createPipeline,
  chain,
  compose,
  branch,
  forMethods,
  forPaths,
} from './builder';

export type { ChainOptions } from './builder';

export { succeed, fail, ask, liftResult, liftAsync, bind, map, sequence, ensure, run } from './effect';

export type { Effect, Outcome, RunOptions } from './effect';
