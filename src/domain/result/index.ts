/**
 * Gatehouse - Result Module
 */

export {
  ErrorKind,
  ERROR_STATUS,
  Errors,
  success,
  failure,
  httpError,
} from './Result';

export type { HttpError, Success, Failure, PipelineResult } from './Result';
