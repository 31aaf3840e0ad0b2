/**
 * Gatehouse - Pipeline Result
 *
 * Tagged success/failure value returned by every pipeline stage.
 * Failures travel by value; nothing in the request path signals
 * an error by throwing.
 */

import { HttpStatus } from '../../infrastructure/platform/types';

/**
 * Error taxonomy for request failures
 */
export enum ErrorKind {
  BadRequest = 'BadRequest',
  Unauthorized = 'Unauthorized',
  Forbidden = 'Forbidden',
  NotFound = 'NotFound',
  MethodNotAllowed = 'MethodNotAllowed',
  PayloadTooLarge = 'PayloadTooLarge',
  UnsupportedMediaType = 'UnsupportedMediaType',
  Timeout = 'Timeout',
  Cancelled = 'Cancelled',
  InternalError = 'InternalError',
}

/**
 * Status code written for each error kind
 */
export const ERROR_STATUS: Readonly<Record<ErrorKind, number>> = {
  [ErrorKind.BadRequest]: HttpStatus.BAD_REQUEST,
  [ErrorKind.Unauthorized]: HttpStatus.UNAUTHORIZED,
  [ErrorKind.Forbidden]: HttpStatus.FORBIDDEN,
  [ErrorKind.NotFound]: HttpStatus.NOT_FOUND,
  [ErrorKind.MethodNotAllowed]: HttpStatus.METHOD_NOT_ALLOWED,
  [ErrorKind.PayloadTooLarge]: HttpStatus.PAYLOAD_TOO_LARGE,
  [ErrorKind.UnsupportedMediaType]: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
  [ErrorKind.Timeout]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorKind.Cancelled]: HttpStatus.CLIENT_CLOSED_REQUEST,
  [ErrorKind.InternalError]: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Failure payload. Serialized to the client without `kind`.
 */
export interface HttpError {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly statusCode: number;
  readonly details: string | null;
  readonly path: string | null;
}

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure {
  readonly ok: false;
  readonly error: HttpError;
}

export type PipelineResult<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure(error: HttpError): Failure {
  return { ok: false, error };
}

/**
 * Build an HttpError whose status code follows its kind
 */
export function httpError(
  kind: ErrorKind,
  message: string,
  details: string | null = null,
  path: string | null = null,
): HttpError {
  return { kind, message, statusCode: ERROR_STATUS[kind], details, path };
}

/**
 * Standard failures used by the router, middleware and handlers
 */
export const Errors = {
  notFound(path: string, details: string = `Path: ${path} not found`): HttpError {
    return httpError(ErrorKind.NotFound, 'Route not found', details, path);
  },

  entityNotFound(message: string, path: string): HttpError {
    return httpError(ErrorKind.NotFound, message, null, path);
  },

  methodNotAllowed(method: string, path: string): HttpError {
    return httpError(
      ErrorKind.MethodNotAllowed,
      'Method not allowed',
      `Method ${method} is not allowed for ${path}`,
      path,
    );
  },

  unauthorized(path: string, details: string = `Path: ${path} requires authentication`): HttpError {
    return httpError(ErrorKind.Unauthorized, 'Unauthorized', details, path);
  },

  forbidden(path: string, details: string | null = null): HttpError {
    return httpError(ErrorKind.Forbidden, 'Forbidden', details, path);
  },

  badRequest(details: string, path: string): HttpError {
    return httpError(ErrorKind.BadRequest, 'Bad request', details, path);
  },

  payloadTooLarge(limit: number, path: string): HttpError {
    return httpError(ErrorKind.PayloadTooLarge, 'Payload too large', `Request body exceeds ${limit} bytes`, path);
  },

  unsupportedMediaType(contentType: string, path: string): HttpError {
    return httpError(
      ErrorKind.UnsupportedMediaType,
      'Unsupported media type',
      `Content type '${contentType}' is not supported`,
      path,
    );
  },

  timeout(path: string): HttpError {
    return httpError(ErrorKind.Timeout, 'Request deadline exceeded', null, path);
  },

  cancelled(path: string): HttpError {
    return httpError(ErrorKind.Cancelled, 'Request cancelled', null, path);
  },

  // Details stay out of the body; the caller logs the original message.
  internalError(path: string | null): HttpError {
    return httpError(ErrorKind.InternalError, 'Internal server error', null, path);
  },
};
