/**
 * Gatehouse - Exceptions
 *
 * Throwable counterparts of the pipeline error kinds. Handler code may throw
 * these; the pipeline boundary turns them back into failures of the same kind
 * through {@link toHttpError}. Anything else becomes an InternalError.
 */

import { ErrorKind, ERROR_STATUS, HttpError, httpError, Errors } from '../result/Result';

// ==================== Built-in Exceptions ====================

/**
 * Base HTTP exception class
 */
export class HttpException extends Error {
  public readonly statusCode: number;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly details: string | null = null,
  ) {
    super(message);
    this.name = 'HttpException';
    this.statusCode = ERROR_STATUS[kind];
    Error.captureStackTrace(this, this.constructor);
  }

  toHttpError(path: string | null): HttpError {
    return httpError(this.kind, this.message, this.details, path);
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestException extends HttpException {
  constructor(message: string = 'Bad request', details: string | null = null) {
    super(ErrorKind.BadRequest, message, details);
    this.name = 'BadRequestException';
  }
}

/**
 * 401 Unauthorized
 */
export class UnauthorizedException extends HttpException {
  constructor(message: string = 'Unauthorized', details: string | null = null) {
    super(ErrorKind.Unauthorized, message, details);
    this.name = 'UnauthorizedException';
  }
}

/**
 * 403 Forbidden
 */
export class ForbiddenException extends HttpException {
  constructor(message: string = 'Forbidden', details: string | null = null) {
    super(ErrorKind.Forbidden, message, details);
    this.name = 'ForbiddenException';
  }
}

/**
 * 404 Not Found
 */
export class NotFoundException extends HttpException {
  constructor(message: string = 'Not found', details: string | null = null) {
    super(ErrorKind.NotFound, message, details);
    this.name = 'NotFoundException';
  }
}

/**
 * 405 Method Not Allowed
 */
export class MethodNotAllowedException extends HttpException {
  constructor(message: string = 'Method not allowed', details: string | null = null) {
    super(ErrorKind.MethodNotAllowed, message, details);
    this.name = 'MethodNotAllowedException';
  }
}

/**
 * 415 Unsupported Media Type
 */
export class UnsupportedMediaTypeException extends HttpException {
  constructor(message: string = 'Unsupported media type', details: string | null = null) {
    super(ErrorKind.UnsupportedMediaType, message, details);
    this.name = 'UnsupportedMediaTypeException';
  }
}

/**
 * 500 Internal Server Error
 */
export class InternalServerException extends HttpException {
  constructor(message: string = 'Internal server error', details: string | null = null) {
    super(ErrorKind.InternalError, message, details);
    this.name = 'InternalServerException';
  }
}

/**
 * Convert anything caught at the pipeline boundary into an HttpError.
 * Internal errors never carry the original message.
 */
export function toHttpError(error: unknown, path: string | null): HttpError {
  if (error instanceof HttpException && error.kind !== ErrorKind.InternalError) {
    return error.toHttpError(path);
  }
  return Errors.internalError(path);
}

/**
 * Describe a caught value for the log
 */
export function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
