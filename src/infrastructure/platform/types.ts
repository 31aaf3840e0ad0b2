/**
 * Gatehouse - Platform Types
 *
 * Core type definitions for the platform abstraction layer.
 * These types keep request/response handling independent of the listener.
 */

import type { HttpError } from '../../domain/result/Result';

/**
 * HTTP Status codes
 */
export enum HttpStatus {
  // 2xx Success
  OK = 200,

  // 4xx Client Errors
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  METHOD_NOT_ALLOWED = 405,
  PAYLOAD_TOO_LARGE = 413,
  UNSUPPORTED_MEDIA_TYPE = 415,
  CLIENT_CLOSED_REQUEST = 499,

  // 5xx Server Errors
  INTERNAL_SERVER_ERROR = 500,
  SERVICE_UNAVAILABLE = 503,
}

/**
 * Protocol type for the adapter layer
 */
export type ProtocolType = 'http';

export type HeaderValue = string | string[];

/**
 * Abstract Response - what the pipeline hands back to the adapter
 */
export interface GatehouseResponse {
  /** Response status code */
  status: number;

  /** Response headers */
  headers: Record<string, HeaderValue>;

  /** Serialized response body */
  body: string;

  /** Content type */
  contentType: string;
}

/**
 * Abstract Request - listener-independent request structure
 */
export interface GatehouseRequest {
  /** Request ID */
  id: string;

  /** HTTP method, upper case */
  method: string;

  /** Absolute path without query string */
  path: string;

  /** Path and query string as received */
  url: string;

  /** Request headers, lower-cased names */
  headers: Record<string, string | string[] | undefined>;

  /** Query parameters */
  query: Record<string, string | undefined>;

  /** Raw request body */
  body: string;

  /** Client IP address */
  ip?: string;

  /** Protocol type */
  protocol: ProtocolType;
}

/**
 * Success value produced by a terminal handler
 */
export interface ResponsePayload {
  body: string;
  contentType: string;
}

export function json(data: unknown): ResponsePayload {
  return { body: JSON.stringify(data), contentType: 'application/json; charset=utf-8' };
}

export function text(body: string): ResponsePayload {
  return { body, contentType: 'text/plain; charset=utf-8' };
}

/**
 * Read a single header value (first one when repeated)
 */
export function getHeader(request: GatehouseRequest, name: string): string | undefined {
  const value = request.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Response builder for fluent API
 */
export class ResponseBuilder {
  private response: GatehouseResponse;

  constructor() {
    this.response = {
      status: HttpStatus.OK,
      headers: {},
      body: '',
      contentType: 'text/plain; charset=utf-8',
    };
  }

  status(code: number): this {
    this.response.status = code;
    return this;
  }

  header(name: string, value: HeaderValue): this {
    this.response.headers[name] = value;
    return this;
  }

  headers(headers: Record<string, HeaderValue>): this {
    Object.assign(this.response.headers, headers);
    return this;
  }

  contentType(type: string): this {
    this.response.contentType = type;
    this.response.headers['Content-Type'] = type;
    return this;
  }

  json(): this {
    return this.contentType('application/json; charset=utf-8');
  }

  body(data: string): this {
    this.response.body = data;
    return this;
  }

  build(): GatehouseResponse {
    return { ...this.response, headers: { ...this.response.headers } };
  }
}

/**
 * Create a new response builder
 */
export function response(): ResponseBuilder {
  return new ResponseBuilder();
}

/**
 * Error response body as sent to clients
 */
export interface ErrorResponse {
  message: string;
  statusCode: number;
  details: string | null;
  path: string | null;
}

/**
 * Create an error response from a pipeline failure
 */
export function createErrorResponse(error: HttpError): GatehouseResponse {
  const body: ErrorResponse = {
    message: error.message,
    statusCode: error.statusCode,
    details: error.details,
    path: error.path,
  };

  return response().status(error.statusCode).json().body(JSON.stringify(body)).build();
}

/**
 * Create a success response from a handler payload
 */
export function createSuccessResponse(payload: ResponsePayload): GatehouseResponse {
  return response().status(HttpStatus.OK).contentType(payload.contentType).body(payload.body).build();
}
