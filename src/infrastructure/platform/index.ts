/**
 * Gatehouse - Platform Module
 *
 * Request/response types and the middleware contract
 */

// Types
export {
  HttpStatus,
  ResponseBuilder,
  response,
  json,
  text,
  getHeader,
  createErrorResponse,
  createSuccessResponse,
} from './types';

export type {
  ProtocolType,
  HeaderValue,
  GatehouseRequest,
  GatehouseResponse,
  ResponsePayload,
  ErrorResponse,
} from './types';

// Middleware
export {
  GatehouseMiddlewareBase,
  LoggingMiddleware,
  MethodCheckMiddleware,
  createMiddleware,
  isMiddleware,
} from './middleware';

export type {
  IGatehouseMiddleware,
  MiddlewareContext,
  MiddlewareFunction,
  NextFunction,
  Handler,
  HandlerResult,
  ResponseHeaders,
  LoggingMiddlewareOptions,
} from './middleware';

// Logging
export { consoleLogger } from './logger';
export type { ILogger, LogLevel } from './logger';

// Adapter
export { AdapterBase } from './adapter';
export type { IAdapter, RequestHandler, ServerInfo } from './adapter';
