/**
 * Gatehouse - Authentication Middleware
 *
 * Reads `Authorization: Bearer <token>`, validates the session and, when
 * roles are given, the session's role. On success the identity, role and
 * token are attached to the request context before `next` runs.
 */

import { Role } from '../../domain/identity/User';
import { Errors, failure } from '../../domain/result/Result';
import {
  GatehouseMiddlewareBase,
  HandlerResult,
  NextFunction,
} from '../../infrastructure/platform/middleware';
import { GatehouseRequest, getHeader } from '../../infrastructure/platform/types';
import type { AppContext, GatehouseServices } from '../services';

const BEARER = /^Bearer\s+(\S+)\s*$/i;

/**
 * Token from a bearer Authorization header; undefined when absent or malformed
 */
export function readBearerToken(request: GatehouseRequest): string | undefined {
  const header = getHeader(request, 'authorization');
  if (header === undefined) {
    return undefined;
  }
  const match = BEARER.exec(header.trim());
  return match ? match[1] : undefined;
}

export interface AuthMiddlewareOptions {
  /** Roles allowed through; empty means any authenticated session */
  roles?: readonly Role[];
}

export class AuthMiddleware extends GatehouseMiddlewareBase<GatehouseServices> {
  private readonly roles: readonly Role[];

  constructor(options: AuthMiddlewareOptions = {}) {
    super();
    this.roles = options.roles ?? [];
  }

  async invoke(ctx: AppContext, next: NextFunction): Promise<HandlerResult> {
    const { path } = ctx.request;
    const token = readBearerToken(ctx.request);

    if (token === undefined) {
      return failure(Errors.unauthorized(path));
    }

    const result = await ctx.services.auth.authenticate(token, path, this.roles);
    if (!result.ok) {
      return result;
    }

    const session = result.value;
    ctx.context.set('identity', session.identity);
    ctx.context.set('role', session.role);
    ctx.context.set('sessionToken', session.token);

    return next();
  }
}

/**
 * Any valid session
 */
export function requireAuth(): AuthMiddleware {
  return new AuthMiddleware();
}

/**
 * A valid session holding one of `roles`
 */
export function requireRole(...roles: Role[]): AuthMiddleware {
  return new AuthMiddleware({ roles });
}
