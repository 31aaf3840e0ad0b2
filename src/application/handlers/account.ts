/**
 * Gatehouse - Account Handlers
 *
 * `POST /login`, `POST /logout` and `POST /adduser`.
 */

import { z } from 'zod';
import { Role, parseRole } from '../../domain/identity/User';
import { Errors, failure, success } from '../../domain/result/Result';
import { Effect, bind, liftAsync, map } from '../../infrastructure/pipeline/effect';
import { text } from '../../infrastructure/platform/types';
import { readBearerToken } from '../middleware/AuthMiddleware';
import type { AppContext, AppHandler } from '../services';
import { parseBody } from './body';

export const LoginBodySchema = z.object({
  username: z.string().min(1, 'must not be empty'),
  password: z.string(),
});

export const AddUserBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1, 'must not be empty'),
  role: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') {
        return Role.User;
      }
      const role = parseRole(value);
      if (!role) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown role '${value}'` });
        return z.NEVER;
      }
      return role;
    }),
});

/**
 * Bearer token of the request; a missing or malformed header is a client error
 */
const bearerToken: Effect<AppContext, string> = async ({ request }) => {
  const token = readBearerToken(request);
  return token === undefined
    ? failure(Errors.badRequest('Missing or malformed Authorization header', request.path))
    : success(token);
};

/**
 * Credentials → session token as plain text
 */
export const login: AppHandler = bind(parseBody(LoginBodySchema), ({ username, password }) =>
  map(
    (ctx: AppContext) => ctx.services.auth.login(username, password, ctx.request.path),
    (session) => text(session.token),
  ),
);

export const logout: AppHandler = bind(bearerToken, (token) =>
  map(
    (ctx: AppContext) => ctx.services.auth.logout(token, ctx.request.path),
    () => text('Logged out successfully'),
  ),
);

/**
 * Administrator only; guarded by the route's auth middleware
 */
export const addUser: AppHandler = bind(
  parseBody(AddUserBodySchema, { allowForm: true, strictContentType: true }),
  ({ email, password, role }) =>
    map(
      liftAsync((ctx: AppContext) => ctx.services.auth.addUser(email, password, role)),
      (user) => text(`User ${user.identity} added.`),
    ),
);
