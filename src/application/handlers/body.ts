/**
 * Gatehouse - Request Body Parsing
 *
 * Bodies are JSON objects (or urlencoded forms where a route accepts them)
 * whose field names are matched case-insensitively, then validated with a
 * zod schema. Every problem is a `BadRequest` or `UnsupportedMediaType`
 * failure naming what was wrong.
 */

import { z } from 'zod';
import { Errors, PipelineResult, failure, success } from '../../domain/result/Result';
import type { Effect } from '../../infrastructure/pipeline/effect';
import { GatehouseRequest, getHeader } from '../../infrastructure/platform/types';
import type { AppContext } from '../services';

const JSON_TYPE = 'application/json';
const FORM_TYPE = 'application/x-www-form-urlencoded';

/**
 * Media type without parameters, lower case; empty when absent
 */
export function mediaType(request: GatehouseRequest): string {
  const header = getHeader(request, 'content-type') ?? '';
  return header.split(';')[0].trim().toLowerCase();
}

function lowerCaseKeys(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key.toLowerCase(), value]));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonObject(body: string, path: string): PipelineResult<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return failure(Errors.badRequest('Request body is not valid JSON', path));
  }

  if (!isRecord(parsed)) {
    return failure(Errors.badRequest('Request body must be a JSON object', path));
  }
  return success(lowerCaseKeys(parsed));
}

export function parseForm(body: string): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of new URLSearchParams(body)) {
    fields[key.toLowerCase()] = value;
  }
  return fields;
}

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  path: string,
): PipelineResult<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return failure(Errors.badRequest(details, path));
  }
  return success(parsed.data);
}

export interface BodyOptions {
  /** Also accept application/x-www-form-urlencoded */
  allowForm?: boolean;

  /** Reject bodies not declared as JSON (or form); otherwise the body is read as JSON whatever its type */
  strictContentType?: boolean;
}

/**
 * Effect reading and validating the request body
 */
export function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: BodyOptions = {},
): Effect<AppContext, T> {
  return async ({ request }) => {
    const { path, body } = request;
    const type = mediaType(request);

    if (options.allowForm && type === FORM_TYPE) {
      return validate(schema, parseForm(body), path);
    }

    if (options.strictContentType && type !== JSON_TYPE) {
      return failure(Errors.unsupportedMediaType(type === '' ? 'none' : type, path));
    }

    const fields = parseJsonObject(body, path);
    return fields.ok ? validate(schema, fields.value, path) : fields;
  };
}
