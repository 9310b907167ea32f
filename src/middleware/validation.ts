import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../errors.js';
import { ErrKey, msg } from '../lib/error-messages.js';

function issues(error: ZodError): Record<string, unknown> {
  return {
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  };
}

function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, key: ErrKey): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(msg(key), issues(parsed.error));
  }
  return parsed.data;
}

export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  return parseWith(schema, body ?? {}, 'BAD_INPUT_SCHEMA');
}

export function parseQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>, query: unknown): T {
  return parseWith(schema, query, 'BAD_QUERY_PARAMS');
}

export function parseParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, params: unknown): T {
  return parseWith(schema, params, 'BAD_PATH_PARAMS');
}
