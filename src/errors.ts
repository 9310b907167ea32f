import type { FastifyReply } from 'fastify';
import { ErrKey, msg } from './lib/error-messages.js';

export type ErrorType =
  | 'BAD_INPUT'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'QUOTA_EXCEEDED'
  | 'RETRY_LATER'
  | 'INTERNAL';

export interface ApiError {
  error: {
    type: ErrorType;
    message: string;
    hint?: string;
    fields?: Record<string, unknown>;
  };
}

export interface CoreFailure {
  type: ErrorType;
  message: string;
  fields?: Record<string, unknown>;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: CoreFailure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(type: ErrorType, message: string, fields?: Record<string, unknown>): Result<T> {
  return { ok: false, error: { type, message, fields } };
}

export function errorResponse(type: ErrorType, message: string, hint?: string, fields?: Record<string, unknown>): ApiError {
  return { error: { type, message, hint, fields } };
}

export function errorTypeToStatus(type: ErrorType): number {
  switch (type) {
    case 'BAD_INPUT': return 400;
    case 'UNAUTHORIZED': return 401;
    case 'FORBIDDEN': return 403;
    case 'NOT_FOUND': return 404;
    case 'CONFLICT': return 409;
    case 'QUOTA_EXCEEDED': return 403;
    case 'RETRY_LATER': return 429;
    case 'INTERNAL':
    default: return 500;
  }
}

/**
 * Base class for errors that are allowed to reach the HTTP error handler.
 * Anything else is reported as INTERNAL.
 */
export class AppError extends Error {
  constructor(
    readonly type: ErrorType,
    message: string,
    readonly fields?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, fields?: Record<string, unknown>) {
    super('BAD_INPUT', message, fields);
    this.name = 'ValidationError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(readonly from: string, readonly to: string) {
    super('CONFLICT', `Invalid status transition: ${from} -> ${to}`, { from, to });
    this.name = 'InvalidTransitionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ReplyAppErrorArgs {
  type: ErrorType;
  statusCode?: number;     // defaults to the taxonomy mapping
  key?: ErrKey;            // catalogue key for the public phrase
  message?: string;        // explicit message (already formatted)
  hint?: string;
  fields?: Record<string, unknown>;
  devDetail?: unknown;     // internal-only detail for logs in non-prod
}

export function replyWithAppError(reply: FastifyReply, args: ReplyAppErrorArgs) {
  if (process.env.NODE_ENV !== 'production' && args.devDetail !== undefined) {
    reply.request.log.debug({ type: args.type, devDetail: args.devDetail }, 'error detail (dev only)');
  }

  const publicMessage = args.message ?? msg(args.key ?? 'INTERNAL_UNEXPECTED');
  const statusCode = args.statusCode ?? errorTypeToStatus(args.type);

  return reply.code(statusCode).send(
    errorResponse(args.type, publicMessage, args.hint, args.fields)
  );
}

export function replyWithFailure(reply: FastifyReply, failure: CoreFailure) {
  return replyWithAppError(reply, {
    type: failure.type,
    message: failure.message,
    fields: failure.fields,
  });
}
