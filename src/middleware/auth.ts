import { FastifyReply, FastifyRequest } from 'fastify';
import { replyWithAppError } from '../errors.js';

declare module 'fastify' {
  interface FastifyContextConfig {
    /** Route is reachable without the API key. */
    public?: boolean;
  }
}

export const ANONYMOUS_USER = 'anonymous';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Shared-secret check on `X-API-Key`; a no-op when no key is configured. */
export function requireApiKey(expectedKey: string | null) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!expectedKey || request.routeOptions.config.public) return;

    const apiKey = headerValue(request.headers['x-api-key']);
    if (!apiKey) {
      return replyWithAppError(reply, { type: 'UNAUTHORIZED', key: 'API_KEY_REQUIRED' });
    }
    if (apiKey !== expectedKey) {
      return replyWithAppError(reply, { type: 'FORBIDDEN', key: 'API_KEY_INVALID' });
    }
  };
}

export function userIdOf(request: FastifyRequest): string {
  return headerValue(request.headers['x-user-id'])?.trim() || ANONYMOUS_USER;
}
