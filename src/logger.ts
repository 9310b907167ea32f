import pino from 'pino';

/**
 * Structural logger type shared by the core components.
 * Satisfied by a pino logger and by Fastify's `app.log`.
 */
export type Logger = pino.BaseLogger & {
  child(bindings: pino.Bindings): Logger;
};

export function loggerOptions(level: string): pino.LoggerOptions {
  return {
    level,
    // Never log bodies or the shared secret
    redact: {
      paths: ['req.body', 'reply.body', 'req.headers["x-api-key"]', 'headers["x-api-key"]'],
      remove: true,
    },
  };
}

export function createLogger(level = 'info'): pino.Logger {
  return pino(loggerOptions(level));
}
