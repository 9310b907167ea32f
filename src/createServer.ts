import Fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { ulid } from 'ulid';
import { ZodError } from 'zod';
import { Settings } from './config/settings.js';
import { AppError, errorMessage, replyWithAppError } from './errors.js';
import { loggerOptions } from './logger.js';
import { requireApiKey } from './middleware/auth.js';
import { requestIdPlugin } from './middleware/request-id.js';
import { adminRoutes } from './routes/admin.js';
import { quotaRoutes } from './routes/quota.js';
import { sourceRoutes } from './routes/sources.js';
import { storageRoutes } from './routes/storage.js';
import { taskRoutes } from './routes/tasks.js';
import { buildServices, ServiceOverrides, Services } from './services.js';

declare module 'fastify' {
  interface FastifyInstance {
    services: Services;
  }
}

export const API_PREFIX = '/api/v1';

export interface ServerOpts {
  settings: Settings;
  overrides?: ServiceOverrides;
}

export async function createServer(opts: ServerOpts): Promise<FastifyInstance> {
  const { settings } = opts;

  const app = Fastify({
    logger: loggerOptions(settings.logLevel),
    genReqId: () => ulid(),
    bodyLimit: 64 * 1024,
  });

  const services = await buildServices(settings, app.log, opts.overrides);
  app.decorate('services', services);

  await app.register(helmet, { global: true });

  // CORS: closed unless origins are configured
  if (settings.corsOrigins.length > 0) {
    await app.register(cors, { origin: settings.corsOrigins });
  }

  await app.register(requestIdPlugin);

  app.setErrorHandler(async (err, request, reply) => {
    if (err instanceof AppError) {
      return replyWithAppError(reply, { type: err.type, message: err.message, fields: err.fields });
    }
    if (err instanceof ZodError) {
      return replyWithAppError(reply, { type: 'BAD_INPUT', key: 'BAD_INPUT_SCHEMA', devDetail: err.issues });
    }
    // Fastify's own 4xx (malformed JSON, body too large, unsupported media type)
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return replyWithAppError(reply, {
        type: 'BAD_INPUT',
        statusCode: err.statusCode,
        key: 'BAD_INPUT_SCHEMA',
        devDetail: err.message,
      });
    }
    request.log.error({ err: errorMessage(err) }, 'unhandled error');
    return replyWithAppError(reply, { type: 'INTERNAL', devDetail: err.message });
  });

  app.setNotFoundHandler(async (_request, reply) => {
    return replyWithAppError(reply, { type: 'NOT_FOUND', key: 'ROUTE_NOT_FOUND' });
  });

  app.get('/health', async () => ({
    status: 'ok',
    version: process.env.npm_package_version ?? 'dev',
    pending_tasks: await services.tasks.countActiveTasks(),
    repo: { kind: services.repo.kind },
    coordinator: services.coordinator.getStats(),
  }));

  await app.register(
    async (api) => {
      api.addHook('preHandler', requireApiKey(settings.apiKey));
      await api.register(taskRoutes(services));
      await api.register(sourceRoutes(services));
      await api.register(quotaRoutes(services));
      await api.register(storageRoutes(services));
      await api.register(adminRoutes(services));
    },
    { prefix: API_PREFIX }
  );

  app.addHook('onReady', async () => {
    await services.tasks.recoverInterrupted();
    services.scheduler.start();
  });

  app.addHook('onClose', async () => {
    await services.scheduler.stop();
    await services.coordinator.stop();
  });

  return app;
}
