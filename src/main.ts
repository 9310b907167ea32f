import { loadSettings, productionWarnings, SettingsError } from './config/settings.js';
import { createServer } from './createServer.js';
import { createLogger } from './logger.js';

async function start() {
  const settings = loadSettings();
  const app = await createServer({ settings });

  for (const warning of productionWarnings(settings)) {
    app.log.warn(warning);
  }

  await app.listen({ port: settings.port, host: settings.host });
  app.log.info({ port: settings.port, repo: settings.repo.kind, maxConcurrent: settings.maxConcurrentTasks }, 'server started');

  let closing = false;
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      if (closing) return;
      closing = true;
      app.log.info({ signal }, 'shutting down');
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error({ err: error }, 'error during shutdown');
          process.exit(1);
        }
      );
    });
  }
}

start().catch((error: unknown) => {
  const log = createLogger('error');
  if (error instanceof SettingsError) {
    log.fatal(error.message);
  } else {
    log.fatal({ err: error }, 'failed to start server');
  }
  process.exit(1);
});
