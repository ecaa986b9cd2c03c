// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Process Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

import { createApp } from './api/app.js';
import { loadConfig } from './config/index.js';
import { createPersonalizationService, createProfileStore } from './core/personalization/index.js';
import { ShutdownCoordinator, createServerCloseHook } from './infrastructure/index.js';
import { getLogger, toError } from './logging/index.js';

const logger = getLogger({ component: 'server' });

function main(): void {
  const config = loadConfig();
  const store = createProfileStore();
  const service = createPersonalizationService(store);
  const app = createApp(service);

  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Personalization service listening', {
      port: config.server.port,
      host: config.server.host,
      environment: config.env.environment,
      storage: store.backend,
      feedbackBaseUrl: config.server.feedbackBaseUrl,
    });
  });

  const shutdown = new ShutdownCoordinator({ exit: code => process.exit(code) });
  shutdown.register('http-server', createServerCloseHook(server), { priority: 'critical' });
  shutdown.register('profile-store', () => store.close(), { priority: 'normal' });
  shutdown.installSignalHandlers();

  server.on('error', error => {
    logger.fatal('HTTP server failed', error);
    void shutdown.shutdown('server-error');
  });
}

try {
  main();
} catch (error) {
  logger.fatal('Failed to start', toError(error));
  process.exitCode = 1;
}
