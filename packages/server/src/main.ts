import { isTaskLinkError } from '@tasklink/errors';
import { createLogger } from '@tasklink/logger';
import { loadServerConfig, startServer } from './index.js';

const logger = createLogger({ component: 'main' });

try {
  const server = startServer(loadServerConfig(), {
    includeStack: process.env['NODE_ENV'] !== 'production',
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((error) => {
      if (error) {
        logger.error('Shutdown failed', { error });
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
} catch (error) {
  logger.fatal('Startup failed', {
    error,
    details: isTaskLinkError(error) ? error.details : undefined,
  });
  process.exitCode = 1;
}
