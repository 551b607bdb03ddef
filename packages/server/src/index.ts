/**
 * @fileoverview HTTP re-exposition server for the tasklink ClickUp client
 * @module @tasklink/server
 */

import { serve, type ServerType } from '@hono/node-server';
import { ClickUpClient } from '@tasklink/clickup';
import { createLogger } from '@tasklink/logger';
import { createApp, type AppOptions } from './app.js';
import type { ServerConfig } from './config.js';

export { createApp, type AppOptions } from './app.js';
export { loadServerConfig, type ServerConfig } from './config.js';

const logger = createLogger({ component: 'server' });

export interface StartServerOptions extends Partial<Omit<AppOptions, 'client'>> {
  /** Prebuilt client; by default one is built from `config.clickup` */
  client?: ClickUpClient;
}

/**
 * Serve the application on `config.host:config.port`.
 */
export function startServer(config: ServerConfig, options: StartServerOptions = {}): ServerType {
  const client = options.client ?? ClickUpClient.fromConfig(config.clickup);
  const app = createApp({ ...options, client });

  return serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info('Server listening', { host: config.host, port: info.port });
  });
}
