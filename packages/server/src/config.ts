/**
 * @fileoverview Server configuration
 * @module @tasklink/server/config
 */

import { z } from 'zod';
import { loadConfig, toConfigurationError, type ClickUpConfig, type Env } from '@tasklink/clickup';

const serverEnvSchema = z.object({
  PORT: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? '8000' : value))
    .pipe(z.coerce.number().int().min(1).max(65535)),
  HOST: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? '0.0.0.0' : value.trim())),
});

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly clickup: ClickUpConfig;
}

/**
 * Read the listener settings and the ClickUp client configuration.
 *
 * @throws ConfigurationError naming every invalid variable
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const result = serverEnvSchema.safeParse(env);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }
  return Object.freeze({
    port: result.data.PORT,
    host: result.data.HOST,
    clickup: loadConfig(env),
  });
}
